import { Command } from 'commander';
import { createDigestCommand } from './commands/digest.js';
import { createShowCommand } from './commands/show.js';

export function createCLI(): Command {
  const program = new Command()
    .name('video-digest')
    .description('Summarize a YouTube video from its transcript, or ask questions about it')
    .version('1.0.0');

  program.addCommand(createDigestCommand(), { isDefault: true });
  program.addCommand(createShowCommand());

  return program;
}
