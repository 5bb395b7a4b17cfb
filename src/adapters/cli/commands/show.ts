import { Command } from 'commander';
import { SummaryStore, parseVideoId } from '../../../core/index.js';
import { exitWithError } from '../errors.js';
import type { SummaryRecord } from '../../../types/index.js';

export function printSummary(record: SummaryRecord): void {
  console.log('[Detailed summary]');
  for (const part of record.detail) {
    console.log(`・${part}\n`);
  }
  console.log('\n[Concise summary]');
  console.log(record.concise);
}

export function createShowCommand(): Command {
  const command = new Command('show')
    .description('Print the stored summary of a video')
    .requiredOption('--vid <id>', 'YouTube video id or URL')
    .option('--dir <dir>', 'summary store directory (default: $SUMMARY_STORE_DIR or ./summaries)')
    .action(async (options: { vid: string; dir?: string }) => {
      const store = new SummaryStore(options.dir || process.env.SUMMARY_STORE_DIR || './summaries');

      let videoId: string;
      let record: SummaryRecord | null;
      try {
        videoId = parseVideoId(options.vid);
        record = await store.find(videoId);
      } catch (error) {
        exitWithError(error, false);
      }

      if (!record) {
        console.log('❌ No stored summary.');
        console.log(`   Path: ${store.pathFor(videoId)}`);
        process.exit(1);
      }

      console.log(`🎬 ${record.title}`);
      console.log(`   ${record.url}\n`);
      printSummary(record);
    });

  return command;
}
