import { DigestError } from '../errors.js';
import type { AnswerBackend, QaSource, SummaryHintSource } from '../../types/index.js';

export interface QaIo {
  question(prompt: string): Promise<string>;
  print(line: string): void;
}

export interface QaSessionOptions {
  backend: AnswerBackend;
  io: QaIo;
  hints?: SummaryHintSource;
  sourceCount: number;
  showSources: boolean;
  onDebug?: (message: string) => void;
}

/**
 * Read queries until an empty line, answering each one in turn.
 */
export class QaSession {
  private options: QaSessionOptions;

  constructor(options: QaSessionOptions) {
    this.options = options;
  }

  async run(videoId: string): Promise<number> {
    const { backend, io, sourceCount, showSources } = this.options;

    const hint = await this.loadHint(videoId);
    if (hint) {
      io.print(`(Summary) ${hint}\n`);
    }

    let turns = 0;
    for (;;) {
      const query = (await io.question('Query: ')).trim();
      if (query === '') break;

      const { answer, sources } = await backend.ask(query, sourceCount);
      io.print(`Answer: ${answer}\n`);
      turns++;

      if (showSources) {
        for (const source of sources) {
          io.print(formatSource(source));
        }
        io.print('');
      }
    }

    return turns;
  }

  private async loadHint(videoId: string): Promise<string | null> {
    if (!this.options.hints) return null;
    try {
      return await this.options.hints.findConcise(videoId);
    } catch (error) {
      // a stored summary only decorates the session
      if (error instanceof DigestError) {
        this.options.onDebug?.(`summary hint skipped: ${error.message}`);
        return null;
      }
      throw error;
    }
  }
}

export function formatSource(source: QaSource): string {
  return `--- ${source.timeLabel} (${source.chunkId} [${source.score.toFixed(3)}]) ---\n ${source.text}`;
}
