import { Command, InvalidArgumentError } from 'commander';
import { config as loadEnv } from 'dotenv';
import {
  GeminiClient,
  MarkdownGenerator,
  QaSession,
  Summarizer,
  SummaryStore,
  TranscriptQa,
  YouTubeClient,
  parseVideoId,
} from '../../../core/index.js';
import { loadConfig } from '../config.js';
import { exitWithError } from '../errors.js';
import { createConsoleIo } from '../io.js';
import { printSummary } from './show.js';
import type { AppConfig } from '../../../types/index.js';

loadEnv();

const DEFAULT_REF_SOURCE = 3;

interface DigestCommandOptions {
  vid: string;
  source: number;
  detail?: boolean;
  debug?: boolean;
  summary?: boolean;
  markdown?: string;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function createDigestCommand(): Command {
  const command = new Command('digest')
    .description('Answer questions about a video, or summarize it with --summary')
    .requiredOption('--vid <id>', 'YouTube video id or URL')
    .option(
      '--source <number>',
      'number of transcript passages used to answer a query',
      parsePositiveInt,
      DEFAULT_REF_SOURCE
    )
    .option('--detail', 'show the passages each answer was based on')
    .option('--debug', 'print debug information')
    .option('--summary', 'summarize the video instead of answering questions')
    .option('--markdown <file>', 'also write the summary as markdown (with --summary)')
    .action(async (options: DigestCommandOptions) => {
      const verbose = options.debug === true;

      let config: AppConfig;
      try {
        config = loadConfig(process.env);
      } catch (error) {
        exitWithError(error, verbose);
      }

      const youtube = new YouTubeClient(config.youtubeApiKey);
      const gemini = new GeminiClient(config.gemini);
      const store = new SummaryStore(config.summaryStoreDir);
      const onDebug = verbose ? (message: string) => console.log(`🔍 ${message}`) : undefined;

      if (verbose) {
        console.log(`🤖 Gemini model: ${config.gemini.model}`);
      }

      try {
        const videoId = parseVideoId(options.vid);

        if (options.summary) {
          const summarizer = new Summarizer(
            { transcripts: youtube, metadata: youtube, generator: gemini, store },
            { locale: config.locale },
            {
              onProgress: (message: string) => console.log(`ℹ️  ${message}`),
              onDebug,
            }
          );
          const record = await summarizer.run(videoId);
          printSummary(record);

          if (options.markdown) {
            const generator = new MarkdownGenerator();
            await generator.writeToFile(generator.generate(record, { locale: config.locale }), options.markdown);
            console.log(`📄 Markdown written: ${options.markdown}`);
          }
          return;
        }

        const qa = new TranscriptQa(
          { transcripts: youtube, generator: gemini, embedder: gemini },
          { locale: config.locale, onDebug }
        );
        console.log('ℹ️  Preparing transcript index...');
        await qa.prepare(videoId);

        const io = createConsoleIo();
        try {
          const session = new QaSession({
            backend: qa,
            io,
            hints: store,
            sourceCount: options.source,
            showSources: options.detail === true,
            onDebug,
          });
          await session.run(videoId);
        } finally {
          io.close();
        }
      } catch (error) {
        exitWithError(error, verbose);
      }
    });

  return command;
}
