import { ChainInvocationError, DigestError, type ChainStage } from '../errors.js';
import { getErrorDetail, renderTemplate } from '../gemini/index.js';
import type { TextGenerator } from '../../types/index.js';

export const MAP_OUTPUT_SEPARATOR = '\n\n';

export interface MapReduceChainConfig {
  mapTemplate: string; // must contain {text}
  reduceTemplate: string; // must contain {text}
  onDebug?: (message: string) => void;
}

/**
 * Summarize each document with the map template, then combine the partial
 * summaries with the reduce template. Calls are issued one at a time.
 */
export class MapReduceChain {
  private generator: TextGenerator;
  private mapTemplate: string;
  private reduceTemplate: string;
  private onDebug?: (message: string) => void;

  constructor(generator: TextGenerator, config: MapReduceChainConfig) {
    for (const [name, template] of [
      ['map', config.mapTemplate],
      ['reduce', config.reduceTemplate],
    ] as const) {
      if (!template.includes('{text}')) {
        throw new DigestError(`The ${name} template has no {text} placeholder`);
      }
    }

    this.generator = generator;
    this.mapTemplate = config.mapTemplate;
    this.reduceTemplate = config.reduceTemplate;
    this.onDebug = config.onDebug;
  }

  async run(documents: string[]): Promise<string> {
    if (documents.length === 0) {
      throw new DigestError('Map-reduce chain needs at least one document');
    }

    const partials: string[] = [];
    for (let i = 0; i < documents.length; i++) {
      this.onDebug?.(`map ${i + 1}/${documents.length} (${documents[i].length} chars)`);
      partials.push(await this.call('map', renderTemplate(this.mapTemplate, documents[i])));
    }

    this.onDebug?.(`reduce ${partials.length} partial summaries`);
    return this.call('reduce', renderTemplate(this.reduceTemplate, partials.join(MAP_OUTPUT_SEPARATOR)));
  }

  private async call(stage: ChainStage, prompt: string): Promise<string> {
    try {
      return await this.generator.generate(prompt);
    } catch (error) {
      if (error instanceof ChainInvocationError) throw error.relabel(stage);
      if (error instanceof DigestError) throw error;
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ChainInvocationError(stage, getErrorDetail(cause), { cause });
    }
  }
}
