import type { StreamTextOptions } from '../ai.types.js';

export interface AiProvider {
  readonly name: string;
  readonly model: string;
  streamText(options: StreamTextOptions): AsyncIterable<string>;
}
