import { describe, expect, it } from '@jest/globals';
import type {
  LanguageModelV2,
  LanguageModelV2CallOptions,
  LanguageModelV2StreamPart,
} from '@ai-sdk/provider';
import { APICallError } from 'ai';

import { RemoteServiceError } from '../ai.errors.js';
import type { StreamTextOptions } from '../ai.types.js';
import {
  type ChatModel,
  LanguageModelProvider,
} from './language-model.provider.js';

type StreamResponse = { stream: ReadableStream<LanguageModelV2StreamPart> };

/** Model stub that records every streaming call it receives. */
class StubLanguageModel implements LanguageModelV2 {
  readonly specificationVersion = 'v2';
  readonly provider = 'stub';
  readonly modelId = 'stub-model';
  readonly supportedUrls: Record<string, RegExp[]> = {};
  readonly calls: LanguageModelV2CallOptions[] = [];

  constructor(
    private readonly respond: (
      options: LanguageModelV2CallOptions,
    ) => StreamResponse,
  ) {}

  async doGenerate(): Promise<never> {
    throw new Error('doGenerate is not used');
  }

  async doStream(
    options: LanguageModelV2CallOptions,
  ): Promise<StreamResponse> {
    this.calls.push(options);
    return this.respond(options);
  }
}

class StubProvider extends LanguageModelProvider {
  public readonly name = 'stub';

  constructor(private readonly languageModel: StubLanguageModel) {
    super({ apiKey: 'test-secret', chatModel: 'stub-model' });
  }

  protected getChatModel(): ChatModel {
    return this.languageModel;
  }
}

const options: StreamTextOptions = {
  messages: [{ role: 'user', content: 'no internet' }],
};

async function collect(stream: AsyncIterable<string>): Promise<string[]> {
  const fragments: string[] = [];
  for await (const fragment of stream) {
    fragments.push(fragment);
  }
  return fragments;
}

describe('LanguageModelProvider', () => {
  it('streams text deltas from the model', async () => {
    const model = new StubLanguageModel(() => ({
      stream: new ReadableStream<LanguageModelV2StreamPart>({
        start(controller) {
          controller.enqueue({ type: 'stream-start', warnings: [] });
          controller.enqueue({ type: 'text-start', id: 't1' });
          controller.enqueue({
            type: 'text-delta',
            id: 't1',
            delta: 'Check ',
          });
          controller.enqueue({
            type: 'text-delta',
            id: 't1',
            delta: 'cables.',
          });
          controller.enqueue({ type: 'text-end', id: 't1' });
          controller.enqueue({
            type: 'finish',
            finishReason: 'stop',
            usage: { inputTokens: 3, outputTokens: 2, totalTokens: 5 },
          });
          controller.close();
        },
      }),
    }));

    const provider = new StubProvider(model);
    const fragments = await collect(provider.streamText(options));

    expect(fragments).toEqual(['Check ', 'cables.']);
  });

  it('reports rate limiting after a single attempt', async () => {
    const model = new StubLanguageModel(() => {
      throw new APICallError({
        message: 'Too Many Requests',
        url: 'https://model.invalid/v1/stream',
        requestBodyValues: {},
        statusCode: 429,
        isRetryable: true,
      });
    });

    const failure = collect(new StubProvider(model).streamText(options));

    await expect(failure).rejects.toBeInstanceOf(RemoteServiceError);
    await expect(failure).rejects.toMatchObject({
      code: 'QUOTA_EXCEEDED',
      statusCode: 429,
    });
    expect(model.calls).toHaveLength(1);
  });

  it('hands the abort signal to the model request', async () => {
    const abortController = new AbortController();
    const model = new StubLanguageModel((callOptions) => ({
      stream: new ReadableStream<LanguageModelV2StreamPart>({
        start(controller) {
          controller.enqueue({ type: 'stream-start', warnings: [] });
          controller.enqueue({ type: 'text-start', id: 't1' });
          controller.enqueue({ type: 'text-delta', id: 't1', delta: 'Hel' });
          callOptions.abortSignal?.addEventListener('abort', () =>
            controller.error(callOptions.abortSignal?.reason),
          );
        },
      }),
    }));

    const iterator = new StubProvider(model)
      .streamText({ ...options, abortSignal: abortController.signal })
      [Symbol.asyncIterator]();

    await expect(iterator.next()).resolves.toEqual({
      done: false,
      value: 'Hel',
    });
    abortController.abort();

    expect(model.calls).toHaveLength(1);
    expect(model.calls[0].abortSignal?.aborted).toBe(true);
  });
});
