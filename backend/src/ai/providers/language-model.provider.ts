import { Logger } from '@nestjs/common';
import { streamText as aiStreamText } from 'ai';
import { ConfigurationError } from '../../config/index.js';
import type { ProviderCredentials } from '../../config/index.js';
import { RemoteServiceError, toRemoteServiceError } from '../ai.errors.js';
import type { StreamTextOptions } from '../ai.types.js';
import type { AiProvider } from './ai-provider.js';

type StreamTextParams = Parameters<typeof aiStreamText>[0];

export type ChatModel = StreamTextParams['model'];

/**
 * 基于 AI SDK 的 provider 公共实现，子类只负责创建具体的模型客户端。
 */
export abstract class LanguageModelProvider implements AiProvider {
  public abstract readonly name: string;

  protected readonly logger = new Logger(this.constructor.name);

  protected constructor(
    protected readonly credentials: ProviderCredentials,
    private readonly temperature?: number,
  ) {}

  get model(): string {
    return this.credentials.chatModel;
  }

  async *streamText(options: StreamTextOptions): AsyncIterable<string> {
    // AI SDK 5.0 默认吞掉流内错误，交给 onError 回调
    let streamError: unknown;
    let deltaCount = 0;
    try {
      const streamOptions: StreamTextParams = {
        model: this.getChatModel(this.model),
        messages: options.messages,
        // 失败直接交给调用方，重试会让远端上下文与本地历史不一致
        maxRetries: 0,
        onError: ({ error }) => {
          streamError = error;
        },
      };

      if (options.abortSignal) {
        streamOptions.abortSignal = options.abortSignal;
      }

      if (this.temperature !== undefined) {
        streamOptions.temperature = this.temperature;
      }

      const result = aiStreamText(streamOptions);

      for await (const delta of result.textStream) {
        deltaCount++;
        yield delta;
      }

      if (streamError !== undefined) {
        throw streamError;
      }

      const finishReason = await result.finishReason;
      if (finishReason === 'content-filter') {
        throw new RemoteServiceError('SAFETY_BLOCKED');
      }
    } catch (error) {
      const remoteError = toRemoteServiceError(error);
      this.logger.error(
        `${this.name} streaming failed after ${deltaCount} deltas [${remoteError.code}]`,
        error instanceof Error ? error.stack : String(error),
      );
      throw remoteError;
    }
  }

  protected abstract getChatModel(modelName: string): ChatModel;

  protected requireApiKey(variable: string): string {
    if (!this.credentials.apiKey) {
      throw new ConfigurationError([`${variable}: API key is not configured`]);
    }
    return this.credentials.apiKey;
  }
}
