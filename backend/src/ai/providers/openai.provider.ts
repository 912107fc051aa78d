import { createOpenAI } from '@ai-sdk/openai';
import type { ProviderCredentials } from '../../config/index.js';
import {
  LanguageModelProvider,
  type ChatModel,
} from './language-model.provider.js';

export class OpenAiProvider extends LanguageModelProvider {
  public readonly name = 'openai';

  private readonly client: ReturnType<typeof createOpenAI>;

  constructor(credentials: ProviderCredentials, temperature?: number) {
    super(credentials, temperature);
    this.client = createOpenAI({
      apiKey: this.requireApiKey('OPENAI_API_KEY'),
    });
    this.logger.log(
      `OpenAI provider initialized with chat model: ${this.model}`,
    );
  }

  protected getChatModel(modelName: string): ChatModel {
    return this.client(modelName);
  }
}
