import { createGoogleGenerativeAI } from '@ai-sdk/google';
import type { ProviderCredentials } from '../../config/index.js';
import {
  LanguageModelProvider,
  type ChatModel,
} from './language-model.provider.js';

export class GeminiProvider extends LanguageModelProvider {
  public readonly name = 'google';

  private readonly client: ReturnType<typeof createGoogleGenerativeAI>;

  constructor(credentials: ProviderCredentials, temperature?: number) {
    super(credentials, temperature);
    this.client = createGoogleGenerativeAI({
      apiKey: this.requireApiKey('GEMINI_API_KEY'),
    });
    this.logger.log(
      `Gemini provider initialized with chat model: ${this.model}`,
    );
  }

  protected getChatModel(modelName: string): ChatModel {
    return this.client(modelName);
  }
}
