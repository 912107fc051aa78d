import { Inject, Injectable } from '@nestjs/common';
import { AI_PROVIDER_TOKEN } from './ai.constants.js';
import type { ModelTurn } from './ai.types.js';
import { ConversationHandle } from './conversation-handle.js';
import type { AiProvider } from './providers/ai-provider.js';

@Injectable()
export class AIService {
  constructor(
    @Inject(AI_PROVIDER_TOKEN) private readonly provider: AiProvider,
  ) {}

  get providerName(): string {
    return this.provider.name;
  }

  get modelName(): string {
    return this.provider.model;
  }

  /**
   * 以已有的轮次为上下文开启一段对话
   */
  open(priorTurns: readonly ModelTurn[]): ConversationHandle {
    return new ConversationHandle(this.provider, priorTurns);
  }
}
