import { toRemoteServiceError } from './ai.errors.js';
import type { AiMessage, ModelTurn } from './ai.types.js';
import { createModelTurn, toAiMessage } from './model-turn.js';
import type { AiProvider } from './providers/ai-provider.js';

/**
 * 与生成服务之间的一段有状态对话。
 *
 * 每次 send 完整消费后，发送的 prompt 与拼接出的回复会作为后续两轮被记住；
 * 失败或被提前放弃的流不会留下任何记录。
 */
export class ConversationHandle {
  private readonly turns: ModelTurn[];

  constructor(
    private readonly provider: AiProvider,
    priorTurns: readonly ModelTurn[],
  ) {
    this.turns = [...priorTurns];
  }

  get history(): readonly ModelTurn[] {
    return [...this.turns];
  }

  async *send(
    prompt: string,
    abortSignal?: AbortSignal,
  ): AsyncGenerator<string, void, undefined> {
    const messages: AiMessage[] = [
      ...this.turns.map(toAiMessage),
      { role: 'user', content: prompt },
    ];

    let reply = '';
    try {
      for await (const fragment of this.provider.streamText({
        messages,
        abortSignal,
      })) {
        reply += fragment;
        yield fragment;
      }
    } catch (error) {
      throw toRemoteServiceError(error);
    }

    this.turns.push(
      createModelTurn('user', prompt),
      createModelTurn('model', reply),
    );
  }
}
