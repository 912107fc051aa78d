import { createModelTurn, type ModelTurn } from '../ai/index.js';
import type { ChatMessage, ChatMessageRole } from './chat.types.js';

/**
 * 会话内只追加的双份历史：展示用的 ChatMessage 与生成服务用的 ModelTurn。
 * 两个列表始终等长，且角色逐位对应（user↔user，assistant↔model）。
 */
export class ConversationStore {
  private readonly messages: ChatMessage[] = [];
  private readonly turns: ModelTurn[] = [];

  get size(): number {
    return this.messages.length;
  }

  appendUser(text: string): ChatMessage {
    return this.append('user', text);
  }

  appendAssistant(text: string): ChatMessage {
    return this.append('assistant', text);
  }

  history(): readonly ChatMessage[] {
    return [...this.messages];
  }

  protocolHistory(): readonly ModelTurn[] {
    return [...this.turns];
  }

  private append(role: ChatMessageRole, content: string): ChatMessage {
    // 先构造好两条记录再写入，保证要么都追加要么都不追加
    const message: ChatMessage = Object.freeze({ role, content });
    const turn = createModelTurn(role === 'user' ? 'user' : 'model', content);

    this.messages.push(message);
    this.turns.push(turn);
    return message;
  }
}
