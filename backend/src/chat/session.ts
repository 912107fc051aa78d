import type { AIService, ConversationHandle } from '../ai/index.js';
import { SessionBusyError } from './chat.errors.js';
import { ConversationStore } from './conversation-store.js';

/**
 * 一次交互会话：独占自己的历史与远端对话句柄，同一时间只处理一轮。
 */
export class Session {
  readonly store = new ConversationStore();
  readonly createdAt: Date;

  private handle: ConversationHandle | null = null;
  private busy = false;
  private lastActiveAt: number;

  constructor(
    readonly id: string,
    now: Date = new Date(),
  ) {
    this.createdAt = now;
    this.lastActiveAt = now.getTime();
  }

  get isBusy(): boolean {
    return this.busy;
  }

  get lastActivity(): number {
    return this.lastActiveAt;
  }

  touch(now: number = Date.now()): void {
    this.lastActiveAt = now;
  }

  beginTurn(): void {
    if (this.busy) {
      throw new SessionBusyError(this.id);
    }
    this.busy = true;
    this.touch();
  }

  endTurn(): void {
    this.busy = false;
    this.touch();
  }

  /**
   * 返回当前对话句柄；首次使用或上一轮失败后，从本地协议历史重新建立。
   */
  conversation(client: Pick<AIService, 'open'>): ConversationHandle {
    if (!this.handle) {
      this.handle = client.open(this.store.protocolHistory());
    }
    return this.handle;
  }

  resetConversation(): void {
    this.handle = null;
  }
}
