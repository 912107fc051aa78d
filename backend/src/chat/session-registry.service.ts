import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'node:crypto';
import type { AppConfig, ChatConfig } from '../config/index.js';
import { SessionNotFoundError } from './chat.errors.js';
import { Session } from './session.js';

/**
 * 进程内的会话表。会话只存在于内存中，结束或闲置超时后丢弃。
 */
@Injectable()
export class SessionRegistry {
  private readonly logger = new Logger(SessionRegistry.name);
  private readonly sessions = new Map<string, Session>();
  private readonly idleTtlMs: number;

  constructor(configService: ConfigService<AppConfig>) {
    this.idleTtlMs =
      configService.get<ChatConfig>('chat')?.sessionIdleTtlMs ?? 0;
  }

  get size(): number {
    return this.sessions.size;
  }

  create(): Session {
    this.prune();
    const session = new Session(randomUUID());
    this.sessions.set(session.id, session);
    return session;
  }

  get(sessionId: string): Session {
    this.prune();
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  end(sessionId: string): void {
    if (!this.sessions.delete(sessionId)) {
      throw new SessionNotFoundError(sessionId);
    }
  }

  /**
   * 清理闲置超时的会话，正在回答中的会话不会被清理
   */
  prune(now: number = Date.now()): number {
    if (this.idleTtlMs <= 0) {
      return 0;
    }

    let removed = 0;
    for (const [id, session] of this.sessions) {
      if (!session.isBusy && now - session.lastActivity > this.idleTtlMs) {
        this.sessions.delete(id);
        removed++;
      }
    }

    if (removed > 0) {
      this.logger.log(`Pruned ${removed} idle session(s)`);
    }
    return removed;
  }
}
