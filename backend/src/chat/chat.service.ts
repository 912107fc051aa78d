import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AIService } from '../ai/index.js';
import type { AppConfig, ChatConfig } from '../config/index.js';
import { RETRIEVER_TOKEN, type Retriever } from '../knowledge/index.js';
import type { ChatTurnEvent, ChatTurnResult } from './chat.types.js';
import {
  composePrompt,
  NETWORK_ASSISTANT_INSTRUCTION,
} from './prompt-composer.js';
import { ResponseAssembler } from './response-assembler.js';
import type { Session } from './session.js';
import { withDeadline } from './stream-deadline.js';

/**
 * 检索增强的单轮对话流程：
 * 记录用户消息 → 关键词检索 → 拼接 prompt → 流式生成 → 成功后记录助手消息。
 * 失败不会重试，用户消息保留，助手消息不提交。
 */
@Injectable()
export class ChatService {
  private readonly logger = new Logger(ChatService.name);
  private readonly assembler = new ResponseAssembler();
  private readonly streamTimeoutMs: number;

  constructor(
    private readonly aiService: AIService,
    @Inject(RETRIEVER_TOKEN) private readonly retriever: Retriever,
    configService: ConfigService<AppConfig>,
  ) {
    this.streamTimeoutMs =
      configService.get<ChatConfig>('chat')?.streamTimeoutMs ?? 0;
  }

  async submit(
    session: Session,
    text: string,
    onEvent?: (event: ChatTurnEvent) => void,
  ): Promise<ChatTurnResult> {
    if (text.trim().length === 0) {
      throw new Error('message must not be empty');
    }

    session.beginTurn();
    try {
      // 句柄需在追加本轮用户消息之前建立，避免同一条消息被发送两次
      const conversation = session.conversation(this.aiService);
      session.store.appendUser(text);

      const retrieval = this.retriever.retrieve(text);
      onEvent?.({ type: 'retrieval', result: retrieval });

      // 仅在开发环境记录详细日志
      if (process.env.NODE_ENV === 'development') {
        this.logger.debug(
          `[Session ${session.id}] retrieval ${
            retrieval.matched ? `matched "${retrieval.trigger}"` : 'missed'
          }`,
        );
      }

      const augmentedPrompt = composePrompt(
        NETWORK_ASSISTANT_INSTRUCTION,
        retrieval.document,
        text,
      );

      onEvent?.({ type: 'status', step: 'thinking', label: 'Thinking...' });

      const abortController = new AbortController();
      const result = await this.assembler.assemble(
        withDeadline(
          conversation.send(augmentedPrompt, abortController.signal),
          this.streamTimeoutMs,
          abortController,
        ),
        (update) => onEvent?.({ type: 'update', update }),
      );

      if (!result.ok) {
        // 远端上下文可能与本地历史不一致，下一轮从本地历史重建
        session.resetConversation();
        const { error, partial } = result;
        this.logger.warn(
          `[Session ${session.id}] response failed [${error.code}] after ${
            partial.length
          } chars: ${error.cause instanceof Error ? error.cause.message : error.message}`,
        );
        return { ok: false, error, retrieval };
      }

      const message = session.store.appendAssistant(result.text);
      return { ok: true, message, retrieval };
    } finally {
      session.endTurn();
    }
  }
}
