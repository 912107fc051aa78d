import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  NotFoundException,
  Param,
  Post,
  Res,
} from '@nestjs/common';
import type { Response } from 'express';
import { randomUUID } from 'node:crypto';
import {
  sendMessageRequestSchema,
  type ChatSseEvent,
  type SessionSummary,
} from '@netassist/types';
import { formatZodError } from '../common/parse-payload.js';
import { SessionBusyError, SessionNotFoundError } from './chat.errors.js';
import { ChatService } from './chat.service.js';
import type { ChatMessage, ChatTurnEvent } from './chat.types.js';
import type { Session } from './session.js';
import { SessionRegistry } from './session-registry.service.js';

const SSE_HEADERS: Record<string, string> = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache, no-transform',
  Connection: 'keep-alive',
};

export const RETRY_SUGGESTION = 'Please try again or rephrase your question.';

@Controller({
  path: 'api/v1/sessions',
})
export class ChatController {
  private readonly logger = new Logger(ChatController.name);

  constructor(
    private readonly chatService: ChatService,
    private readonly sessions: SessionRegistry,
  ) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  createSession(): { data: SessionSummary } {
    const session = this.sessions.create();
    return {
      data: { id: session.id, createdAt: session.createdAt.toISOString() },
    };
  }

  @Get(':sessionId/messages')
  listMessages(@Param('sessionId') sessionId: string): {
    data: readonly ChatMessage[];
  } {
    return { data: this.findSession(sessionId).store.history() };
  }

  @Delete(':sessionId')
  @HttpCode(HttpStatus.NO_CONTENT)
  endSession(@Param('sessionId') sessionId: string): void {
    try {
      this.sessions.end(sessionId);
    } catch (error) {
      throw this.toHttpException(error);
    }
  }

  @Post(':sessionId/messages')
  async sendMessage(
    @Param('sessionId') sessionId: string,
    @Body() body: unknown,
    @Res() res: Response,
  ): Promise<void> {
    const requestId = randomUUID();

    const parsed = sendMessageRequestSchema.safeParse(body);
    if (!parsed.success) {
      const message = formatZodError(parsed.error);
      this.logger.warn(`Chat request ${requestId} rejected: ${message}`);
      res.status(HttpStatus.BAD_REQUEST).json({
        type: 'error',
        data: { code: 'CHAT_BAD_REQUEST', message, requestId },
      });
      return;
    }

    let session: Session;
    try {
      session = this.sessions.get(sessionId);
    } catch (error) {
      this.rejectBeforeStream(res, requestId, error);
      return;
    }

    if (session.isBusy) {
      this.rejectBeforeStream(res, requestId, new SessionBusyError(sessionId));
      return;
    }

    // 仅在开发环境记录请求开始日志
    if (process.env.NODE_ENV === 'development') {
      this.logger.log(
        `Chat request ${requestId} started (session=${sessionId})`,
      );
    }

    res.writeHead(HttpStatus.OK, SSE_HEADERS);
    res.flushHeaders?.();

    const writeEvent = (event: ChatSseEvent) => {
      res.write(`data: ${JSON.stringify(event)}\n\n`);
    };

    try {
      const result = await this.chatService.submit(
        session,
        parsed.data.message,
        (event) => writeEvent(this.toSseEvent(event)),
      );

      if (result.ok) {
        writeEvent({ type: 'message', data: result.message });
        writeEvent({ type: 'done' });
      } else {
        this.logger.warn(
          `Chat request ${requestId} failed [${result.error.code}]: ${result.error.message}`,
        );
        writeEvent({
          type: 'error',
          data: {
            code: result.error.code,
            message: result.error.message,
            suggestion: RETRY_SUGGESTION,
            requestId,
          },
        });
      }
    } catch (error) {
      const code =
        error instanceof SessionBusyError ? error.code : 'CHAT_INTERNAL_ERROR';

      this.logger.error(
        `Chat request ${requestId} failed [${code}]: ${
          error instanceof Error ? error.message : String(error)
        }`,
        error instanceof Error ? error.stack : undefined,
      );

      writeEvent({
        type: 'error',
        data: {
          code,
          message:
            error instanceof SessionBusyError
              ? error.message
              : 'An internal error occurred while answering.',
          suggestion: RETRY_SUGGESTION,
          requestId,
        },
      });
    } finally {
      res.end();
    }
  }

  private findSession(sessionId: string): Session {
    try {
      return this.sessions.get(sessionId);
    } catch (error) {
      throw this.toHttpException(error);
    }
  }

  private toHttpException(error: unknown): unknown {
    if (error instanceof SessionNotFoundError) {
      return new NotFoundException(error.message);
    }
    return error;
  }

  private rejectBeforeStream(
    res: Response,
    requestId: string,
    error: unknown,
  ): void {
    if (error instanceof SessionNotFoundError) {
      res.status(HttpStatus.NOT_FOUND).json({
        type: 'error',
        data: { code: error.code, message: error.message, requestId },
      });
      return;
    }
    if (error instanceof SessionBusyError) {
      res.status(HttpStatus.CONFLICT).json({
        type: 'error',
        data: { code: error.code, message: error.message, requestId },
      });
      return;
    }
    throw error;
  }

  private toSseEvent(event: ChatTurnEvent): ChatSseEvent {
    switch (event.type) {
      case 'status':
        return {
          type: 'status',
          data: { step: event.step, label: event.label },
        };
      case 'retrieval':
        return {
          type: 'retrieval',
          data: {
            matched: event.result.matched,
            trigger: event.result.trigger,
            title: event.result.title,
          },
        };
      case 'update':
        return { type: 'update', data: event.update };
    }
  }
}
