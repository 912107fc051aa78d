import { Inject, Injectable, Logger } from '@nestjs/common';
import type { KnowledgeBase } from './knowledge-base.js';
import {
  KNOWLEDGE_BASE_TOKEN,
  RETRIEVER_TOKEN,
  type Retriever,
} from './knowledge.retriever.js';
import type {
  KnowledgeGuideSummary,
  RetrievalResult,
} from './knowledge.types.js';

@Injectable()
export class KnowledgeService {
  private readonly logger = new Logger(KnowledgeService.name);

  constructor(
    @Inject(KNOWLEDGE_BASE_TOKEN)
    private readonly knowledgeBase: KnowledgeBase,
    @Inject(RETRIEVER_TOKEN)
    private readonly retriever: Retriever,
  ) {}

  listGuides(): KnowledgeGuideSummary[] {
    return this.knowledgeBase.list().map((entry) => ({
      trigger: entry.trigger,
      aliases: [...entry.aliases],
      title: entry.title,
    }));
  }

  lookup(query: string): RetrievalResult {
    const result = this.retriever.retrieve(query);
    // 仅在开发环境记录详细日志
    if (process.env.NODE_ENV === 'development') {
      this.logger.debug(
        `Lookup "${query.substring(0, 50)}${query.length > 50 ? '...' : ''}" -> ${
          result.matched ? result.trigger : 'fallback'
        }`,
      );
    }
    return result;
  }
}
