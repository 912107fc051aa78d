import { Module } from '@nestjs/common';
import { KnowledgeBase } from './knowledge-base.js';
import { KeywordRetriever } from './keyword.retriever.js';
import {
  KNOWLEDGE_BASE_TOKEN,
  RETRIEVER_TOKEN,
} from './knowledge.retriever.js';
import { KnowledgeController } from './knowledge.controller.js';
import { KnowledgeService } from './knowledge.service.js';

@Module({
  providers: [
    {
      provide: KNOWLEDGE_BASE_TOKEN,
      useFactory: () => KnowledgeBase.networkGuides(),
    },
    {
      provide: RETRIEVER_TOKEN,
      useFactory: (knowledgeBase: KnowledgeBase) =>
        new KeywordRetriever(knowledgeBase),
      inject: [KNOWLEDGE_BASE_TOKEN],
    },
    KnowledgeService,
  ],
  controllers: [KnowledgeController],
  exports: [KnowledgeService, RETRIEVER_TOKEN],
})
export class KnowledgeModule {}
