import type { KnowledgeBase } from './knowledge-base.js';
import { NO_GUIDE_FALLBACK, type Retriever } from './knowledge.retriever.js';
import type { RetrievalResult } from './knowledge.types.js';

/**
 * 关键词检索：按条目顺序检查触发短语（及别名）是否出现在小写化后的 query 中，
 * 第一个命中的条目胜出。
 */
export class KeywordRetriever implements Retriever {
  constructor(private readonly knowledgeBase: KnowledgeBase) {}

  lookup(query: string): string {
    return this.retrieve(query).document;
  }

  retrieve(query: string): RetrievalResult {
    const normalized = query.toLowerCase();

    for (const entry of this.knowledgeBase.list()) {
      const phrases = [entry.trigger, ...entry.aliases];
      if (
        phrases.some((phrase) => normalized.includes(phrase.toLowerCase()))
      ) {
        return {
          matched: true,
          trigger: entry.trigger,
          title: entry.title,
          document: entry.document,
        };
      }
    }

    return { matched: false, document: NO_GUIDE_FALLBACK };
  }
}
