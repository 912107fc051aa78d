import type { RetrievalResult } from './knowledge.types.js';

export const NO_GUIDE_FALLBACK =
  'No specific guide found. I will try to answer based on my general knowledge.';

/**
 * 检索层契约：query → 最匹配的文档，未命中时返回兜底文本。
 * 实现必须是纯函数，不抛异常。
 */
export interface Retriever {
  lookup(query: string): string;
  retrieve(query: string): RetrievalResult;
}

export const RETRIEVER_TOKEN = Symbol('RETRIEVER');
export const KNOWLEDGE_BASE_TOKEN = Symbol('KNOWLEDGE_BASE');
