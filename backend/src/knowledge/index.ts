export * from './knowledge.module.js';
export * from './knowledge.service.js';
export * from './knowledge.retriever.js';
export * from './knowledge.types.js';
export * from './knowledge-base.js';
export * from './keyword.retriever.js';
