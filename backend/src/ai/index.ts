export * from './ai.module.js';
export * from './ai.service.js';
export * from './ai.constants.js';
export * from './ai.errors.js';
export * from './ai.types.js';
export * from './model-turn.js';
export * from './conversation-handle.js';
export type { AiProvider } from './providers/ai-provider.js';
