export * from './chat.module.js';
export * from './chat.service.js';
export * from './chat.errors.js';
export * from './chat.types.js';
export * from './session.js';
export * from './session-registry.service.js';
export * from './conversation-store.js';
export * from './prompt-composer.js';
export * from './response-assembler.js';
