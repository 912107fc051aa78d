export * from './config.module.js';
export * from './configuration.js';
export * from './config.errors.js';
export { validateEnv, type EnvSchema } from './env.validation.js';
