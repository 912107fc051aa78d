import { validateEnv } from './env.validation.js';

export type AppConfig = ReturnType<typeof configuration>;

export const configuration = () => {
  // ConfigModule 的 validate 已经先行执行，这里复用同一份校验结果
  const env = validateEnv(process.env);

  return {
    app: {
      nodeEnv: env.NODE_ENV,
      port: env.PORT,
    },
    ai: {
      provider: env.AI_PROVIDER,
      temperature: env.CHAT_TEMPERATURE,
      google: {
        apiKey: env.GEMINI_API_KEY,
        chatModel: env.GEMINI_CHAT_MODEL,
      },
      openai: {
        apiKey: env.OPENAI_API_KEY,
        chatModel: env.OPENAI_CHAT_MODEL,
      },
    },
    chat: {
      streamTimeoutMs: env.CHAT_STREAM_TIMEOUT_MS,
      sessionIdleTtlMs: env.SESSION_IDLE_TTL_MS,
    },
  };
};

export type AiConfig = AppConfig['ai'];
export type ProviderCredentials = AiConfig['google'];
export type ChatConfig = AppConfig['chat'];
