import { z } from 'zod';
import { ConfigurationError } from './config.errors.js';

export const envSchema = z
  .object({
    NODE_ENV: z
      .enum(['development', 'test', 'production'])
      .default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    AI_PROVIDER: z.enum(['google', 'openai']).default('google'),
    GEMINI_API_KEY: z.string().trim().optional(),
    GEMINI_CHAT_MODEL: z.string().trim().default('gemini-2.0-flash-lite'),
    OPENAI_API_KEY: z.string().trim().optional(),
    OPENAI_CHAT_MODEL: z.string().trim().default('gpt-4o-mini'),
    CHAT_TEMPERATURE: z.coerce.number().min(0).max(2).optional(),
    CHAT_STREAM_TIMEOUT_MS: z.coerce
      .number()
      .int()
      .nonnegative()
      .default(120_000),
    SESSION_IDLE_TTL_MS: z.coerce
      .number()
      .int()
      .nonnegative()
      .default(60 * 60 * 1000),
  })
  .superRefine((env, ctx) => {
    if (env.NODE_ENV === 'test') {
      return;
    }
    if (env.AI_PROVIDER === 'google' && !env.GEMINI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['GEMINI_API_KEY'],
        message:
          'GEMINI_API_KEY is required when AI_PROVIDER=google outside of test environment',
      });
    }
    if (env.AI_PROVIDER === 'openai' && !env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OPENAI_API_KEY'],
        message:
          'OPENAI_API_KEY is required when AI_PROVIDER=openai outside of test environment',
      });
    }
  });

export type EnvSchema = z.infer<typeof envSchema>;

export const validateEnv = (config: Record<string, unknown>): EnvSchema => {
  const parsed = envSchema.safeParse(config);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.errors.map(
        (issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`,
      ),
    );
  }
  return parsed.data;
};
