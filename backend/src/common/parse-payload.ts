import { BadRequestException } from '@nestjs/common';
import type { z } from 'zod';

export function formatZodError(error: z.ZodError): string {
  return error.errors
    .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
    .join('; ');
}

/**
 * 校验请求体，失败时返回 400 而不是未捕获的 ZodError
 */
export function parsePayload<T extends z.ZodTypeAny>(
  schema: T,
  body: unknown,
): z.output<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new BadRequestException(formatZodError(parsed.error));
  }
  return parsed.data;
}
