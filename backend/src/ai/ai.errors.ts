import { APICallError, RetryError } from 'ai';

export type RemoteServiceErrorCode =
  | 'NETWORK'
  | 'QUOTA_EXCEEDED'
  | 'INVALID_REQUEST'
  | 'SAFETY_BLOCKED'
  | 'TIMEOUT'
  | 'UNKNOWN';

const DEFAULT_MESSAGES: Record<RemoteServiceErrorCode, string> = {
  NETWORK: 'The connection to the model service was interrupted.',
  QUOTA_EXCEEDED: 'The model service quota has been exceeded.',
  INVALID_REQUEST: 'The model service rejected the request.',
  SAFETY_BLOCKED: 'The response was blocked by the model safety filters.',
  TIMEOUT: 'The model service did not finish responding in time.',
  UNKNOWN: 'The model service failed to respond.',
};

const NETWORK_ERROR_MARKERS = [
  'terminated',
  'fetch failed',
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
];

export class RemoteServiceError extends Error {
  public readonly code: RemoteServiceErrorCode;
  public readonly statusCode?: number;

  constructor(
    code: RemoteServiceErrorCode,
    message = DEFAULT_MESSAGES[code],
    options?: { cause?: Error; statusCode?: number },
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.code = code;
    this.name = 'RemoteServiceError';
    if (options?.statusCode !== undefined) {
      this.statusCode = options.statusCode;
    }
  }
}

export function isNetworkError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === 'AbortError' ||
      NETWORK_ERROR_MARKERS.some((marker) => error.message.includes(marker)))
  );
}

/**
 * 将 provider / 传输层抛出的任意异常归类为 RemoteServiceError
 */
export function toRemoteServiceError(error: unknown): RemoteServiceError {
  if (error instanceof RemoteServiceError) {
    return error;
  }

  // 按最后一次失败的原因归类
  if (RetryError.isInstance(error)) {
    return toRemoteServiceError(error.lastError);
  }

  const cause = error instanceof Error ? error : undefined;

  if (APICallError.isInstance(error)) {
    const statusCode = error.statusCode;
    if (statusCode === 429) {
      return new RemoteServiceError('QUOTA_EXCEEDED', undefined, {
        cause,
        statusCode,
      });
    }
    if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
      return new RemoteServiceError('INVALID_REQUEST', undefined, {
        cause,
        statusCode,
      });
    }
    if (statusCode === undefined && isNetworkError(error.cause)) {
      return new RemoteServiceError('NETWORK', undefined, { cause });
    }
    return new RemoteServiceError('UNKNOWN', undefined, { cause, statusCode });
  }

  if (isNetworkError(error)) {
    return new RemoteServiceError('NETWORK', undefined, { cause });
  }

  return new RemoteServiceError('UNKNOWN', undefined, { cause });
}
