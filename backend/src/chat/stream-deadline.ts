import { RemoteServiceError } from '../ai/index.js';

/**
 * 为整个片段消费过程加上截止时间，超时以 RemoteServiceError('TIMEOUT') 结束，
 * 并中止传入的 AbortController 以关闭上游请求。
 * timeoutMs <= 0 表示不限时。
 */
export function withDeadline<T>(
  stream: AsyncIterable<T>,
  timeoutMs: number,
  abortController?: AbortController,
): AsyncIterable<T> {
  if (timeoutMs <= 0) {
    return stream;
  }

  return {
    [Symbol.asyncIterator]() {
      const iterator = stream[Symbol.asyncIterator]();
      const deadline = Date.now() + timeoutMs;
      const expire = (): RemoteServiceError => {
        const error = new RemoteServiceError(
          'TIMEOUT',
          `The model service did not finish responding within ${timeoutMs} ms.`,
        );
        abortController?.abort(error);
        return error;
      };

      return {
        async next(): Promise<IteratorResult<T>> {
          const remaining = deadline - Date.now();
          if (remaining <= 0) {
            throw expire();
          }

          let timer: NodeJS.Timeout | undefined;
          const expired = new Promise<never>((_, reject) => {
            timer = setTimeout(() => reject(expire()), remaining);
          });

          try {
            return await Promise.race([iterator.next(), expired]);
          } finally {
            clearTimeout(timer);
          }
        },
        async return(): Promise<IteratorResult<T>> {
          if (typeof iterator.return === 'function') {
            return iterator.return();
          }
          return { done: true, value: undefined };
        },
      };
    },
  };
}
