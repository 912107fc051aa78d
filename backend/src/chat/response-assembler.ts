import { toRemoteServiceError } from '../ai/index.js';
import type { AssemblyResult, AssemblyUpdate } from './chat.types.js';

export const STREAMING_CURSOR = '▌';

/**
 * 按顺序拼接流式片段。每个片段后推送带光标的中间结果，正常结束时推送不带光标的
 * 最终文本；中途出错返回 Err，已拼接的部分不会被提交。
 */
export class ResponseAssembler {
  constructor(private readonly cursor: string = STREAMING_CURSOR) {}

  async assemble(
    fragments: AsyncIterable<string>,
    onUpdate?: (update: AssemblyUpdate) => void,
  ): Promise<AssemblyResult> {
    const iterator = fragments[Symbol.asyncIterator]();
    let buffer = '';

    for (;;) {
      // 只有取片段的失败算作生成服务的错误，onUpdate 抛出的异常原样向上传递
      let step: IteratorResult<string>;
      try {
        step = await iterator.next();
      } catch (error) {
        return {
          ok: false,
          error: toRemoteServiceError(error),
          partial: buffer,
        };
      }
      if (step.done) {
        break;
      }

      buffer += step.value;
      try {
        onUpdate?.({ text: buffer + this.cursor, final: false });
      } catch (error) {
        await iterator.return?.();
        throw error;
      }
    }

    onUpdate?.({ text: buffer, final: true });
    return { ok: true, text: buffer };
  }
}
