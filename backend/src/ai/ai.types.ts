export type AiMessageRole = 'system' | 'user' | 'assistant';

export interface AiMessage {
  role: AiMessageRole;
  content: string;
}

export interface StreamTextOptions {
  messages: AiMessage[];
  /** 中止后 provider 需要关闭与生成服务之间的请求 */
  abortSignal?: AbortSignal;
}

export type ModelTurnRole = 'user' | 'model';

export interface ModelTurnPart {
  readonly text: string;
}

/**
 * 生成服务自己的对话轮次格式，与展示用的 ChatMessage 一一对应。
 */
export interface ModelTurn {
  readonly role: ModelTurnRole;
  readonly parts: readonly ModelTurnPart[];
}
