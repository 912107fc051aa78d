import type { AiMessage, ModelTurn, ModelTurnRole } from './ai.types.js';

export function createModelTurn(role: ModelTurnRole, text: string): ModelTurn {
  return Object.freeze({
    role,
    parts: Object.freeze([Object.freeze({ text })]),
  });
}

export function modelTurnText(turn: ModelTurn): string {
  return turn.parts.map((part) => part.text).join('');
}

export function toAiMessage(turn: ModelTurn): AiMessage {
  return {
    role: turn.role === 'model' ? 'assistant' : 'user',
    content: modelTurnText(turn),
  };
}
