import type { ChatMessageRole } from '@netassist/types';
import type { RemoteServiceError } from '../ai/index.js';
import type { RetrievalResult } from '../knowledge/index.js';

export type { ChatMessageRole };

export interface ChatMessage {
  readonly role: ChatMessageRole;
  readonly content: string;
}

export interface AssemblyUpdate {
  text: string;
  final: boolean;
}

export type AssemblyResult =
  | { ok: true; text: string }
  | { ok: false; error: RemoteServiceError; partial: string };

export type ChatTurnResult =
  | { ok: true; message: ChatMessage; retrieval: RetrievalResult }
  | { ok: false; error: RemoteServiceError; retrieval: RetrievalResult };

export type ChatTurnEvent =
  | { type: 'status'; step: string; label: string }
  | { type: 'retrieval'; result: RetrievalResult }
  | { type: 'update'; update: AssemblyUpdate };
