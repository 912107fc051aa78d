import { z } from 'zod';

export const chatMessageRoleSchema = z.enum(['user', 'assistant']);

export type ChatMessageRole = z.infer<typeof chatMessageRoleSchema>;

export const chatMessageSchema = z.object({
  role: chatMessageRoleSchema,
  content: z.string(),
});

export type ChatMessagePayload = z.infer<typeof chatMessageSchema>;

export const sendMessageRequestSchema = z.object({
  message: z
    .string()
    .trim()
    .min(1, 'message is required')
    .max(4000, 'message is too long'),
});

export type SendMessageRequestPayload = z.infer<
  typeof sendMessageRequestSchema
>;

export const sessionSummarySchema = z.object({
  id: z.string().uuid(),
  createdAt: z.string().datetime(),
});

export type SessionSummary = z.infer<typeof sessionSummarySchema>;

export const retrievalSummarySchema = z.object({
  matched: z.boolean(),
  trigger: z.string().optional(),
  title: z.string().optional(),
});

export type RetrievalSummary = z.infer<typeof retrievalSummarySchema>;

export const chatStatusSchema = z.object({
  step: z.string().trim().min(1),
  label: z.string().trim().min(1),
});

export type ChatStatus = z.infer<typeof chatStatusSchema>;

const statusEventSchema = z.object({
  type: z.literal('status'),
  data: chatStatusSchema,
});

const retrievalEventSchema = z.object({
  type: z.literal('retrieval'),
  data: retrievalSummarySchema,
});

/**
 * Display text of the reply so far. While streaming it ends with the cursor
 * marker; the last update (`final: true`) carries the committed text.
 */
const updateEventSchema = z.object({
  type: z.literal('update'),
  data: z.object({
    text: z.string(),
    final: z.boolean(),
  }),
});

const messageEventSchema = z.object({
  type: z.literal('message'),
  data: chatMessageSchema,
});

const doneEventSchema = z.object({
  type: z.literal('done'),
});

const errorEventSchema = z.object({
  type: z.literal('error'),
  data: z.object({
    code: z.string().trim().min(1),
    message: z.string().trim().min(1),
    suggestion: z.string().trim().min(1).optional(),
    requestId: z.string().uuid(),
  }),
});

export const chatSseEventSchema = z.discriminatedUnion('type', [
  statusEventSchema,
  retrievalEventSchema,
  updateEventSchema,
  messageEventSchema,
  doneEventSchema,
  errorEventSchema,
]);

export type ChatSseEvent = z.infer<typeof chatSseEventSchema>;
export type ChatSseStatusEvent = z.infer<typeof statusEventSchema>;
export type ChatSseRetrievalEvent = z.infer<typeof retrievalEventSchema>;
export type ChatSseUpdateEvent = z.infer<typeof updateEventSchema>;
export type ChatSseMessageEvent = z.infer<typeof messageEventSchema>;
export type ChatSseDoneEvent = z.infer<typeof doneEventSchema>;
export type ChatSseErrorEvent = z.infer<typeof errorEventSchema>;

export const knowledgeLookupRequestSchema = z.object({
  query: z.string().max(4000, 'query is too long'),
});

export type KnowledgeLookupRequestPayload = z.infer<
  typeof knowledgeLookupRequestSchema
>;
