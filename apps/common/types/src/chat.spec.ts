import { describe, expect, it } from '@jest/globals';

import { chatSseEventSchema, sendMessageRequestSchema } from './chat.js';

describe('sendMessageRequestSchema', () => {
  it('trims the message', () => {
    const payload = sendMessageRequestSchema.parse({
      message: '  slow network  ',
    });
    expect(payload).toEqual({ message: 'slow network' });
  });

  it('rejects a blank message', () => {
    const result = sendMessageRequestSchema.safeParse({ message: '   ' });
    expect(result.success).toBe(false);
  });
});

describe('chatSseEventSchema', () => {
  it('accepts an update event', () => {
    const event = chatSseEventSchema.parse({
      type: 'update',
      data: { text: 'Hel▌', final: false },
    });
    expect(event.type).toBe('update');
  });

  it('rejects an error event without a request id', () => {
    const result = chatSseEventSchema.safeParse({
      type: 'error',
      data: { code: 'NETWORK', message: 'fetch failed' },
    });
    expect(result.success).toBe(false);
  });
});
