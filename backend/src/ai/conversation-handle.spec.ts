import { describe, expect, it } from '@jest/globals';

import { RemoteServiceError } from './ai.errors.js';
import { ConversationHandle } from './conversation-handle.js';
import { createModelTurn } from './model-turn.js';
import { FakeAiProvider } from './testing/fake-ai-provider.js';

async function collect(stream: AsyncIterable<string>): Promise<string[]> {
  const fragments: string[] = [];
  for await (const fragment of stream) {
    fragments.push(fragment);
  }
  return fragments;
}

describe('ConversationHandle', () => {
  it('sends prior turns followed by the new prompt', async () => {
    const provider = new FakeAiProvider([['ok']]);
    const handle = new ConversationHandle(provider, [
      createModelTurn('user', 'first question'),
      createModelTurn('model', 'first answer'),
    ]);

    await collect(handle.send('second question'));

    expect(provider.calls[0].messages).toEqual([
      { role: 'user', content: 'first question' },
      { role: 'assistant', content: 'first answer' },
      { role: 'user', content: 'second question' },
    ]);
  });

  it('yields fragments in order and remembers the completed exchange', async () => {
    const provider = new FakeAiProvider([['Check ', 'your ', 'router.']]);
    const handle = new ConversationHandle(provider, []);

    const fragments = await collect(handle.send('augmented prompt'));

    expect(fragments).toEqual(['Check ', 'your ', 'router.']);
    expect(handle.history).toEqual([
      { role: 'user', parts: [{ text: 'augmented prompt' }] },
      { role: 'model', parts: [{ text: 'Check your router.' }] },
    ]);
  });

  it('carries the remembered exchange into the next send', async () => {
    const provider = new FakeAiProvider([['one'], ['two']]);
    const handle = new ConversationHandle(provider, []);

    await collect(handle.send('first'));
    await collect(handle.send('second'));

    expect(provider.calls[1].messages).toEqual([
      { role: 'user', content: 'first' },
      { role: 'assistant', content: 'one' },
      { role: 'user', content: 'second' },
    ]);
  });

  it('remembers nothing when the stream fails', async () => {
    const provider = new FakeAiProvider([
      { fragments: ['Par', 'tial'], error: new Error('fetch failed') },
    ]);
    const handle = new ConversationHandle(provider, []);

    await expect(collect(handle.send('prompt'))).rejects.toMatchObject({
      name: 'RemoteServiceError',
      code: 'NETWORK',
    });
    expect(handle.history).toEqual([]);
  });

  it('remembers nothing when the consumer stops early', async () => {
    const provider = new FakeAiProvider([['a', 'b', 'c']]);
    const handle = new ConversationHandle(provider, []);

    for await (const fragment of handle.send('prompt')) {
      if (fragment === 'a') {
        break;
      }
    }

    expect(handle.history).toEqual([]);
  });

  it('does not share its turn list with the caller', async () => {
    const prior = [createModelTurn('user', 'hello')];
    const provider = new FakeAiProvider([['hi']]);
    const handle = new ConversationHandle(provider, prior);

    await collect(handle.send('next'));

    expect(prior).toHaveLength(1);
    expect(handle.history).toHaveLength(3);
  });

  it('passes remote service errors through unchanged', async () => {
    const quota = new RemoteServiceError('QUOTA_EXCEEDED');
    const provider = new FakeAiProvider([{ fragments: [], error: quota }]);
    const handle = new ConversationHandle(provider, []);

    await expect(collect(handle.send('prompt'))).rejects.toBe(quota);
  });
});
