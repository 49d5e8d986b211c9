import { describe, it, expect } from 'vitest';
import { ReplyComposer, truncateAtWord } from '../../src/api/composer/composer.ts';
import { STATE_TEMPLATES } from '../../src/api/composer/templates.ts';
import { GenerationFailureError } from '../../src/api/errors.ts';
import { FakeGenerator, testConfig } from '../helpers/fakes.ts';
import { InMemoryConversationStore } from '../helpers/memory-store.ts';

const contact = new InMemoryConversationStore().addContact({ phone: '+15551230001' }, 'interested');

describe('truncateAtWord', () => {
  it('leaves short text alone', () => {
    expect(truncateAtWord('hello world', 20)).toBe('hello world');
  });

  it('cuts at the last word boundary', () => {
    expect(truncateAtWord('hello world again', 13)).toBe('hello world');
  });

  it('keeps a whole word that ends exactly at the limit', () => {
    expect(truncateAtWord('hello world again', 11)).toBe('hello world');
  });

  it('hard-cuts a single long word', () => {
    expect(truncateAtWord('abcdefghij', 4)).toBe('abcd');
  });

  it('does not split an emoji on a hard cut', () => {
    const text = 'a' + '\u{1F600}'.repeat(200);

    const cut = truncateAtWord(text, 320);

    expect(cut).toBe('a' + '\u{1F600}'.repeat(159));
    expect(cut).toHaveLength(319);
  });

  it('keeps a whole emoji that fits exactly', () => {
    expect(truncateAtWord('\u{1F600}\u{1F600}\u{1F600}', 4)).toBe('\u{1F600}\u{1F600}');
  });
});

describe('ReplyComposer', () => {
  it('uses generated text within the limit', async () => {
    const generator = new FakeGenerator(() => '  Great, how many square feet?  ');
    const composer = new ReplyComposer(generator, testConfig());

    const reply = await composer.compose(contact, [], 'interested');

    expect(reply).toEqual({ text: 'Great, how many square feet?', source: 'generated' });
    expect(generator.requests).toHaveLength(1);
    expect(generator.requests[0]?.maxLength).toBe(320);
    expect(generator.requests[0]?.state).toBe('interested');
  });

  it('regenerates once with a tighter hint when the first reply is too long', async () => {
    const generator = new FakeGenerator((request) => (request.maxLength === 320 ? 'x'.repeat(400) : 'Short enough'));
    const composer = new ReplyComposer(generator, testConfig());

    const reply = await composer.compose(contact, [], 'interested');

    expect(reply).toEqual({ text: 'Short enough', source: 'generated' });
    expect(generator.requests.map((r) => r.maxLength)).toEqual([320, 240]);
  });

  it('truncates at a word boundary when regeneration is still too long', async () => {
    const long = 'word '.repeat(100).trim();
    const generator = new FakeGenerator(() => long);
    const composer = new ReplyComposer(generator, testConfig({ maxReplyLength: 12 }));

    const reply = await composer.compose(contact, [], 'interested');

    expect(reply).toEqual({ text: 'word word', source: 'truncated' });
    expect(generator.requests).toHaveLength(2);
  });

  it('truncates the first reply when regeneration fails', async () => {
    let calls = 0;
    const generator = new FakeGenerator(() => {
      calls++;
      if (calls === 1) return 'one two three four';
      throw new GenerationFailureError('http', 'OpenAI error: overloaded');
    });
    const composer = new ReplyComposer(generator, testConfig({ maxReplyLength: 10 }));

    expect(await composer.compose(contact, [], 'interested')).toEqual({ text: 'one two', source: 'truncated' });
  });

  it('falls back to the state template when generation throws', async () => {
    const generator = new FakeGenerator(() => {
      throw new GenerationFailureError('network', 'OpenAI request failed: connection reset');
    });
    const composer = new ReplyComposer(generator, testConfig());

    expect(await composer.compose(contact, [], 'action_sqft')).toEqual({
      text: STATE_TEMPLATES.action_sqft,
      source: 'template',
    });
  });

  it('falls back to the template on empty output', async () => {
    const composer = new ReplyComposer(new FakeGenerator(() => '   '), testConfig());

    expect((await composer.compose(contact, [], 'follow_up')).source).toBe('template');
  });

  it('falls back to the template when generation times out', async () => {
    let aborted = false;
    const generator = new FakeGenerator(
      (request) =>
        new Promise<string>(() => {
          request.signal?.addEventListener('abort', () => {
            aborted = true;
          });
        }),
    );
    const composer = new ReplyComposer(generator, testConfig({ generationTimeoutMs: 10 }));

    const reply = await composer.compose(contact, [], 'pause');

    expect(reply).toEqual({ text: STATE_TEMPLATES.pause, source: 'template' });
    expect(aborted).toBe(true);
  });

  it('uses templates when no generator is configured', async () => {
    const composer = new ReplyComposer(null, testConfig());
    expect(await composer.compose(contact, [], 'start')).toEqual({ text: STATE_TEMPLATES.start, source: 'template' });
  });

  it('keeps templates within a lowered limit', async () => {
    const composer = new ReplyComposer(null, testConfig({ maxReplyLength: 20 }));
    const reply = await composer.compose(contact, [], 'interested');

    expect(reply.text).toBe('Great! Roughly how');
    expect(reply.text.length).toBeLessThanOrEqual(20);
  });
});
