import { beforeEach, describe, it, expect, vi } from 'vitest';
import { LlmPostProcessor, buildPostProcessPrompt } from './llm';

const openai = vi.hoisted(() => ({
  construct: vi.fn(),
  create: vi.fn(),
}));

vi.mock('openai', () => ({
  default: class {
    chat = { completions: { create: openai.create } };

    constructor(options: unknown) {
      openai.construct(options);
    }
  },
}));

function processor(timeoutMs = 20_000, apiKey: string | undefined = 'test-secret'): LlmPostProcessor {
  return new LlmPostProcessor({ apiKey, settings: () => ({ model: 'gpt-4o-mini', timeoutMs }) });
}

function completion(content: string | null) {
  return { choices: [{ message: { role: 'assistant', content } }] };
}

describe('buildPostProcessPrompt', () => {
  it('wraps the transcript with the instruction', () => {
    expect(buildPostProcessPrompt('translate to French', 'hello world')).toBe(
      'translate to French\n\nTranscript:\nhello world\n\nRespond ONLY with the processed text, nothing else.'
    );
  });
});

describe('LlmPostProcessor', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('returns the text untouched for an empty instruction without calling the model', async () => {
    const signal = new AbortController().signal;

    expect(await processor().rewrite('hello world', { prompt: '' }, signal)).toEqual({ ok: true, value: 'hello world' });
    expect(await processor().rewrite('hello world', { prompt: '   ' }, signal)).toEqual({ ok: true, value: 'hello world' });
    expect(openai.construct).not.toHaveBeenCalled();
    expect(openai.create).not.toHaveBeenCalled();
  });

  it('rewrites the transcript with the instruction', async () => {
    openai.create.mockResolvedValueOnce(completion('  Bonjour le monde  '));

    const result = await processor().rewrite('hello world', { prompt: 'translate to French' }, new AbortController().signal);

    expect(result).toEqual({ ok: true, value: 'Bonjour le monde' });
    expect(openai.construct).toHaveBeenCalledWith({ apiKey: 'test-secret', maxRetries: 0 });
    const [body, options] = openai.create.mock.calls[0];
    expect(body.model).toBe('gpt-4o-mini');
    expect(body.messages[1]).toEqual({
      role: 'user',
      content: buildPostProcessPrompt('translate to French', 'hello world'),
    });
    expect(options.signal).toBeInstanceOf(AbortSignal);
  });

  it('falls back to the input on an empty answer', async () => {
    openai.create.mockResolvedValueOnce(completion(null));

    expect(await processor().rewrite('hello world', { prompt: 'fix grammar' }, new AbortController().signal)).toEqual({
      ok: true,
      value: 'hello world',
    });
  });

  it('fails with AuthError when no key is configured', async () => {
    const result = await processor(20_000, undefined).rewrite(
      'hello world',
      { prompt: 'fix grammar' },
      new AbortController().signal
    );

    expect(result).toEqual({ ok: false, kind: 'AuthError', message: 'OpenAI API key not configured (set OPENAI_API_KEY)' });
    expect(openai.create).not.toHaveBeenCalled();
  });

  it('classifies API failures', async () => {
    openai.create.mockRejectedValueOnce(Object.assign(new Error('Incorrect API key provided'), { status: 401 }));
    openai.create.mockRejectedValueOnce(Object.assign(new Error('Service unavailable'), { status: 503 }));
    const signal = new AbortController().signal;

    expect(await processor().rewrite('hello world', { prompt: 'fix grammar' }, signal)).toEqual({
      ok: false,
      kind: 'AuthError',
      message: 'Post-processing failed: Incorrect API key provided',
    });
    expect(await processor().rewrite('hello world', { prompt: 'fix grammar' }, signal)).toEqual({
      ok: false,
      kind: 'NetworkError',
      message: 'Post-processing failed: Service unavailable',
    });
  });

  it('gives up at the deadline', async () => {
    openai.create.mockReturnValueOnce(new Promise(() => undefined));

    expect(await processor(20).rewrite('hello world', { prompt: 'fix grammar' }, new AbortController().signal)).toEqual({
      ok: false,
      kind: 'NetworkError',
      message: 'Post-processing timed out after 20ms',
    });
  });

  it('returns Cancelled when the run is cancelled mid-request', async () => {
    openai.create.mockReturnValueOnce(new Promise(() => undefined));
    const cancel = new AbortController();

    const pending = processor().rewrite('hello world', { prompt: 'fix grammar' }, cancel.signal);
    cancel.abort();

    expect(await pending).toEqual({ ok: false, kind: 'Cancelled', message: 'Cancelled' });
  });

  it('applies a changed deadline to the next request', async () => {
    openai.create.mockReturnValueOnce(new Promise(() => undefined));
    const settings = { model: 'gpt-4o-mini', timeoutMs: 0 };
    const service = new LlmPostProcessor({ apiKey: 'test-secret', settings: () => settings });

    settings.timeoutMs = 15;
    const result = await service.rewrite('hello world', { prompt: 'fix grammar' }, new AbortController().signal);

    expect(result).toEqual({ ok: false, kind: 'NetworkError', message: 'Post-processing timed out after 15ms' });
  });
});
