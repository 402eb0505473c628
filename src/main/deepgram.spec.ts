import { beforeEach, describe, it, expect, vi } from 'vitest';
import { FRAME_SAMPLES, SAMPLE_RATE_HZ, TranscriptRequest } from '../shared/types';
import { DeepgramTranscriber } from './deepgram';
import { createFrame, freezeAudio } from './silence';

const deepgram = vi.hoisted(() => ({
  createClient: vi.fn(),
  transcribeFile: vi.fn(),
}));

vi.mock('@deepgram/sdk', () => ({
  createClient: (apiKey: string) => {
    deepgram.createClient(apiKey);
    return { listen: { prerecorded: { transcribeFile: deepgram.transcribeFile } } };
  },
}));

function request(language: TranscriptRequest['language'] = 'en-US'): TranscriptRequest {
  const frame = createFrame(new Int16Array(FRAME_SAMPLES).fill(3000));
  return { audio: freezeAudio([frame, frame], SAMPLE_RATE_HZ), language };
}

function transcriber(timeoutMs = 30_000, apiKey: string | undefined = 'test-secret'): DeepgramTranscriber {
  return new DeepgramTranscriber({ apiKey, settings: () => ({ model: 'nova-2', timeoutMs }) });
}

describe('DeepgramTranscriber', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('transcribes the utterance as a WAV upload', async () => {
    deepgram.transcribeFile.mockResolvedValueOnce({
      result: { results: { channels: [{ alternatives: [{ transcript: 'hello world' }] }] } },
      error: null,
    });

    const result = await transcriber().transcribe(request('fr'), new AbortController().signal);

    expect(result).toEqual({ ok: true, value: 'hello world' });
    expect(deepgram.createClient).toHaveBeenCalledWith('test-secret');
    const [upload, options] = deepgram.transcribeFile.mock.calls[0];
    expect(Buffer.isBuffer(upload)).toBe(true);
    expect(upload.toString('ascii', 0, 4)).toBe('RIFF');
    expect(upload.length).toBe(44 + FRAME_SAMPLES * 2 * 2);
    expect(options).toEqual({ model: 'nova-2', language: 'fr', smart_format: true, punctuate: true });
  });

  it('returns an empty transcript when nothing was recognised', async () => {
    deepgram.transcribeFile.mockResolvedValueOnce({
      result: { results: { channels: [{ alternatives: [{ transcript: '' }] }] } },
      error: null,
    });

    expect(await transcriber().transcribe(request(), new AbortController().signal)).toEqual({ ok: true, value: '' });
  });

  it('skips the request for empty audio', async () => {
    const empty: TranscriptRequest = { audio: freezeAudio([], SAMPLE_RATE_HZ), language: 'en-US' };

    expect(await transcriber().transcribe(empty, new AbortController().signal)).toEqual({ ok: true, value: '' });
    expect(deepgram.transcribeFile).not.toHaveBeenCalled();
  });

  it('fails with AuthError when no key is configured', async () => {
    const result = await transcriber(30_000, undefined).transcribe(request(), new AbortController().signal);

    expect(result).toEqual({
      ok: false,
      kind: 'AuthError',
      message: 'Deepgram API key not configured (set DEEPGRAM_API_KEY)',
    });
    expect(deepgram.transcribeFile).not.toHaveBeenCalled();
  });

  it('maps a rejected key to AuthError', async () => {
    deepgram.transcribeFile.mockResolvedValueOnce({
      result: null,
      error: Object.assign(new Error('Invalid credentials.'), { status: 401 }),
    });

    expect(await transcriber().transcribe(request(), new AbortController().signal)).toEqual({
      ok: false,
      kind: 'AuthError',
      message: 'Deepgram error: Invalid credentials.',
    });
  });

  it('maps transport failures to NetworkError', async () => {
    deepgram.transcribeFile.mockRejectedValueOnce(new TypeError('fetch failed'));

    expect(await transcriber().transcribe(request(), new AbortController().signal)).toEqual({
      ok: false,
      kind: 'NetworkError',
      message: 'Deepgram request failed: fetch failed',
    });
  });

  it('gives up at the deadline', async () => {
    deepgram.transcribeFile.mockReturnValueOnce(new Promise(() => undefined));

    expect(await transcriber(20).transcribe(request(), new AbortController().signal)).toEqual({
      ok: false,
      kind: 'NetworkError',
      message: 'Transcription timed out after 20ms',
    });
  });

  it('returns Cancelled when the run is cancelled mid-request', async () => {
    deepgram.transcribeFile.mockReturnValueOnce(new Promise(() => undefined));
    const cancel = new AbortController();

    const pending = transcriber().transcribe(request(), cancel.signal);
    cancel.abort();

    expect(await pending).toEqual({ ok: false, kind: 'Cancelled', message: 'Cancelled' });
  });

  it('does not start a request for an already cancelled run', async () => {
    const cancel = new AbortController();
    cancel.abort();

    expect(await transcriber().transcribe(request(), cancel.signal)).toEqual({
      ok: false,
      kind: 'Cancelled',
      message: 'Cancelled',
    });
    expect(deepgram.transcribeFile).not.toHaveBeenCalled();
  });

  it('picks up a model change on the next request', async () => {
    const reply = {
      result: { results: { channels: [{ alternatives: [{ transcript: 'hello world' }] }] } },
      error: null,
    };
    deepgram.transcribeFile.mockResolvedValueOnce(reply).mockResolvedValueOnce(reply);
    const settings = { model: 'nova-2', timeoutMs: 30_000 };
    const service = new DeepgramTranscriber({ apiKey: 'test-secret', settings: () => settings });

    await service.transcribe(request(), new AbortController().signal);
    settings.model = 'nova-3';
    await service.transcribe(request(), new AbortController().signal);

    expect(deepgram.transcribeFile.mock.calls.map((call) => call[1].model)).toEqual(['nova-2', 'nova-3']);
  });
});
