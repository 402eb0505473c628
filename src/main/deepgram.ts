import { createClient } from '@deepgram/sdk';
import type { TranscriptRequest, TranscriptResult, TranscriptionService } from '../shared/types';
import { classifyServiceError, describeError } from '../shared/errors';
import { encodeWav } from './audioCapture';
import { abandonedResult, cancelledResult, untilAborted, withTimeout } from './cancellation';

type DeepgramClient = ReturnType<typeof createClient>;

export interface TranscriptionSettings {
  model: string;
  timeoutMs: number;
}

export interface DeepgramTranscriberOptions {
  apiKey?: string;
  /** Read per request so model and deadline edits apply to the next utterance. */
  settings: () => TranscriptionSettings;
}

export class DeepgramTranscriber implements TranscriptionService {
  private client: DeepgramClient | null = null;

  constructor(private readonly options: DeepgramTranscriberOptions) {}

  async transcribe(request: TranscriptRequest, cancel: AbortSignal): Promise<TranscriptResult> {
    if (cancel.aborted) {
      return cancelledResult();
    }

    const apiKey = this.options.apiKey;
    if (!apiKey) {
      return { ok: false, kind: 'AuthError', message: 'Deepgram API key not configured (set DEEPGRAM_API_KEY)' };
    }

    if (request.audio.frames.length === 0) {
      return { ok: true, value: '' };
    }

    const { model, timeoutMs } = this.options.settings();
    const signal = withTimeout(cancel, timeoutMs);

    try {
      const outcome = await untilAborted(this.request(apiKey, model, request), signal);
      if (outcome.status === 'abandoned') {
        console.log('[Deepgram] Request abandoned');
        return abandonedResult(cancel, timeoutMs, 'Transcription');
      }
      return outcome.value;
    } catch (error) {
      console.error('[Deepgram] Request failed:', describeError(error));
      return { ok: false, kind: classifyServiceError(error), message: `Deepgram request failed: ${describeError(error)}` };
    }
  }

  private async request(apiKey: string, model: string, request: TranscriptRequest): Promise<TranscriptResult> {
    const response = await this.getClient(apiKey).listen.prerecorded.transcribeFile(encodeWav(request.audio), {
      model,
      language: request.language,
      smart_format: true,
      punctuate: true,
    });

    if (response.error) {
      console.error('[Deepgram] API error:', response.error.message);
      return {
        ok: false,
        kind: classifyServiceError(response.error),
        message: `Deepgram error: ${response.error.message}`,
      };
    }

    const channels = response.result?.results?.channels ?? [];
    const text = channels
      .map((channel) => channel.alternatives?.[0]?.transcript ?? '')
      .filter((part) => part.length > 0)
      .join(' ')
      .trim();

    return { ok: true, value: text };
  }

  private getClient(apiKey: string): DeepgramClient {
    if (!this.client) {
      this.client = createClient(apiKey);
    }
    return this.client;
  }
}
