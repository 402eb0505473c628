import OpenAI from 'openai';
import type { PostProcessInstruction, PostProcessor, ServiceResult } from '../shared/types';
import { classifyServiceError, describeError } from '../shared/errors';
import { abandonedResult, cancelledResult, untilAborted, withTimeout } from './cancellation';

const POST_PROCESS_SYSTEM_PROMPT = `You rewrite speech-to-text transcripts according to the user's instruction.

Rules:
1. Follow the instruction exactly
2. Preserve the speaker's meaning unless the instruction says otherwise
3. Do not change technical terms or proper nouns
4. Return ONLY the rewritten text, no explanations or quotes`;

export interface PostProcessSettings {
  model: string;
  timeoutMs: number;
}

export interface LlmPostProcessorOptions {
  apiKey?: string;
  /** Read per request, like the transcriber's. */
  settings: () => PostProcessSettings;
}

export function buildPostProcessPrompt(instruction: string, transcript: string): string {
  return `${instruction}\n\nTranscript:\n${transcript}\n\nRespond ONLY with the processed text, nothing else.`;
}

export class LlmPostProcessor implements PostProcessor {
  private client: OpenAI | null = null;

  constructor(private readonly options: LlmPostProcessorOptions) {}

  async rewrite(
    text: string,
    instruction: PostProcessInstruction,
    cancel: AbortSignal
  ): Promise<ServiceResult<string>> {
    const prompt = instruction.prompt.trim();
    if (!prompt || text.trim().length === 0) {
      return { ok: true, value: text };
    }

    if (cancel.aborted) {
      return cancelledResult();
    }

    const apiKey = this.options.apiKey;
    if (!apiKey) {
      return { ok: false, kind: 'AuthError', message: 'OpenAI API key not configured (set OPENAI_API_KEY)' };
    }

    const { model, timeoutMs } = this.options.settings();
    const signal = withTimeout(cancel, timeoutMs);

    try {
      const outcome = await untilAborted(this.complete(apiKey, model, text, prompt, signal), signal);
      if (outcome.status === 'abandoned') {
        console.log('[LLM] Request abandoned');
        return abandonedResult(cancel, timeoutMs, 'Post-processing');
      }
      return { ok: true, value: outcome.value };
    } catch (error) {
      if (signal.aborted) {
        return abandonedResult(cancel, timeoutMs, 'Post-processing');
      }
      console.error('[LLM] Post-processing failed:', describeError(error));
      return { ok: false, kind: classifyServiceError(error), message: `Post-processing failed: ${describeError(error)}` };
    }
  }

  private async complete(
    apiKey: string,
    model: string,
    text: string,
    prompt: string,
    signal: AbortSignal
  ): Promise<string> {
    const response = await this.getClient(apiKey).chat.completions.create(
      {
        model,
        messages: [
          { role: 'system', content: POST_PROCESS_SYSTEM_PROMPT },
          { role: 'user', content: buildPostProcessPrompt(prompt, text) },
        ],
        temperature: 0.3,
      },
      { signal }
    );

    const rewritten = response.choices[0]?.message?.content?.trim();
    if (!rewritten) {
      console.warn('[LLM] Empty response, using raw transcript');
      return text;
    }

    return rewritten;
  }

  private getClient(apiKey: string): OpenAI {
    if (!this.client) {
      // Retry policy belongs to the caller
      this.client = new OpenAI({ apiKey, maxRetries: 0 });
    }
    return this.client;
  }
}
