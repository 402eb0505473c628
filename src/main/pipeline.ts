import {
  CaptureDevice,
  CapturedAudio,
  FeedbackEvent,
  FeedbackSink,
  HotkeyEvent,
  OutputInjector,
  PipelineState,
  PostProcessor,
  ServiceFailureKind,
  TranscriptRequest,
  TranscriptionService,
} from '../shared/types';
import type { LanguageCode } from '../shared/languages';
import { describeError } from '../shared/errors';
import { audioDurationMs, trimSilence } from './silence';

export interface PipelineSettings {
  language: LanguageCode;
  silenceThresholdDb: number;
  minSilenceMs: number;
  minSpeechMs: number;
  postProcessPrompt: string;
}

export interface PipelineDependencies {
  capture: CaptureDevice;
  transcriber: TranscriptionService;
  postProcessor: PostProcessor;
  injector: OutputInjector;
  feedback: FeedbackSink;
  /** Read at every release so setting changes apply to the next utterance. */
  settings: () => PipelineSettings;
}

interface PipelineRun {
  id: number;
  abort: AbortController;
}

/**
 * Press-to-paste state machine. Only the current run may touch state, the
 * feedback sink or the injector; every async continuation re-checks its run
 * id first, so a run superseded by a newer press is silently dropped.
 */
export class PipelineController {
  private state = PipelineState.Idle;
  private currentRun: PipelineRun | null = null;
  private nextRunId = 1;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(private readonly deps: PipelineDependencies) {
    deps.capture.onDeviceError((error) => this.handleDeviceError(error));
  }

  handle(event: HotkeyEvent): void {
    switch (event.kind) {
      case 'press':
        this.press();
        break;
      case 'release':
        this.release();
        break;
      case 'cancel':
        this.cancel();
        break;
    }
  }

  getState(): PipelineState {
    return this.state;
  }

  getCurrentRunId(): number | null {
    return this.currentRun?.id ?? null;
  }

  press(): void {
    if (this.currentRun) {
      this.supersede(this.currentRun);
    }

    const run: PipelineRun = { id: this.nextRunId++, abort: new AbortController() };
    this.currentRun = run;

    try {
      this.deps.capture.start();
    } catch (error) {
      console.error(`[Pipeline] Run #${run.id} could not start recording:`, describeError(error));
      this.finish(run, { type: 'Error', runId: run.id, kind: 'DeviceUnavailable', message: describeError(error) });
      return;
    }

    this.state = PipelineState.Recording;
    console.log(`[Pipeline] Run #${run.id} recording`);
    this.notify({ type: 'RecordingStarted', runId: run.id });
  }

  release(): void {
    const run = this.currentRun;
    if (!run || this.state !== PipelineState.Recording) {
      // Release without a matching press, e.g. the process started mid-press
      return;
    }

    const recorded = this.deps.capture.stop();
    this.state = PipelineState.Trimming;
    this.notify({ type: 'RecordingStopped', runId: run.id });

    let settings: PipelineSettings;
    let trimmed: CapturedAudio;
    try {
      settings = this.deps.settings();
      trimmed = trimSilence(recorded, settings.silenceThresholdDb, settings.minSilenceMs);
    } catch (error) {
      console.error(`[Pipeline] Run #${run.id} could not read settings:`, describeError(error));
      this.finish(run, { type: 'Error', runId: run.id, kind: 'InternalError', message: describeError(error) });
      return;
    }
    const speechMs = audioDurationMs(trimmed);
    console.log(
      `[Pipeline] Run #${run.id} trimmed ${audioDurationMs(recorded).toFixed(0)}ms to ${speechMs.toFixed(0)}ms`
    );

    if (trimmed.frames.length === 0 || speechMs < settings.minSpeechMs) {
      this.finish(run, { type: 'NoSpeechDetected', runId: run.id });
      return;
    }

    this.state = PipelineState.Transcribing;
    this.notify({ type: 'TranscribingStarted', runId: run.id });

    const request: TranscriptRequest = { audio: trimmed, language: settings.language };
    this.track(this.process(run, request, settings.postProcessPrompt));
  }

  cancel(): void {
    const run = this.currentRun;
    if (!run) {
      return;
    }

    const wasRecording = this.state === PipelineState.Recording;
    this.currentRun = null;
    this.state = PipelineState.Idle;
    run.abort.abort();
    if (wasRecording) {
      this.deps.capture.stop();
    }

    console.log(`[Pipeline] Run #${run.id} cancelled`);
    this.notify({ type: 'Cancelled', runId: run.id });
  }

  /** Resolves once every run still in flight, superseded ones included, has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private async process(run: PipelineRun, request: TranscriptRequest, instruction: string): Promise<void> {
    const { signal } = run.abort;

    try {
      const transcript = await this.deps.transcriber.transcribe(request, signal);
      if (!this.isCurrent(run)) {
        console.log(`[Pipeline] Discarding transcription of stale run #${run.id}`);
        return;
      }

      if (!transcript.ok) {
        this.finish(run, this.failureEvent(run, transcript.kind, transcript.message));
        return;
      }

      const rawText = transcript.value;
      console.log(`[Pipeline] Run #${run.id} raw transcript:`, rawText);
      if (rawText.trim().length === 0) {
        this.finish(run, { type: 'NoSpeechDetected', runId: run.id });
        return;
      }

      let finalText = rawText;
      if (instruction.trim().length > 0) {
        this.state = PipelineState.PostProcessing;
        this.notify({ type: 'PostProcessingStarted', runId: run.id });

        const rewritten = await this.deps.postProcessor.rewrite(rawText, { prompt: instruction }, signal);
        if (!this.isCurrent(run)) {
          console.log(`[Pipeline] Discarding post-processing of stale run #${run.id}`);
          return;
        }

        if (rewritten.ok) {
          finalText = rewritten.value.trim().length > 0 ? rewritten.value : rawText;
        } else if (rewritten.kind === 'Cancelled') {
          this.finish(run, { type: 'Cancelled', runId: run.id });
          return;
        } else {
          console.warn(`[Pipeline] Post-processing failed, using raw transcript: ${rewritten.message}`);
          this.notify({
            type: 'Warning',
            runId: run.id,
            message: `Post-processing failed (${rewritten.kind}); pasted the raw transcript`,
          });
        }
      }

      this.state = PipelineState.Injecting;
      const delivery = await this.deps.injector.deliver(finalText, signal);
      if (!this.isCurrent(run)) {
        return;
      }

      if (!delivery.ok && delivery.kind === 'Cancelled') {
        this.finish(run, { type: 'Cancelled', runId: run.id });
        return;
      }
      if (!delivery.ok) {
        this.finish(run, { type: 'Error', runId: run.id, kind: delivery.kind, message: delivery.message });
        return;
      }

      console.log(`[Pipeline] Run #${run.id} done:`, finalText);
      this.finish(run, { type: 'Done', runId: run.id, text: finalText });
    } catch (error) {
      console.error(`[Pipeline] Run #${run.id} failed unexpectedly:`, error);
      this.finish(run, { type: 'Error', runId: run.id, kind: 'InternalError', message: describeError(error) });
    }
  }

  private failureEvent(run: PipelineRun, kind: ServiceFailureKind, message: string): FeedbackEvent {
    if (kind === 'Cancelled') {
      return { type: 'Cancelled', runId: run.id };
    }
    console.error(`[Pipeline] Run #${run.id} transcription failed (${kind}): ${message}`);
    return { type: 'Error', runId: run.id, kind, message };
  }

  private supersede(run: PipelineRun): void {
    if (this.state === PipelineState.Recording) {
      this.deps.capture.stop();
    }
    this.currentRun = null;
    this.state = PipelineState.Idle;
    run.abort.abort();
    console.log(`[Pipeline] Run #${run.id} superseded by a new press`);
  }

  private handleDeviceError(error: Error): void {
    const run = this.currentRun;
    if (!run || this.state !== PipelineState.Recording) {
      return;
    }

    this.deps.capture.stop();
    this.finish(run, { type: 'Error', runId: run.id, kind: 'DeviceUnavailable', message: error.message });
  }

  private isCurrent(run: PipelineRun): boolean {
    return this.currentRun === run;
  }

  /** Returns to idle and emits the run's single terminal notification. */
  private finish(run: PipelineRun, event: FeedbackEvent): void {
    if (!this.isCurrent(run)) {
      return;
    }
    this.currentRun = null;
    this.state = PipelineState.Idle;
    this.notify(event);
  }

  private notify(event: FeedbackEvent): void {
    try {
      this.deps.feedback.notify(event);
    } catch (error) {
      console.error('[Pipeline] Feedback sink threw:', describeError(error));
    }
  }

  private track(task: Promise<void>): void {
    this.inFlight.add(task);
    void task.finally(() => this.inFlight.delete(task));
  }
}
