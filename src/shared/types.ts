import type { FeedbackEventType } from './feedback-events';
import type { LanguageCode } from './languages';

export type InsertionMode = 'paste' | 'type';

export interface AppConfig {
  hotkey: string;
  cancelKey: string;
  language: LanguageCode;
  silenceThresholdDb: number;
  minSilenceMs: number;
  minSpeechMs: number;
  postProcessPrompt: string;
  insertionMode: InsertionMode;
  restoreClipboard: boolean;
  deepgramModel: string;
  llmModel: string;
  transcriptionTimeoutMs: number;
  postProcessTimeoutMs: number;
}

export interface Credentials {
  deepgramApiKey?: string;
  openaiApiKey?: string;
}

export enum PipelineState {
  Idle = 'idle',
  Recording = 'recording',
  Trimming = 'trimming',
  Transcribing = 'transcribing',
  PostProcessing = 'post-processing',
  Injecting = 'injecting',
}

export type HotkeyEventKind = 'press' | 'release' | 'cancel';

export interface HotkeyEvent {
  kind: HotkeyEventKind;
  timestamp: number;
}

export interface AudioFrame {
  samples: Int16Array;
  amplitudeDb: number;
}

/** Frames captured between one start() and stop(). Frozen once handed out. */
export interface CapturedAudio {
  readonly frames: readonly AudioFrame[];
  readonly sampleRateHz: number;
}

export interface TranscriptRequest {
  audio: CapturedAudio;
  language: LanguageCode;
}

export interface PostProcessInstruction {
  prompt: string;
}

export type ServiceFailureKind = 'NetworkError' | 'AuthError' | 'Cancelled';

export type FailureKind =
  | ServiceFailureKind
  | 'DeviceUnavailable'
  | 'InjectionFailed'
  | 'InternalError';

export type ServiceResult<T> =
  | { ok: true; value: T }
  | { ok: false; kind: ServiceFailureKind; message: string };

export type TranscriptResult = ServiceResult<string>;

export type DeliveryResult =
  | { ok: true }
  | { ok: false; kind: 'InjectionFailed' | 'Cancelled'; message: string };

type RunEvent<T extends FeedbackEventType> = { type: T; runId: number };

export type FeedbackEvent =
  | RunEvent<'RecordingStarted'>
  | RunEvent<'RecordingStopped'>
  | RunEvent<'NoSpeechDetected'>
  | RunEvent<'TranscribingStarted'>
  | RunEvent<'PostProcessingStarted'>
  | RunEvent<'Cancelled'>
  | (RunEvent<'Warning'> & { message: string })
  | (RunEvent<'Error'> & { kind: FailureKind; message: string })
  | (RunEvent<'Done'> & { text: string });

export interface CaptureDevice {
  start(): void;
  stop(): CapturedAudio;
  currentAmplitude(): number;
  onDeviceError(listener: (error: Error) => void): void;
}

export interface TranscriptionService {
  transcribe(request: TranscriptRequest, cancel: AbortSignal): Promise<TranscriptResult>;
}

export interface PostProcessor {
  rewrite(
    text: string,
    instruction: PostProcessInstruction,
    cancel: AbortSignal
  ): Promise<ServiceResult<string>>;
}

export interface OutputInjector {
  /** Nothing is typed or pasted once `cancel` has aborted. */
  deliver(text: string, cancel: AbortSignal): Promise<DeliveryResult>;
}

export interface FeedbackSink {
  notify(event: FeedbackEvent): void;
}

export const SAMPLE_RATE_HZ = 16000;

// 20 ms at 16 kHz
export const FRAME_SAMPLES = 320;

export const SILENCE_FLOOR_DB = -120;

export function defaultHotkey(platform: NodeJS.Platform = process.platform): string {
  return platform === 'darwin' ? 'RIGHT ALT' : 'RIGHT CTRL';
}

export const DEFAULT_CONFIG: AppConfig = {
  hotkey: defaultHotkey(),
  cancelKey: 'ESCAPE',
  language: 'en-US',
  silenceThresholdDb: -50,
  minSilenceMs: 200,
  minSpeechMs: 150,
  postProcessPrompt: '',
  insertionMode: 'paste',
  restoreClipboard: true,
  deepgramModel: 'nova-2',
  llmModel: 'gpt-4o-mini',
  transcriptionTimeoutMs: 30000,
  postProcessTimeoutMs: 20000,
};
