import type { FailureKind, FeedbackEvent, FeedbackSink } from '../shared/types';
import { FEEDBACK_EVENTS } from '../shared/feedback-events';

export enum IndicatorState {
  Idle = 'idle',
  Recording = 'recording',
  Processing = 'processing',
  Error = 'error',
}

export const NUM_CAPSULES = 16;
const METER_FLOOR_DB = -60;
const METER_INTERVAL_MS = 100;
const ERROR_RESET_MS = 5000;

export function levelToCapsules(levelDb: number): number {
  const lit = Math.round(((levelDb - METER_FLOOR_DB) / -METER_FLOOR_DB) * NUM_CAPSULES);
  return Math.max(0, Math.min(NUM_CAPSULES, lit));
}

export function renderLevelMeter(levelDb: number): string {
  const lit = levelToCapsules(levelDb);
  return '█'.repeat(lit) + '░'.repeat(NUM_CAPSULES - lit);
}

export interface LevelSource {
  currentAmplitude(): number;
}

export interface StatusIndicatorOptions {
  hotkeyLabel: string;
  level?: LevelSource;
  /** Status lines. Defaults to console. */
  write?: (line: string) => void;
  /**
   * Live level meter output, called with an empty string when the meter
   * stops. Defaults to an in-place line on a TTY, nothing otherwise.
   */
  meter?: (meter: string) => void;
  meterIntervalMs?: number;
  errorResetMs?: number;
}

/** Terminal stand-in for the recording dot, spinner and tooltip of a tray icon. */
export class StatusIndicator implements FeedbackSink {
  private currentState = IndicatorState.Idle;
  private meterTimer: NodeJS.Timeout | null = null;
  private resetTimer: NodeJS.Timeout | null = null;
  private readonly write: (line: string) => void;
  private readonly meter: ((meter: string) => void) | undefined;

  constructor(private readonly options: StatusIndicatorOptions) {
    this.write = options.write ?? ((line) => console.log(`[Status] ${line}`));
    this.meter = options.meter ?? defaultMeterWriter();
  }

  getState(): IndicatorState {
    return this.currentState;
  }

  notify(event: FeedbackEvent): void {
    switch (event.type) {
      case FEEDBACK_EVENTS.RECORDING_STARTED:
        this.setState(IndicatorState.Recording, 'Recording...');
        this.startMeter();
        break;
      case FEEDBACK_EVENTS.RECORDING_STOPPED:
        this.stopMeter();
        break;
      case FEEDBACK_EVENTS.NO_SPEECH_DETECTED:
        this.stopMeter();
        this.setState(IndicatorState.Idle, 'No speech detected');
        break;
      case FEEDBACK_EVENTS.TRANSCRIBING_STARTED:
        this.setState(IndicatorState.Processing, 'Transcribing...');
        break;
      case FEEDBACK_EVENTS.POST_PROCESSING_STARTED:
        this.setState(IndicatorState.Processing, 'Post-processing...');
        break;
      case FEEDBACK_EVENTS.WARNING:
        this.write(`Warning: ${event.message}`);
        break;
      case FEEDBACK_EVENTS.ERROR:
        this.stopMeter();
        this.showError(event.kind, event.message);
        break;
      case FEEDBACK_EVENTS.CANCELLED:
        this.stopMeter();
        this.setState(IndicatorState.Idle, 'Cancelled');
        break;
      case FEEDBACK_EVENTS.DONE:
        this.setState(IndicatorState.Idle, `Done (${event.text.length} chars)`);
        break;
    }
  }

  showIdle(): void {
    this.setState(IndicatorState.Idle, `Idle (hold ${this.options.hotkeyLabel} to dictate)`);
  }

  destroy(): void {
    this.stopMeter();
    this.clearResetTimer();
  }

  private setState(state: IndicatorState, message: string): void {
    this.clearResetTimer();
    this.currentState = state;
    this.write(message);
  }

  private showError(kind: FailureKind, message: string): void {
    this.setState(IndicatorState.Error, `Error (${kind}): ${message}`);

    // Back to idle after a while unless something else happened meanwhile
    this.resetTimer = setTimeout(() => {
      this.resetTimer = null;
      if (this.currentState === IndicatorState.Error) {
        this.showIdle();
      }
    }, this.options.errorResetMs ?? ERROR_RESET_MS);
    this.resetTimer.unref();
  }

  private startMeter(): void {
    const { level } = this.options;
    const meter = this.meter;
    if (!level || !meter || this.meterTimer) {
      return;
    }

    this.meterTimer = setInterval(() => {
      meter(renderLevelMeter(level.currentAmplitude()));
    }, this.options.meterIntervalMs ?? METER_INTERVAL_MS);
    this.meterTimer.unref();
  }

  private stopMeter(): void {
    if (this.meterTimer) {
      clearInterval(this.meterTimer);
      this.meterTimer = null;
      this.meter?.('');
    }
  }

  private clearResetTimer(): void {
    if (this.resetTimer) {
      clearTimeout(this.resetTimer);
      this.resetTimer = null;
    }
  }
}

function defaultMeterWriter(): ((meter: string) => void) | undefined {
  if (!process.stdout.isTTY) {
    return undefined;
  }
  return (meter) => {
    process.stdout.write(meter ? `\r${meter}` : '\r\x1b[2K');
  };
}
