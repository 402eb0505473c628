import { EventEmitter } from 'events';
import {
  AudioFrame,
  CaptureDevice,
  CapturedAudio,
  FRAME_SAMPLES,
  SAMPLE_RATE_HZ,
  SILENCE_FLOOR_DB,
} from '../shared/types';
import { DeviceUnavailableError, describeError } from '../shared/errors';
import { createFrame, freezeAudio } from './silence';
import {
  RecorderFactory,
  RecorderProcess,
  detectRecorder,
  installInstructions,
  spawnRecorder,
} from './recorder';

export interface AudioCaptureOptions {
  /** Absent when no recorder could be found; start() then fails with the reason. */
  createRecorder?: RecorderFactory;
  unavailableReason?: string;
  sampleRateHz?: number;
  frameSamples?: number;
}

const BYTES_PER_SAMPLE = 2;

export class AudioCapture implements CaptureDevice {
  private recorder: RecorderProcess | null = null;
  private frames: AudioFrame[] = [];
  private pending: Buffer = Buffer.alloc(0);
  private latestAmplitude = SILENCE_FLOOR_DB;
  private readonly events = new EventEmitter();
  private readonly sampleRateHz: number;
  private readonly frameSamples: number;

  constructor(private readonly options: AudioCaptureOptions) {
    this.sampleRateHz = options.sampleRateHz ?? SAMPLE_RATE_HZ;
    this.frameSamples = options.frameSamples ?? FRAME_SAMPLES;
  }

  start(): void {
    if (this.recorder) {
      throw new DeviceUnavailableError('Microphone is already claimed by an open capture session');
    }
    if (!this.options.createRecorder) {
      throw new DeviceUnavailableError(this.options.unavailableReason ?? 'No audio input device available');
    }

    this.frames = [];
    this.pending = Buffer.alloc(0);
    this.latestAmplitude = SILENCE_FLOOR_DB;

    let recorder: RecorderProcess;
    try {
      recorder = this.options.createRecorder();
    } catch (error) {
      throw new DeviceUnavailableError(`Failed to open audio input: ${describeError(error)}`);
    }

    recorder.onData((chunk) => {
      if (this.recorder === recorder) {
        this.append(chunk);
      }
    });
    recorder.onFailure((error) => {
      if (this.recorder !== recorder) return;
      console.error('[Audio] Recorder failed:', error.message);
      this.events.emit('deviceError', error);
    });

    this.recorder = recorder;
    console.log('[Audio] Capture started');
  }

  stop(): CapturedAudio {
    const recorder = this.recorder;
    if (!recorder) {
      throw new Error('stop() called without an open capture session');
    }

    this.recorder = null;
    recorder.stop();
    this.flushPartialFrame();

    const audio = freezeAudio(this.frames, this.sampleRateHz);
    this.frames = [];
    this.pending = Buffer.alloc(0);
    this.latestAmplitude = SILENCE_FLOOR_DB;

    console.log(`[Audio] Capture stopped (${audio.frames.length} frames)`);
    return audio;
  }

  currentAmplitude(): number {
    return this.latestAmplitude;
  }

  onDeviceError(listener: (error: Error) => void): void {
    this.events.on('deviceError', listener);
  }

  private append(chunk: Buffer): void {
    const data = this.pending.length > 0 ? Buffer.concat([this.pending, chunk]) : chunk;
    const frameBytes = this.frameSamples * BYTES_PER_SAMPLE;

    let offset = 0;
    while (data.length - offset >= frameBytes) {
      this.pushFrame(decodePcm16(data.subarray(offset, offset + frameBytes)));
      offset += frameBytes;
    }
    this.pending = Buffer.from(data.subarray(offset));
  }

  private flushPartialFrame(): void {
    const usable = this.pending.length - (this.pending.length % BYTES_PER_SAMPLE);
    if (usable > 0) {
      this.pushFrame(decodePcm16(this.pending.subarray(0, usable)));
    }
  }

  private pushFrame(samples: Int16Array): void {
    const frame = createFrame(samples);
    this.frames.push(frame);
    this.latestAmplitude = frame.amplitudeDb;
  }
}

export function decodePcm16(bytes: Buffer): Int16Array {
  const samples = new Int16Array(Math.floor(bytes.length / BYTES_PER_SAMPLE));
  for (let i = 0; i < samples.length; i++) {
    samples[i] = bytes.readInt16LE(i * BYTES_PER_SAMPLE);
  }
  return samples;
}

export function encodePcm16(audio: CapturedAudio): Buffer {
  const total = audio.frames.reduce((sum, frame) => sum + frame.samples.length, 0);
  const out = Buffer.alloc(total * BYTES_PER_SAMPLE);
  let offset = 0;
  for (const frame of audio.frames) {
    for (let i = 0; i < frame.samples.length; i++) {
      out.writeInt16LE(frame.samples[i], offset);
      offset += BYTES_PER_SAMPLE;
    }
  }
  return out;
}

/** Mono 16-bit RIFF/WAVE container around the captured PCM. */
export function encodeWav(audio: CapturedAudio): Buffer {
  const pcm = encodePcm16(audio);
  const header = Buffer.alloc(44);
  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + pcm.length, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(1, 22);
  header.writeUInt32LE(audio.sampleRateHz, 24);
  header.writeUInt32LE(audio.sampleRateHz * BYTES_PER_SAMPLE, 28);
  header.writeUInt16LE(BYTES_PER_SAMPLE, 32);
  header.writeUInt16LE(16, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(pcm.length, 40);
  return Buffer.concat([header, pcm]);
}

/** Probes the system for a recorder binary once and builds the capture around it. */
export async function createSystemCapture(sampleRateHz: number = SAMPLE_RATE_HZ): Promise<AudioCapture> {
  const recorder = await detectRecorder();
  if (!recorder) {
    const reason = installInstructions();
    console.warn(`[Audio] ${reason}`);
    return new AudioCapture({ unavailableReason: reason, sampleRateHz });
  }

  console.log(`[Audio] Using ${recorder.backend} for microphone capture`);
  return new AudioCapture({
    createRecorder: () => spawnRecorder(recorder, sampleRateHz),
    sampleRateHz,
  });
}
