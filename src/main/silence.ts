import { AudioFrame, CapturedAudio, SILENCE_FLOOR_DB } from '../shared/types';

const FULL_SCALE = 32768;

/** RMS level of a frame in dBFS, floored for digital silence. */
export function frameAmplitudeDb(samples: Int16Array): number {
  if (samples.length === 0) {
    return SILENCE_FLOOR_DB;
  }

  let sumSquares = 0;
  for (let i = 0; i < samples.length; i++) {
    sumSquares += samples[i] * samples[i];
  }
  const rms = Math.sqrt(sumSquares / samples.length);
  if (rms === 0) {
    return SILENCE_FLOOR_DB;
  }

  return Math.max(SILENCE_FLOOR_DB, 20 * Math.log10(rms / FULL_SCALE));
}

export function createFrame(samples: Int16Array): AudioFrame {
  return { samples, amplitudeDb: frameAmplitudeDb(samples) };
}

export function freezeAudio(frames: readonly AudioFrame[], sampleRateHz: number): CapturedAudio {
  return Object.freeze({ frames: Object.freeze([...frames]), sampleRateHz });
}

export function audioDurationMs(audio: CapturedAudio): number {
  return spanDurationMs(audio.frames, 0, audio.frames.length, audio.sampleRateHz);
}

function spanDurationMs(
  frames: readonly AudioFrame[],
  from: number,
  to: number,
  sampleRateHz: number
): number {
  let samples = 0;
  for (let i = from; i < to; i++) {
    samples += frames[i].samples.length;
  }
  return (samples / sampleRateHz) * 1000;
}

/**
 * Removes the leading and trailing runs of frames below `thresholdDb` when
 * each run lasts at least `minSilenceMs`. A buffer that is silent throughout
 * trims to no frames at all.
 */
export function trimSilence(audio: CapturedAudio, thresholdDb: number, minSilenceMs: number): CapturedAudio {
  const { frames, sampleRateHz } = audio;
  const isSilent = (frame: AudioFrame) => frame.amplitudeDb < thresholdDb;

  let start = 0;
  while (start < frames.length && isSilent(frames[start])) {
    start++;
  }
  if (start === frames.length) {
    return freezeAudio([], sampleRateHz);
  }

  let end = frames.length;
  while (end > start && isSilent(frames[end - 1])) {
    end--;
  }

  const from = spanDurationMs(frames, 0, start, sampleRateHz) >= minSilenceMs ? start : 0;
  const to = spanDurationMs(frames, end, frames.length, sampleRateHz) >= minSilenceMs ? end : frames.length;

  return freezeAudio(frames.slice(from, to), sampleRateHz);
}
