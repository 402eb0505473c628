import { spawn, execFile } from 'child_process';

export type RecorderBackend = 'sox' | 'arecord' | 'ffmpeg';

export interface RecorderInfo {
  backend: RecorderBackend;
  binaryPath: string;
}

/** A running system recorder streaming raw s16le mono PCM on stdout. */
export interface RecorderProcess {
  onData(listener: (chunk: Buffer) => void): void;
  /** Fires once if the recorder dies without stop() having been called. */
  onFailure(listener: (error: Error) => void): void;
  stop(): void;
}

export type RecorderFactory = () => RecorderProcess;

const STDERR_LIMIT = 2000;

export function spawnRecorder(recorder: RecorderInfo, sampleRateHz: number): RecorderProcess {
  const proc = spawn(recorder.binaryPath, buildRecorderArgs(recorder.backend, sampleRateHz), {
    stdio: ['ignore', 'pipe', 'pipe'],
  });

  let stopRequested = false;
  let failed = false;
  let stderrData = '';
  const failureListeners: Array<(error: Error) => void> = [];

  const fail = (error: Error): void => {
    if (stopRequested || failed) return;
    failed = true;
    failureListeners.forEach((listener) => listener(error));
  };

  proc.stderr.on('data', (chunk: Buffer) => {
    if (stderrData.length < STDERR_LIMIT) {
      stderrData += chunk.toString();
    }
  });

  proc.on('error', (err) => {
    fail(new Error(`Recording failed to start: ${err.message}`));
  });

  proc.on('close', (code, signal) => {
    const msg = stderrData.slice(0, 300).trim();
    fail(new Error(`Recorder exited (code ${code ?? 'none'}, signal ${signal ?? 'none'})${msg ? `: ${msg}` : ''}`));
  });

  return {
    onData(listener) {
      proc.stdout.on('data', listener);
    },
    onFailure(listener) {
      failureListeners.push(listener);
    },
    stop() {
      stopRequested = true;
      if (!proc.killed) {
        proc.kill('SIGTERM');
      }
    },
  };
}

export function buildRecorderArgs(
  backend: RecorderBackend,
  sampleRateHz: number,
  platform: NodeJS.Platform = process.platform
): string[] {
  const rate = String(sampleRateHz);
  switch (backend) {
    case 'sox':
      return ['-q', '-d', '-t', 'raw', '-r', rate, '-c', '1', '-b', '16', '-e', 'signed-integer', '-'];
    case 'arecord':
      return ['-q', '-f', 'S16_LE', '-r', rate, '-c', '1', '-t', 'raw'];
    case 'ffmpeg':
      return [
        '-loglevel', 'error',
        '-f', ffmpegInputFormat(platform), '-i', ffmpegInputDevice(platform),
        '-ar', rate, '-ac', '1', '-f', 's16le', '-',
      ];
  }
}

function ffmpegInputFormat(platform: NodeJS.Platform): string {
  switch (platform) {
    case 'win32': return 'dshow';
    case 'darwin': return 'avfoundation';
    default: return 'pulse';
  }
}

function ffmpegInputDevice(platform: NodeJS.Platform): string {
  switch (platform) {
    case 'win32': return 'audio=default';
    case 'darwin': return ':default';
    default: return 'default';
  }
}

export function recorderCandidates(platform: NodeJS.Platform = process.platform): RecorderBackend[] {
  switch (platform) {
    case 'darwin':
      return ['sox', 'ffmpeg'];
    case 'linux':
      return ['arecord', 'sox', 'ffmpeg'];
    case 'win32':
      return ['ffmpeg', 'sox'];
    default:
      return ['sox', 'ffmpeg'];
  }
}

export async function detectRecorder(
  platform: NodeJS.Platform = process.platform,
  exists: (binary: string) => Promise<boolean> = binaryExists
): Promise<RecorderInfo | undefined> {
  for (const backend of recorderCandidates(platform)) {
    if (await exists(backend)) {
      return { backend, binaryPath: backend };
    }
  }
  return undefined;
}

function binaryExists(name: string): Promise<boolean> {
  const cmd = process.platform === 'win32' ? 'where' : 'which';
  return new Promise((resolve) => {
    execFile(cmd, [name], (err) => resolve(!err));
  });
}

export function installInstructions(platform: NodeJS.Platform = process.platform): string {
  switch (platform) {
    case 'darwin':
      return 'No audio recorder found. Install SoX: brew install sox';
    case 'linux':
      return 'No audio recorder found. Install arecord (alsa-utils) or SoX: sudo apt install alsa-utils';
    case 'win32':
      return 'No audio recorder found. Install FFmpeg: winget install ffmpeg';
    default:
      return 'No audio recorder found. Install SoX or FFmpeg.';
  }
}
