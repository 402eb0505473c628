import type { ServiceFailureKind } from './types';

export class DeviceUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DeviceUnavailableError';
  }
}

export class HotkeyUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'HotkeyUnavailableError';
  }
}

const AUTH_STATUS_CODES = new Set([401, 403]);

export function extractStatusCode(error: unknown): number | undefined {
  if (!error || typeof error !== 'object') return undefined;

  if ('status' in error && typeof error.status === 'number') return error.status;

  if ('response' in error) {
    const response = error.response;
    if (response && typeof response === 'object' && 'status' in response && typeof response.status === 'number') {
      return response.status;
    }
  }

  return undefined;
}

/** Maps an SDK or transport error onto the failure kinds the pipeline reports. */
export function classifyServiceError(error: unknown): Exclude<ServiceFailureKind, 'Cancelled'> {
  const status = extractStatusCode(error);
  return status !== undefined && AUTH_STATUS_CODES.has(status) ? 'AuthError' : 'NetworkError';
}

export function describeError(error: unknown): string {
  if (error instanceof Error && error.message.trim()) return error.message;
  if (typeof error === 'string' && error.trim()) return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

export function maskSecret(value: string | undefined): string {
  return value ? `***${value.slice(-4)}` : '(empty)';
}
