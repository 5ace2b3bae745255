import { WorkoutError } from '../domain/errors.js';

// stdout is reserved for workout reports, so every log line goes to stderr.
export function logInfo(message: string, meta: Record<string, unknown> = {}) {
  const payload = { level: 'info', message, ...meta };
  console.error(JSON.stringify(payload));
}

export function logError(message: string, meta: Record<string, unknown> = {}) {
  const payload = { level: 'error', message, ...meta };
  console.error(JSON.stringify(payload));
}

export function errorMeta(err: unknown): Record<string, unknown> {
  if (err instanceof WorkoutError) {
    return { error: err.message, code: err.code, ...err.meta };
  }
  if (err instanceof Error) return { error: err.message };
  return { error: String(err) };
}
