/**
 * Tagged outcome of a tool call, so callers branch on `ok` instead of
 * catching.
 */

import { toErrorPayload, type ErrorPayload } from './errors.js';

export type ToolResult<T = unknown> = { ok: true; data: T } | { ok: false; error: ErrorPayload };

/**
 * Await `fn` and capture its value or its error. The original error is
 * passed to `onError` before it is reduced to a payload.
 */
export async function settle<T>(
  fn: () => Promise<T>,
  onError?: (error: unknown) => void
): Promise<ToolResult<T>> {
  try {
    return { ok: true, data: await fn() };
  } catch (error) {
    onError?.(error);
    return { ok: false, error: toErrorPayload(error) };
  }
}
