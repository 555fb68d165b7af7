/**
 * Fault boundary around contract handler invocations.
 *
 * Every dispatch on the server side runs inside `runInFaultBoundary`, which
 * turns any way a handler can end into a typed outcome:
 * - resolves with a value            → ok
 * - aborted (deadline or cancel)     → DEADLINE_EXCEEDED / CANCELLED
 * - throws RpcError                  → that status
 * - throws anything else             → INTERNAL, flagged as a panic
 * - resolves with null or undefined  → INTERNAL
 */

import type { StatusCodeValue } from '../types/status.js';
import { StatusCode, isRpcError } from '../types/status.js';

// ---------------------------------------------------------------------------
// Outcome
// ---------------------------------------------------------------------------

export type CallOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; status: Exclude<StatusCodeValue, 'OK'>; message: string; panic: boolean };

/** Reason attached to an AbortController when a call's deadline passes. */
export class DeadlineExceededError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DeadlineExceededError';
  }
}

/** Reason attached to an AbortController when the caller gives up. */
export class CallCancelledError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CallCancelledError';
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Render a thrown value as a message, whatever was thrown. */
export function describeThrown(thrown: unknown): string {
  if (thrown instanceof Error) return thrown.message;
  if (typeof thrown === 'string') return thrown;
  try {
    return JSON.stringify(thrown) ?? String(thrown);
  } catch {
    return String(thrown);
  }
}

function abortOutcome(signal: AbortSignal): CallOutcome<never> {
  const reason: unknown = signal.reason;
  if (reason instanceof DeadlineExceededError) {
    return { ok: false, status: StatusCode.DEADLINE_EXCEEDED, message: reason.message, panic: false };
  }
  return {
    ok: false,
    status: StatusCode.CANCELLED,
    message: reason instanceof Error ? reason.message : 'call cancelled',
    panic: false,
  };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Run a handler and classify how it ended. Never rejects.
 *
 * An abort takes precedence over whatever the handler threw afterwards:
 * a handler that fails because its delay was interrupted reports the
 * deadline, not its own error.
 */
export async function runInFaultBoundary<T>(
  invoke: () => Promise<T>,
  signal: AbortSignal,
): Promise<CallOutcome<T>> {
  try {
    const value = await invoke();
    if (signal.aborted) {
      return abortOutcome(signal);
    }
    if (value === null || value === undefined) {
      return {
        ok: false,
        status: StatusCode.INTERNAL,
        message: 'handler resolved without a response',
        panic: false,
      };
    }
    return { ok: true, value };
  } catch (thrown: unknown) {
    if (signal.aborted) {
      return abortOutcome(signal);
    }

    if (isRpcError(thrown)) {
      return { ok: false, status: thrown.code, message: thrown.message, panic: thrown.panic };
    }

    return {
      ok: false,
      status: StatusCode.INTERNAL,
      message: `panic: ${describeThrown(thrown)}`,
      panic: true,
    };
  }
}
