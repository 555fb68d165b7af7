/**
 * Frame codec for the in-process transport.
 *
 * Calls still cross a serialization boundary even though no socket is
 * involved: requests and responses are JSON-encoded into Buffers, checked
 * against the message size and nesting depth limits, and decoded on the
 * other side. Values JSON cannot carry (undefined fields, functions) are
 * lost exactly as they would be on a real wire.
 */

import type { StatusCodeValue } from '../types/status.js';
import { RpcError, StatusCode, isStatusCode } from '../types/status.js';
import type { ContractMethodName } from '../types/contract.js';
import { isContractMethod } from '../types/contract.js';
import { DEFAULT_MAX_MESSAGE_BYTES } from '../types/suite-config.js';

// ---------------------------------------------------------------------------
// Limits
// ---------------------------------------------------------------------------

export interface FrameLimits {
  /** Maximum encoded frame size in bytes. Default 4 MiB. */
  maxMessageBytes: number;
  /** Maximum JSON nesting depth (objects + arrays). Default 64. */
  maxJsonDepth: number;
}

export const DEFAULT_FRAME_LIMITS: Readonly<FrameLimits> = {
  maxMessageBytes: DEFAULT_MAX_MESSAGE_BYTES,
  maxJsonDepth: 64,
};

// ---------------------------------------------------------------------------
// Frames
// ---------------------------------------------------------------------------

export interface RequestFrame {
  kind: 'request';
  id: number;
  method: ContractMethodName;
  /** Milliseconds the server may spend before the call's deadline, or null. */
  timeout_ms: number | null;
  payload: unknown;
}

export interface CancelFrame {
  kind: 'cancel';
  id: number;
  reason: 'cancelled' | 'deadline_exceeded';
}

export interface ResponseFrame {
  kind: 'response';
  id: number;
  status: StatusCodeValue;
  message: string;
  panic: boolean;
  payload: unknown;
}

export type Frame = RequestFrame | CancelFrame | ResponseFrame;

/** A frame that could not be decoded. The transport drops it. */
export class FrameError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FrameError';
  }
}

// ---------------------------------------------------------------------------
// JSON depth checker (character-level scan, no parsing)
// ---------------------------------------------------------------------------

/**
 * Scan raw JSON and return the maximum nesting depth, skipping characters
 * inside string literals.
 */
export function measureJsonDepth(raw: string): number {
  let depth = 0;
  let maxDepth = 0;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < raw.length; i++) {
    const ch = raw[i];

    if (escaped) {
      escaped = false;
      continue;
    }
    if (ch === '\\' && inString) {
      escaped = true;
      continue;
    }
    if (ch === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;

    if (ch === '{' || ch === '[') {
      depth++;
      if (depth > maxDepth) maxDepth = depth;
    } else if (ch === '}' || ch === ']') {
      depth--;
    }
  }

  return maxDepth;
}

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

/**
 * Encode a frame, enforcing the size and depth limits.
 *
 * @throws RpcError RESOURCE_EXHAUSTED when a limit is exceeded, INTERNAL
 *   when the frame cannot be serialized (cycles, BigInt).
 */
export function encodeFrame(frame: Frame, limits: FrameLimits = DEFAULT_FRAME_LIMITS): Buffer {
  let raw: string;
  try {
    raw = JSON.stringify(frame);
  } catch (err) {
    throw new RpcError({
      code: StatusCode.INTERNAL,
      message: `${frame.kind} could not be encoded: ${err instanceof Error ? err.message : String(err)}`,
    });
  }

  const bytes = Buffer.byteLength(raw, 'utf-8');
  if (bytes > limits.maxMessageBytes) {
    throw new RpcError({
      code: StatusCode.RESOURCE_EXHAUSTED,
      message: `${frame.kind} exceeds message size limit: ${bytes} bytes > ${limits.maxMessageBytes} byte limit`,
    });
  }

  const depth = measureJsonDepth(raw);
  if (depth > limits.maxJsonDepth) {
    throw new RpcError({
      code: StatusCode.RESOURCE_EXHAUSTED,
      message: `${frame.kind} exceeds JSON nesting depth limit: ${depth} levels > ${limits.maxJsonDepth} level limit`,
    });
  }

  return Buffer.from(raw, 'utf-8');
}

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decode and shape-check a frame.
 *
 * @throws FrameError for oversized, too deep, unparseable or malformed frames.
 */
export function decodeFrame(buffer: Buffer, limits: FrameLimits = DEFAULT_FRAME_LIMITS): Frame {
  if (buffer.byteLength > limits.maxMessageBytes) {
    throw new FrameError(
      `frame exceeds message size limit: ${buffer.byteLength} bytes > ${limits.maxMessageBytes} byte limit`,
    );
  }

  const raw = buffer.toString('utf-8');
  if (measureJsonDepth(raw) > limits.maxJsonDepth) {
    throw new FrameError('frame exceeds JSON nesting depth limit');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new FrameError('frame is not valid JSON');
  }

  if (!isRecord(parsed) || typeof parsed.id !== 'number') {
    throw new FrameError('frame must be an object with a numeric id');
  }
  const id = parsed.id;

  switch (parsed.kind) {
    case 'request': {
      if (!isContractMethod(parsed.method)) {
        throw new FrameError(`request frame names unknown method "${String(parsed.method)}"`);
      }
      const timeout = parsed.timeout_ms;
      if (timeout !== null && typeof timeout !== 'number') {
        throw new FrameError('request frame timeout_ms must be a number or null');
      }
      return { kind: 'request', id, method: parsed.method, timeout_ms: timeout, payload: parsed.payload };
    }
    case 'cancel': {
      const reason = parsed.reason;
      if (reason !== 'cancelled' && reason !== 'deadline_exceeded') {
        throw new FrameError('cancel frame has an unknown reason');
      }
      return { kind: 'cancel', id, reason };
    }
    case 'response': {
      if (!isStatusCode(parsed.status) || typeof parsed.message !== 'string') {
        throw new FrameError('response frame needs a status code and message');
      }
      return {
        kind: 'response',
        id,
        status: parsed.status,
        message: parsed.message,
        panic: parsed.panic === true,
        payload: parsed.payload ?? null,
      };
    }
    default:
      throw new FrameError(`unknown frame kind "${String(parsed.kind)}"`);
  }
}
