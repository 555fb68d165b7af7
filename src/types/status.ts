/**
 * RPC status codes and the RpcError class.
 *
 * Contract handlers signal non-OK outcomes by throwing RpcError with a
 * status code. Anything else thrown out of a handler is treated as a panic
 * at the transport's fault boundary.
 */

// ---------------------------------------------------------------------------
// Status codes
// ---------------------------------------------------------------------------

export const StatusCode = {
  OK: 'OK',
  CANCELLED: 'CANCELLED',
  UNKNOWN: 'UNKNOWN',
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
  DEADLINE_EXCEEDED: 'DEADLINE_EXCEEDED',
  NOT_FOUND: 'NOT_FOUND',
  FAILED_PRECONDITION: 'FAILED_PRECONDITION',
  RESOURCE_EXHAUSTED: 'RESOURCE_EXHAUSTED',
  UNIMPLEMENTED: 'UNIMPLEMENTED',
  INTERNAL: 'INTERNAL',
  UNAVAILABLE: 'UNAVAILABLE',
} as const;

export type StatusCodeValue = (typeof StatusCode)[keyof typeof StatusCode];

const STATUS_CODE_VALUES: ReadonlySet<string> = new Set(Object.values(StatusCode));

/** Type guard for status code strings arriving over the wire. */
export function isStatusCode(value: unknown): value is StatusCodeValue {
  return typeof value === 'string' && STATUS_CODE_VALUES.has(value);
}

/**
 * Codes an implementation may use to reject a request it does not support.
 * INTERNAL and UNKNOWN are deliberately absent.
 */
export const REJECTION_CODES: ReadonlySet<StatusCodeValue> = new Set<StatusCodeValue>([
  StatusCode.INVALID_ARGUMENT,
  StatusCode.NOT_FOUND,
  StatusCode.FAILED_PRECONDITION,
  StatusCode.UNIMPLEMENTED,
]);

// ---------------------------------------------------------------------------
// RpcError
// ---------------------------------------------------------------------------

const RPC_ERROR_BRAND = Symbol.for('cost-plugin-conformance.RpcError');

export interface RpcErrorOptions {
  code: Exclude<StatusCodeValue, 'OK'>;
  message: string;
  /** True when the status was produced by recovering a panic. */
  panic?: boolean;
  /**
   * True when the calling side produced the status (its deadline, its
   * cancellation, a closed channel) rather than the implementation.
   */
  local?: boolean;
}

export class RpcError extends Error {
  readonly code: Exclude<StatusCodeValue, 'OK'>;
  readonly panic: boolean;
  readonly local: boolean;

  /** @internal Brand for safe instanceof checks across module boundaries. */
  readonly [RPC_ERROR_BRAND] = true as const;

  constructor(options: RpcErrorOptions) {
    super(options.message);
    this.name = 'RpcError';
    this.code = options.code;
    this.panic = options.panic ?? false;
    this.local = options.local ?? false;
  }

  /** `CODE: message`, the form used in test result details. */
  describe(): string {
    return `${this.code}: ${this.message}`;
  }
}

/** Type guard for RpcError, including instances from another copy of this module. */
export function isRpcError(value: unknown): value is RpcError {
  if (value instanceof RpcError) {
    return true;
  }

  return (
    typeof value === 'object' &&
    value !== null &&
    RPC_ERROR_BRAND in value &&
    value[RPC_ERROR_BRAND] === true
  );
}
