export type SwarmErrorCode =
  | 'ENVELOPE_CONSTRUCTION_FAILED'
  | 'INVALID_ENVELOPE'
  | 'POW_EXHAUSTED'
  | 'POW_CALCULATION_FAILED'
  | 'BUILD_CANCELLED'
  | 'INVALID_WIRE_MESSAGE'
  | 'WORKER_FAILED';

export interface SwarmErrorOptions {
  context?: Record<string, unknown>;
  cause?: unknown;
}

export class SwarmError extends Error {
  readonly code: SwarmErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: SwarmErrorCode, message: string, options: SwarmErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'SwarmError';
    this.code = code;
    this.context = options.context;
  }
}

/** Narrow an unknown rejection to a SwarmError, optionally of a given code */
export function isSwarmError(value: unknown, code?: SwarmErrorCode): value is SwarmError {
  if (!(value instanceof SwarmError)) return false;
  return code === undefined || value.code === code;
}
