import { isSwarmError } from '../errors/swarm-error.js';
import type { PowConfig } from './pow-config.js';
import { solveProofOfWork } from './proof-of-work.js';
import type { ProofOfWorkInput } from './proof-of-work.js';

/** Message posted to a worker thread */
export interface PowJobRequest {
  id: number;
  input: ProofOfWorkInput;
  config: PowConfig;
  /** Int32 cell; the pool stores 1 to ask the worker to stop */
  cancelFlag: SharedArrayBuffer;
}

/** Message a worker thread posts back */
export type PowJobResponse =
  | { id: number; status: 'solved'; nonce: string }
  | { id: number; status: 'exhausted'; trials: number; elapsedMs: number }
  | { id: number; status: 'cancelled' }
  | { id: number; status: 'error'; message: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function isPowJobRequest(value: unknown): value is PowJobRequest {
  if (!isRecord(value) || typeof value.id !== 'number') return false;
  const { input, config } = value;
  return (
    isRecord(input) &&
    typeof input.payload === 'string' &&
    typeof input.destination === 'string' &&
    typeof input.timestamp === 'number' &&
    typeof input.ttl === 'number' &&
    isRecord(config) &&
    typeof config.nonceTrials === 'number' &&
    typeof config.maxTrials === 'number' &&
    typeof config.maxDurationMs === 'number' &&
    value.cancelFlag instanceof SharedArrayBuffer
  );
}

export function isPowJobResponse(value: unknown): value is PowJobResponse {
  if (!isRecord(value) || typeof value.id !== 'number') return false;
  switch (value.status) {
    case 'solved':
      return typeof value.nonce === 'string';
    case 'exhausted':
      return typeof value.trials === 'number' && typeof value.elapsedMs === 'number';
    case 'cancelled':
      return true;
    case 'error':
      return typeof value.message === 'string';
    default:
      return false;
  }
}

/** Run one job to completion on the current thread */
export function runPowJob(request: PowJobRequest): PowJobResponse {
  const flag = new Int32Array(request.cancelFlag);
  try {
    const nonce = solveProofOfWork(request.input, request.config, () => Atomics.load(flag, 0) === 1);
    return { id: request.id, status: 'solved', nonce };
  } catch (err) {
    if (isSwarmError(err, 'POW_EXHAUSTED')) {
      const trials = Number(err.context?.trials ?? 0);
      const elapsedMs = Number(err.context?.elapsedMs ?? 0);
      return { id: request.id, status: 'exhausted', trials, elapsedMs };
    }
    if (isSwarmError(err, 'BUILD_CANCELLED')) {
      return { id: request.id, status: 'cancelled' };
    }
    return { id: request.id, status: 'error', message: err instanceof Error ? err.message : String(err) };
  }
}
