import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { resolvePowConfig } from './pow-config.js';
import type { PowConfig, PowOptions } from './pow-config.js';
import {
  ProofOfWorkSearch,
  assertSolvable,
  cancelledError,
  encodeNonce,
  exhaustedError,
  isBudgetSpent,
} from './proof-of-work.js';
import type { ProofOfWorkInput } from './proof-of-work.js';

/** Nonces scanned per slice before the inline executor yields */
export const DEFAULT_SLICE_TRIALS = 4096;

/**
 * Somewhere a proof-of-work search can run without holding up the caller.
 *
 * Implementations reject with SwarmError POW_EXHAUSTED when the budget runs
 * out and BUILD_CANCELLED when `signal` aborts before a nonce is reported.
 */
export interface PowExecutor {
  readonly config: PowConfig;
  solve(input: ProofOfWorkInput, signal?: AbortSignal): Promise<string>;
}

export interface InlinePowExecutorOptions extends PowOptions {
  /** Nonces scanned between yields. Default: DEFAULT_SLICE_TRIALS */
  sliceTrials?: number;
}

/**
 * Runs the search on the calling thread in slices, yielding to the event
 * loop between them so other work and abort signals get a turn.
 */
export class InlinePowExecutor implements PowExecutor {
  readonly config: PowConfig;
  private readonly sliceTrials: number;

  constructor(options: InlinePowExecutorOptions = {}) {
    const { sliceTrials = DEFAULT_SLICE_TRIALS, ...powOptions } = options;
    if (!Number.isSafeInteger(sliceTrials) || sliceTrials < 1) {
      throw new RangeError(`sliceTrials must be a positive integer, got ${sliceTrials}`);
    }
    this.config = resolvePowConfig(powOptions);
    this.sliceTrials = sliceTrials;
  }

  async solve(input: ProofOfWorkInput, signal?: AbortSignal): Promise<string> {
    // No hashing before the caller gets its promise back
    await yieldToEventLoop();
    const search = new ProofOfWorkSearch(input, this.config.nonceTrials);
    assertSolvable(search);
    const startedAt = Date.now();

    for (;;) {
      if (signal?.aborted) {
        throw cancelledError();
      }
      if (isBudgetSpent(search, this.config, startedAt)) {
        throw exhaustedError(search.trials, Date.now() - startedAt);
      }
      const found = search.advance(Math.min(this.sliceTrials, this.config.maxTrials - search.trials));
      if (found !== null) {
        return encodeNonce(found);
      }
      await yieldToEventLoop();
    }
  }
}
