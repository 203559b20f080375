import { toBase64 } from '../crypto/encoding.js';
import { SwarmError, isSwarmError } from '../errors/swarm-error.js';
import { wrapMessage } from '../envelope/envelope-codec.js';
import type { WrapOptions } from '../envelope/envelope-codec.js';
import type { LogicalMessage } from '../envelope/types.js';
import { expectedTrials } from '../pow/difficulty.js';
import { InlinePowExecutor } from '../pow/pow-executor.js';
import type { PowExecutor } from '../pow/pow-executor.js';
import { payloadByteLength } from '../pow/proof-of-work.js';
import type { ProofOfWorkInput } from '../pow/proof-of-work.js';
import { DEFAULT_MESSAGE_TTL_MS } from './outgoing-message.js';
import type { OutgoingMessage, PlainOutgoingMessage } from './outgoing-message.js';

/**
 * wrapped -> done                          (no proof of work)
 * wrapped -> solving -> done | failed | cancelled
 */
export type BuildState = 'wrapped' | 'solving' | 'done' | 'failed' | 'cancelled';

export interface BuildOptions {
  /** Whether the destination policy demands a proof of work */
  requirePoW: boolean;
  /** TTL in ms. Default: the builder's defaultTtl */
  ttl?: number;
  /** Aborting cancels the build like cancel() */
  signal?: AbortSignal;
}

/** Handle on one in-flight build */
export interface BuildHandle {
  readonly result: Promise<OutgoingMessage>;
  readonly state: BuildState;
  /** Cancel the proof-of-work search. No effect once the build has finished. */
  cancel(): void;
}

export interface MessageBuilderOptions extends WrapOptions {
  /** Where proof-of-work searches run. Default: an InlinePowExecutor */
  executor?: PowExecutor;
  /** TTL used when a build does not name one. Default: DEFAULT_MESSAGE_TTL_MS */
  defaultTtl?: number;
  /** Wall clock used for the PoW timestamp. Default: Date.now */
  now?: () => number;
}

class MessageBuild implements BuildHandle {
  readonly result: Promise<OutgoingMessage>;
  private currentState: BuildState = 'wrapped';
  private readonly controller = new AbortController();
  private detachSignal: () => void = () => {};

  constructor(
    message: PlainOutgoingMessage,
    requirePoW: boolean,
    private readonly executor: PowExecutor,
    private readonly now: () => number,
    signal?: AbortSignal,
  ) {
    if (!requirePoW) {
      this.currentState = 'done';
      this.result = Promise.resolve(message);
      return;
    }
    if (signal) {
      const onAbort = () => this.cancel();
      signal.addEventListener('abort', onAbort, { once: true });
      this.detachSignal = () => signal.removeEventListener('abort', onAbort);
      if (signal.aborted) this.controller.abort();
    }
    this.result = this.solve(message);
  }

  get state(): BuildState {
    return this.currentState;
  }

  cancel(): void {
    if (this.currentState === 'solving') {
      this.controller.abort();
    }
  }

  private async solve(message: PlainOutgoingMessage): Promise<OutgoingMessage> {
    this.currentState = 'solving';
    const powTimestamp = this.now();
    const input: ProofOfWorkInput = {
      payload: message.payload,
      destination: message.destination,
      timestamp: powTimestamp,
      ttl: message.ttl,
    };

    try {
      const trials = expectedTrials(payloadByteLength(message.payload), message.ttl, this.executor.config.nonceTrials);
      console.log(
        `[MessageBuilder] Calculating proof of work for ${message.destination.slice(0, 8)} (expected ~${trials} trials)`,
      );
      const nonce = await this.executor.solve(input, this.controller.signal);
      if (this.controller.signal.aborted) {
        throw new SwarmError('BUILD_CANCELLED', 'Proof of work cancelled');
      }
      this.currentState = 'done';
      console.log(`[MessageBuilder] Proof of work ready for ${message.destination.slice(0, 8)}`);
      return { ...message, powTimestamp, nonce };
    } catch (err) {
      if (this.controller.signal.aborted || isSwarmError(err, 'BUILD_CANCELLED')) {
        this.currentState = 'cancelled';
        console.log(`[MessageBuilder] Build for ${message.destination.slice(0, 8)} cancelled`);
        throw new SwarmError('BUILD_CANCELLED', 'Message build cancelled', { cause: err });
      }
      this.currentState = 'failed';
      if (isSwarmError(err, 'POW_EXHAUSTED')) {
        console.warn(`[MessageBuilder] Proof of work failed for ${message.destination.slice(0, 8)}: ${err.message}`);
        throw new SwarmError('POW_CALCULATION_FAILED', 'Failed to calculate proof of work', {
          cause: err,
          context: { destination: message.destination, ...err.context },
        });
      }
      throw err;
    } finally {
      this.detachSignal();
    }
  }
}

/**
 * MessageBuilder - turns logical messages into ready-to-send OutgoingMessages.
 *
 * Wrapping happens synchronously inside build(); envelope errors are thrown
 * from there. The proof-of-work search, when required, runs on the
 * configured executor and is reported through the returned handle.
 * Nothing is retried: a caller that wants another attempt builds again,
 * preferably with a fresh send timestamp.
 */
export class MessageBuilder {
  private readonly executor: PowExecutor;
  private readonly defaultTtl: number;
  private readonly now: () => number;
  private readonly wrapOptions: WrapOptions;

  constructor(options: MessageBuilderOptions = {}) {
    const { executor, defaultTtl = DEFAULT_MESSAGE_TTL_MS, now = Date.now, ...wrapOptions } = options;
    this.executor = executor ?? new InlinePowExecutor();
    this.defaultTtl = defaultTtl;
    this.now = now;
    this.wrapOptions = wrapOptions;
  }

  /**
   * @throws SwarmError ENVELOPE_CONSTRUCTION_FAILED when the message cannot be wrapped
   */
  build(message: LogicalMessage, sendTimestamp: number, options: BuildOptions): BuildHandle {
    const ttl = options.ttl ?? this.defaultTtl;
    if (!Number.isSafeInteger(ttl) || ttl < 0) {
      throw new SwarmError('ENVELOPE_CONSTRUCTION_FAILED', `Invalid TTL: ${ttl}`, { context: { field: 'ttl' } });
    }

    const framed = wrapMessage(message, sendTimestamp, this.wrapOptions);
    const wrapped: PlainOutgoingMessage = {
      destination: message.destination,
      payload: toBase64(framed),
      ttl,
    };
    return new MessageBuild(wrapped, options.requirePoW, this.executor, this.now, options.signal);
  }
}

/** One-off build with a throwaway builder */
export function buildOutgoingMessage(
  message: LogicalMessage,
  sendTimestamp: number,
  options: BuildOptions & MessageBuilderOptions,
): Promise<OutgoingMessage> {
  const { requirePoW, ttl, signal, ...builderOptions } = options;
  return new MessageBuilder(builderOptions).build(message, sendTimestamp, { requirePoW, ttl, signal }).result;
}
