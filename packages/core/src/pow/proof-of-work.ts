/**
 * Proof-of-work puzzle for storage-node submissions.
 *
 * A nonce is valid when the first 8 bytes of
 *   SHA-512(nonce || SHA-512(destination || timestamp || ttl || payload))
 * read as a big-endian unsigned integer fall below the target from
 * computeTarget(). The inner hash does not depend on the nonce, so it is
 * computed once per search.
 *
 * Searches scan nonces sequentially from zero: the nonce found is the
 * smallest valid one, which makes results reproducible.
 */

import { SwarmError } from '../errors/swarm-error.js';
import { fromBase64, toBase64, utf8Encode } from '../crypto/encoding.js';
import { SHA512_LENGTH, sha512 } from '../crypto/hash.js';
import { NONCE_LENGTH, computeTarget } from './difficulty.js';
import type { PowConfig } from './pow-config.js';

/** Everything the digest commits to */
export interface ProofOfWorkInput {
  /** Transport-safe payload text (base64 of the framed envelope) */
  payload: string;
  destination: string;
  /** PoW timestamp, ms since epoch */
  timestamp: number;
  /** TTL in ms */
  ttl: number;
}

/** Nonces scanned between budget and cancellation checks */
const CHECK_INTERVAL = 1024;

const MAX_NONCE = (1n << 64n) - 1n;

export function payloadByteLength(payload: string): number {
  return Buffer.byteLength(payload, 'utf8');
}

export function computeInitialHash(input: ProofOfWorkInput): Uint8Array {
  return sha512(utf8Encode(`${input.destination}${input.timestamp}${input.ttl}${input.payload}`));
}

export function nonceToBytes(nonce: bigint): Uint8Array {
  if (nonce < 0n || nonce > MAX_NONCE) {
    throw new RangeError(`Nonce out of range: ${nonce}`);
  }
  const bytes = new Uint8Array(NONCE_LENGTH);
  new DataView(bytes.buffer).setBigUint64(0, nonce);
  return bytes;
}

/** Base64 of the 8 big-endian nonce bytes, as sent on the wire */
export function encodeNonce(nonce: bigint): string {
  return toBase64(nonceToBytes(nonce));
}

/**
 * @throws Error if the text is not base64 of exactly 8 bytes
 */
export function decodeNonce(text: string): bigint {
  const bytes = fromBase64(text);
  if (bytes.length !== NONCE_LENGTH) {
    throw new Error(`Nonce must be ${NONCE_LENGTH} bytes, got ${bytes.length}`);
  }
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getBigUint64(0);
}

export function computeDigest(nonce: bigint, initialHash: Uint8Array): Uint8Array {
  const buffer = new Uint8Array(NONCE_LENGTH + initialHash.length);
  buffer.set(nonceToBytes(nonce), 0);
  buffer.set(initialHash, NONCE_LENGTH);
  return sha512(buffer);
}

/** The digest's leading 64 bits; compared against the target */
export function digestScore(digest: Uint8Array): bigint {
  return new DataView(digest.buffer, digest.byteOffset, digest.byteLength).getBigUint64(0);
}

export function targetFor(input: ProofOfWorkInput, nonceTrials: number): bigint {
  return computeTarget(payloadByteLength(input.payload), input.ttl, nonceTrials);
}

/**
 * Incremental sequential search. Each instance owns its own counters and
 * scratch buffer, so independent searches can run side by side.
 */
export class ProofOfWorkSearch {
  readonly target: bigint;
  private nextNonce = 0n;
  private scanned = 0;
  private readonly buffer: Uint8Array;
  private readonly view: DataView;

  constructor(input: ProofOfWorkInput, nonceTrials: number) {
    this.target = targetFor(input, nonceTrials);
    this.buffer = new Uint8Array(NONCE_LENGTH + SHA512_LENGTH);
    this.buffer.set(computeInitialHash(input), NONCE_LENGTH);
    this.view = new DataView(this.buffer.buffer);
  }

  /** Number of nonces scanned so far */
  get trials(): number {
    return this.scanned;
  }

  /**
   * Scan up to `count` further nonces.
   * @returns the first satisfying nonce, or null if none was found in this slice
   */
  advance(count: number): bigint | null {
    for (let i = 0; i < count; i++) {
      const nonce = this.nextNonce;
      this.view.setBigUint64(0, nonce);
      this.nextNonce = nonce + 1n;
      this.scanned++;
      if (digestScore(sha512(this.buffer)) < this.target) {
        return nonce;
      }
    }
    return null;
  }
}

export function exhaustedError(trials: number, elapsedMs: number): SwarmError {
  return new SwarmError('POW_EXHAUSTED', `No valid nonce after ${trials} trials (${elapsedMs}ms)`, {
    context: { trials, elapsedMs },
  });
}

export function cancelledError(): SwarmError {
  return new SwarmError('BUILD_CANCELLED', 'Proof of work cancelled');
}

/**
 * A zero target cannot be met by any digest; fail before scanning.
 * @throws SwarmError POW_EXHAUSTED
 */
export function assertSolvable(search: ProofOfWorkSearch): void {
  if (search.target === 0n) {
    throw new SwarmError('POW_EXHAUSTED', 'Difficulty target is zero, no nonce can satisfy it', {
      context: { trials: 0, elapsedMs: 0 },
    });
  }
}

/** True once the search has used up its trial or time budget */
export function isBudgetSpent(search: ProofOfWorkSearch, config: PowConfig, startedAt: number): boolean {
  return search.trials >= config.maxTrials || Date.now() - startedAt >= config.maxDurationMs;
}

/**
 * Solve on the current thread. Blocks until a nonce is found, the budget is
 * spent, or `shouldStop` returns true (polled every CHECK_INTERVAL trials).
 *
 * @returns base64-encoded nonce
 * @throws SwarmError POW_EXHAUSTED when the budget runs out
 * @throws SwarmError BUILD_CANCELLED when shouldStop() reports true
 */
export function solveProofOfWork(input: ProofOfWorkInput, config: PowConfig, shouldStop?: () => boolean): string {
  const search = new ProofOfWorkSearch(input, config.nonceTrials);
  assertSolvable(search);
  const startedAt = Date.now();

  for (;;) {
    if (shouldStop?.()) {
      throw cancelledError();
    }
    if (isBudgetSpent(search, config, startedAt)) {
      throw exhaustedError(search.trials, Date.now() - startedAt);
    }
    const found = search.advance(Math.min(CHECK_INTERVAL, config.maxTrials - search.trials));
    if (found !== null) {
      return encodeNonce(found);
    }
  }
}

/** Check a received nonce the way a storage node would */
export function verifyProofOfWork(input: ProofOfWorkInput, nonce: string, nonceTrials: number): boolean {
  let value: bigint;
  try {
    value = decodeNonce(nonce);
  } catch {
    return false;
  }
  const digest = computeDigest(value, computeInitialHash(input));
  return digestScore(digest) < targetFor(input, nonceTrials);
}
