/** Nonce width in bytes; also counted towards the payload length */
export const NONCE_LENGTH = 8;

const TWO_POW_64 = 1n << 64n;
const TTL_SCALE = 1n << 16n;

/**
 * Highest acceptable digest score for a payload of `payloadLength` bytes
 * kept for `ttl` ms.
 *
 * target = 2^64 / (nonceTrials * (len + ttlSeconds * len / 2^16)), len = payloadLength + 8
 *
 * The expected number of trials equals the denominator, so bigger or
 * longer-lived payloads cost proportionally more work.
 */
export function computeTarget(payloadLength: number, ttl: number, nonceTrials: number): bigint {
  return TWO_POW_64 / difficultyDenominator(payloadLength, ttl, nonceTrials);
}

/**
 * Expected number of nonces scanned before a hit. Once this exceeds 2^64
 * the target is zero and the search cannot succeed.
 */
export function expectedTrials(payloadLength: number, ttl: number, nonceTrials: number): bigint {
  return difficultyDenominator(payloadLength, ttl, nonceTrials);
}

function difficultyDenominator(payloadLength: number, ttl: number, nonceTrials: number): bigint {
  if (!Number.isSafeInteger(payloadLength) || payloadLength < 0) {
    throw new RangeError(`payloadLength must be a non-negative integer, got ${payloadLength}`);
  }
  if (!Number.isSafeInteger(ttl) || ttl < 0) {
    throw new RangeError(`ttl must be a non-negative integer, got ${ttl}`);
  }
  if (!Number.isSafeInteger(nonceTrials) || nonceTrials < 1) {
    throw new RangeError(`nonceTrials must be a positive integer, got ${nonceTrials}`);
  }
  const totalLength = BigInt(payloadLength + NONCE_LENGTH);
  const ttlSeconds = BigInt(Math.floor(ttl / 1000));
  return BigInt(nonceTrials) * (totalLength + (ttlSeconds * totalLength) / TTL_SCALE);
}
