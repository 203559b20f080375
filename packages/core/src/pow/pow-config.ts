/** Difficulty multiplier storage nodes expect by default */
export const DEFAULT_NONCE_TRIALS = 10;

/** Nonces tried before a search gives up (2^24) */
export const DEFAULT_MAX_TRIALS = 2 ** 24;

/** Wall-clock budget for one search (1 minute) */
export const DEFAULT_MAX_DURATION_MS = 60 * 1000;

export interface PowConfig {
  /** Difficulty multiplier; expected trials grow linearly with it */
  nonceTrials: number;
  /** Maximum nonces scanned before failing with POW_EXHAUSTED */
  maxTrials: number;
  /** Maximum search time in ms before failing with POW_EXHAUSTED */
  maxDurationMs: number;
}

export type PowOptions = Partial<PowConfig>;

function requirePositiveInteger(name: string, value: number): number {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

/** Fill in defaults and validate a partial PoW configuration */
export function resolvePowConfig(options: PowOptions = {}): PowConfig {
  const {
    nonceTrials = DEFAULT_NONCE_TRIALS,
    maxTrials = DEFAULT_MAX_TRIALS,
    maxDurationMs = DEFAULT_MAX_DURATION_MS,
  } = options;
  return {
    nonceTrials: requirePositiveInteger('nonceTrials', nonceTrials),
    maxTrials: requirePositiveInteger('maxTrials', maxTrials),
    maxDurationMs: requirePositiveInteger('maxDurationMs', maxDurationMs),
  };
}

function readInteger(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  if (!/^\d+$/.test(raw.trim())) {
    throw new RangeError(`${key} must be a positive integer, got "${raw}"`);
  }
  return Number(raw.trim());
}

/**
 * Read PoW settings from the environment:
 * SWARM_POW_NONCE_TRIALS, SWARM_POW_MAX_TRIALS, SWARM_POW_MAX_DURATION_MS.
 */
export function powConfigFromEnv(env: NodeJS.ProcessEnv = process.env): PowConfig {
  return resolvePowConfig({
    nonceTrials: readInteger(env, 'SWARM_POW_NONCE_TRIALS'),
    maxTrials: readInteger(env, 'SWARM_POW_MAX_TRIALS'),
    maxDurationMs: readInteger(env, 'SWARM_POW_MAX_DURATION_MS'),
  });
}
