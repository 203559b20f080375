export { computeTarget, expectedTrials, NONCE_LENGTH } from './difficulty.js';
export {
  resolvePowConfig,
  powConfigFromEnv,
  DEFAULT_NONCE_TRIALS,
  DEFAULT_MAX_TRIALS,
  DEFAULT_MAX_DURATION_MS,
} from './pow-config.js';
export type { PowConfig, PowOptions } from './pow-config.js';
export {
  ProofOfWorkSearch,
  solveProofOfWork,
  verifyProofOfWork,
  computeInitialHash,
  computeDigest,
  digestScore,
  encodeNonce,
  decodeNonce,
  payloadByteLength,
  targetFor,
} from './proof-of-work.js';
export type { ProofOfWorkInput } from './proof-of-work.js';
export { InlinePowExecutor, DEFAULT_SLICE_TRIALS } from './pow-executor.js';
export type { PowExecutor, InlinePowExecutorOptions } from './pow-executor.js';
export { PowWorkerPool, spawnThreadWorker } from './worker-pool.js';
export type { PowWorkerHandle, PowWorkerSpawner, PowWorkerPoolOptions } from './worker-pool.js';
export { runPowJob, isPowJobRequest, isPowJobResponse } from './pow-job.js';
export type { PowJobRequest, PowJobResponse } from './pow-job.js';
