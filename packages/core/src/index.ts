export const SWARM_ENVELOPE_VERSION = '0.1.0';

export { SwarmError, isSwarmError } from './errors/index.js';
export type { SwarmErrorCode, SwarmErrorOptions } from './errors/index.js';

export { isSessionId, SESSION_ID_PREFIX } from './identity/index.js';
export type { SessionId } from './identity/index.js';

export { toBase64, fromBase64, uint8ArrayToHex, sha512 } from './crypto/index.js';

// Envelope codec
export {
  wrapMessage,
  unwrapMessage,
  ENVELOPE_TYPES,
  DEFAULT_MAX_CONTENT_BYTES,
  DEFAULT_SOURCE_DEVICE,
  MESSAGE_REQUEST_VERB,
  MESSAGE_REQUEST_PATH,
} from './envelope/index.js';
export type { EnvelopeType, LogicalMessage, FramedEnvelope, UnwrappedEnvelope, WrapOptions } from './envelope/index.js';

// Proof of work
export {
  computeTarget,
  expectedTrials,
  NONCE_LENGTH,
  resolvePowConfig,
  powConfigFromEnv,
  DEFAULT_NONCE_TRIALS,
  DEFAULT_MAX_TRIALS,
  DEFAULT_MAX_DURATION_MS,
  ProofOfWorkSearch,
  solveProofOfWork,
  verifyProofOfWork,
  computeInitialHash,
  computeDigest,
  digestScore,
  encodeNonce,
  decodeNonce,
  InlinePowExecutor,
  DEFAULT_SLICE_TRIALS,
  PowWorkerPool,
  spawnThreadWorker,
} from './pow/index.js';
export type {
  PowConfig,
  PowOptions,
  ProofOfWorkInput,
  PowExecutor,
  InlinePowExecutorOptions,
  PowWorkerHandle,
  PowWorkerSpawner,
  PowWorkerPoolOptions,
  PowJobRequest,
  PowJobResponse,
} from './pow/index.js';

// Outgoing messages
export {
  MessageBuilder,
  buildOutgoingMessage,
  DEFAULT_MESSAGE_TTL_MS,
  toWireFormat,
  fromWireFormat,
  hasProofOfWork,
} from './message/index.js';
export type {
  BuildHandle,
  BuildOptions,
  BuildState,
  MessageBuilderOptions,
  OutgoingMessage,
  ProvenOutgoingMessage,
  PlainOutgoingMessage,
  WireMessage,
} from './message/index.js';
