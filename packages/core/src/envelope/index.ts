export {
  wrapMessage,
  unwrapMessage,
  DEFAULT_MAX_CONTENT_BYTES,
  DEFAULT_SOURCE_DEVICE,
  MESSAGE_REQUEST_VERB,
  MESSAGE_REQUEST_PATH,
} from './envelope-codec.js';
export type { WrapOptions } from './envelope-codec.js';
export { ENVELOPE_TYPES } from './types.js';
export type { EnvelopeType, LogicalMessage, FramedEnvelope, UnwrappedEnvelope } from './types.js';
