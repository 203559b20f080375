import { SwarmError } from '../errors/swarm-error.js';
import { isSessionId } from '../identity/session-id.js';
import { EnvelopeProto, PLAIN_CONVERSION, WebSocketMessageProto } from './schema.js';
import { ENVELOPE_TYPES, ENVELOPE_TYPE_NAMES } from './types.js';
import type { EnvelopeType, FramedEnvelope, LogicalMessage, UnwrappedEnvelope } from './types.js';

/** Largest content accepted for a single envelope (64 KiB) */
export const DEFAULT_MAX_CONTENT_BYTES = 64 * 1024;

/** Sender device used when the caller does not name one */
export const DEFAULT_SOURCE_DEVICE = 1;

export const MESSAGE_REQUEST_VERB = 'PUT';
export const MESSAGE_REQUEST_PATH = '/api/v1/message';

const MAX_UINT32 = 0xffffffff;

export interface WrapOptions {
  /** Upper bound on `content` length in bytes. Default: DEFAULT_MAX_CONTENT_BYTES */
  maxContentBytes?: number;
}

const TYPES_BY_NAME = new Map<string, EnvelopeType>(
  ENVELOPE_TYPES.map((type): [string, EnvelopeType] => [ENVELOPE_TYPE_NAMES[type], type]),
);

function constructionError(message: string, context: Record<string, unknown>): SwarmError {
  return new SwarmError('ENVELOPE_CONSTRUCTION_FAILED', message, { context });
}

function isTimestamp(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

function validateLogicalMessage(message: LogicalMessage, sendTimestamp: number, maxContentBytes: number): void {
  if (typeof message.destination !== 'string' || message.destination.length === 0) {
    throw constructionError('Message has no destination', { field: 'destination' });
  }
  if (!isSessionId(message.destination)) {
    throw constructionError('Destination is not a valid public key identifier', {
      field: 'destination',
      destination: message.destination,
    });
  }
  if (!Object.hasOwn(ENVELOPE_TYPE_NAMES, message.type)) {
    throw constructionError(`Unknown envelope type: ${String(message.type)}`, { field: 'type' });
  }
  if (typeof message.source !== 'string') {
    throw constructionError('Message has no source', { field: 'source' });
  }
  // Sealed-sender envelopes hide the sender inside the content
  if (message.source.length === 0 && message.type !== 'unidentified-sender') {
    throw constructionError('Message has no source', { field: 'source' });
  }
  const device = message.sourceDevice ?? DEFAULT_SOURCE_DEVICE;
  if (!Number.isInteger(device) || device < 0 || device > MAX_UINT32) {
    throw constructionError(`Invalid source device: ${device}`, { field: 'sourceDevice' });
  }
  if (!isTimestamp(message.timestamp)) {
    throw constructionError('Message timestamp must be a non-negative integer', { field: 'timestamp' });
  }
  if (!isTimestamp(sendTimestamp)) {
    throw constructionError('Send timestamp must be a non-negative integer', { field: 'sendTimestamp' });
  }
  if (!(message.content instanceof Uint8Array) || message.content.length === 0) {
    throw constructionError('Message has no content', { field: 'content' });
  }
  if (message.content.length > maxContentBytes) {
    throw constructionError(`Content is ${message.content.length} bytes, limit is ${maxContentBytes}`, {
      field: 'content',
      size: message.content.length,
      limit: maxContentBytes,
    });
  }
}

/**
 * Wrap a logical message into an envelope and frame it as a websocket
 * PUT request, the shape storage nodes accept.
 *
 * Deterministic: the request id is the send timestamp.
 *
 * @throws SwarmError ENVELOPE_CONSTRUCTION_FAILED for missing/invalid fields or oversized content
 */
export function wrapMessage(message: LogicalMessage, sendTimestamp: number, options: WrapOptions = {}): FramedEnvelope {
  const { maxContentBytes = DEFAULT_MAX_CONTENT_BYTES } = options;
  validateLogicalMessage(message, sendTimestamp, maxContentBytes);

  const envelope = EnvelopeProto.fromObject({
    type: ENVELOPE_TYPE_NAMES[message.type],
    source: message.source,
    sourceDevice: message.sourceDevice ?? DEFAULT_SOURCE_DEVICE,
    timestamp: sendTimestamp,
    content: message.content,
  });
  const body = EnvelopeProto.encode(envelope).finish();

  const frame = WebSocketMessageProto.fromObject({
    type: 'REQUEST',
    request: {
      verb: MESSAGE_REQUEST_VERB,
      path: MESSAGE_REQUEST_PATH,
      body,
      id: sendTimestamp,
    },
  });
  return WebSocketMessageProto.encode(frame).finish();
}

function invalidEnvelope(message: string, cause?: unknown): SwarmError {
  return new SwarmError('INVALID_ENVELOPE', message, { cause });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Reverse of wrapMessage: strip the transport frame and decode the envelope.
 *
 * @throws SwarmError INVALID_ENVELOPE if either layer is malformed
 */
export function unwrapMessage(framed: FramedEnvelope): UnwrappedEnvelope {
  let frame: Record<string, unknown>;
  try {
    frame = WebSocketMessageProto.toObject(WebSocketMessageProto.decode(framed), PLAIN_CONVERSION);
  } catch (err) {
    throw invalidEnvelope('Transport frame could not be decoded', err);
  }

  const request = frame.request;
  if (frame.type !== 'REQUEST' || !isRecord(request)) {
    throw invalidEnvelope('Transport frame is not a request');
  }
  if (request.verb !== MESSAGE_REQUEST_VERB || request.path !== MESSAGE_REQUEST_PATH) {
    throw invalidEnvelope(`Unexpected request ${String(request.verb)} ${String(request.path)}`);
  }
  if (!(request.body instanceof Uint8Array)) {
    throw invalidEnvelope('Transport frame has no body');
  }

  let envelope: Record<string, unknown>;
  try {
    envelope = EnvelopeProto.toObject(EnvelopeProto.decode(request.body), PLAIN_CONVERSION);
  } catch (err) {
    throw invalidEnvelope('Envelope could not be decoded', err);
  }

  const type = typeof envelope.type === 'string' ? TYPES_BY_NAME.get(envelope.type) : undefined;
  if (!type) {
    throw invalidEnvelope(`Unknown envelope type: ${String(envelope.type)}`);
  }
  if (!isTimestamp(envelope.timestamp)) {
    throw invalidEnvelope('Envelope has no timestamp');
  }
  if (!(envelope.content instanceof Uint8Array)) {
    throw invalidEnvelope('Envelope has no content');
  }

  return {
    type,
    source: typeof envelope.source === 'string' ? envelope.source : '',
    sourceDevice: typeof envelope.sourceDevice === 'number' ? envelope.sourceDevice : DEFAULT_SOURCE_DEVICE,
    timestamp: envelope.timestamp,
    content: new Uint8Array(envelope.content),
  };
}
