import { SwarmError } from '../errors/swarm-error.js';

/** Default time storage nodes keep a message (4 days) */
export const DEFAULT_MESSAGE_TTL_MS = 4 * 24 * 60 * 60 * 1000;

interface OutgoingMessageBase {
  /** Recipient public key identifier */
  destination: string;
  /** Base64 of the framed envelope */
  payload: string;
  /** TTL in ms */
  ttl: number;
}

/** Message carrying a proof of work; the nonce is bound to powTimestamp */
export interface ProvenOutgoingMessage extends OutgoingMessageBase {
  /** When the proof of work was calculated, ms since epoch */
  powTimestamp: number;
  /** Base64 proof-of-work nonce */
  nonce: string;
}

export interface PlainOutgoingMessage extends OutgoingMessageBase {
  powTimestamp?: undefined;
  nonce?: undefined;
}

/** Ready-to-send message; powTimestamp and nonce come as a pair or not at all */
export type OutgoingMessage = ProvenOutgoingMessage | PlainOutgoingMessage;

/** Flat record handed to the transport layer */
export interface WireMessage {
  pubKey: string;
  data: string;
  ttl: string;
  timestamp?: string;
  nonce?: string;
}

export function hasProofOfWork(message: OutgoingMessage): message is ProvenOutgoingMessage {
  return message.powTimestamp !== undefined && message.nonce !== undefined;
}

export function toWireFormat(message: OutgoingMessage): WireMessage {
  const result: WireMessage = {
    pubKey: message.destination,
    data: message.payload,
    ttl: String(message.ttl),
  };
  if (hasProofOfWork(message)) {
    result.timestamp = String(message.powTimestamp);
    result.nonce = message.nonce;
  }
  return result;
}

const DECIMAL_PATTERN = /^(0|[1-9]\d*)$/;

function parseDecimal(field: string, value: unknown): number {
  if (typeof value !== 'string' || !DECIMAL_PATTERN.test(value)) {
    throw new SwarmError('INVALID_WIRE_MESSAGE', `${field} must be a decimal string`, { context: { field } });
  }
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw new SwarmError('INVALID_WIRE_MESSAGE', `${field} is out of range`, { context: { field } });
  }
  return parsed;
}

function requireText(field: string, value: unknown): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new SwarmError('INVALID_WIRE_MESSAGE', `${field} must be a non-empty string`, { context: { field } });
  }
  return value;
}

/**
 * Parse a wire record back into an OutgoingMessage.
 *
 * @throws SwarmError INVALID_WIRE_MESSAGE on missing fields, bad numbers, or a
 * timestamp without a nonce (or the other way round)
 */
export function fromWireFormat(value: unknown): OutgoingMessage {
  if (typeof value !== 'object' || value === null) {
    throw new SwarmError('INVALID_WIRE_MESSAGE', 'Wire message must be an object');
  }
  const record: Record<string, unknown> = Object.fromEntries(Object.entries(value));
  const base = {
    destination: requireText('pubKey', record.pubKey),
    payload: requireText('data', record.data),
    ttl: parseDecimal('ttl', record.ttl),
  };

  const hasTimestamp = record.timestamp !== undefined;
  const hasNonce = record.nonce !== undefined;
  if (hasTimestamp !== hasNonce) {
    throw new SwarmError('INVALID_WIRE_MESSAGE', 'timestamp and nonce must be sent together', {
      context: { field: hasTimestamp ? 'nonce' : 'timestamp' },
    });
  }
  if (!hasTimestamp) {
    return base;
  }
  return {
    ...base,
    powTimestamp: parseDecimal('timestamp', record.timestamp),
    nonce: requireText('nonce', record.nonce),
  };
}
