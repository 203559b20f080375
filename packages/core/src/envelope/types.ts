import type { SessionId } from '../identity/session-id.js';

export const ENVELOPE_TYPES = [
  'ciphertext',
  'key-exchange',
  'prekey-bundle',
  'receipt',
  'unidentified-sender',
  'friend-request',
] as const;

export type EnvelopeType = (typeof ENVELOPE_TYPES)[number];

/** Maps envelope types onto the enum names of the wire schema */
export const ENVELOPE_TYPE_NAMES: Record<EnvelopeType, string> = {
  ciphertext: 'CIPHERTEXT',
  'key-exchange': 'KEY_EXCHANGE',
  'prekey-bundle': 'PREKEY_BUNDLE',
  receipt: 'RECEIPT',
  'unidentified-sender': 'UNIDENTIFIED_SENDER',
  'friend-request': 'FRIEND_REQUEST',
};

/** A message as handed over by the sending subsystem */
export interface LogicalMessage {
  type: EnvelopeType;
  /** Sender identifier; empty only for sealed-sender envelopes */
  source: string;
  /** Sender device number. Default: 1 */
  sourceDevice?: number;
  destination: SessionId;
  /** Creation time, ms since epoch */
  timestamp: number;
  /** Already-encrypted content bytes */
  content: Uint8Array;
}

/** Serialized, transport-framed envelope bytes */
export type FramedEnvelope = Uint8Array;

/** What a receiver recovers from a framed envelope */
export interface UnwrappedEnvelope {
  type: EnvelopeType;
  source: string;
  sourceDevice: number;
  /** The send timestamp the envelope was wrapped with */
  timestamp: number;
  content: Uint8Array;
}
