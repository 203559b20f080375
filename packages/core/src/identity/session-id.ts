/** Hex public key with the `05` prefix, as storage nodes address recipients */
export type SessionId = string;

export const SESSION_ID_PREFIX = '05';

const SESSION_ID_PATTERN = /^05[0-9a-f]{64}$/;

export function isSessionId(value: unknown): value is SessionId {
  return typeof value === 'string' && SESSION_ID_PATTERN.test(value);
}
