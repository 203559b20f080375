/**
 * Byte encoding helpers shared by the codec and the proof-of-work engine.
 */

const textEncoder = new TextEncoder();

export function utf8Encode(text: string): Uint8Array {
  return textEncoder.encode(text);
}

export function uint8ArrayToHex(arr: Uint8Array): string {
  return Array.from(arr)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}

/** Transport-safe text form used for envelope payloads and nonces */
export function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Decode standard (padded) base64.
 * @throws Error if the text is not canonical base64
 */
export function fromBase64(text: string): Uint8Array {
  if (!BASE64_PATTERN.test(text)) {
    throw new Error('Invalid base64 string');
  }
  return new Uint8Array(Buffer.from(text, 'base64'));
}

/** Concatenate byte arrays into a fresh buffer */
export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}
