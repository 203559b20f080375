import { describe, expect, it } from 'vitest';
import { concatBytes, fromBase64, toBase64, uint8ArrayToHex, utf8Encode } from './encoding.js';
import { SHA512_LENGTH, sha512 } from './hash.js';

describe('encoding', () => {
  it('hex encodes with zero padding', () => {
    expect(uint8ArrayToHex(new Uint8Array([0, 1, 171, 255]))).toBe('0001abff');
  });

  it('base64 encodes bytes', () => {
    expect(toBase64(new Uint8Array([0, 0, 0, 0, 0, 0, 0, 1]))).toBe('AAAAAAAAAAE=');
    expect(toBase64(utf8Encode('hi'))).toBe('aGk=');
  });

  it('base64 encodes a view into a larger buffer without leaking neighbours', () => {
    const backing = new Uint8Array([9, 9, 104, 105, 9]);
    expect(toBase64(backing.subarray(2, 4))).toBe('aGk=');
  });

  it('decodes base64 back to bytes', () => {
    expect(Array.from(fromBase64('aGk='))).toEqual([104, 105]);
    expect(fromBase64('')).toHaveLength(0);
  });

  it('rejects malformed base64', () => {
    expect(() => fromBase64('not base64!')).toThrow('Invalid base64 string');
    expect(() => fromBase64('aGk')).toThrow('Invalid base64 string');
  });

  it('concatenates byte arrays in order', () => {
    const joined = concatBytes(new Uint8Array([1]), new Uint8Array([]), new Uint8Array([2, 3]));
    expect(Array.from(joined)).toEqual([1, 2, 3]);
  });
});

describe('sha512', () => {
  it('produces 64-byte digests', () => {
    expect(SHA512_LENGTH).toBe(64);
    expect(sha512(utf8Encode('abc'))).toHaveLength(64);
  });

  it('matches the standard digest of "abc"', () => {
    expect(uint8ArrayToHex(sha512(utf8Encode('abc'))).slice(0, 32)).toBe('ddaf35a193617abacc417349ae204131');
  });
});
