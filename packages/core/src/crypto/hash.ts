import nacl from 'tweetnacl';

/** SHA-512 digest length in bytes */
export const SHA512_LENGTH = nacl.hash.hashLength;

export function sha512(data: Uint8Array): Uint8Array {
  return nacl.hash(data);
}
