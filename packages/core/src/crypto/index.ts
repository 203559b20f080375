export { utf8Encode, uint8ArrayToHex, toBase64, fromBase64, concatBytes } from './encoding.js';
export { sha512, SHA512_LENGTH } from './hash.js';
