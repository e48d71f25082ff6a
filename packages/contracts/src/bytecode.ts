import { sha256 } from "@noble/hashes/sha256";
import { bytesToBigInt, bytesToHex, type PrefixedHexString } from "@ethereumjs/util";

const WORD_SIZE = 32;
const MAX_WORDS = 1 << 16;

/** Bytecode that cannot be hashed or loaded into the VM. */
export class BytecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BytecodeError";
  }
}

/** Number of 32-byte words in `bytecode`, after checking its shape. */
export function bytecodeLengthInWords(bytecode: Uint8Array): number {
  if (bytecode.length % WORD_SIZE !== 0) {
    throw new BytecodeError(
      `Bytecode length ${bytecode.length} is not a multiple of ${WORD_SIZE}`
    );
  }
  const words = bytecode.length / WORD_SIZE;
  if (words % 2 === 0) {
    throw new BytecodeError(`Bytecode must have an odd number of words (got ${words})`);
  }
  if (words >= MAX_WORDS) {
    throw new BytecodeError(`Bytecode is too long (${words} words)`);
  }
  return words;
}

/**
 * Versioned bytecode hash: SHA-256 of the code, with byte 0 set to the
 * version (1), byte 1 zeroed and bytes 2..3 holding the big-endian length in
 * words.
 */
export function hashBytecode(bytecode: Uint8Array): PrefixedHexString {
  const words = bytecodeLengthInWords(bytecode);
  const hash = sha256(bytecode);
  hash[0] = 1;
  hash[1] = 0;
  hash[2] = words >> 8;
  hash[3] = words & 0xff;
  return bytesToHex(hash);
}

/** Split bytecode into big-endian 256-bit words. */
export function bytesToBeWords(bytecode: Uint8Array): bigint[] {
  bytecodeLengthInWords(bytecode);
  const words: bigint[] = [];
  for (let offset = 0; offset < bytecode.length; offset += WORD_SIZE) {
    words.push(bytesToBigInt(bytecode.subarray(offset, offset + WORD_SIZE)));
  }
  return words;
}
