import pc from "picocolors";
import { hexToBytes, bytesToHex, isHexString } from "@ethereumjs/util";

export type Colors = ReturnType<typeof pc.createColors>;

/** Colors honouring the terminal's support, as detected by picocolors. */
export const defaultColors: Colors = pc.createColors(pc.isColorSupported);

/** Build a palette that always (or never) emits ANSI escapes. */
export function createColors(enabled: boolean): Colors {
  return pc.createColors(enabled);
}

export function stripAnsi(input: string): string {
  // eslint-disable-next-line no-control-regex
  return input.replace(/\x1b\[[0-9;]*m/g, "");
}

/** `padEnd` that ignores ANSI escapes when measuring width. */
export function padVisible(text: string, width: number): string {
  const visible = stripAnsi(text).length;
  return visible >= width ? text : text + " ".repeat(width - visible);
}

/** Format a 256-bit value as 0x followed by exactly 64 hex digits. */
export function formatWord(value: bigint): string {
  return "0x" + value.toString(16).padStart(64, "0");
}

/** Decode 0x-prefixed hex into bytes, or `undefined` when it is not hex. An odd-length string is left-padded. */
export function tryDecodeHex(hex: string): Uint8Array | undefined {
  const body = hex.startsWith("0x") || hex.startsWith("0X") ? hex.slice(2) : hex;
  if (body.length === 0) return new Uint8Array(0);
  const prefixed = `0x${body.length % 2 === 0 ? body : "0" + body}`;
  return isHexString(prefixed) ? hexToBytes(prefixed) : undefined;
}

/** Like `tryDecodeHex`, but throws on malformed input. */
export function decodeHex(hex: string): Uint8Array {
  const bytes = tryDecodeHex(hex);
  if (!bytes) {
    throw new Error(`Invalid hex string: ${hex}`);
  }
  return bytes;
}

/** Lowercase hex of `bytes` without the 0x prefix. */
export function hexDigits(bytes: Uint8Array): string {
  return bytesToHex(bytes).slice(2);
}
