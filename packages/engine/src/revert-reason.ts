import { bytesToBigInt, bytesToHex } from "@ethereumjs/util";

const ERROR_SELECTOR = "0x08c379a0"; // Error(string)
const PANIC_SELECTOR = "0x4e487b71"; // Panic(uint256)

function decodeErrorString(data: Uint8Array): string | undefined {
  if (data.length < 68) return undefined;
  const offset = bytesToBigInt(data.subarray(4, 36));
  if (offset > BigInt(data.length)) return undefined;

  const start = 4 + Number(offset);
  if (start + 32 > data.length) return undefined;
  const length = bytesToBigInt(data.subarray(start, start + 32));
  if (BigInt(start + 32) + length > BigInt(data.length)) return undefined;

  return new TextDecoder().decode(data.subarray(start + 32, start + 32 + Number(length)));
}

/** Human-readable reason for a REVERT, from its return data. */
export function decodeRevertReason(returnData: Uint8Array): string {
  if (returnData.length === 0) return "execution reverted";

  const selector = bytesToHex(returnData.subarray(0, 4));
  if (selector === ERROR_SELECTOR) {
    const message = decodeErrorString(returnData);
    if (message !== undefined) return message;
  } else if (selector === PANIC_SELECTOR && returnData.length >= 36) {
    return `Panic(0x${bytesToBigInt(returnData.subarray(4, 36)).toString(16)})`;
  }
  return bytesToHex(returnData);
}
