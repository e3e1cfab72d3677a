import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import type { BytesType, HashType } from "../Node";
import { HashLength } from "../Node";

/** True when `value` has the byte length of a node hash. */
export const isHash = (value: Uint8Array): value is HashType =>
  value.length === HashLength;

/** Lowercase `0x`-prefixed hex rendering of `bytes`. */
export const toHex = (bytes: Uint8Array): string => `0x${bytesToHex(bytes)}`;

const stripHexPrefix = (hex: string): string =>
  hex.startsWith("0x") || hex.startsWith("0X") ? hex.slice(2) : hex;

/**
 * Build helpers that coerce hex input into bytes with a custom error.
 */
export const makeBytesHelpers = (onError: (message: string) => Error) => {
  const bytesFromHex = (hex: string): BytesType => {
    const digits = stripHexPrefix(hex);
    if (digits.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(digits)) {
      throw onError(`Invalid hex input ${JSON.stringify(hex)}`);
    }
    return hexToBytes(digits);
  };

  return { bytesFromHex };
};

/**
 * Build helpers that coerce hex or raw input into hashes with a custom error.
 */
export const makeHashHelpers = (onError: (message: string) => Error) => {
  const { bytesFromHex } = makeBytesHelpers(onError);

  const hashFromBytes = (bytes: Uint8Array): HashType => {
    if (!isHash(bytes)) {
      throw onError(
        `Invalid hash input of ${bytes.length} bytes (expected ${HashLength})`,
      );
    }
    return bytes;
  };

  const hashFromHex = (hex: string): HashType =>
    hashFromBytes(bytesFromHex(hex));

  return { hashFromBytes, hashFromHex };
};
