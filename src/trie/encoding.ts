import * as Data from "effect/Data";
import * as Effect from "effect/Effect";
import * as Schema from "effect/Schema";
import type { BytesType, NibbleSlice } from "./Node";

/** Error raised when hex-prefix encoding/decoding fails. */
export class NibbleEncodingError extends Data.TaggedError(
  "NibbleEncodingError",
)<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

const isNibbleList = (nibbles: Uint8Array): boolean => {
  for (const nibble of nibbles) {
    if (nibble > 0x0f) {
      return false;
    }
  }
  return true;
};

/** Schema for validating nibble lists (values 0x0 through 0xf). */
export const NibbleListSchema: Schema.Schema<Uint8Array, Uint8Array> =
  Schema.Uint8ArrayFromSelf.pipe(
    Schema.filter(isNibbleList, {
      message: () => "Nibble list must contain values between 0x0 and 0xf",
    }),
  );

/** One nibble per byte, values 0x0-0xf. */
export type NibbleList = BytesType;

/** Decoded hex-prefix path with leaf flag. */
export interface HexPrefixDecoded {
  readonly path: NibbleSlice;
  readonly isLeaf: boolean;
}

const validateNibbleList = (
  nibbles: BytesType,
): Effect.Effect<NibbleList, NibbleEncodingError> =>
  Schema.decode(NibbleListSchema)(nibbles).pipe(
    Effect.mapError(
      (cause) =>
        new NibbleEncodingError({
          message: "Invalid nibble list",
          cause,
        }),
    ),
  );

/** Convert a byte array into a nibble list (two nibbles per byte). */
export const bytesToNibbleList = (
  bytes: BytesType,
): Effect.Effect<NibbleList> =>
  Effect.sync(() => {
    const nibbles = new Uint8Array(bytes.length * 2);
    for (let i = 0; i < bytes.length; i += 1) {
      const byte = bytes[i];
      nibbles[i * 2] = (byte & 0xf0) >> 4;
      nibbles[i * 2 + 1] = byte & 0x0f;
    }
    return nibbles;
  });

/**
 * Decode a hex-prefix compact path into a nibble view over the compact bytes.
 *
 * The flag nibble (and the padding nibble of even paths) is skipped by the
 * view offset, so no bytes are copied.
 */
export const compactToNibbleSlice = (
  compact: BytesType,
): Effect.Effect<HexPrefixDecoded, NibbleEncodingError> =>
  Effect.gen(function* () {
    if (compact.length === 0) {
      return yield* Effect.fail(
        new NibbleEncodingError({ message: "Compact path cannot be empty" }),
      );
    }

    const first = compact[0];
    if ((first & 0xc0) !== 0) {
      return yield* Effect.fail(
        new NibbleEncodingError({
          message: "Compact path has invalid hex-prefix flag bits",
        }),
      );
    }
    const isOdd = (first & 0x10) !== 0;
    const isLeaf = (first & 0x20) !== 0;

    if (!isOdd && (first & 0x0f) !== 0) {
      return yield* Effect.fail(
        new NibbleEncodingError({
          message: "Even compact path must have a zero padding nibble",
        }),
      );
    }

    return {
      path: { data: compact, offset: isOdd ? 1 : 2 },
      isLeaf,
    };
  });

/** Encode a nibble list into a hex-prefix compact path. */
export const nibbleListToCompact = (
  nibbles: BytesType,
  isLeaf: boolean,
): Effect.Effect<BytesType, NibbleEncodingError> =>
  Effect.gen(function* () {
    const validated = yield* validateNibbleList(nibbles);
    const isOdd = validated.length % 2 === 1;
    const compact = new Uint8Array(1 + Math.floor(validated.length / 2));
    const flag = (isLeaf ? 0x20 : 0x00) | (isOdd ? 0x10 : 0x00);

    let start = 0;
    compact[0] = flag;
    if (isOdd) {
      compact[0] = flag | validated[0];
      start = 1;
    }
    for (let i = start; i < validated.length; i += 2) {
      compact[1 + (i - start) / 2] = (validated[i] << 4) | validated[i + 1];
    }
    return compact;
  });
