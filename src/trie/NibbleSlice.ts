import * as Data from "effect/Data";
import * as Effect from "effect/Effect";
import type { BytesType, NibbleSlice } from "./Node";

/** Error raised when a nibble index or offset falls outside a slice. */
export class NibbleOutOfBoundsError extends Data.TaggedError(
  "NibbleOutOfBoundsError",
)<{
  readonly message: string;
  readonly index: number;
  readonly length: number;
}> {}

const outOfBounds = (message: string, index: number, length: number) =>
  new NibbleOutOfBoundsError({ message, index, length });

const nibbleCapacity = (data: BytesType): number => data.length * 2;

const nibbleAt = (slice: NibbleSlice, index: number): number => {
  const absolute = slice.offset + index;
  const byte = slice.data[absolute >> 1];
  return (absolute & 1) === 0 ? byte >> 4 : byte & 0x0f;
};

/** Nibble view over the whole of `data`. */
export const fromBytes = (data: BytesType): NibbleSlice => ({
  data,
  offset: 0,
});

/** Nibble view over `data` starting at `offset`. */
export const make = (
  data: BytesType,
  offset: number,
): Effect.Effect<NibbleSlice, NibbleOutOfBoundsError> =>
  Number.isInteger(offset) && offset >= 0 && offset <= nibbleCapacity(data)
    ? Effect.succeed({ data, offset })
    : Effect.fail(
        outOfBounds(
          `Nibble offset ${offset} exceeds ${nibbleCapacity(data)} nibbles`,
          offset,
          nibbleCapacity(data),
        ),
      );

/** Number of nibbles remaining after the offset. */
export const length = (slice: NibbleSlice): number =>
  nibbleCapacity(slice.data) - slice.offset;

export const isEmpty = (slice: NibbleSlice): boolean => length(slice) === 0;

/** The `index`-th nibble counted from the slice offset. */
export const at = (
  slice: NibbleSlice,
  index: number,
): Effect.Effect<number, NibbleOutOfBoundsError> => {
  const available = length(slice);
  if (!Number.isInteger(index) || index < 0 || index >= available) {
    return Effect.fail(
      outOfBounds(
        `Nibble index ${index} out of bounds for slice of ${available} nibbles`,
        index,
        available,
      ),
    );
  }
  return Effect.succeed(nibbleAt(slice, index));
};

/** True when every nibble of `prefix` matches the start of `slice`. */
export const startsWith = (
  slice: NibbleSlice,
  prefix: NibbleSlice,
): boolean => {
  const prefixLength = length(prefix);
  if (prefixLength > length(slice)) {
    return false;
  }
  for (let i = 0; i < prefixLength; i += 1) {
    if (nibbleAt(slice, i) !== nibbleAt(prefix, i)) {
      return false;
    }
  }
  return true;
};

export const equals = (a: NibbleSlice, b: NibbleSlice): boolean =>
  length(a) === length(b) && startsWith(a, b);

/** Same bytes, offset advanced by `count` nibbles. */
export const mid = (
  slice: NibbleSlice,
  count: number,
): Effect.Effect<NibbleSlice, NibbleOutOfBoundsError> => {
  const available = length(slice);
  if (!Number.isInteger(count) || count < 0 || count > available) {
    return Effect.fail(
      outOfBounds(
        `Cannot advance ${count} nibbles into a slice of ${available}`,
        count,
        available,
      ),
    );
  }
  return Effect.succeed({ data: slice.data, offset: slice.offset + count });
};

/** Drop the first `byteOffset` bytes of `data` without copying. */
export const byteSlice = (
  data: BytesType,
  byteOffset: number,
): Effect.Effect<BytesType, NibbleOutOfBoundsError> =>
  Number.isInteger(byteOffset) && byteOffset >= 0 && byteOffset <= data.length
    ? Effect.succeed(data.subarray(byteOffset))
    : Effect.fail(
        outOfBounds(
          `Cannot drop ${byteOffset} bytes from ${data.length}`,
          byteOffset,
          data.length,
        ),
      );

/**
 * Rebase the view on the byte holding its next nibble, so consumed whole
 * bytes are dropped and the offset is 0 or 1.
 */
export const realign = (
  slice: NibbleSlice,
): Effect.Effect<NibbleSlice, NibbleOutOfBoundsError> =>
  Effect.map(byteSlice(slice.data, slice.offset >> 1), (data) => ({
    data,
    offset: slice.offset & 1,
  }));

/** Copy the viewed nibbles out, one per byte. */
export const toNibbleList = (slice: NibbleSlice): Uint8Array => {
  const out = new Uint8Array(length(slice));
  for (let i = 0; i < out.length; i += 1) {
    out[i] = nibbleAt(slice, i);
  }
  return out;
};

/** Hex-digit rendering of the viewed nibbles, for log annotations. */
export const format = (slice: NibbleSlice): string =>
  Array.from(toNibbleList(slice), (nibble) => nibble.toString(16)).join("");
