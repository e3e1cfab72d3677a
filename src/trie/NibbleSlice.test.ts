import { assert, describe, it } from "@effect/vitest";
import * as Effect from "effect/Effect";
import * as Nibbles from "./NibbleSlice";
import { NibbleOutOfBoundsError } from "./NibbleSlice";
import { bytesFromHex } from "./testUtils";

describe("NibbleSlice", () => {
  it.effect("reads nibbles relative to the offset", () =>
    Effect.gen(function* () {
      const slice = yield* Nibbles.make(bytesFromHex("0x12ab"), 1);

      assert.strictEqual(Nibbles.length(slice), 3);
      assert.strictEqual(yield* Nibbles.at(slice, 0), 0x2);
      assert.strictEqual(yield* Nibbles.at(slice, 1), 0xa);
      assert.strictEqual(yield* Nibbles.at(slice, 2), 0xb);
    }),
  );

  it.effect("fails reading past the end", () =>
    Effect.gen(function* () {
      const slice = Nibbles.fromBytes(bytesFromHex("0x12"));
      const error = yield* Effect.flip(Nibbles.at(slice, 2));

      assert.instanceOf(error, NibbleOutOfBoundsError);
      assert.strictEqual(error.index, 2);
      assert.strictEqual(error.length, 2);
    }),
  );

  it.effect("rejects an offset beyond the data", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(Nibbles.make(bytesFromHex("0x12"), 3));
      assert.instanceOf(error, NibbleOutOfBoundsError);
    }),
  );

  it("matches prefixes nibble by nibble across different offsets", () => {
    const key = Nibbles.fromBytes(bytesFromHex("0x12345678"));
    const oddPrefix = { data: bytesFromHex("0x3123"), offset: 1 };

    assert.isTrue(Nibbles.startsWith(key, oddPrefix));
    assert.isFalse(Nibbles.startsWith(key, { data: bytesFromHex("0x13"), offset: 0 }));
    assert.isTrue(Nibbles.startsWith(key, Nibbles.fromBytes(new Uint8Array(0))));
  });

  it("never treats a longer slice as a prefix", () => {
    const short = Nibbles.fromBytes(bytesFromHex("0x12"));
    const long = Nibbles.fromBytes(bytesFromHex("0x1234"));

    assert.isFalse(Nibbles.startsWith(short, long));
    assert.isTrue(Nibbles.startsWith(long, short));
  });

  it("requires equal length for equality", () => {
    const a = { data: bytesFromHex("0x2012"), offset: 2 };
    const b = { data: bytesFromHex("0x3012"), offset: 1 };

    assert.isTrue(Nibbles.equals(a, Nibbles.fromBytes(bytesFromHex("0x12"))));
    assert.isFalse(Nibbles.equals(b, Nibbles.fromBytes(bytesFromHex("0x12"))));
    assert.isTrue(
      Nibbles.equals(b, { data: bytesFromHex("0x0012"), offset: 1 }),
    );
  });

  it.effect("mid twice to the full length yields an empty slice", () =>
    Effect.gen(function* () {
      const slice = Nibbles.fromBytes(bytesFromHex("0xabcdef"));
      const first = yield* Nibbles.mid(slice, 2);
      const second = yield* Nibbles.mid(first, 4);

      assert.isTrue(Nibbles.isEmpty(second));
      assert.strictEqual(second.data, slice.data);
      assert.strictEqual(second.offset, 6);
    }),
  );

  it.effect("mid past the end fails with out of bounds", () =>
    Effect.gen(function* () {
      const slice = Nibbles.fromBytes(bytesFromHex("0xabcdef"));
      const first = yield* Nibbles.mid(slice, 2);
      const error = yield* Effect.flip(Nibbles.mid(first, 5));

      assert.instanceOf(error, NibbleOutOfBoundsError);
      assert.strictEqual(error.index, 5);
      assert.strictEqual(error.length, 4);
    }),
  );

  it.effect("byteSlice drops leading bytes without copying", () =>
    Effect.gen(function* () {
      const data = bytesFromHex("0x010203");
      const rest = yield* Nibbles.byteSlice(data, 1);

      assert.deepStrictEqual(Array.from(rest), [0x02, 0x03]);
      assert.strictEqual(rest.buffer, data.buffer);

      const error = yield* Effect.flip(Nibbles.byteSlice(data, 4));
      assert.instanceOf(error, NibbleOutOfBoundsError);
    }),
  );

  it.effect("realign keeps a pending odd nibble", () =>
    Effect.gen(function* () {
      const key = Nibbles.fromBytes(bytesFromHex("0x123456"));
      const odd = yield* Nibbles.realign(yield* Nibbles.mid(key, 3));
      const even = yield* Nibbles.realign(yield* Nibbles.mid(key, 4));

      assert.strictEqual(odd.data.length, 2);
      assert.strictEqual(odd.offset, 1);
      assert.strictEqual(Nibbles.format(odd), "456");
      assert.strictEqual(even.data.length, 1);
      assert.strictEqual(even.offset, 0);
      assert.strictEqual(Nibbles.format(even), "56");
    }),
  );

  it("does not mutate the viewed bytes", () => {
    const data = bytesFromHex("0xfe01");
    const copy = Uint8Array.from(data);
    Nibbles.toNibbleList({ data, offset: 1 });

    assert.deepStrictEqual(Array.from(data), Array.from(copy));
    assert.deepStrictEqual(
      Array.from(Nibbles.toNibbleList({ data, offset: 1 })),
      [0xe, 0x0, 0x1],
    );
  });
});
