import { RLP, type Input } from "@ethereumjs/rlp";
import { assert, describe, it } from "@effect/vitest";
import * as Effect from "effect/Effect";
import * as Option from "effect/Option";
import type { NodeHandle } from "./Node";
import * as Nibbles from "./NibbleSlice";
import {
  MalformedNodeError,
  TrieNodeDecoderTest,
  decodeBranch,
  decodeExtension,
  decodeLeaf,
  decodeNodeKind,
} from "./NodeCodec";
import { toHex } from "./internal/primitives";
import { bytesFromHex } from "./testUtils";

const childHash = bytesFromHex(`0x${"aa".repeat(32)}`);

const handleHex = (handle: NodeHandle): string =>
  handle._tag === "inline" ? toHex(handle.value) : toHex(handle.hash);

const branchItems = (
  slots: Readonly<Record<number, Input>>,
  value: Uint8Array,
): Array<Input> => [
  ...Array.from({ length: 16 }, (_, i) => slots[i] ?? new Uint8Array(0)),
  value,
];

describe("TrieNodeDecoder", () => {
  it.effect("decodes a leaf node", () =>
    Effect.gen(function* () {
      const encoded = RLP.encode([
        bytesFromHex("0x2012"),
        bytesFromHex("0xdeadbeef"),
      ]);
      const node = yield* decodeNodeKind(encoded);

      assert.strictEqual(node._tag, "leaf");
      if (node._tag !== "leaf") return;
      assert.strictEqual(Nibbles.format(node.key), "12");
      assert.strictEqual(node.value._tag, "inline");
      assert.strictEqual(handleHex(node.value), "0xdeadbeef");
    }).pipe(Effect.provide(TrieNodeDecoderTest)),
  );

  it.effect("decodes an extension with a hashed child", () =>
    Effect.gen(function* () {
      const encoded = RLP.encode([bytesFromHex("0x1a"), childHash]);
      const node = yield* decodeExtension(encoded);

      assert.strictEqual(Nibbles.format(node.key), "a");
      assert.strictEqual(node.child._tag, "hashed");
      assert.strictEqual(handleHex(node.child), toHex(childHash));
    }).pipe(Effect.provide(TrieNodeDecoderTest)),
  );

  it.effect("decodes an extension with an embedded leaf child", () =>
    Effect.gen(function* () {
      const rawLeaf = [bytesFromHex("0x2023"), bytesFromHex("0xabab")];
      const encoded = RLP.encode([bytesFromHex("0x0001"), rawLeaf]);
      const node = yield* decodeExtension(encoded);

      assert.strictEqual(Nibbles.format(node.key), "01");
      assert.strictEqual(node.child._tag, "inline");
      if (node.child._tag !== "inline") return;
      assert.strictEqual(toHex(node.child.value), toHex(RLP.encode(rawLeaf)));

      const leaf = yield* decodeLeaf(node.child.value);
      assert.strictEqual(Nibbles.format(leaf.key), "23");
      assert.strictEqual(handleHex(leaf.value), "0xabab");
    }).pipe(Effect.provide(TrieNodeDecoderTest)),
  );

  it.effect("decodes a branch with one child and a value", () =>
    Effect.gen(function* () {
      const encoded = RLP.encode(
        branchItems({ 3: childHash }, bytesFromHex("0x01")),
      );
      const node = yield* decodeBranch(encoded);

      assert.strictEqual(node.children.length, 16);
      node.children.forEach((child, index) => {
        assert.strictEqual(Option.isSome(child), index === 3);
      });
      const child = node.children[3];
      assert.isTrue(Option.isSome(child));
      if (Option.isSome(child)) {
        assert.strictEqual(handleHex(child.value), toHex(childHash));
      }
      assert.strictEqual(
        Option.getOrNull(Option.map(node.value, handleHex)),
        "0x01",
      );
    }).pipe(Effect.provide(TrieNodeDecoderTest)),
  );

  it.effect("decodes an unpopulated branch value as none", () =>
    Effect.gen(function* () {
      const encoded = RLP.encode(branchItems({ 0: childHash }, new Uint8Array(0)));
      const node = yield* decodeBranch(encoded);
      assert.isTrue(Option.isNone(node.value));
    }).pipe(Effect.provide(TrieNodeDecoderTest)),
  );

  it.effect("decodes the empty trie encoding", () =>
    Effect.gen(function* () {
      const node = yield* decodeNodeKind(bytesFromHex("0x80"));
      assert.strictEqual(node._tag, "empty");
    }).pipe(Effect.provide(TrieNodeDecoderTest)),
  );

  it.effect("fails on malformed node shapes", () =>
    Effect.gen(function* () {
      const cases: ReadonlyArray<readonly [Uint8Array, string]> = [
        [bytesFromHex("0x01"), "Top-level trie node must be a list"],
        [
          RLP.encode([bytesFromHex("0x00"), childHash, childHash]),
          "Trie node must contain 2 or 17 items, received 3",
        ],
        [
          RLP.encode([bytesFromHex("0x00"), new Uint8Array(0)]),
          "Extension child reference cannot be empty",
        ],
        [
          RLP.encode([bytesFromHex("0x00"), bytesFromHex("0x0102030405")]),
          "Invalid child reference byte length 5 (expected 0 or 32)",
        ],
        [
          RLP.encode([bytesFromHex("0x20"), [bytesFromHex("0x01")]]),
          "Leaf value must be byte string",
        ],
        [
          RLP.encode([bytesFromHex("0x40"), bytesFromHex("0x01")]),
          "Failed to decode hex-prefix compact path",
        ],
      ];

      for (const [encoded, message] of cases) {
        const error = yield* Effect.flip(decodeNodeKind(encoded));
        assert.instanceOf(error, MalformedNodeError);
        assert.strictEqual(error.message, message);
      }
    }).pipe(Effect.provide(TrieNodeDecoderTest)),
  );

  it.effect("wraps RLP decoding failures", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(decodeNodeKind(bytesFromHex("0xf8")));
      assert.instanceOf(error, MalformedNodeError);
      assert.strictEqual(error.message, "Failed to RLP-decode trie node");
    }).pipe(Effect.provide(TrieNodeDecoderTest)),
  );

  it.effect("refinements fail on a different node kind", () =>
    Effect.gen(function* () {
      const branch = RLP.encode(branchItems({}, bytesFromHex("0x01")));
      const error = yield* Effect.flip(decodeLeaf(branch));

      assert.instanceOf(error, MalformedNodeError);
      assert.strictEqual(error.message, "Expected leaf node, decoded branch");
    }).pipe(Effect.provide(TrieNodeDecoderTest)),
  );
});
