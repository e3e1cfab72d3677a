import { assert, describe, it } from "@effect/vitest";
import * as Effect from "effect/Effect";
import { hashedHandle, inlineHandle } from "../trie/Node";
import { TrieHasherTest, hashNode } from "../trie/hash";
import { toHex } from "../trie/internal/primitives";
import { bytesFromHex, hashFromHex } from "../trie/testUtils";
import { NodeNotFoundError, buildProofNodeTable } from "./ProofNodeTable";

const nodeA = bytesFromHex("0xc4821234");
const nodeB = bytesFromHex("0xc3820102");

describe("ProofNodeTable", () => {
  it.effect("indexes every proof node by its hash", () =>
    Effect.gen(function* () {
      const table = yield* buildProofNodeTable([nodeA, nodeB]);
      const hashA = yield* hashNode(nodeA);
      const hashB = yield* hashNode(nodeB);

      assert.strictEqual(table.size, 2);
      assert.isTrue(table.has(hashA));
      assert.isTrue(table.has(hashB));
      assert.strictEqual(toHex(yield* table.resolveByHash(hashA)), toHex(nodeA));
      assert.strictEqual(toHex(yield* table.resolveByHash(hashB)), toHex(nodeB));
    }).pipe(Effect.provide(TrieHasherTest)),
  );

  it.effect("collapses duplicate proof entries", () =>
    Effect.gen(function* () {
      const table = yield* buildProofNodeTable([nodeA, nodeA]);
      assert.strictEqual(table.size, 1);
    }).pipe(Effect.provide(TrieHasherTest)),
  );

  it.effect("fails for a hash outside the proof set", () =>
    Effect.gen(function* () {
      const table = yield* buildProofNodeTable([nodeA]);
      const missing = hashFromHex(`0x${"11".repeat(32)}`);
      const error = yield* Effect.flip(table.resolveByHash(missing));

      assert.isFalse(table.has(missing));
      assert.instanceOf(error, NodeNotFoundError);
      assert.strictEqual(error.hash, `0x${"11".repeat(32)}`);
    }).pipe(Effect.provide(TrieHasherTest)),
  );

  it.effect("resolves inline handles without a lookup", () =>
    Effect.gen(function* () {
      const table = yield* buildProofNodeTable([]);
      const value = yield* table.resolve(inlineHandle(nodeB));
      assert.strictEqual(value, nodeB);
    }).pipe(Effect.provide(TrieHasherTest)),
  );

  it.effect("resolves hashed handles through the table", () =>
    Effect.gen(function* () {
      const table = yield* buildProofNodeTable([nodeA]);
      const hashA = yield* hashNode(nodeA);
      const value = yield* table.resolve(hashedHandle(hashA));
      assert.strictEqual(toHex(value), toHex(nodeA));

      const hashB = yield* hashNode(nodeB);
      const error = yield* Effect.flip(table.resolve(hashedHandle(hashB)));
      assert.instanceOf(error, NodeNotFoundError);
    }).pipe(Effect.provide(TrieHasherTest)),
  );
});
