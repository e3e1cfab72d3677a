import { RLP, type Input } from "@ethereumjs/rlp";
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";
import { ProofVerifierTest } from "../proof/ProofVerifier";
import type { BytesType, HashType } from "./Node";
import { BranchChildrenCount, HashLength } from "./Node";
import * as Nibbles from "./NibbleSlice";
import { TrieNodeDecoderTest } from "./NodeCodec";
import { nibbleListToCompact, type NibbleList } from "./encoding";
import { EMPTY_TRIE_ROOT, TrieHasher, TrieHasherTest, hashNode } from "./hash";
import { makeBytesHelpers, makeHashHelpers } from "./internal/primitives";

const fixtureError = (message: string) => new Error(message);

/** Parse a hex fixture, failing loudly on malformed input. */
export const { bytesFromHex } = makeBytesHelpers(fixtureError);

/** Parse a 32-byte hex fixture. */
export const { hashFromHex } = makeHashHelpers(fixtureError);

const BaseDeps = Layer.mergeAll(TrieHasherTest, TrieNodeDecoderTest);

/** Verifier plus its hasher and decoder, for tests. */
export const VerifierTestLayer = Layer.mergeAll(
  BaseDeps,
  ProofVerifierTest.pipe(Layer.provide(BaseDeps)),
);

/** Structural trie node, before encoding. */
export type BuiltNode =
  | {
      readonly _tag: "leaf";
      readonly path: NibbleList;
      readonly value: BytesType;
    }
  | {
      readonly _tag: "extension";
      readonly path: NibbleList;
      readonly child: BuiltNode;
    }
  | {
      readonly _tag: "branch";
      readonly children: ReadonlyArray<BuiltNode | null>;
      readonly value: BytesType;
    };

/** Trie built from fixture entries, able to hand out minimal proofs. */
export interface TestTrie {
  readonly root: HashType;
  readonly rootNode: BuiltNode | null;
  /** Proof nodes on the path to `key`, root first. */
  readonly proof: (key: BytesType) => ReadonlyArray<BytesType>;
}

export interface TestTrieEntry {
  readonly key: BytesType;
  readonly value: BytesType;
}

type NibbleEntry = readonly [NibbleList, BytesType];

const EmptyBytes = new Uint8Array(0);

const commonPrefixLength = (a: Uint8Array, b: Uint8Array): number => {
  const limit = Math.min(a.length, b.length);
  for (let i = 0; i < limit; i += 1) {
    if (a[i] !== b[i]) {
      return i;
    }
  }
  return limit;
};

const patricialize = (
  entries: ReadonlyArray<NibbleEntry>,
  level: number,
): BuiltNode => {
  const [firstKey, firstValue] = entries[0];
  if (entries.length === 1) {
    return { _tag: "leaf", path: firstKey.subarray(level), value: firstValue };
  }

  const substring = firstKey.subarray(level);
  let prefixLength = substring.length;
  for (const [key] of entries) {
    prefixLength = Math.min(
      prefixLength,
      commonPrefixLength(substring, key.subarray(level)),
    );
  }

  if (prefixLength > 0) {
    return {
      _tag: "extension",
      path: substring.subarray(0, prefixLength),
      child: patricialize(entries, level + prefixLength),
    };
  }

  const buckets: Array<Array<NibbleEntry>> = Array.from(
    { length: BranchChildrenCount },
    () => [],
  );
  let value: BytesType = EmptyBytes;
  for (const entry of entries) {
    const [key, entryValue] = entry;
    if (key.length === level) {
      value = entryValue;
    } else {
      buckets[key[level]].push(entry);
    }
  }

  return {
    _tag: "branch",
    children: buckets.map((bucket) =>
      bucket.length === 0 ? null : patricialize(bucket, level + 1),
    ),
    value,
  };
};

const encodeTree = (root: BuiltNode) => {
  const encodings = new Map<BuiltNode, BytesType>();

  const compact = (path: NibbleList, isLeaf: boolean) =>
    nibbleListToCompact(path, isLeaf).pipe(Effect.orDie);

  const childRef = (
    node: BuiltNode | null,
  ): Effect.Effect<Input, never, TrieHasher> =>
    Effect.gen(function* () {
      if (node === null) {
        return EmptyBytes;
      }
      const item = yield* itemsOf(node);
      const encoded = RLP.encode(item);
      encodings.set(node, encoded);
      if (encoded.length < HashLength) {
        return item;
      }
      return yield* hashNode(encoded);
    });

  const itemsOf = (node: BuiltNode): Effect.Effect<Input, never, TrieHasher> =>
    Effect.gen(function* () {
      switch (node._tag) {
        case "leaf":
          return [yield* compact(node.path, true), node.value];
        case "extension":
          return [yield* compact(node.path, false), yield* childRef(node.child)];
        case "branch": {
          const items: Array<Input> = [];
          for (const child of node.children) {
            items.push(yield* childRef(child));
          }
          items.push(node.value);
          return items;
        }
      }
    });

  return Effect.gen(function* () {
    const encoded = RLP.encode(yield* itemsOf(root));
    encodings.set(root, encoded);
    const hash = yield* hashNode(encoded);
    return { hash, encodings };
  });
};

const collectProof = (
  root: BuiltNode,
  encodings: ReadonlyMap<BuiltNode, BytesType>,
  key: BytesType,
): ReadonlyArray<BytesType> => {
  const nibbles = Nibbles.toNibbleList(Nibbles.fromBytes(key));
  const proof: Array<BytesType> = [];
  let node: BuiltNode | null = root;
  let level = 0;

  while (node !== null) {
    const encoded = encodings.get(node);
    if (encoded === undefined) {
      throw new Error("Trie node was never encoded");
    }
    if (node === root || encoded.length >= HashLength) {
      proof.push(encoded);
    }

    switch (node._tag) {
      case "leaf":
        return proof;
      case "extension": {
        const rest = nibbles.subarray(level);
        if (commonPrefixLength(rest, node.path) !== node.path.length) {
          return proof;
        }
        level += node.path.length;
        node = node.child;
        break;
      }
      case "branch": {
        if (level === nibbles.length) {
          return proof;
        }
        node = node.children[nibbles[level]];
        level += 1;
        break;
      }
    }
  }
  return proof;
};

/**
 * Build a trie over `entries`. With `secured`, keys are hashed before
 * insertion and `proof` expects the already-hashed key.
 */
export const buildTestTrie = (
  entries: ReadonlyArray<TestTrieEntry>,
  options: { readonly secured?: boolean } = {},
): Effect.Effect<TestTrie, never, TrieHasher> =>
  Effect.gen(function* () {
    const byPath = new Map<string, NibbleEntry>();
    for (const entry of entries) {
      const key = options.secured ? yield* hashNode(entry.key) : entry.key;
      const path = Nibbles.toNibbleList(Nibbles.fromBytes(key));
      byPath.set(Nibbles.format(Nibbles.fromBytes(key)), [path, entry.value]);
    }

    if (byPath.size === 0) {
      return {
        root: EMPTY_TRIE_ROOT,
        rootNode: null,
        proof: () => [],
      };
    }

    const rootNode = patricialize([...byPath.values()], 0);
    const { hash, encodings } = yield* encodeTree(rootNode);
    return {
      root: hash,
      rootNode,
      proof: (key) => collectProof(rootNode, encodings, key),
    };
  });

/** Fixed-width key whose bytes are all `byte`. */
export const filledKey = (byte: number, length = 32): BytesType =>
  new Uint8Array(length).fill(byte);
