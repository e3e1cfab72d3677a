import * as Data from "effect/Data";
import * as Effect from "effect/Effect";
import type { BytesType, HashType, NodeHandle, TrieNode } from "../trie/Node";
import { TrieHasher } from "../trie/hash";
import { toHex } from "../trie/internal/primitives";

/** Error raised when traversal needs a node the proof does not supply. */
export class NodeNotFoundError extends Data.TaggedError("NodeNotFoundError")<{
  readonly message: string;
  readonly hash: string;
}> {}

/**
 * Read-only, hash-addressed view over the nodes of one proof.
 *
 * Only bytes whose digest was computed here can be returned by hash, so a
 * resolved node is always one the prover supplied.
 */
export interface ProofNodeTable {
  readonly size: number;
  readonly has: (hash: HashType) => boolean;
  readonly resolveByHash: (
    hash: HashType,
  ) => Effect.Effect<BytesType, NodeNotFoundError>;
  readonly resolve: (
    handle: NodeHandle,
  ) => Effect.Effect<BytesType, NodeNotFoundError>;
}

const nodeNotFound = (hash: HashType) => {
  const hex = toHex(hash);
  return new NodeNotFoundError({
    message: `Proof does not contain node ${hex}`,
    hash: hex,
  });
};

const makeTable = (nodes: ReadonlyMap<string, TrieNode>): ProofNodeTable => {
  const resolveByHash = (hash: HashType) => {
    const node = nodes.get(toHex(hash));
    return node === undefined
      ? Effect.fail(nodeNotFound(hash))
      : Effect.succeed(node.encoded);
  };

  return {
    size: nodes.size,
    has: (hash) => nodes.has(toHex(hash)),
    resolveByHash,
    resolve: (handle) => {
      switch (handle._tag) {
        case "inline":
          return Effect.succeed(handle.value);
        case "hashed":
          return resolveByHash(handle.hash);
      }
    },
  };
};

/** Hash every proof entry and index it by digest. */
export const buildProofNodeTable = (proofNodes: ReadonlyArray<BytesType>) =>
  Effect.gen(function* () {
    const hasher = yield* TrieHasher;
    const nodes = new Map<string, TrieNode>();
    for (const encoded of proofNodes) {
      const hash = yield* hasher.hash(encoded);
      nodes.set(toHex(hash), { hash, encoded });
    }
    return makeTable(nodes);
  });
