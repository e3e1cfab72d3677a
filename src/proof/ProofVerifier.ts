import * as Context from "effect/Context";
import * as Effect from "effect/Effect";
import type * as Either from "effect/Either";
import * as Layer from "effect/Layer";
import * as Option from "effect/Option";
import type {
  BytesType,
  HashType,
  NibbleSlice,
  NodeHandle,
  NodeKind,
} from "../trie/Node";
import * as Nibbles from "../trie/NibbleSlice";
import type { NibbleOutOfBoundsError } from "../trie/NibbleSlice";
import {
  TrieNodeDecoder,
  TrieNodeDecoderLive,
  type MalformedNodeError,
  type TrieNodeDecoderService,
} from "../trie/NodeCodec";
import {
  TrieHasher,
  TrieHasherLive,
  isEmptyTrieRoot,
  type TrieHasherService,
} from "../trie/hash";
import { toHex } from "../trie/internal/primitives";
import {
  buildProofNodeTable,
  type NodeNotFoundError,
  type ProofNodeTable,
} from "./ProofNodeTable";

/** Upper bound on nodes visited per lookup. */
export const MAX_TRIE_DEPTH = 50 as const;

/** Failures meaning the proof cannot be trusted or parsed. */
export type InvalidProofError =
  | MalformedNodeError
  | NodeNotFoundError
  | NibbleOutOfBoundsError;

/** Outcome of visiting one node. */
type TraversalStep =
  | {
      readonly _tag: "done";
      readonly value: Option.Option<BytesType>;
    }
  | {
      readonly _tag: "descend";
      readonly child: NodeHandle;
      readonly cursor: NibbleSlice;
    };

const done = (value: Option.Option<BytesType>): TraversalStep => ({
  _tag: "done",
  value,
});

const absent = done(Option.none());

const descend = (child: NodeHandle, cursor: NibbleSlice): TraversalStep => ({
  _tag: "descend",
  child,
  cursor,
});

/** Proof verification service interface. */
export interface ProofVerifierService {
  /** Build a table from `proofNodes` and look up `key` under `root`. */
  readonly verify: (
    root: HashType,
    proofNodes: ReadonlyArray<BytesType>,
    key: BytesType,
  ) => Effect.Effect<Option.Option<BytesType>, InvalidProofError>;
  /** Look up `key` under `root` against a table the caller keeps. */
  readonly verifyWithTable: (
    table: ProofNodeTable,
    root: HashType,
    key: BytesType,
  ) => Effect.Effect<Option.Option<BytesType>, InvalidProofError>;
}

/** Context tag for proof verification. */
export class ProofVerifier extends Context.Tag("ProofVerifier")<
  ProofVerifier,
  ProofVerifierService
>() {}

const stepInto = (
  table: ProofNodeTable,
  node: NodeKind,
  cursor: NibbleSlice,
): Effect.Effect<TraversalStep, InvalidProofError> =>
  Effect.gen(function* () {
    switch (node._tag) {
      case "empty":
        return absent;
      case "leaf": {
        const remaining = yield* Nibbles.realign(cursor);
        if (!Nibbles.equals(remaining, node.key)) {
          return absent;
        }
        return done(Option.some(yield* table.resolve(node.value)));
      }
      case "extension": {
        if (!Nibbles.startsWith(cursor, node.key)) {
          return absent;
        }
        const next = yield* Nibbles.mid(cursor, Nibbles.length(node.key));
        return descend(node.child, next);
      }
      case "branch": {
        if (Nibbles.isEmpty(cursor)) {
          if (Option.isNone(node.value)) {
            return absent;
          }
          return done(Option.some(yield* table.resolve(node.value.value)));
        }
        const nibble = yield* Nibbles.at(cursor, 0);
        const child = node.children[nibble];
        if (child === undefined || Option.isNone(child)) {
          return absent;
        }
        return descend(child.value, yield* Nibbles.mid(cursor, 1));
      }
    }
  });

const makeProofVerifier = (
  hasher: TrieHasherService,
  decoder: TrieNodeDecoderService,
) => {
  const loadNode = (table: ProofNodeTable, handle: NodeHandle) =>
    Effect.flatMap(table.resolve(handle), decoder.decodeNodeKind);

  const verifyWithTable = (
    table: ProofNodeTable,
    root: HashType,
    key: BytesType,
  ): Effect.Effect<Option.Option<BytesType>, InvalidProofError> =>
    Effect.gen(function* () {
      if (isEmptyTrieRoot(root)) {
        return Option.none();
      }

      let node = yield* Effect.flatMap(
        table.resolveByHash(root),
        decoder.decodeNodeKind,
      );
      let cursor = Nibbles.fromBytes(key);

      for (let depth = 0; depth < MAX_TRIE_DEPTH; depth += 1) {
        const step = yield* stepInto(table, node, cursor);
        yield* Effect.logDebug(`visited ${node._tag} node`).pipe(
          Effect.annotateLogs({
            depth,
            remainingNibbles: Nibbles.length(cursor),
          }),
        );
        if (step._tag === "done") {
          return step.value;
        }
        cursor = step.cursor;
        node = yield* loadNode(table, step.child);
      }

      yield* Effect.logWarning(
        "Proof traversal reached the depth limit without a terminal node",
      ).pipe(
        Effect.annotateLogs({
          maxDepth: MAX_TRIE_DEPTH,
          root: toHex(root),
          key: toHex(key),
          remaining: Nibbles.format(cursor),
        }),
      );
      return Option.none();
    });

  return {
    verify: (root, proofNodes, key) =>
      Effect.flatMap(
        buildProofNodeTable(proofNodes).pipe(
          Effect.provideService(TrieHasher, hasher),
        ),
        (table) => verifyWithTable(table, root, key),
      ),
    verifyWithTable,
  } satisfies ProofVerifierService;
};

const ProofVerifierLayer = Layer.effect(
  ProofVerifier,
  Effect.gen(function* () {
    const hasher = yield* TrieHasher;
    const decoder = yield* TrieNodeDecoder;
    return makeProofVerifier(hasher, decoder);
  }),
);

/** Production proof verifier layer. */
export const ProofVerifierLive: Layer.Layer<
  ProofVerifier,
  never,
  TrieHasher | TrieNodeDecoder
> = ProofVerifierLayer;

/** Deterministic proof verifier layer for tests. */
export const ProofVerifierTest: Layer.Layer<
  ProofVerifier,
  never,
  TrieHasher | TrieNodeDecoder
> = ProofVerifierLayer;

/** Verifier wired to keccak-256 and the Ethereum node decoder. */
export const EthereumProofVerifierLive: Layer.Layer<
  ProofVerifier | TrieHasher | TrieNodeDecoder
> = ProofVerifierLive.pipe(
  Layer.provideMerge(Layer.mergeAll(TrieHasherLive, TrieNodeDecoderLive)),
);

/** Look up `key` under `root` using only the supplied proof nodes. */
export const verify = (
  root: HashType,
  proofNodes: ReadonlyArray<BytesType>,
  key: BytesType,
) =>
  Effect.gen(function* () {
    const verifier = yield* ProofVerifier;
    return yield* verifier.verify(root, proofNodes, key);
  });

/** Look up `key` under `root` against a caller-held table. */
export const verifyWithTable = (
  table: ProofNodeTable,
  root: HashType,
  key: BytesType,
) =>
  Effect.gen(function* () {
    const verifier = yield* ProofVerifier;
    return yield* verifier.verifyWithTable(table, root, key);
  });

const EmptyValue: BytesType = new Uint8Array(0);

/** Value stored under `key`, or empty bytes when the key is absent. */
export const verifyProof = (
  root: HashType,
  proof: ReadonlyArray<BytesType>,
  key: BytesType,
) =>
  verify(root, proof, key).pipe(Effect.map(Option.getOrElse(() => EmptyValue)));

/** Run {@link verifyProof} synchronously against the Ethereum layers. */
export const verifyProofSync = (
  root: HashType,
  proof: ReadonlyArray<BytesType>,
  key: BytesType,
): Either.Either<BytesType, InvalidProofError> =>
  verifyProof(root, proof, key).pipe(
    Effect.either,
    Effect.provide(EthereumProofVerifierLive),
    Effect.runSync,
  );
