import { keccak_256 } from "@noble/hashes/sha3";
import * as Context from "effect/Context";
import * as Data from "effect/Data";
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";
import type { BytesType, HashType } from "./Node";
import { isHash, makeHashHelpers, toHex } from "./internal/primitives";

/** Error raised when a digest does not have the node hash shape. */
export class TrieHashError extends Data.TaggedError("TrieHashError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

const { hashFromHex } = makeHashHelpers(
  (message) => new TrieHashError({ message }),
);

/** Keccak-256 of the empty trie encoding (keccak256(rlp.encode(b""))). */
export const EMPTY_TRIE_ROOT: HashType = hashFromHex(
  "0x56e81f171bcc55a6ff8345e692c0f86e5b48e01b996cadc001622fb5e363b421",
);

export const isEmptyTrieRoot = (hash: HashType): boolean =>
  toHex(hash) === toHex(EMPTY_TRIE_ROOT);

/** Hash primitive used to address proof nodes. */
export interface TrieHasherService {
  readonly hash: (data: BytesType) => Effect.Effect<HashType>;
}

/** Context tag for the node hash primitive. */
export class TrieHasher extends Context.Tag("TrieHasher")<
  TrieHasher,
  TrieHasherService
>() {}

const keccak256 = (data: BytesType): Effect.Effect<HashType> =>
  Effect.suspend(() => {
    const digest = keccak_256(data);
    return isHash(digest)
      ? Effect.succeed(digest)
      : Effect.die(
          new TrieHashError({
            message: `keccak256 produced ${digest.length} bytes`,
          }),
        );
  });

const TrieHasherLayer: Layer.Layer<TrieHasher> = Layer.succeed(TrieHasher, {
  hash: keccak256,
} satisfies TrieHasherService);

/** Production keccak-256 hasher layer. */
export const TrieHasherLive: Layer.Layer<TrieHasher> = TrieHasherLayer;

/** Deterministic hasher layer for tests. */
export const TrieHasherTest: Layer.Layer<TrieHasher> = TrieHasherLayer;

/** Hash `data` with the provided hasher. */
export const hashNode = (data: BytesType) =>
  Effect.gen(function* () {
    const hasher = yield* TrieHasher;
    return yield* hasher.hash(data);
  });
