import type * as Brand from "effect/Brand";
import type * as Option from "effect/Option";

/** Byte array type used by trie nodes. */
export type BytesType = Uint8Array;

/** 32-byte keccak-256 digest identifying an encoded trie node. */
export type HashType = Uint8Array & Brand.Brand<"Hash">;

/** Byte length of a node hash. */
export const HashLength = 32 as const;

/** Number of children in a branch node. */
export const BranchChildrenCount = 16 as const;

/** Proof entry paired with the digest it is indexed under. */
export interface TrieNode {
  readonly hash: HashType;
  readonly encoded: BytesType;
}

/**
 * View over `data` starting at nibble `offset`.
 * Invariant: `offset <= 2 * data.length`.
 */
export interface NibbleSlice {
  readonly data: BytesType;
  readonly offset: number;
}

/** Child or value reference: embedded in the parent, or addressed by hash. */
export type NodeHandle =
  | {
      readonly _tag: "inline";
      readonly value: BytesType;
    }
  | {
      readonly _tag: "hashed";
      readonly hash: HashType;
    };

/** Leaf node with the remaining key and its value. */
export interface LeafNode {
  readonly _tag: "leaf";
  readonly key: NibbleSlice;
  readonly value: NodeHandle;
}

/** Extension node with a shared key segment and a single child. */
export interface ExtensionNode {
  readonly _tag: "extension";
  readonly key: NibbleSlice;
  readonly child: NodeHandle;
}

/** Branch slots indexed by nibble value; always {@link BranchChildrenCount} long. */
export type BranchChildren = ReadonlyArray<Option.Option<NodeHandle>>;

/** Branch node with 16 optional children and an optional value. */
export interface BranchNode {
  readonly _tag: "branch";
  readonly value: Option.Option<NodeHandle>;
  readonly children: BranchChildren;
}

/** Encoding of the empty trie. */
export interface EmptyNode {
  readonly _tag: "empty";
}

/** Decoded trie node. */
export type NodeKind = LeafNode | ExtensionNode | BranchNode | EmptyNode;

export const inlineHandle = (value: BytesType): NodeHandle => ({
  _tag: "inline",
  value,
});

export const hashedHandle = (hash: HashType): NodeHandle => ({
  _tag: "hashed",
  hash,
});
