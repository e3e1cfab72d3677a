import { RLP, type NestedUint8Array } from "@ethereumjs/rlp";
import * as Context from "effect/Context";
import * as Data from "effect/Data";
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";
import * as Option from "effect/Option";
import type {
  BranchNode,
  BytesType,
  ExtensionNode,
  LeafNode,
  NodeHandle,
  NodeKind,
} from "./Node";
import {
  BranchChildrenCount,
  HashLength,
  hashedHandle,
  inlineHandle,
} from "./Node";
import { NibbleEncodingError, compactToNibbleSlice } from "./encoding";
import { isHash } from "./internal/primitives";

/** Error raised when proof bytes do not decode to a trie node. */
export class MalformedNodeError extends Data.TaggedError("MalformedNodeError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

type RlpItem = Uint8Array | NestedUint8Array;

const wrapNibbleError = (cause: NibbleEncodingError) =>
  new MalformedNodeError({
    message: "Failed to decode hex-prefix compact path",
    cause,
  });

const wrapRlpDecodeError = (cause: unknown) =>
  new MalformedNodeError({ message: "Failed to RLP-decode trie node", cause });

const wrapRlpEncodeError = (cause: unknown) =>
  new MalformedNodeError({
    message: "Failed to RLP-encode inline child node",
    cause,
  });

const invalidBranchArityError = (length: number) =>
  new MalformedNodeError({
    message: `Trie node must contain 2 or ${BranchChildrenCount + 1} items, received ${length}`,
  });

const invalidRlpItemError = (message: string) =>
  new MalformedNodeError({ message });

const decodeRlp = (encoded: BytesType) =>
  Effect.try({
    try: (): RlpItem => RLP.decode(encoded),
    catch: wrapRlpDecodeError,
  });

const encodeRlp = (item: NestedUint8Array) =>
  Effect.try({
    try: () => RLP.encode(item),
    catch: wrapRlpEncodeError,
  });

/** Decode a child reference: empty slot, 32-byte hash, or embedded node. */
const decodeChildRef = (
  item: RlpItem,
): Effect.Effect<Option.Option<NodeHandle>, MalformedNodeError> =>
  Effect.gen(function* () {
    if (item instanceof Uint8Array) {
      if (item.length === 0) {
        return Option.none();
      }
      if (isHash(item)) {
        return Option.some(hashedHandle(item));
      }
      return yield* Effect.fail(
        invalidRlpItemError(
          `Invalid child reference byte length ${item.length} (expected 0 or ${HashLength})`,
        ),
      );
    }

    const embedded = yield* encodeRlp(item);
    return Option.some(inlineHandle(embedded));
  });

const decodeShortNode = (
  compact: RlpItem,
  second: RlpItem,
): Effect.Effect<LeafNode | ExtensionNode, MalformedNodeError> =>
  Effect.gen(function* () {
    if (!(compact instanceof Uint8Array)) {
      return yield* Effect.fail(
        invalidRlpItemError(
          "Compact path for leaf/extension must be byte string",
        ),
      );
    }

    const { path, isLeaf } = yield* compactToNibbleSlice(compact).pipe(
      Effect.mapError(wrapNibbleError),
    );

    if (isLeaf) {
      if (!(second instanceof Uint8Array)) {
        return yield* Effect.fail(
          invalidRlpItemError("Leaf value must be byte string"),
        );
      }
      return { _tag: "leaf", key: path, value: inlineHandle(second) } as const;
    }

    const child = yield* decodeChildRef(second);
    if (Option.isNone(child)) {
      return yield* Effect.fail(
        invalidRlpItemError("Extension child reference cannot be empty"),
      );
    }
    return { _tag: "extension", key: path, child: child.value } as const;
  });

const decodeBranchItems = (
  items: NestedUint8Array,
): Effect.Effect<BranchNode, MalformedNodeError> =>
  Effect.gen(function* () {
    const children: Array<Option.Option<NodeHandle>> = [];
    for (let i = 0; i < BranchChildrenCount; i += 1) {
      children.push(yield* decodeChildRef(items[i]));
    }

    const valueItem = items[BranchChildrenCount];
    if (!(valueItem instanceof Uint8Array)) {
      return yield* Effect.fail(
        invalidRlpItemError("Branch value must be byte string"),
      );
    }
    const value =
      valueItem.length === 0
        ? Option.none<NodeHandle>()
        : Option.some(inlineHandle(valueItem));

    return { _tag: "branch", value, children } as const;
  });

/** Decode a trie node (leaf/extension/branch/empty) from its RLP bytes. */
const decodeNodeKindImpl = (
  encoded: BytesType,
): Effect.Effect<NodeKind, MalformedNodeError> =>
  Effect.gen(function* () {
    const data = yield* decodeRlp(encoded);

    if (data instanceof Uint8Array) {
      if (data.length === 0) {
        return { _tag: "empty" } as const;
      }
      return yield* Effect.fail(
        invalidRlpItemError("Top-level trie node must be a list"),
      );
    }

    if (data.length === 2) {
      return yield* decodeShortNode(data[0], data[1]);
    }

    if (data.length === BranchChildrenCount + 1) {
      return yield* decodeBranchItems(data);
    }

    return yield* Effect.fail(invalidBranchArityError(data.length));
  });

const unexpectedKindError = (expected: NodeKind["_tag"], actual: NodeKind) =>
  new MalformedNodeError({
    message: `Expected ${expected} node, decoded ${actual._tag}`,
  });

const refine =
  <K extends NodeKind>(
    expected: K["_tag"],
    guard: (node: NodeKind) => node is K,
  ) =>
  (encoded: BytesType): Effect.Effect<K, MalformedNodeError> =>
    Effect.flatMap(decodeNodeKindImpl(encoded), (node) =>
      guard(node)
        ? Effect.succeed(node)
        : Effect.fail(unexpectedKindError(expected, node)),
    );

/**
 * Trie node decoder service interface.
 *
 * `decodeNodeKind` classifies any node; the `decodeLeaf`, `decodeExtension`
 * and `decodeBranch` refinements fail when the bytes hold another kind.
 */
export interface TrieNodeDecoderService {
  readonly decodeNodeKind: (
    encoded: BytesType,
  ) => Effect.Effect<NodeKind, MalformedNodeError>;
  readonly decodeLeaf: (
    encoded: BytesType,
  ) => Effect.Effect<LeafNode, MalformedNodeError>;
  readonly decodeExtension: (
    encoded: BytesType,
  ) => Effect.Effect<ExtensionNode, MalformedNodeError>;
  readonly decodeBranch: (
    encoded: BytesType,
  ) => Effect.Effect<BranchNode, MalformedNodeError>;
}

/** Context tag for the trie node decoder. */
export class TrieNodeDecoder extends Context.Tag("TrieNodeDecoder")<
  TrieNodeDecoder,
  TrieNodeDecoderService
>() {}

const TrieNodeDecoderLayer: Layer.Layer<TrieNodeDecoder> = Layer.succeed(
  TrieNodeDecoder,
  {
    decodeNodeKind: decodeNodeKindImpl,
    decodeLeaf: refine("leaf", (node): node is LeafNode => node._tag === "leaf"),
    decodeExtension: refine(
      "extension",
      (node): node is ExtensionNode => node._tag === "extension",
    ),
    decodeBranch: refine(
      "branch",
      (node): node is BranchNode => node._tag === "branch",
    ),
  } satisfies TrieNodeDecoderService,
);

/** Production Ethereum (RLP + hex-prefix) decoder layer. */
export const TrieNodeDecoderLive: Layer.Layer<TrieNodeDecoder> =
  TrieNodeDecoderLayer;

/** Deterministic decoder layer for tests. */
export const TrieNodeDecoderTest: Layer.Layer<TrieNodeDecoder> =
  TrieNodeDecoderLayer;

/** Decode any trie node from its encoded bytes. */
export const decodeNodeKind = (encoded: BytesType) =>
  Effect.gen(function* () {
    const decoder = yield* TrieNodeDecoder;
    return yield* decoder.decodeNodeKind(encoded);
  });

/** Decode bytes that must hold a leaf node. */
export const decodeLeaf = (encoded: BytesType) =>
  Effect.gen(function* () {
    const decoder = yield* TrieNodeDecoder;
    return yield* decoder.decodeLeaf(encoded);
  });

/** Decode bytes that must hold an extension node. */
export const decodeExtension = (encoded: BytesType) =>
  Effect.gen(function* () {
    const decoder = yield* TrieNodeDecoder;
    return yield* decoder.decodeExtension(encoded);
  });

/** Decode bytes that must hold a branch node. */
export const decodeBranch = (encoded: BytesType) =>
  Effect.gen(function* () {
    const decoder = yield* TrieNodeDecoder;
    return yield* decoder.decodeBranch(encoded);
  });
