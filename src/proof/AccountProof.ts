import { RLP } from "@ethereumjs/rlp";
import * as Data from "effect/Data";
import * as Effect from "effect/Effect";
import * as Option from "effect/Option";
import type { BytesType, HashType } from "../trie/Node";
import { hashNode } from "../trie/hash";
import { isHash, toHex } from "../trie/internal/primitives";
import { verify } from "./ProofVerifier";

/** Account state stored in the Ethereum state trie. */
export interface Account {
  readonly nonce: bigint;
  readonly balance: bigint;
  readonly storageRoot: HashType;
  readonly codeHash: HashType;
}

/** Error raised when a proven account leaf is not a valid account encoding. */
export class InvalidAccountError extends Data.TaggedError(
  "InvalidAccountError",
)<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** Error raised when a proven storage leaf is not an RLP byte string. */
export class InvalidStorageValueError extends Data.TaggedError(
  "InvalidStorageValueError",
)<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** Error raised when an address or storage slot has the wrong shape. */
export class InvalidProofInputError extends Data.TaggedError(
  "InvalidProofInputError",
)<{
  readonly message: string;
}> {}

const AddressLength = 20;
const SlotLength = 32;

const decodeRlp = <E>(encoded: BytesType, onError: (cause: unknown) => E) =>
  Effect.try({ try: () => RLP.decode(encoded), catch: onError });

const wrapAccountRlpError = (cause: unknown) =>
  new InvalidAccountError({ message: "Failed to RLP-decode account", cause });

/** Big-endian unsigned integer without leading zero bytes. */
const toQuantity = <E>(
  bytes: BytesType,
  onError: (message: string) => E,
): Effect.Effect<bigint, E> => {
  if (bytes.length === 0) {
    return Effect.succeed(0n);
  }
  if (bytes[0] === 0) {
    return Effect.fail(onError("Quantity has leading zero bytes"));
  }
  return Effect.succeed(BigInt(toHex(bytes)));
};

const accountError = (message: string) => new InvalidAccountError({ message });

const storageError = (message: string) =>
  new InvalidStorageValueError({ message });

/** Decode `[nonce, balance, storageRoot, codeHash]`. */
export const decodeAccount = (
  encoded: BytesType,
): Effect.Effect<Account, InvalidAccountError> =>
  Effect.gen(function* () {
    const decoded = yield* decodeRlp(encoded, wrapAccountRlpError);
    if (decoded instanceof Uint8Array || decoded.length !== 4) {
      return yield* Effect.fail(
        accountError("Account must be a list of 4 items"),
      );
    }

    const [nonce, balance, storageRoot, codeHash] = decoded;
    if (
      !(nonce instanceof Uint8Array) ||
      !(balance instanceof Uint8Array) ||
      !(storageRoot instanceof Uint8Array) ||
      !(codeHash instanceof Uint8Array)
    ) {
      return yield* Effect.fail(
        accountError("Account fields must be byte strings"),
      );
    }
    if (!isHash(storageRoot) || !isHash(codeHash)) {
      return yield* Effect.fail(
        accountError("Account storage root and code hash must be 32 bytes"),
      );
    }

    return {
      nonce: yield* toQuantity(nonce, accountError),
      balance: yield* toQuantity(balance, accountError),
      storageRoot,
      codeHash,
    };
  });

const checkAddress = (address: BytesType) =>
  address.length === AddressLength
    ? Effect.succeed(address)
    : Effect.fail(
        new InvalidProofInputError({
          message: `Address must be ${AddressLength} bytes, received ${address.length}`,
        }),
      );

/** Left-pad a storage slot to its 32-byte trie form. */
export const normalizeStorageSlot = (
  slot: BytesType,
): Effect.Effect<BytesType, InvalidProofInputError> => {
  if (slot.length > SlotLength) {
    return Effect.fail(
      new InvalidProofInputError({
        message: `Storage slot must be at most ${SlotLength} bytes, received ${slot.length}`,
      }),
    );
  }
  const padded = new Uint8Array(SlotLength);
  padded.set(slot, SlotLength - slot.length);
  return Effect.succeed(padded);
};

/**
 * Prove the account at `address` against a state root.
 * Resolves to `None` when the proof shows the account does not exist.
 */
export const verifyAccountProof = (
  stateRoot: HashType,
  address: BytesType,
  proof: ReadonlyArray<BytesType>,
) =>
  Effect.gen(function* () {
    const key = yield* hashNode(yield* checkAddress(address));
    const leaf = yield* verify(stateRoot, proof, key);
    if (Option.isNone(leaf)) {
      return Option.none<Account>();
    }
    return Option.some(yield* decodeAccount(leaf.value));
  });

/** Prove a storage slot against an account storage root; absent slots are 0. */
export const verifyStorageProof = (
  storageRoot: HashType,
  slot: BytesType,
  proof: ReadonlyArray<BytesType>,
) =>
  Effect.gen(function* () {
    const key = yield* hashNode(yield* normalizeStorageSlot(slot));
    const leaf = yield* verify(storageRoot, proof, key);
    if (Option.isNone(leaf)) {
      return 0n;
    }
    const value = yield* decodeRlp(
      leaf.value,
      (cause) =>
        new InvalidStorageValueError({
          message: "Failed to RLP-decode storage value",
          cause,
        }),
    );
    if (!(value instanceof Uint8Array)) {
      return yield* Effect.fail(
        storageError("Storage value must be a byte string"),
      );
    }
    return yield* toQuantity(value, storageError);
  });
