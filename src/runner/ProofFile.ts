import * as Data from "effect/Data";
import * as Effect from "effect/Effect";
import * as Option from "effect/Option";
import * as Schema from "effect/Schema";
import * as fs from "node:fs";
import type { BytesType, HashType } from "../trie/Node";
import { hashNode } from "../trie/hash";
import {
  makeBytesHelpers,
  makeHashHelpers,
  toHex,
} from "../trie/internal/primitives";
import { verify } from "../proof/ProofVerifier";
import type { KeyMode } from "./VerifierCommand";

/** Error raised when a proof file cannot be read or decoded. */
export class ProofFileError extends Data.TaggedError("ProofFileError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

const HexString = Schema.String.pipe(
  Schema.pattern(/^0x(?:[0-9a-fA-F]{2})*$/, {
    message: () => "Expected 0x-prefixed even-length hex",
  }),
);

/** JSON shape of a proof file. */
export const ProofFileSchema = Schema.Struct({
  root: HexString,
  key: HexString,
  proof: Schema.Array(HexString),
});

/** Decoded proof file contents. */
export interface ProofInput {
  readonly root: HashType;
  readonly key: BytesType;
  readonly proof: ReadonlyArray<BytesType>;
}

const proofFileError = (message: string) => new ProofFileError({ message });
const { bytesFromHex } = makeBytesHelpers(proofFileError);
const { hashFromHex } = makeHashHelpers(proofFileError);

const toProofFileError =
  (message: string) =>
  (cause: unknown): ProofFileError =>
    cause instanceof ProofFileError
      ? cause
      : new ProofFileError({ message, cause });

/** Decode the JSON text of a proof file into bytes. */
export const parseProofFile = (
  text: string,
): Effect.Effect<ProofInput, ProofFileError> =>
  Effect.gen(function* () {
    const json: unknown = yield* Effect.try({
      try: () => JSON.parse(text),
      catch: toProofFileError("Proof file is not valid JSON"),
    });
    const file = yield* Schema.decodeUnknown(ProofFileSchema)(json).pipe(
      Effect.mapError(toProofFileError("Proof file has an invalid shape")),
    );

    return yield* Effect.try({
      try: () => ({
        root: hashFromHex(file.root),
        key: bytesFromHex(file.key),
        proof: file.proof.map(bytesFromHex),
      }),
      catch: toProofFileError("Proof file has an invalid root"),
    });
  });

/** Read and decode a proof file from disk. */
export const readProofFile = (path: string) =>
  Effect.try({
    try: () => fs.readFileSync(path, "utf8"),
    catch: (cause) =>
      new ProofFileError({ message: `Unable to read proof file ${path}`, cause }),
  }).pipe(Effect.flatMap(parseProofFile));

/** Value hex for a proven key, or `absent`. */
export const formatVerification = (value: Option.Option<BytesType>): string =>
  Option.match(value, {
    onNone: () => "absent",
    onSome: toHex,
  });

/** Verify a decoded proof file under the configured key mode. */
export const runVerification = (
  input: ProofInput,
  keyMode: KeyMode,
) =>
  Effect.gen(function* () {
    const key = keyMode === "secured" ? yield* hashNode(input.key) : input.key;
    const value = yield* verify(input.root, input.proof, key);
    return formatVerification(value);
  }).pipe(Effect.annotateLogs({ keyMode }));
