import * as Data from "effect/Data";
import * as Effect from "effect/Effect";
import * as Schema from "effect/Schema";

/** Version reported by `--version`. */
export const VerifierVersion = "0.1.0";

export const VerifierHelpText = `Usage: mpt-verify [options] <proof.json>

Verify a Merkle Patricia Trie proof and print the proven value.

Options:
  --secured              hash the key with keccak-256 before lookup
  --log-level <level>    All | Trace | Debug | Info | Warning | Error | Fatal | None
                         (default Warning)
  -h, --help             show this help
  -v, --version          show the version

The proof file holds { "root": "0x..", "key": "0x..", "proof": ["0x..", ...] }.
Prints the value as 0x-prefixed hex, or "absent" when the key is not in the trie.`;

/** Options of a verification run, decoded from argv. */
export const VerifierOptionsSchema = Schema.Struct({
  proofFile: Schema.NonEmptyString,
  keyMode: Schema.Literal("raw", "secured"),
  logLevel: Schema.Literal(
    "All",
    "Trace",
    "Debug",
    "Info",
    "Warning",
    "Error",
    "Fatal",
    "None",
  ),
});

export type VerifierOptions = Schema.Schema.Type<typeof VerifierOptionsSchema>;

export type KeyMode = VerifierOptions["keyMode"];

/** What the CLI was asked to do. */
export type VerifierCommand =
  | { readonly _tag: "Verify"; readonly options: VerifierOptions }
  | { readonly _tag: "ShowHelp" }
  | { readonly _tag: "ShowVersion" };

/** Error raised for command lines the CLI does not accept. */
export class VerifierUsageError extends Data.TaggedError("VerifierUsageError")<{
  readonly message: string;
  readonly argument?: string;
  readonly cause?: unknown;
}> {}

interface ScannedArgs {
  readonly positionals: Array<string>;
  secured: boolean;
  logLevel: string;
  help: boolean;
  version: boolean;
  /** First rejected argument; display flags still win over it. */
  rejected?: VerifierUsageError;
}

const reject = (message: string, argument: string) =>
  new VerifierUsageError({ message, argument });

const scanArgs = (argv: ReadonlyArray<string>): ScannedArgs => {
  const scanned: ScannedArgs = {
    positionals: [],
    secured: false,
    logLevel: "Warning",
    help: false,
    version: false,
  };
  const note = (error: VerifierUsageError) => {
    scanned.rejected ??= error;
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case "-h":
      case "--help":
        scanned.help = true;
        break;
      case "-v":
      case "--version":
        scanned.version = true;
        break;
      case "--secured":
        scanned.secured = true;
        break;
      case "--log-level": {
        const value = argv[i + 1];
        if (value === undefined) {
          note(reject("--log-level needs a value", arg));
        } else {
          scanned.logLevel = value;
          i += 1;
        }
        break;
      }
      default:
        if (arg.startsWith("-")) {
          note(reject(`Unknown option ${arg}`, arg));
        } else {
          scanned.positionals.push(arg);
        }
    }
  }

  return scanned;
};

const decodeOptions = Schema.decodeUnknown(VerifierOptionsSchema);

/**
 * Turn argv (without the node and script entries) into a command.
 * `--help` and `--version` are honoured even alongside bad arguments.
 */
export const parseCommand = (
  argv: ReadonlyArray<string>,
): Effect.Effect<VerifierCommand, VerifierUsageError> =>
  Effect.gen(function* () {
    const scanned = scanArgs(argv);

    if (scanned.help && scanned.version) {
      return yield* Effect.fail(
        new VerifierUsageError({
          message: "--help and --version cannot be combined",
        }),
      );
    }
    if (scanned.help) {
      return { _tag: "ShowHelp" } as const;
    }
    if (scanned.version) {
      return { _tag: "ShowVersion" } as const;
    }
    if (scanned.rejected !== undefined) {
      return yield* Effect.fail(scanned.rejected);
    }

    const [proofFile, ...extra] = scanned.positionals;
    if (proofFile === undefined) {
      return yield* Effect.fail(
        new VerifierUsageError({ message: "Missing proof file argument" }),
      );
    }
    if (extra.length > 0) {
      return yield* Effect.fail(
        reject(`Unexpected argument ${extra[0]}`, extra[0]),
      );
    }

    const options = yield* decodeOptions({
      proofFile,
      keyMode: scanned.secured ? "secured" : "raw",
      logLevel: scanned.logLevel,
    }).pipe(
      Effect.mapError(
        (cause) =>
          new VerifierUsageError({ message: "Invalid command line", cause }),
      ),
    );
    return { _tag: "Verify", options } as const;
  });
