import * as Console from "effect/Console";
import * as Effect from "effect/Effect";
import * as Exit from "effect/Exit";
import * as Logger from "effect/Logger";
import * as LogLevel from "effect/LogLevel";
import { EthereumProofVerifierLive } from "./proof/ProofVerifier";
import { readProofFile, runVerification } from "./runner/ProofFile";
import {
  VerifierHelpText,
  VerifierVersion,
  parseCommand,
  type VerifierOptions,
} from "./runner/VerifierCommand";

const verifyFile = (options: VerifierOptions) =>
  Effect.gen(function* () {
    const input = yield* readProofFile(options.proofFile);
    const output = yield* runVerification(input, options.keyMode);
    yield* Console.log(output);
  }).pipe(
    Logger.withMinimumLogLevel(LogLevel.fromLiteral(options.logLevel)),
    Effect.provide(EthereumProofVerifierLive),
  );

const program = (argv: ReadonlyArray<string>) =>
  Effect.gen(function* () {
    const command = yield* parseCommand(argv);
    switch (command._tag) {
      case "ShowHelp":
        return yield* Console.log(VerifierHelpText);
      case "ShowVersion":
        return yield* Console.log(VerifierVersion);
      case "Verify":
        return yield* verifyFile(command.options);
    }
  });

const exit = await Effect.runPromiseExit(program(process.argv.slice(2)));

if (Exit.isFailure(exit)) {
  await Effect.runPromise(Effect.logError("mpt-verify failed", exit.cause));
  process.exitCode = 1;
}
