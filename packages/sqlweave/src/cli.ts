#!/usr/bin/env node
/**
 * sqlweave CLI
 *
 * Command-line interface for generating query modules from IR documents.
 *
 * Log verbosity is controlled via the built-in --log-level flag:
 *   --log-level debug   Show detailed output (document names, file paths)
 *   --log-level info    Default - show progress messages
 *   --log-level none    Suppress all output except errors
 */
import { Command, Options } from "@effect/cli";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import { Console, Effect, Option } from "effect";
import { runGenerate, type GenerateError, type GenerateResult } from "./generate.js";

export const VERSION = "0.1.0";

// ============================================================================
// Options
// ============================================================================

const configPath = Options.file("config").pipe(
  Options.withAlias("c"),
  Options.withDescription("Path to config file"),
  Options.optional,
);

const outputDir = Options.directory("output").pipe(
  Options.withAlias("o"),
  Options.withDescription("Override output directory"),
  Options.optional,
);

const dialect = Options.text("dialect").pipe(
  Options.withAlias("d"),
  Options.withDescription("Override the configured SQL dialect (postgres, mysql, sqlite)"),
  Options.optional,
);

const dryRun = Options.boolean("dry-run").pipe(
  Options.withAlias("n"),
  Options.withDescription("Show what would be generated without writing files"),
  Options.withDefault(false),
);

// ============================================================================
// Generate Command Logic
// ============================================================================

interface GenerateArgs {
  readonly configPath: Option.Option<string>;
  readonly outputDir: Option.Option<string>;
  readonly dialect: Option.Option<string>;
  readonly dryRun: boolean;
}

const runGenerateCommand = (args: GenerateArgs) => {
  const opts = {
    configPath: Option.getOrUndefined(args.configPath),
    outputDir: Option.getOrUndefined(args.outputDir),
    dialect: Option.getOrUndefined(args.dialect),
    dryRun: args.dryRun,
  };

  const logSuccess = (result: GenerateResult) => {
    const written = result.writeResults.filter(r => r.written).length;
    const total = result.writeResults.length;
    const suffix = args.dryRun ? " (dry run)" : "";
    return Console.log(`\n✓ Generated ${args.dryRun ? total : written} files${suffix}`);
  };

  return runGenerate(opts).pipe(
    Effect.tap(logSuccess),
    // Handle errors with extra details
    Effect.catchTags({
      ConfigInvalid: error => logErrorWithDetails(error, error.errors),
      IrDecodeError: error => logErrorWithDetails(error, error.errors),
      UnsupportedType: error => logErrorWithDetails(error, error.hints),
      EmitConflict: error => logErrorWithDetails(error, error.sources),
    }),
    // Remaining tagged errors print their message only
    Effect.catchAll(error => logErrorWithDetails(error, [])),
  );
};

/** Log an error with a list of detail messages */
const logErrorWithDetails = (error: GenerateError, details: readonly string[]) =>
  Console.error(`\n✗ Error: ${error._tag}`).pipe(
    Effect.andThen(Console.error(`  ${error.message}`)),
    Effect.andThen(Effect.forEach(details, e => Console.error(`    - ${e}`))),
    Effect.andThen(Effect.fail(error)),
  );

// ============================================================================
// Commands
// ============================================================================

const options = { configPath, outputDir, dialect, dryRun };

const generateCommand = Command.make("generate", options, runGenerateCommand);

// Root command runs generate by default
const rootCommand = Command.make("sqlweave", options, runGenerateCommand).pipe(
  Command.withSubcommands([generateCommand]),
);

// ============================================================================
// CLI App
// ============================================================================

const cli = Command.run(rootCommand, {
  name: "sqlweave",
  version: VERSION,
});

// Run with Node.js platform
cli(process.argv).pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain);
