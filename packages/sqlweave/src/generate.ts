/**
 * Generate Orchestration Function
 *
 * Threads together the full code generation pipeline:
 * 1. Load config and resolve the dialect
 * 2. Read and decode IR documents
 * 3. Generate one module per query
 * 4. Write modules and the index barrel
 *
 * Logging:
 * - Effect.log (INFO) - Progress messages shown by default
 * - Effect.logDebug (DEBUG) - Detailed info (query names, file lists)
 */
import { Effect, Layer } from "effect"
import { FileSystem, Path } from "@effect/platform"
import type { ResolvedConfig } from "./config.js"
import { CONFIG_FILE_NAMES, ConfigLoaderService, ConfigLoaderLive } from "./services/config-loader.js"
import { createFileWriter, type Emission, type WriteResult } from "./services/file-writer.js"
import { makeInflectionLayer } from "./services/inflection.js"
import { parseQueryDocument } from "./ir/index.js"
import { parseDialect, SUPPORTED_DIALECTS, type Dialect } from "./lib/dialect.js"
import { generateQuery, type GeneratedQuery } from "./generate-query.js"
import {
  ConfigInvalid,
  type ConfigNotFound,
  EmitConflict,
  type GenerationError,
  type IrDecodeError,
  type UnsupportedDialect,
  type WriteError,
} from "./errors.js"

/**
 * Options for the generate function
 */
export interface GenerateOptions {
  /** Path to config file (optional - will search if not provided) */
  readonly configPath?: string
  /** Directory to search for config from (default: cwd) */
  readonly searchFrom?: string
  /** Override output directory from config */
  readonly outputDir?: string
  /** Override the configured dialect */
  readonly dialect?: string
  /** Dry run - don't write files, just return what would be written */
  readonly dryRun?: boolean
}

/**
 * Result of a generate operation
 */
export interface GenerateResult {
  readonly config: ResolvedConfig
  readonly dialect: Dialect
  readonly queries: readonly GeneratedQuery[]
  readonly writeResults: readonly WriteResult[]
}

/**
 * All possible errors from the generate pipeline
 */
export type GenerateError =
  | ConfigNotFound
  | ConfigInvalid
  | UnsupportedDialect
  | IrDecodeError
  | GenerationError
  | EmitConflict
  | WriteError

/** JSON files in the input directory that are never IR documents */
const NON_IR_FILES = new Set([...CONFIG_FILE_NAMES, "package-lock.json", "tsconfig.json"])

export const INDEX_FILE = "index.ts"

/**
 * Fail fast on a missing or unknown dialect, before any IR is read.
 */
const resolveDialect = (
  config: ResolvedConfig,
  override: string | undefined
): Effect.Effect<Dialect, ConfigInvalid | UnsupportedDialect> => {
  const tag = override ?? config.dialect
  return tag === undefined
    ? Effect.fail(
        new ConfigInvalid({
          message: "No dialect configured",
          path: config.configDir ?? ".",
          errors: [`dialect is required - one of ${SUPPORTED_DIALECTS.join(", ")}`],
        })
      )
    : parseDialect(tag)
}

const readDocuments = (inputDir: string) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const pathSvc = yield* Path.Path
    const unreadable = (cause: unknown) =>
      new ConfigInvalid({
        message: `Cannot read input directory ${inputDir}`,
        path: inputDir,
        errors: [String(cause)],
      })

    const entries = yield* fs.readDirectory(inputDir).pipe(Effect.mapError(unreadable))
    const files = entries.filter((name) => name.endsWith(".json") && !NON_IR_FILES.has(name)).sort()
    yield* Effect.logDebug(`IR documents: ${files.join(", ")}`)

    return yield* Effect.forEach(files, (name) => {
      const file = pathSvc.join(inputDir, name)
      return fs.readFileString(file).pipe(
        Effect.mapError(unreadable),
        Effect.flatMap((text) => parseQueryDocument(text, file)),
        Effect.map((query) => ({ file: name, query }))
      )
    })
  })

/** One module per query plus an index re-exporting them */
export const toEmissions = (
  generated: readonly { readonly file: string; readonly query: GeneratedQuery }[]
): Effect.Effect<readonly Emission[], EmitConflict> => {
  const byPath = new Map<string, string[]>()
  for (const { file, query } of generated) {
    const path = `${query.functionName}.ts`
    byPath.set(path, [...(byPath.get(path) ?? []), file])
  }
  for (const [path, sources] of byPath) {
    if (sources.length > 1 || path === INDEX_FILE) {
      return Effect.fail(
        new EmitConflict({
          message: `${path} would be generated from ${sources.join(", ")}`,
          path,
          sources,
        })
      )
    }
  }
  if (generated.length === 0) return Effect.succeed([])

  const modules = generated.map(({ file, query }): Emission => ({
    path: `${query.functionName}.ts`,
    content: query.source,
    source: file,
  }))
  const index = [...byPath.keys()]
    .sort()
    .map((path) => `export * from "./${path.replace(/\.ts$/, ".js")}";`)
  return Effect.succeed([...modules, { path: INDEX_FILE, content: `${index.join("\n")}\n`, source: "index" }])
}

/**
 * The main generate pipeline
 */
export const generate = (
  options: GenerateOptions = {}
): Effect.Effect<GenerateResult, GenerateError, ConfigLoaderService | FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    // 1. Load configuration
    yield* Effect.logDebug("Loading configuration...")
    const configLoader = yield* ConfigLoaderService
    const config = yield* configLoader.load({
      configPath: options.configPath,
      searchFrom: options.searchFrom,
    })

    const dialect = yield* resolveDialect(config, options.dialect)
    yield* Effect.logDebug(`Dialect: ${dialect}`)

    const pathSvc = yield* Path.Path
    const baseDir = config.configDir ?? options.searchFrom ?? process.cwd()
    const inputDir = pathSvc.resolve(baseDir, config.input)
    const outputDir =
      options.outputDir === undefined
        ? pathSvc.resolve(baseDir, config.outputDir)
        : pathSvc.resolve(options.outputDir)

    // 2. Read IR documents
    yield* Effect.log(`Reading IR documents from ${inputDir}...`)
    const documents = yield* readDocuments(inputDir)
    yield* Effect.log(`Found ${documents.length} queries`)

    // 3. Generate
    const generated = yield* Effect.forEach(documents, ({ file, query }) =>
      generateQuery(query, { dialect, runtimeModule: config.runtimeModule }).pipe(
        Effect.map((result) => ({ file, query: result }))
      )
    ).pipe(Effect.provide(makeInflectionLayer(config.inflection)))

    // 4. Write files
    const emissions = yield* toEmissions(generated)
    yield* Effect.log(`Writing to ${outputDir}...`)
    const writer = createFileWriter()
    const writeResults = yield* writer.writeAll(emissions, {
      outputDir,
      dryRun: options.dryRun ?? false,
    })

    yield* Effect.forEach(writeResults, (result) => {
      const status = options.dryRun ? "(dry run)" : result.written ? "✓" : "–"
      return Effect.logDebug(`${status} ${result.path}`)
    })

    const written = writeResults.filter((r) => r.written).length
    const dryRunSuffix = options.dryRun ? " (dry run)" : ""
    yield* Effect.log(`Wrote ${written} files${dryRunSuffix}`)

    return {
      config,
      dialect,
      queries: generated.map(({ query }) => query),
      writeResults,
    }
  })

/**
 * Layer that provides all services needed for generate()
 */
export const GenerateLive = Layer.mergeAll(ConfigLoaderLive)

/**
 * Run generate with the live config loader.
 * Requires FileSystem and Path from @effect/platform.
 */
export const runGenerate = (
  options: GenerateOptions = {}
): Effect.Effect<GenerateResult, GenerateError, FileSystem.FileSystem | Path.Path> =>
  generate(options).pipe(Effect.provide(GenerateLive))
