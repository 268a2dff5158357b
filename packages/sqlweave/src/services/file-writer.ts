/**
 * File Writer
 *
 * Writes generated modules under the output directory. Files whose content
 * is unchanged are left untouched so timestamps only move on real changes.
 */
import { Effect } from "effect"
import { FileSystem, Path } from "@effect/platform"
import { WriteError } from "../errors.js"

/**
 * A file to be written, relative to the output directory
 */
export interface Emission {
  readonly path: string
  readonly content: string
  /** IR document (or "index") the file was generated from */
  readonly source: string
}

export interface WriteResult {
  /** Absolute path */
  readonly path: string
  readonly written: boolean
  readonly reason?: "dry-run" | "unchanged"
}

export interface WriteOptions {
  readonly outputDir: string
  readonly dryRun?: boolean
  /** Header prepended to each file, given the emission source (default: defaultHeader) */
  readonly header?: (source: string) => string
}

export const defaultHeader = (source: string): string =>
  `// AUTO-GENERATED FILE - DO NOT EDIT\n// Generated by sqlweave from ${source}\n\n`

export interface FileWriter {
  readonly writeAll: (
    emissions: readonly Emission[],
    options: WriteOptions
  ) => Effect.Effect<readonly WriteResult[], WriteError, FileSystem.FileSystem | Path.Path>
}

export function createFileWriter(): FileWriter {
  const writeOne = (emission: Emission, options: WriteOptions) =>
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem
      const pathSvc = yield* Path.Path
      const target = pathSvc.join(options.outputDir, emission.path)
      const header = options.header ?? defaultHeader
      const content = header(emission.source) + emission.content

      if (options.dryRun) {
        return { path: target, written: false, reason: "dry-run" } satisfies WriteResult
      }

      const toWriteError = (cause: unknown) =>
        new WriteError({ message: `Failed to write ${target}`, path: target, cause })

      const exists = yield* fs.exists(target).pipe(Effect.mapError(toWriteError))
      if (exists) {
        const current = yield* fs.readFileString(target).pipe(Effect.mapError(toWriteError))
        if (current === content) {
          return { path: target, written: false, reason: "unchanged" } satisfies WriteResult
        }
      }

      yield* fs.makeDirectory(pathSvc.dirname(target), { recursive: true }).pipe(Effect.mapError(toWriteError))
      yield* fs.writeFileString(target, content).pipe(Effect.mapError(toWriteError))
      return { path: target, written: true } satisfies WriteResult
    })

  return {
    writeAll: (emissions, options) =>
      Effect.forEach(emissions, (emission) => writeOne(emission, options)),
  }
}
