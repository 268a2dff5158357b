/**
 * Config Loader Tests
 *
 * Loads real config files from temporary directories.
 */
import { describe, expect, it, layer } from "@effect/vitest"
import { Effect, Layer } from "effect"
import { FileSystem, Path } from "@effect/platform"
import { NodeFileSystem, NodePath } from "@effect/platform-node"
import { createConfigLoader, defineConfig } from "../services/config-loader.js"

const PlatformLayer = Layer.merge(NodeFileSystem.layer, NodePath.layer)

/** Run `body` against a fresh directory holding `files` */
const withFiles = <A, E, R>(
  files: Readonly<Record<string, string>>,
  body: (dir: string) => Effect.Effect<A, E, R>
) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const pathSvc = yield* Path.Path
    const dir = yield* fs.makeTempDirectoryScoped({ prefix: "config-loader-" })
    for (const [name, content] of Object.entries(files)) {
      yield* fs.writeFileString(pathSvc.join(dir, name), content)
    }
    return yield* body(dir)
  }).pipe(Effect.scoped)

layer(PlatformLayer)("ConfigLoader", (it) => {
  it.effect("applies defaults to a JSON config", () =>
    withFiles({ "sqlweave.config.json": JSON.stringify({ dialect: "postgres" }) }, (dir) =>
      Effect.gen(function* () {
        const config = yield* createConfigLoader().load({ searchFrom: dir })
        expect(config).toEqual({
          dialect: "postgres",
          input: ".",
          outputDir: "src/generated",
          runtimeModule: "@sqlweave/runtime",
          configDir: dir,
        })
      })
    )
  )

  it.effect("reads the sqlweave key of package.json", () =>
    withFiles(
      {
        "package.json": JSON.stringify({
          name: "app",
          sqlweave: { dialect: "mysql", input: "sql/ir", inflection: { fieldName: [] } },
        }),
      },
      (dir) =>
        Effect.gen(function* () {
          const config = yield* createConfigLoader().load({ searchFrom: dir })
          expect(config.dialect).toBe("mysql")
          expect(config.input).toBe("sql/ir")
          expect(config.inflection).toEqual({ fieldName: [] })
        })
    )
  )

  it.effect("loads an explicit config path", () =>
    withFiles({ "custom.json": JSON.stringify({ dialect: "sqlite", outputDir: "gen" }) }, (dir) =>
      Effect.gen(function* () {
        const pathSvc = yield* Path.Path
        const config = yield* createConfigLoader().load({ configPath: pathSvc.join(dir, "custom.json") })
        expect(config.outputDir).toBe("gen")
        expect(config.configDir).toBe(dir)
      })
    )
  )

  it.effect("rejects invalid settings", () =>
    withFiles(
      { "sqlweave.config.json": JSON.stringify({ dialect: "sqlite", inflection: { fieldName: ["kebabCase"] } }) },
      (dir) =>
        Effect.gen(function* () {
          const pathSvc = yield* Path.Path
          const error = yield* Effect.flip(createConfigLoader().load({ searchFrom: dir }))
          expect(error._tag).toBe("ConfigInvalid")
          if (error._tag === "ConfigInvalid") {
            expect(error.message).toBe(`Invalid configuration in ${pathSvc.join(dir, "sqlweave.config.json")}`)
            expect(error.errors.length).toBeGreaterThan(0)
            expect(error.errors.every((line) => line.startsWith("inflection.fieldName.0: "))).toBe(true)
          }
        })
    )
  )

  it.effect("rejects an empty runtime module", () =>
    withFiles({ "sqlweave.config.json": JSON.stringify({ runtimeModule: "" }) }, (dir) =>
      Effect.gen(function* () {
        const error = yield* Effect.flip(createConfigLoader().load({ searchFrom: dir }))
        expect(error._tag).toBe("ConfigInvalid")
        if (error._tag === "ConfigInvalid") {
          expect(error.errors.every((line) => line.startsWith("runtimeModule: "))).toBe(true)
        }
      })
    )
  )
})

describe("defineConfig", () => {
  it("returns the config unchanged", () => {
    const config = { dialect: "postgres", outputDir: "src/db" }
    expect(defineConfig(config)).toBe(config)
  })
})
