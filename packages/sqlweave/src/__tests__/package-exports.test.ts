/**
 * Published entry points of the workspace packages
 */
import { describe, expect, it } from "@effect/vitest"
import { existsSync, readFileSync } from "node:fs"
import { Schema as S } from "effect"

const EntryPoint = S.Struct({ source: S.String, types: S.String, import: S.String })

const Manifest = S.Struct({
  main: S.String,
  types: S.String,
  files: S.Array(S.String),
  exports: S.Record({ key: S.String, value: EntryPoint }),
  scripts: S.Record({ key: S.String, value: S.String }),
})

const packageUrl = (name: string): URL => new URL(`../../../${name}/`, import.meta.url)

const readManifest = (name: string) =>
  S.decodeUnknownSync(Manifest)(JSON.parse(readFileSync(new URL("package.json", packageUrl(name)), "utf8")))

describe.each(["runtime", "sqlweave"])("packages/%s", (name) => {
  const manifest = readManifest(name)

  it("loads compiled output outside the workspace", () => {
    expect(manifest.main).toBe("./dist/index.js")
    expect(manifest.types).toBe("./dist/index.d.ts")
    expect(manifest.files).toEqual(["dist"])
    expect(manifest.scripts["build"]).toBe("tsc -p tsconfig.build.json")
    for (const entry of Object.values(manifest.exports)) {
      expect(entry.import).toMatch(/^\.\/dist\/.+\.js$/)
      expect(entry.types).toBe(entry.import.replace(/\.js$/, ".d.ts"))
    }
  })

  it("maps every entry point to an existing source file", () => {
    for (const entry of Object.values(manifest.exports)) {
      expect(entry.source).toBe(entry.import.replace(/^\.\/dist\//, "./src/").replace(/\.js$/, ".ts"))
      expect(existsSync(new URL(entry.source, packageUrl(name)))).toBe(true)
    }
  })
})
