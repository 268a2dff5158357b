/**
 * Testing Utilities
 *
 * Helpers for testing query generation without IR files on disk.
 *
 * ```typescript
 * import { testQuery, testGenerate } from "sqlweave/testing"
 *
 * it.effect("returns the row count", () =>
 *   Effect.gen(function* () {
 *     const result = yield* testGenerate(
 *       testQuery({ instructions: [Instruction.EmitStatic({ text: "DELETE FROM t WHERE true" })] }),
 *     )
 *     expect(result.returnType).toEqual({ kind: "rowCount" })
 *   })
 * )
 * ```
 */
import { Effect, Layer } from "effect";
import type { ResolvedConfig } from "./config.js";
import { ConfigLoaderService } from "./services/config-loader.js";
import { makeInflectionLayer, type InflectionConfig } from "./services/inflection.js";
import { generateQuery, type GeneratedQuery, type GenerateQueryOptions } from "./generate-query.js";
import type { GenerationError } from "./errors.js";
import type { QueryDefinition } from "./ir/index.js";

// =============================================================================
// Test IR Builders
// =============================================================================

/**
 * Create a QueryDefinition with empty defaults for everything not given.
 */
export function testQuery(overrides: Partial<QueryDefinition> = {}): QueryDefinition {
  return {
    functionName: "test_query",
    affinity: "none",
    parameters: [],
    implicitParameters: [],
    responses: [],
    instructions: [],
    expressions: [],
    ...overrides,
  };
}

// =============================================================================
// Generation Helpers
// =============================================================================

export interface TestGenerateOptions extends Partial<GenerateQueryOptions> {
  readonly inflection?: InflectionConfig;
}

/**
 * Generate one query with default options (sqlite, `@sqlweave/runtime`).
 */
export function testGenerate(
  query: QueryDefinition,
  options: TestGenerateOptions = {},
): Effect.Effect<GeneratedQuery, GenerationError> {
  return generateQuery(query, {
    dialect: options.dialect ?? "sqlite",
    runtimeModule: options.runtimeModule ?? "@sqlweave/runtime",
  }).pipe(Effect.provide(makeInflectionLayer(options.inflection)));
}

// =============================================================================
// Config Helpers
// =============================================================================

/**
 * ConfigLoader layer that always returns the given configuration.
 */
export function testConfigLoader(
  config: Partial<ResolvedConfig> = {},
): Layer.Layer<ConfigLoaderService> {
  const resolved: ResolvedConfig = {
    input: ".",
    outputDir: "src/generated",
    runtimeModule: "@sqlweave/runtime",
    ...config,
  };
  return Layer.succeed(ConfigLoaderService, {
    load: () => Effect.succeed(resolved),
  });
}
