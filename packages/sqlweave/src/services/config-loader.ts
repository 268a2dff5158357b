/**
 * Config Loader Service
 *
 * Loads and validates sqlweave.config.{ts,js,mjs,cjs,json} (or a `sqlweave`
 * key in package.json) using lilconfig.
 */
import { dirname } from "node:path";
import { pathToFileURL } from "node:url";
import { Context, Effect, Layer, Schema as S, ParseResult, pipe } from "effect";
import { lilconfig } from "lilconfig";
import { Config, type ConfigInput, type ResolvedConfig } from "../config.js";
import { ConfigNotFound, ConfigInvalid } from "../errors.js";

/**
 * Config Loader service interface
 */
export interface ConfigLoader {
  /**
   * Load configuration from file.
   * @param configPath - Optional explicit path to config file
   * @param searchFrom - Directory to search from (default: cwd)
   */
  readonly load: (options?: {
    readonly configPath?: string;
    readonly searchFrom?: string;
  }) => Effect.Effect<ResolvedConfig, ConfigNotFound | ConfigInvalid>;
}

/**
 * ConfigLoader service tag
 */
export class ConfigLoaderService extends Context.Tag("ConfigLoader")<
  ConfigLoaderService,
  ConfigLoader
>() {}

/**
 * Default config file names to search for
 */
export const CONFIG_FILE_NAMES = [
  "sqlweave.config.ts",
  "sqlweave.config.js",
  "sqlweave.config.mjs",
  "sqlweave.config.cjs",
  "sqlweave.config.json",
  "package.json",
];

/**
 * Dynamic import loader for TypeScript config files (needs a TS-aware loader such as tsx)
 */
const dynamicImport = async (filepath: string): Promise<unknown> => {
  const mod: unknown = await import(pathToFileURL(filepath).href);
  return typeof mod === "object" && mod !== null && "default" in mod ? mod.default : mod;
};

function createLilconfig() {
  return lilconfig("sqlweave", {
    searchPlaces: CONFIG_FILE_NAMES,
    loaders: { ".ts": dynamicImport },
  });
}

/** One `path: message` line per schema issue */
function formatSchemaErrors(error: ParseResult.ParseError): readonly string[] {
  return ParseResult.ArrayFormatter.formatErrorSync(error).map(issue =>
    issue.path.length === 0 ? issue.message : `${issue.path.join(".")}: ${issue.message}`,
  );
}

type LoadOptions = Parameters<ConfigLoader["load"]>[0];

/** Locate the config file, or read the one named explicitly */
const findConfig = (lc: ReturnType<typeof createLilconfig>, options: LoadOptions) => {
  const searchFrom = options?.searchFrom ?? process.cwd();
  const configPath = options?.configPath;

  return pipe(
    Effect.tryPromise({
      try: () => (configPath ? lc.load(configPath) : lc.search(searchFrom)),
      catch: error =>
        new ConfigInvalid({
          message: `Failed to load config: ${error instanceof Error ? error.message : String(error)}`,
          path: configPath ?? searchFrom,
          errors: [String(error)],
        }),
    }),
    Effect.flatMap(result =>
      result && !result.isEmpty
        ? Effect.succeed({ filepath: result.filepath, config: result.config })
        : Effect.fail(
            new ConfigNotFound({
              message: "No configuration file found",
              searchPaths: configPath
                ? [configPath]
                : CONFIG_FILE_NAMES.map(name => `${searchFrom}/${name}`),
            }),
          ),
    ),
  );
};

const decodeConfig = (filepath: string, raw: unknown) =>
  pipe(
    S.decodeUnknown(Config)(raw),
    Effect.mapError(
      parseError =>
        new ConfigInvalid({
          message: `Invalid configuration in ${filepath}`,
          path: filepath,
          errors: formatSchemaErrors(parseError),
        }),
    ),
  );

/**
 * Create a ConfigLoader implementation
 */
export function createConfigLoader(): ConfigLoader {
  const lc = createLilconfig();

  return {
    load: options =>
      Effect.gen(function* () {
        const { filepath, config } = yield* findConfig(lc, options);
        const parsed = yield* decodeConfig(filepath, config);
        yield* Effect.logDebug(`loaded config from ${filepath}`);

        return {
          ...parsed,
          configDir: dirname(filepath),
        } satisfies ResolvedConfig;
      }),
  };
}

/**
 * Live layer for ConfigLoader
 */
export const ConfigLoaderLive = Layer.succeed(ConfigLoaderService, createConfigLoader());

/**
 * Helper to define a config (provides type safety for users)
 */
export function defineConfig(config: ConfigInput): ConfigInput {
  return config;
}
