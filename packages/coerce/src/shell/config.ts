import * as FileSystem from "@effect/platform/FileSystem"
import * as Path from "@effect/platform/Path"
import * as S from "@effect/schema/Schema"
import dotenv from "dotenv"
import { Data, Effect, LogLevel, pipe } from "effect"

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string
}> {}

const logLevelSchema = S.Literal("All", "Trace", "Debug", "Info", "Warning", "Error", "Fatal", "None")

const envSchema = S.Struct({
  COERCE_LANGUAGES: S.optionalWith(S.String, { default: () => "" }),
  COERCE_LANGUAGES_FILE: S.optional(S.NonEmptyString),
  COERCE_LOG_LEVEL: S.optionalWith(logLevelSchema, { default: () => "Info" as const })
})

type Env = S.Schema.Type<typeof envSchema>

export type Config = {
  // language codes whose true/false words extend the English ones
  readonly languages: ReadonlyArray<string>
  readonly languagesFile: string | null
  readonly logLevel: LogLevel.LogLevel
}

const toConfigError = (
  error: ConfigError | Error | string
): ConfigError =>
  error instanceof ConfigError
    ? error
    : new ConfigError({
      message: error instanceof Error ? error.message : error
    })

export const parseLanguageCodes = (value: string): ReadonlyArray<string> =>
  value
    .split(",")
    .map((code) => code.trim().toLowerCase())
    .filter((code) => code.length > 0)

// CHANGE: load an optional .env file from the working directory or next to the module
// FORMAT THEOREM: forall paths: first existing candidate is loaded, otherwise dotenv defaults apply
// PURITY: SHELL
// EFFECT: Effect<void, ConfigError, FileSystem | Path>
// INVARIANT: variables already present in the environment are never overwritten
// COMPLEXITY: O(k)/O(1) where k = candidate paths
const loadEnv = pipe(
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem.FileSystem)
    const path = yield* _(Path.Path)
    const modulePath = yield* _(path.fromFileUrl(new URL(import.meta.url)))
    const moduleDir = path.dirname(modulePath)
    const cwd = process.cwd()
    const candidateEnvPaths = [
      path.resolve(cwd, ".env"),
      path.resolve(cwd, "../.env"),
      path.resolve(cwd, "../../.env"),
      path.resolve(moduleDir, "../../.env"),
      path.resolve(moduleDir, "../../../../.env")
    ]

    let resolvedEnvPath: string | null = null
    for (const envPath of candidateEnvPaths) {
      const exists = yield* _(fs.exists(envPath))
      if (exists) {
        resolvedEnvPath = envPath
        break
      }
    }

    if (resolvedEnvPath !== null) {
      yield* _(Effect.logDebug(`Loading environment from ${resolvedEnvPath}`))
      dotenv.config({ path: resolvedEnvPath })
    }
  }),
  Effect.mapError((error) => toConfigError(error instanceof Error ? error : String(error))),
  Effect.asVoid
)

const toConfig = (env: Env): Config => ({
  languages: parseLanguageCodes(env.COERCE_LANGUAGES),
  languagesFile: env.COERCE_LANGUAGES_FILE ?? null,
  logLevel: LogLevel.fromLiteral(env.COERCE_LOG_LEVEL)
})

// CHANGE: decode configuration from environment variables
// FORMAT THEOREM: forall env: decode(env) = config -> config.logLevel in LogLevel
// PURITY: SHELL
// EFFECT: Effect<Config, ConfigError, FileSystem | Path>
// INVARIANT: every variable is optional; defaults are English only and Info
// COMPLEXITY: O(n)/O(n)
export const loadConfig = pipe(
  loadEnv,
  Effect.flatMap(() => Effect.sync(() => process.env)),
  Effect.flatMap(S.decodeUnknown(envSchema)),
  Effect.map(toConfig),
  Effect.mapError((error) => toConfigError(error instanceof Error ? error : String(error)))
)
