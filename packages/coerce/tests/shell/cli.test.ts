import { NodeContext } from "@effect/platform-node"
import { describe, expect, it } from "@effect/vitest"
import { Effect, LogLevel, pipe } from "effect"

import { parseCliArgs, usage } from "../../src/shell/cli.js"
import { loadConfig } from "../../src/shell/config.js"

const withEnv = (values: Readonly<Record<string, string>>) =>
  Effect.acquireRelease(
    Effect.sync(() => {
      const previous = Object.keys(values).map((key) => [key, process.env[key]] as const)
      for (const [key, value] of Object.entries(values)) {
        process.env[key] = value
      }
      return previous
    }),
    (previous) =>
      Effect.sync(() => {
        for (const [key, value] of previous) {
          if (value === undefined) {
            delete process.env[key]
          } else {
            process.env[key] = value
          }
        }
      })
  )

describe("parseCliArgs", () => {
  it.effect("splits the type from the values", () =>
    Effect.gen(function*(_) {
      const input = yield* _(parseCliArgs(["integer", "1", "0x10"]))
      expect(input).toEqual({ descriptor: "integer", values: ["1", "0x10"] })
    }))

  it.effect("accepts a type without values", () =>
    Effect.gen(function*(_) {
      const input = yield* _(parseCliArgs(["integer"]))
      expect(input.values).toEqual([])
    }))

  it.effect("reports usage without a type", () =>
    Effect.gen(function*(_) {
      const error = yield* _(Effect.flip(parseCliArgs([])))
      expect(error.message).toBe(usage)
      const empty = yield* _(Effect.flip(parseCliArgs([""])))
      expect(empty.message).toBe("Usage: coerce <type> [value ...]")
    }))
})

describe("loadConfig", () => {
  it.effect("reads languages and log level from the environment", () =>
    Effect.scoped(
      Effect.gen(function*(_) {
        yield* _(withEnv({ COERCE_LANGUAGES: "fi, SV", COERCE_LOG_LEVEL: "Debug" }))
        const config = yield* _(pipe(loadConfig, Effect.provide(NodeContext.layer)))
        expect(config.languages).toEqual(["fi", "sv"])
        expect(config.logLevel).toBe(LogLevel.Debug)
        expect(config.languagesFile).toBe(null)
      })
    ))

  it.effect("rejects unknown log levels", () =>
    Effect.scoped(
      Effect.gen(function*(_) {
        yield* _(withEnv({ COERCE_LOG_LEVEL: "Loud" }))
        const error = yield* _(Effect.flip(pipe(loadConfig, Effect.provide(NodeContext.layer))))
        expect(error._tag).toBe("ConfigError")
      })
    ))
})
