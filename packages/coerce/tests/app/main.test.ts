import { NodeContext } from "@effect/platform-node"
import { describe, expect, it } from "@effect/vitest"
import { Effect, pipe } from "effect"
import { vi } from "vitest"

import { program } from "../../src/app/program.js"

const withLogSpy = Effect.acquireRelease(
  Effect.sync(() => vi.spyOn(console, "log").mockImplementation(() => {})),
  (spy) =>
    Effect.sync(() => {
      spy.mockRestore()
    })
)

const withArgv = (nextArgv: ReadonlyArray<string>) =>
  Effect.acquireRelease(
    Effect.sync(() => {
      const previous = process.argv
      process.argv = [...nextArgv]
      return previous
    }),
    (previous) =>
      Effect.sync(() => {
        process.argv = previous
      })
  )

const runProgram = pipe(program, Effect.provide(NodeContext.layer))

describe("main program", () => {
  it.effect("prints every converted value", () =>
    Effect.scoped(
      Effect.gen(function*(_) {
        const logSpy = yield* _(withLogSpy)
        yield* _(withArgv(["node", "main", "integer", "0x10", "1 000"]))
        yield* _(runProgram)
        yield* _(Effect.sync(() => {
          expect(logSpy).toHaveBeenCalledWith("16")
          expect(logSpy).toHaveBeenLastCalledWith("1000")
        }))
      })
    ))

  it.effect("prints containers in literal syntax", () =>
    Effect.scoped(
      Effect.gen(function*(_) {
        const logSpy = yield* _(withLogSpy)
        yield* _(withArgv(["node", "main", "{\"type\": \"list\", \"nested\": [\"boolean\"]}", "['yes', 'off']"]))
        yield* _(runProgram)
        yield* _(Effect.sync(() => {
          expect(logSpy).toHaveBeenLastCalledWith("[True, False]")
        }))
      })
    ))

  it.effect("fails when a value cannot be converted", () =>
    Effect.scoped(
      Effect.gen(function*(_) {
        yield* _(withLogSpy)
        yield* _(withArgv(["node", "main", "integer", "1", "x"]))
        const error = yield* _(Effect.flip(runProgram))
        expect(error._tag).toBe("ConversionFailedError")
        expect(error.message).toBe("1 of 2 value(s) could not be converted.")
      })
    ))

  it.effect("fails with usage when no type is given", () =>
    Effect.scoped(
      Effect.gen(function*(_) {
        yield* _(withArgv(["node", "main"]))
        const error = yield* _(Effect.flip(runProgram))
        expect(error.message).toBe("Usage: coerce <type> [value ...]")
      })
    ))

  it.effect("refuses unrecognized types before converting", () =>
    Effect.scoped(
      Effect.gen(function*(_) {
        const logSpy = yield* _(withLogSpy)
        yield* _(withArgv(["node", "main", "Gadget", "1"]))
        const error = yield* _(Effect.flip(runProgram))
        expect(error.message).toBe("Unrecognized type 'Gadget'.")
        expect(logSpy).not.toHaveBeenCalled()
      })
    ))

  it.effect("refuses unrecognized types when no values are given", () =>
    Effect.scoped(
      Effect.gen(function*(_) {
        yield* _(withArgv(["node", "main", "Gadget"]))
        const error = yield* _(Effect.flip(runProgram))
        expect(error._tag).toBe("UnrecognizedTypeError")
        expect(error.message).toBe("Unrecognized type 'Gadget'.")
      })
    ))
})
