import * as S from "@effect/schema/Schema"
import { Data, Effect, pipe } from "effect"

export class UsageError extends Data.TaggedError("UsageError")<{
  readonly message: string
}> {}

const cliSchema = S.Struct({
  descriptor: S.NonEmptyString,
  values: S.Array(S.String)
})

export type CliInput = S.Schema.Type<typeof cliSchema>

export const usage = "Usage: coerce <type> [value ...]"

export const parseCliArgs = (args: ReadonlyArray<string>): Effect.Effect<CliInput, UsageError> =>
  pipe(
    S.decodeUnknown(cliSchema)({ descriptor: args[0], values: args.slice(1) }),
    Effect.mapError(() => new UsageError({ message: usage }))
  )

export const readCliInput = pipe(
  Effect.sync(() => process.argv.slice(2)),
  Effect.flatMap(parseCliArgs)
)
