import { Duration, Either } from "effect"

import { type ValueError, valueError } from "./errors.js"

const timestampPattern =
  /^(\d{4})[-./]?(\d{2})[-./]?(\d{2})(?:[ T_]?(\d{2}):?(\d{2})(?::?(\d{2})(?:[.,](\d{1,6}))?)?)?\s*([Zz]|[+-]\d{2}:?\d{2})?$/u

type TimestampParts = {
  readonly year: number
  readonly month: number
  readonly day: number
  readonly hour: number
  readonly minute: number
  readonly second: number
  readonly millisecond: number
  readonly offsetMinutes: number
}

const parseOffset = (zone: string | undefined): number => {
  if (zone === undefined || zone.toUpperCase() === "Z") {
    return 0
  }
  const digits = zone.slice(1).replace(":", "")
  const minutes = Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2))
  return zone.startsWith("-") ? -minutes : minutes
}

const toParts = (match: RegExpMatchArray): TimestampParts => ({
  year: Number(match[1]),
  month: Number(match[2]),
  day: Number(match[3]),
  hour: Number(match[4] ?? "0"),
  minute: Number(match[5] ?? "0"),
  second: Number(match[6] ?? "0"),
  millisecond: Math.floor(Number((match[7] ?? "").padEnd(6, "0")) / 1000),
  offsetMinutes: parseOffset(match[8])
})

const fromParts = (parts: TimestampParts): Date | null => {
  const date = new Date(0)
  date.setUTCFullYear(parts.year, parts.month - 1, parts.day)
  date.setUTCHours(parts.hour, parts.minute, parts.second, parts.millisecond)
  const valid = date.getUTCFullYear() === parts.year &&
    date.getUTCMonth() === parts.month - 1 &&
    date.getUTCDate() === parts.day &&
    date.getUTCHours() === parts.hour &&
    date.getUTCMinutes() === parts.minute &&
    date.getUTCSeconds() === parts.second
  return valid ? new Date(date.getTime() - parts.offsetMinutes * 60_000) : null
}

/**
 * Parses a timestamp such as `2024-01-02 10:30:00.250` or `20240102T103000Z`.
 * Numbers are seconds since the epoch. Timestamps without a zone are UTC.
 *
 * @pure true
 * @complexity O(n) time / O(1) space
 */
export const parseDateTime = (value: string | number): Either.Either<Date, ValueError> => {
  if (typeof value === "number") {
    const date = new Date(value * 1000)
    return Number.isNaN(date.getTime())
      ? Either.left(valueError(`Invalid timestamp '${value}'.`))
      : Either.right(date)
  }
  const match = value.trim().match(timestampPattern)
  const date = match === null ? null : fromParts(toParts(match))
  return date === null
    ? Either.left(valueError(`Invalid timestamp '${value}'.`))
    : Either.right(date)
}

export const hasTimeOfDay = (date: Date): boolean =>
  date.getUTCHours() !== 0 ||
  date.getUTCMinutes() !== 0 ||
  date.getUTCSeconds() !== 0 ||
  date.getUTCMilliseconds() !== 0

const unitMillis: ReadonlyArray<readonly [ReadonlyArray<string>, number]> = [
  [["w", "week", "weeks"], 604_800_000],
  [["d", "day", "days"], 86_400_000],
  [["h", "hour", "hours"], 3_600_000],
  [["m", "min", "mins", "minute", "minutes"], 60_000],
  [["s", "sec", "secs", "second", "seconds"], 1000],
  [["ms", "millis", "millisecond", "milliseconds"], 1],
  [["us", "μs", "micro", "micros", "microsecond", "microseconds"], 0.001],
  [["ns", "nano", "nanos", "nanosecond", "nanoseconds"], 0.000_001]
]

const lookupUnit = (unit: string): number | null => {
  const entry = unitMillis.find(([names]) => names.includes(unit))
  return entry === undefined ? null : entry[1]
}

const numberPattern = /^(?:\d+(?:\.\d*)?|\.\d+)$/u
const timerPattern = /^(\d+):(\d{2})(?::(\d{2}))?(?:\.(\d{1,3}))?$/u
const verbosePattern = /(\d+(?:\.\d*)?|\.\d+)([a-zμ]+)/gu

const parseTimer = (text: string): number | null => {
  const match = text.match(timerPattern)
  if (match === null) {
    return null
  }
  const first = Number(match[1])
  const second = Number(match[2])
  const fraction = Number((match[4] ?? "").padEnd(3, "0"))
  return match[3] === undefined
    ? (first * 60 + second) * 1000 + fraction
    : (first * 3600 + second * 60 + Number(match[3])) * 1000 + fraction
}

const parseVerbose = (text: string): number | null => {
  const compact = text.toLowerCase().replaceAll(/\s+/gu, "")
  let consumed = 0
  let total = 0
  for (const match of compact.matchAll(verbosePattern)) {
    const unit = lookupUnit(match[2] ?? "")
    if (match.index !== consumed || unit === null) {
      return null
    }
    total += Number(match[1]) * unit
    consumed += (match[0] ?? "").length
  }
  return consumed === 0 || consumed !== compact.length ? null : total
}

const parseMillis = (text: string): number | null => {
  if (numberPattern.test(text)) {
    return Number(text) * 1000
  }
  return parseTimer(text) ?? parseVerbose(text)
}

/**
 * Parses durations such as `90`, `1:30`, `1 minute 30 seconds` or `1h 30min`.
 * Bare numbers are seconds.
 *
 * @pure true
 * @invariant result is never negative
 * @complexity O(n) time / O(1) space
 */
export const parseDuration = (value: string | number): Either.Either<Duration.Duration, ValueError> => {
  const text = typeof value === "number" ? `${value}` : value.trim()
  if (text.startsWith("-")) {
    return Either.left(valueError("Negative durations are not supported."))
  }
  const millis = typeof value === "number" ? value * 1000 : parseMillis(text.replace(/^\+/u, ""))
  return millis === null || !Number.isFinite(millis)
    ? Either.left(valueError(`Invalid time string '${text}'.`))
    : Either.right(Duration.millis(millis))
}
