import { Either } from "effect"

import type { Attempt, ConverterContext, ConverterDefinition, NestedConverters, TypeConverter } from "../converter.js"
import {
  asDetail,
  declaredInstanceCheck,
  defineConverter,
  makeConverter,
  nestedConverters,
  positionalNested,
  validateAll
} from "../converter.js"
import { type ValueError, valueError } from "../errors.js"
import type { ContainerKind } from "../literal-eval.js"
import { evaluateContainer, toRuntime } from "../literal-eval.js"
import { formatValue, isPlainObject, uniqueMap, uniqueSet } from "../runtime.js"
import { plural } from "../text.js"
import type { TypeInfo } from "../type-info.js"

// Converts items one by one and stops at the first failure.
export const convertEach = <A, B>(
  items: Iterable<A>,
  convertOne: (item: A, index: number) => Either.Either<B, ValueError>
): Either.Either<Array<B>, ValueError> => {
  const converted: Array<B> = []
  let index = 0
  for (const item of items) {
    const result = convertOne(item, index)
    if (Either.isLeft(result)) {
      return Either.left(result.left)
    }
    converted.push(result.right)
    index += 1
  }
  return Either.right(converted)
}

const firstNested = (nested: NestedConverters): TypeConverter | null => nestedConverters(nested)[0] ?? null

const evaluated = (text: string, expected: ContainerKind): Either.Either<unknown, ValueError> =>
  Either.map(evaluateContainer(text, expected), toRuntime)

const sequenceItems = (value: unknown): ReadonlyArray<unknown> | null =>
  Array.isArray(value) || value instanceof Uint8Array ? Array.from<unknown>(value) : null

const convertItemsWith = (
  converter: TypeConverter | null,
  items: ReadonlyArray<unknown>
): Either.Either<Array<unknown>, ValueError> =>
  converter === null
    ? Either.right([...items])
    : convertEach(items, (item, index) => Either.mapLeft(converter.convert(item, `${index}`, "Item"), asDetail))

const allItemsReady = (converter: TypeConverter | null, items: Iterable<unknown>): boolean => {
  if (converter === null) {
    return true
  }
  for (const item of items) {
    if (!converter.noConversionNeeded(item)) {
      return false
    }
  }
  return true
}

// CHANGE: convert list values from literal text or from other sequences
// FORMAT THEOREM: list[integer]("['1', 2]") = [1, 2]
// PURITY: CORE
// INVARIANT: a failing item is named by its 0-based index
// COMPLEXITY: O(n)/O(n)
export const listConverter: ConverterDefinition = defineConverter({
  kind: "list",
  builtin: "list",
  natives: [Array],
  build: (info, context) => {
    const nested = positionalNested(info, context)
    const itemConverter = firstNested(nested)
    const isList = declaredInstanceCheck(info, "list", [Array])
    const convertSequence = (value: unknown): Attempt => {
      const items = sequenceItems(value)
      return items === null ? Either.left(valueError()) : convertItemsWith(itemConverter, items)
    }
    return makeConverter(info, {
      kind: "list",
      ownName: "list",
      nested,
      valueKinds: ["string", "list", "tuple", "bytes", "bytearray"],
      noConversionNeeded: (value) => isList(value) && Array.isArray(value) && allItemsReady(itemConverter, value),
      convertText: (value) => Either.flatMap(evaluated(value, "list"), convertSequence),
      convertOther: convertSequence
    })
  }
})

const isHomogeneous = (info: TypeInfo): boolean => info.nested?.at(-1)?.type?.kind === "ellipsis"

export const tupleConverter: ConverterDefinition = defineConverter({
  kind: "tuple",
  builtin: "tuple",
  build: (info, context) => {
    const nested = positionalNested(info, context)
    const converters = nestedConverters(nested)
    const homogeneous = isHomogeneous(info)
    const isTuple = declaredInstanceCheck(info, "tuple")

    const convertItems = (items: ReadonlyArray<unknown>): Attempt => {
      if (converters.length === 0 || homogeneous) {
        return Either.map(convertItemsWith(converters[0] ?? null, items), (converted) => Object.freeze(converted))
      }
      if (items.length !== converters.length) {
        return Either.left(
          valueError(`Expected ${converters.length} item${plural(converters.length)}, got ${items.length}.`)
        )
      }
      const converted = convertEach(
        items,
        (item, index) => {
          const converter = converters[index]
          return converter === undefined
            ? Either.right(item)
            : Either.mapLeft(converter.convert(item, `${index}`, "Item"), asDetail)
        }
      )
      return Either.map(converted, (frozen) => Object.freeze(frozen))
    }

    const itemsReady = (items: ReadonlyArray<unknown>): boolean => {
      if (converters.length === 0) {
        return true
      }
      if (homogeneous) {
        return allItemsReady(converters[0] ?? null, items)
      }
      return items.length === converters.length &&
        items.every((item, index) => converters[index]?.noConversionNeeded(item) ?? true)
    }

    const convertSequence = (value: unknown): Attempt => {
      const items = sequenceItems(value)
      return items === null ? Either.left(valueError()) : convertItems(items)
    }

    return makeConverter(info, {
      kind: "tuple",
      ownName: "tuple",
      nested,
      valueKinds: ["string", "list", "tuple", "bytes", "bytearray"],
      noConversionNeeded: (value) => isTuple(value) && Array.isArray(value) && itemsReady(value),
      convertText: (value) => Either.flatMap(evaluated(value, "tuple"), convertSequence),
      convertOther: convertSequence,
      // the trailing ellipsis resolves to the unknown sentinel and is not validated
      validate: () => validateAll(homogeneous ? converters.slice(0, -1) : converters)
    })
  }
})

const mappingEntries = (value: unknown): ReadonlyArray<readonly [unknown, unknown]> | null => {
  if (value instanceof Map) {
    return [...value.entries()]
  }
  if (typeof value === "object" && value !== null && isPlainObject(value)) {
    return Object.entries(value)
  }
  return null
}

export const dictConverter: ConverterDefinition = defineConverter({
  kind: "dict",
  builtin: "dict",
  natives: [Map],
  build: (info, context) => {
    const nested = positionalNested(info, context)
    const [keyConverter, itemConverter] = nestedConverters(nested)
    const isDict = declaredInstanceCheck(info, "dict", [Map])

    const convertEntries = (entries: ReadonlyArray<readonly [unknown, unknown]>): Attempt => {
      if (keyConverter === undefined || itemConverter === undefined) {
        return Either.right(uniqueMap(entries))
      }
      const converted = convertEach(entries, ([key, item]): Either.Either<readonly [unknown, unknown], ValueError> =>
        Either.flatMap(
          Either.mapLeft(keyConverter.convert(key, null, "Key"), asDetail),
          (convertedKey) =>
            Either.map(
              Either.mapLeft(itemConverter.convert(item, formatValue(key), "Item"), asDetail),
              (convertedItem) => [convertedKey, convertedItem] as const
            )
        ))
      return Either.map(converted, (pairs) => uniqueMap(pairs))
    }

    const convertMapping = (value: unknown): Attempt => {
      const entries = mappingEntries(value)
      return entries === null ? Either.left(valueError()) : convertEntries(entries)
    }

    return makeConverter(info, {
      kind: "dict",
      ownName: "dictionary",
      nested,
      valueKinds: ["string", "dictionary", "object"],
      noConversionNeeded: (value) =>
        isDict(value) &&
        value instanceof Map &&
        (keyConverter === undefined || itemConverter === undefined ||
          [...value.entries()].every(([key, item]) =>
            keyConverter.noConversionNeeded(key) && itemConverter.noConversionNeeded(item)
          )),
      convertText: (value) => Either.flatMap(evaluated(value, "dict"), convertMapping),
      convertOther: convertMapping
    })
  }
})

const collectionItems = (value: unknown): ReadonlyArray<unknown> | null => {
  if (value instanceof Map) {
    return [...value.keys()]
  }
  if (value instanceof Set) {
    return [...value]
  }
  return sequenceItems(value)
}

const buildSetConverter = (kind: "set" | "frozenset", emptyText: string) => (info: TypeInfo, context: ConverterContext) => {
  const nested = positionalNested(info, context)
  const itemConverter = firstNested(nested)
  const isSet = declaredInstanceCheck(info, kind, [Set])

  const convertItems = (items: ReadonlyArray<unknown>): Attempt =>
    itemConverter === null
      ? Either.right(uniqueSet(items))
      : Either.map(
        convertEach(items, (item) => Either.mapLeft(itemConverter.convert(item, null, "Item"), asDetail)),
        (converted) => uniqueSet(converted)
      )

  const convertCollection = (value: unknown): Attempt => {
    const items = collectionItems(value)
    return items === null ? Either.left(valueError()) : convertItems(items)
  }

  return makeConverter(info, {
    kind,
    ownName: kind,
    nested,
    valueKinds: ["string", "list", "tuple", "set", "dictionary", "bytes", "bytearray"],
    noConversionNeeded: (value) => isSet(value) && value instanceof Set && allItemsReady(itemConverter, value),
    convertText: (value) =>
      value === emptyText ? Either.right(new Set()) : Either.flatMap(evaluated(value, "set"), convertCollection),
    convertOther: convertCollection
  })
}

export const setConverter: ConverterDefinition = defineConverter({
  kind: "set",
  builtin: "set",
  natives: [Set],
  build: buildSetConverter("set", "set()")
})

// Frozen sets are plain `Set`s at run time; only the empty spelling differs.
export const frozensetConverter: ConverterDefinition = defineConverter({
  kind: "frozenset",
  builtin: "frozenset",
  handles: () => false,
  build: buildSetConverter("frozenset", "frozenset()")
})
