// CHANGE: introduce branded values for converted results without unsafe casts at call sites
// FORMAT THEOREM: forall x in Domain: brand(x) -> preserves(value(x))
// PURITY: CORE
// INVARIANT: brands are only created in this axiomatic module
// COMPLEXITY: O(1)/O(1)
export type Brand<T, Name extends string> = T & { readonly __brand: Name }

export type FilePath = Brand<string, "FilePath">

// CHANGE: provide the constructor for normalized file system paths
// FORMAT THEOREM: forall s in String: FilePath(s) = s
// PURITY: CORE
// INVARIANT: branding does not change runtime representation
// COMPLEXITY: O(1)/O(1)
export const FilePath = (value: string): FilePath => value as FilePath
