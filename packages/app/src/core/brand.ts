// CHANGE: introduce branded values to keep identifiers distinct from plain strings without unsafe casts
// WHY: an identifier is only ever produced by the encoder or by a successful checksum verification
// QUOTE(TZ): "generate all valid PESEL numbers for a range of years"
// REF: user-2026-10-18-pesel-range
// SOURCE: n/a
// FORMAT THEOREM: forall x in Domain: brand(x) -> preserves(value(x))
// PURITY: CORE
// INVARIANT: brands are only created in this axiomatic module
// COMPLEXITY: O(1)/O(1)
export type Brand<T, Name extends string> = T & { readonly __brand: Name }

export type PeselNumber = Brand<string, "PeselNumber">
export type LocalDateString = Brand<string, "LocalDateString">

// CHANGE: provide constructors for PESEL identifiers
// WHY: mark 11-digit strings that passed through the encoder or the verifier
// QUOTE(TZ): "exactly 11 ASCII digits"
// REF: user-2026-10-18-pesel-range
// SOURCE: n/a
// FORMAT THEOREM: forall s in String: PeselNumber(s) = s
// PURITY: CORE
// INVARIANT: branding does not change runtime representation
// COMPLEXITY: O(1)/O(1)
export const PeselNumber = (value: string): PeselNumber => value as PeselNumber

// CHANGE: provide constructors for local date strings
// WHY: keep YYYY-MM-DD renderings apart from arbitrary text in logs and output
// QUOTE(TZ): n/a
// REF: user-2026-10-18-pesel-range
// SOURCE: n/a
// FORMAT THEOREM: forall s in String: LocalDateString(s) = s
// PURITY: CORE
// INVARIANT: local date string stays unchanged
// COMPLEXITY: O(1)/O(1)
export const LocalDateString = (value: string): LocalDateString => value as LocalDateString
