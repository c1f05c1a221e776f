// CHANGE: Pure half of the environment reader: split and normalize an INCLUDE-style value
// PURITY: CORE
// INVARIANT: Order of non-empty segments is preserved; duplicates are kept
// COMPLEXITY: O(n) where n = |value|

import { normalizeSeparators } from "./paths.js";

/**
 * Separator used by Windows-style include path variables.
 */
export const INCLUDE_SEPARATOR = ";";

/**
 * Splits an `INCLUDE` value into directories.
 *
 * Empty segments are dropped. A value made only of separators yields an
 * empty list, which is not treated as a failure.
 *
 * @pure true
 * @postcondition ∀d ∈ result: d.length > 0 ∧ !d.includes("\\")
 *
 * @example
 * ```ts
 * splitIncludeVariable("C:\\foo;;C:\\bar\\baz"); // ["C:/foo", "C:/bar/baz"]
 * ```
 */
export function splitIncludeVariable(value: string): readonly string[] {
	return value
		.split(INCLUDE_SEPARATOR)
		.filter((segment) => segment.length > 0)
		.map(normalizeSeparators);
}
