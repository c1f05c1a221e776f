// CHANGE: Textual path helpers shared by the parser, the environment reader and the selector
// PURITY: CORE
// INVARIANT: No filesystem access; operates on strings only
// COMPLEXITY: O(n) where n = |path|

/**
 * Replaces every backslash with a forward slash.
 *
 * @pure true
 * @invariant normalizeSeparators(normalizeSeparators(p)) = normalizeSeparators(p)
 * @postcondition result contains no "\\"
 *
 * @example
 * ```ts
 * normalizeSeparators("C:\\bar\\baz"); // "C:/bar/baz"
 * ```
 */
export function normalizeSeparators(value: string): string {
	return value.replace(/\\/gu, "/");
}

/**
 * Last segment of a path, treating both "/" and "\\" as separators.
 *
 * @pure true
 * @postcondition result contains neither "/" nor "\\"
 */
export function fileNameOf(value: string): string {
	const segments = normalizeSeparators(value).split("/");
	return segments.at(-1) ?? "";
}
