// CHANGE: Output parser for gcc-like verbose preprocessor diagnostics
// FORMAT THEOREM: ∀text: parseIncludeDirs(text) = Right(dirs) → dirs.length > 0 ∧ dirs ⊆ lines between markers (in order)
// PURITY: CORE
// INVARIANT: Never returns an empty success; no sorting, no deduplication
// COMPLEXITY: O(n) where n = |text|

import { Either } from "effect";

import { NoIncludeDirectoriesFound } from "./errors.js";
import { normalizeSeparators } from "./paths.js";

/**
 * Line that opens the system include section in `-v` output.
 */
export const SEARCH_START_MARKER = "#include <...> search starts here:";

/**
 * Line that closes the include section.
 */
export const SEARCH_END_MARKER = "End of search list.";

// Only the last parenthesized group is an annotation; "(x86)" inside a path is kept.
const TRAILING_ANNOTATION = /\s*\([^()]*\)$/u;

type ScanState = "Outside" | "InsideSearchSection";

/**
 * Strips a trailing annotation such as `(framework directory)` and
 * normalizes separators.
 *
 * @param line - Already trimmed, non-empty line from the search section
 * @returns Cleaned directory, or null when nothing is left after stripping
 *
 * @pure true
 *
 * @example
 * ```ts
 * cleanDirectoryEntry("/System/Library/Frameworks (framework directory)");
 * // "/System/Library/Frameworks"
 * ```
 */
export function cleanDirectoryEntry(line: string): string | null {
	const path = line.replace(TRAILING_ANNOTATION, "").trim();
	return path.length === 0 ? null : normalizeSeparators(path);
}

/**
 * Extracts the ordered include directory list from compiler diagnostics.
 *
 * Scanning starts after {@link SEARCH_START_MARKER} and stops at the first
 * line containing {@link SEARCH_END_MARKER}, wherever it appears.
 *
 * @param compilerOutput - Decoded stderr of `<compiler> -v -E -x c++ -`
 * @returns Right with at least one directory, or Left(NoIncludeDirectoriesFound)
 *
 * @pure true
 * @invariant Lines outside the section never contribute
 * @complexity O(n)
 *
 * @example
 * ```ts
 * const result = parseIncludeDirs([
 *   "#include <...> search starts here:",
 *   " /usr/include",
 *   " /usr/local/include (framework directory)",
 *   "End of search list.",
 * ].join("\n"));
 * // Either.right(["/usr/include", "/usr/local/include"])
 * ```
 */
export function parseIncludeDirs(
	compilerOutput: string,
): Either.Either<readonly string[], NoIncludeDirectoriesFound> {
	const dirs: string[] = [];
	let state: ScanState = "Outside";

	for (const rawLine of compilerOutput.split(/\r?\n/u)) {
		const line = rawLine.trim();

		if (line.includes(SEARCH_START_MARKER)) {
			state = "InsideSearchSection";
			continue;
		}
		if (line.includes(SEARCH_END_MARKER)) break;
		if (state === "Outside" || line.length === 0) continue;

		const entry = cleanDirectoryEntry(line);
		if (entry !== null) dirs.push(entry);
	}

	return dirs.length === 0
		? Either.left(new NoIncludeDirectoriesFound())
		: Either.right(dirs);
}
