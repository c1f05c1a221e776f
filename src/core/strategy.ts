// CHANGE: Pure strategy selector (platform × optional compiler → extraction strategy)
// FORMAT THEOREM: ∀p, c: selectStrategy(p, c)._tag = "Environment" ↔ p = "windows" ∧ (c = ∅ ∨ isMsvcLikeCompiler(resolve(p, c)))
// PURITY: CORE
// INVARIANT: Platform is an explicit argument, never read from the running process
// COMPLEXITY: O(|compiler|)

import {
	type ExtractionStrategy,
	INCLUDE_VARIABLE,
	type Platform,
} from "./models.js";
import { fileNameOf } from "./paths.js";

/**
 * Default compiler on POSIX-family systems.
 */
export const POSIX_DEFAULT_COMPILER = "/usr/bin/c++";

/**
 * Default compiler elsewhere, resolved through PATH by the runner.
 */
export const FALLBACK_DEFAULT_COMPILER = "c++";

const MSVC_FILE_NAME = /cl(?:\.exe)?$/u;

/**
 * Checks whether a compiler file name looks like MSVC (`cl`, `cl.exe`,
 * `clang-cl`, `clang-cl.exe`). Case-sensitive.
 *
 * @pure true
 */
export function isMsvcLikeCompiler(compilerPath: string): boolean {
	return MSVC_FILE_NAME.test(fileNameOf(compilerPath));
}

/**
 * Resolves the compiler to invoke when the caller supplied none.
 *
 * @pure true
 * @postcondition compiler !== undefined → result = compiler
 */
export function resolveCompilerPath(
	platform: Platform,
	compiler: string | undefined,
): string {
	if (compiler !== undefined) return compiler;
	return platform === "posix"
		? POSIX_DEFAULT_COMPILER
		: FALLBACK_DEFAULT_COMPILER;
}

/**
 * Decides how include directories are obtained.
 *
 * Windows without an explicit compiler, or with an MSVC-like one, reads
 * `INCLUDE`; every other combination queries a gcc-like compiler.
 *
 * @param platform - Platform family of the running process
 * @param compiler - Explicit compiler path, if any
 *
 * @pure true
 * @complexity O(|compiler|)
 *
 * @example
 * ```ts
 * selectStrategy("posix", undefined);
 * // { _tag: "Compiler", compilerPath: "/usr/bin/c++" }
 * selectStrategy("windows", "C:\\VC\\bin\\cl.exe");
 * // { _tag: "Environment", variable: "INCLUDE" }
 * ```
 */
export function selectStrategy(
	platform: Platform,
	compiler: string | undefined,
): ExtractionStrategy {
	const environment: ExtractionStrategy = {
		_tag: "Environment",
		variable: INCLUDE_VARIABLE,
	};
	if (platform === "windows" && compiler === undefined) return environment;

	const compilerPath = resolveCompilerPath(platform, compiler);
	if (platform === "windows" && isMsvcLikeCompiler(compilerPath)) {
		return environment;
	}
	return { _tag: "Compiler", compilerPath };
}
