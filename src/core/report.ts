// CHANGE: Pure rendering of results, errors and usage into output lines
// PURITY: CORE
// INVARIANT: Every AppError variant maps to exactly one message (exhaustive match)
// COMPLEXITY: O(n) where n = |dirs|

import { match } from "ts-pattern";

import type { AppError } from "./errors.js";
import { COMPILER_QUERY_ARGS, type ExtractionStrategy } from "./models.js";

/**
 * Human-readable description of an application error.
 *
 * @pure true
 *
 * @example
 * ```ts
 * describeError(new EnvironmentVariableMissing({ variable: "INCLUDE" }));
 * // "INCLUDE environment variable not set"
 * ```
 */
export function describeError(error: AppError): string {
	return match(error)
		.with(
			{ _tag: "EnvironmentVariableMissing" },
			(e) => `${e.variable} environment variable not set`,
		)
		.with(
			{ _tag: "CompilerLaunchFailed" },
			(e) => `Failed to execute compiler: ${e.reason}`,
		)
		.with(
			{ _tag: "NoIncludeDirectoriesFound" },
			() => "No include directories found in compiler output",
		)
		.with({ _tag: "InvalidArguments" }, (e) => e.detail)
		.exhaustive();
}

/**
 * Single diagnostic line printed on failure.
 *
 * @pure true
 * @postcondition result.startsWith("Error: ")
 */
export function formatErrorLine(error: AppError): string {
	return `Error: ${describeError(error)}`;
}

/**
 * Printable command line used for `--verbose` traces.
 *
 * @pure true
 */
export function formatCompilerCommand(compilerPath: string): string {
	const quoted = compilerPath.includes(" ")
		? `"${compilerPath}"`
		: compilerPath;
	return [quoted, ...COMPILER_QUERY_ARGS].join(" ");
}

/**
 * Trace lines describing the chosen strategy.
 *
 * @pure true
 */
export function describeStrategy(
	strategy: ExtractionStrategy,
): readonly string[] {
	return match(strategy)
		.with({ _tag: "Environment" }, (s) => [
			`↳ Strategy: environment variable ${s.variable}`,
		])
		.with({ _tag: "Compiler" }, (s) => [
			`↳ Strategy: query compiler ${s.compilerPath}`,
			`↳ Command: ${formatCompilerCommand(s.compilerPath)}`,
		])
		.exhaustive();
}

/**
 * Usage text printed for `--help`.
 */
export const USAGE: readonly string[] = [
	"Extract system include directories from C++ compiler",
	"",
	"Usage: get-system-include-dirs [OPTIONS]",
	"",
	"Options:",
	"  -c, --compiler <COMPILER>  Path to the C++ compiler to query",
	"      --verbose              Print the chosen strategy and command to stderr",
	"  -h, --help                 Print help",
];
