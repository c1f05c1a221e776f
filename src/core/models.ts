// CHANGE: Functional Core domain models for include-directory discovery
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the CLI process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Platform family the tool runs on.
 *
 * - `windows`: win32; `INCLUDE` is the default source of directories
 * - `posix`: Unix-like systems; `/usr/bin/c++` is the default compiler
 * - `other`: anything unrecognised; the bare `c++` command is used
 */
export type Platform = "windows" | "posix" | "other";

/**
 * Name of the environment variable consulted by the environment strategy.
 */
export const INCLUDE_VARIABLE = "INCLUDE";

/**
 * Arguments that make a gcc-like compiler print its search path:
 * verbose, preprocess only, C++ mode, source from stdin.
 */
export const COMPILER_QUERY_ARGS: readonly string[] = [
	"-v",
	"-E",
	"-x",
	"c++",
	"-",
];

/**
 * Read the include list from an environment variable.
 */
export interface EnvironmentStrategy {
	readonly _tag: "Environment";
	readonly variable: string;
}

/**
 * Run a gcc-like compiler and parse its verbose stderr.
 */
export interface CompilerStrategy {
	readonly _tag: "Compiler";
	readonly compilerPath: string;
}

/**
 * Extraction strategy chosen by the selector.
 *
 * @invariant discriminated by `_tag`
 */
export type ExtractionStrategy = EnvironmentStrategy | CompilerStrategy;

/**
 * Captured result of one compiler invocation.
 *
 * @property exitCode null when the process was terminated by a signal
 * @property signal null when the process exited normally
 */
export interface ProcessOutput {
	readonly stdout: string;
	readonly stderr: string;
	readonly exitCode: number | null;
	readonly signal: string | null;
}

/**
 * Parsed command-line options.
 *
 * @property compiler Explicit compiler path; absent means platform default
 * @property verbose Trace strategy and command on stderr
 * @property help Print usage and exit
 */
export interface CLIOptions {
	readonly compiler?: string;
	readonly verbose: boolean;
	readonly help: boolean;
}
