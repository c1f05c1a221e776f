// CHANGE: Public API entry point for library consumers
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces or APP compositions
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATION (Programmatic Entry Points)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Include-directory discovery as an Effect.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { createNodeContext, getIncludeDirs } from "get-system-include-dirs";
 *
 * const dirs = await Effect.runPromise(
 *   getIncludeDirs("/usr/bin/g++", createNodeContext()),
 * );
 * ```
 */
export {
	type ExtractionError,
	extractIncludeDirs,
	getIncludeDirs,
	type IncludeDirsContext,
	queryCompiler,
} from "./app/getIncludeDirs.js";
export { createNodeContext, runCli } from "./app/runCli.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES AND ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export {
	type AppError,
	CompilerLaunchFailed,
	EnvironmentVariableMissing,
	InvalidArguments,
	NoIncludeDirectoriesFound,
} from "./core/errors.js";
export {
	type CLIOptions,
	COMPILER_QUERY_ARGS,
	type CompilerStrategy,
	type EnvironmentStrategy,
	type ExitCode,
	type ExtractionStrategy,
	INCLUDE_VARIABLE,
	type Platform,
	type ProcessOutput,
} from "./core/models.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE PURE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export { splitIncludeVariable } from "./core/environment.js";
export {
	cleanDirectoryEntry,
	parseIncludeDirs,
	SEARCH_END_MARKER,
	SEARCH_START_MARKER,
} from "./core/parser.js";
export { normalizeSeparators } from "./core/paths.js";
export { detectPlatform } from "./core/platform.js";
export { describeError, formatErrorLine } from "./core/report.js";
export {
	isMsvcLikeCompiler,
	resolveCompilerPath,
	selectStrategy,
} from "./core/strategy.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL CAPABILITIES
// ═══════════════════════════════════════════════════════════════════════════════

export {
	type EnvironmentMap,
	readIncludeVariable,
} from "./shell/environment/reader.js";
export {
	type CompilerRunner,
	nodeCompilerRunner,
	runProcess,
} from "./shell/process/runner.js";
