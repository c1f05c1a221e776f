// CHANGE: Application layer composing the selector, environment reader, runner and parser
// PURITY: APP (no process.exit, no console output)
// EFFECT: Effect<readonly string[], ExtractionError>
// INVARIANT: At most one CompilerRunner.run per extraction; no partial results
// COMPLEXITY: O(n) where n = |compiler diagnostics|

import { Effect } from "effect";
import { match } from "ts-pattern";

import type {
	CompilerLaunchFailed,
	EnvironmentVariableMissing,
	NoIncludeDirectoriesFound,
} from "../core/errors.js";
import {
	COMPILER_QUERY_ARGS,
	type ExtractionStrategy,
	type Platform,
} from "../core/models.js";
import { parseIncludeDirs } from "../core/parser.js";
import { selectStrategy } from "../core/strategy.js";
import {
	type EnvironmentMap,
	readIncludeVariable,
} from "../shell/environment/reader.js";
import type { CompilerRunner } from "../shell/process/runner.js";

/**
 * Capabilities an extraction needs, injected at the entry point.
 *
 * @property platform Platform family of the running process
 * @property env Environment variables (process.env in production)
 * @property runner Subprocess capability
 */
export interface IncludeDirsContext {
	readonly platform: Platform;
	readonly env: EnvironmentMap;
	readonly runner: CompilerRunner;
}

/**
 * Failures an extraction can produce.
 */
export type ExtractionError =
	| EnvironmentVariableMissing
	| CompilerLaunchFailed
	| NoIncludeDirectoriesFound;

/**
 * Queries a gcc-like compiler and parses its stderr.
 *
 * Output is parsed whatever the exit status; stdout is discarded.
 *
 * @pure false (runs the compiler through the injected runner)
 * @effect Effect<readonly string[], CompilerLaunchFailed | NoIncludeDirectoriesFound>
 */
export function queryCompiler(
	compilerPath: string,
	runner: CompilerRunner,
): Effect.Effect<
	readonly string[],
	CompilerLaunchFailed | NoIncludeDirectoriesFound
> {
	return Effect.gen(function* () {
		const output = yield* runner.run(compilerPath, COMPILER_QUERY_ARGS);
		return yield* parseIncludeDirs(output.stderr);
	});
}

/**
 * Executes an already selected strategy.
 *
 * @effect Effect<readonly string[], ExtractionError>
 */
export function extractIncludeDirs(
	strategy: ExtractionStrategy,
	context: IncludeDirsContext,
): Effect.Effect<readonly string[], ExtractionError> {
	return match(strategy)
		.with({ _tag: "Environment" }, (s) =>
			readIncludeVariable(context.env, s.variable),
		)
		.with({ _tag: "Compiler" }, (s) =>
			queryCompiler(s.compilerPath, context.runner),
		)
		.exhaustive();
}

/**
 * Discovers the system include directories for an optional compiler.
 *
 * @param compiler - Explicit compiler path; undefined selects the platform default
 * @param context - Injected platform, environment and runner
 * @returns Effect with the ordered directory list
 *
 * @pure false (coordinates effects)
 * @invariant compiler strategy success → result.length > 0
 *
 * @example
 * ```ts
 * const dirs = await Effect.runPromise(
 *   getIncludeDirs("/usr/bin/clang++", {
 *     platform: "posix",
 *     env: process.env,
 *     runner: nodeCompilerRunner,
 *   }),
 * );
 * ```
 */
export function getIncludeDirs(
	compiler: string | undefined,
	context: IncludeDirsContext,
): Effect.Effect<readonly string[], ExtractionError> {
	return extractIncludeDirs(
		selectStrategy(context.platform, compiler),
		context,
	);
}
