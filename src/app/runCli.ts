// CHANGE: CLI orchestration returning ExitCode as a value
// PURITY: APP (console output only; no process.exit)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: stdout receives either the full directory list or nothing
// INVARIANT: Exactly one "Error: ..." line on failure
// COMPLEXITY: O(n) where n = |dirs|

import { Effect, Either } from "effect";

import type { AppError } from "../core/errors.js";
import type { ExitCode } from "../core/models.js";
import { detectPlatform } from "../core/platform.js";
import { describeStrategy, formatErrorLine, USAGE } from "../core/report.js";
import { selectStrategy } from "../core/strategy.js";
import { parseCLIArgs } from "../shell/config/cli.js";
import { nodeCompilerRunner } from "../shell/process/runner.js";
import { extractIncludeDirs, type IncludeDirsContext } from "./getIncludeDirs.js";

const SUCCESS: ExitCode = 0;
const FAILURE: ExitCode = 1;

/**
 * Context wired to the running Node.js process.
 *
 * @pure false (reads process.platform and process.env)
 */
export function createNodeContext(): IncludeDirsContext {
	return {
		platform: detectPlatform(process.platform),
		env: process.env,
		runner: nodeCompilerRunner,
	};
}

function reportFailure(error: AppError): ExitCode {
	console.error(formatErrorLine(error));
	return FAILURE;
}

/**
 * Parses arguments, extracts directories and prints the outcome.
 *
 * @param args - Arguments without the node and script entries
 * @param context - Injected platform, environment and runner
 * @returns Effect<ExitCode, never>; 0 on success or help, 1 on any failure
 *
 * @pure false (console output)
 * @postcondition result = 0 ↔ help ∨ every directory was printed
 */
export function runCli(
	args: readonly string[],
	context: IncludeDirsContext,
): Effect.Effect<ExitCode> {
	return Effect.gen(function* () {
		const parsed = parseCLIArgs(args);
		if (Either.isLeft(parsed)) return reportFailure(parsed.left);
		const options = parsed.right;

		if (options.help) {
			for (const line of USAGE) console.log(line);
			return SUCCESS;
		}

		const strategy = selectStrategy(context.platform, options.compiler);
		if (options.verbose) {
			for (const line of describeStrategy(strategy)) console.error(line);
		}

		const result = yield* Effect.either(extractIncludeDirs(strategy, context));
		if (Either.isLeft(result)) return reportFailure(result.left);

		for (const dir of result.right) console.log(dir);
		return SUCCESS;
	});
}
