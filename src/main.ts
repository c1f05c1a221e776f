// CHANGE: Make main.ts a thin APP delegator
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value without side effects beyond console output
// COMPLEXITY: O(1)

import { Effect } from "effect";

import { createNodeContext, runCli } from "./app/runCli.js";
import type { ExitCode } from "./core/models.js";

const FATAL: ExitCode = 1;

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @param args - Arguments without the node and script entries
 * @returns Effect<ExitCode> (0 | 1)
 *
 * @pure false (reads process state, prints results)
 * @invariant ExitCode ∈ {0,1}
 */
export function main(
	args: readonly string[] = process.argv.slice(2),
): Effect.Effect<ExitCode> {
	return runCli(args, createNodeContext());
}

/**
 * Runs {@link main} and records the outcome in `process.exitCode`.
 *
 * The process then ends on its own once stdout is flushed, so piped
 * output is never cut short.
 *
 * @pure false (sets process.exitCode)
 * @postcondition process.exitCode ∈ {0,1}
 */
export function runMain(
	args: readonly string[] = process.argv.slice(2),
): Effect.Effect<void> {
	return main(args).pipe(
		Effect.catchAllDefect((defect) =>
			Effect.sync(() => {
				console.error("Fatal error:", defect);
				return FATAL;
			}),
		),
		Effect.flatMap((code) =>
			Effect.sync(() => {
				process.exitCode = code;
			}),
		),
	);
}
