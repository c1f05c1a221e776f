#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - exit status is set once, the process drains and ends by itself
// FORMAT THEOREM: ∀run: process.exitCode ∈ {0,1} is assigned exactly once at shell boundary
// PURITY: SHELL (BIN layer)
// INVARIANT: No process.exit anywhere; stdout is flushed before the process ends
// COMPLEXITY: O(1) time/space (delegates to APP)

import { Effect } from "effect";

import { runMain } from "../main.js";

/**
 * CLI entry point for get-system-include-dirs.
 *
 * @remarks
 * - @pure false (console I/O, process.exitCode)
 * - @postcondition process ends with ExitCode ∈ {0,1}
 */
void Effect.runPromise(runMain()).catch((error: Error) => {
	console.error("Fatal error:", error);
	process.exitCode = 1;
});
