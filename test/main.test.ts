// CHANGE: Specs for the process entry point (exit status without process.exit)
// PURITY: SHELL - mutates process.exitCode, restored after each test
// INVARIANT: runMain never terminates the process; it only assigns process.exitCode

import { Effect } from "effect";
import { afterEach, describe, expect, it, type MockInstance, vi } from "vitest";

import { USAGE } from "../src/core/report.js";
import { runMain } from "../src/main.js";

describe("runMain", () => {
	const savedExitCode = process.exitCode;

	const setupSpies = (): { log: MockInstance; err: MockInstance } => {
		const log = vi.spyOn(console, "log").mockImplementation(() => {
			// sink
		});
		const err = vi.spyOn(console, "error").mockImplementation(() => {
			// sink
		});
		return { log, err };
	};

	afterEach((): void => {
		process.exitCode = savedExitCode;
		vi.restoreAllMocks();
	});

	it("sets exit code 0 for --help and leaves the process running", () => {
		const { log } = setupSpies();
		const exit = vi.spyOn(process, "exit");

		return Effect.runPromise(
			Effect.gen(function* () {
				yield* runMain(["--help"]);

				expect(process.exitCode).toBe(0);
				expect(exit).not.toHaveBeenCalled();
				expect(log).toHaveBeenCalledTimes(USAGE.length);
			}),
		);
	});

	it("sets exit code 1 for invalid arguments", () => {
		const { err } = setupSpies();

		return Effect.runPromise(
			Effect.gen(function* () {
				yield* runMain(["--bogus"]);

				expect(process.exitCode).toBe(1);
				expect(err).toHaveBeenCalledWith(
					"Error: unexpected argument '--bogus' found",
				);
			}),
		);
	});
});
