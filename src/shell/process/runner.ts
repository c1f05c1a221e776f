// CHANGE: Subprocess runner capability and its node:child_process implementation
// PURITY: SHELL (spawns an external process)
// EFFECT: Effect<ProcessOutput, CompilerLaunchFailed>
// INVARIANT: Resumes exactly once, after the child closed all of its streams
// INVARIANT: Exit status is reported, never interpreted as failure
// COMPLEXITY: O(n) where n = bytes written by the compiler

import { type ChildProcessByStdio, spawn } from "node:child_process";
import type { Readable } from "node:stream";
import { Effect, Either } from "effect";

import { CompilerLaunchFailed } from "../../core/errors.js";
import type { ProcessOutput } from "../../core/models.js";

/**
 * Narrow capability for running a compiler.
 *
 * Everything above this interface stays free of process handling; tests
 * substitute a scripted implementation.
 */
export interface CompilerRunner {
	readonly run: (
		compilerPath: string,
		args: readonly string[],
	) => Effect.Effect<ProcessOutput, CompilerLaunchFailed>;
}

/**
 * Decodes captured bytes as UTF-8; invalid sequences become U+FFFD.
 *
 * @pure true
 */
export function decodeOutput(chunks: readonly Buffer[]): string {
	return Buffer.concat(chunks).toString("utf8");
}

type CompilerProcess = ChildProcessByStdio<null, Readable, Readable>;

/**
 * Starts the child, turning synchronous spawn errors (empty or malformed
 * command) into the same failure as an asynchronous ENOENT.
 */
function startCompiler(
	compilerPath: string,
	args: readonly string[],
): Either.Either<CompilerProcess, CompilerLaunchFailed> {
	try {
		return Either.right(
			spawn(compilerPath, [...args], {
				stdio: ["ignore", "pipe", "pipe"],
				windowsHide: true,
			}),
		);
	} catch (error) {
		return Either.left(
			new CompilerLaunchFailed({
				compiler: compilerPath,
				reason: error instanceof Error ? error.message : String(error),
			}),
		);
	}
}

/**
 * Runs the executable directly (no shell) and captures stdout and stderr.
 *
 * stdin is the null device, so the compiler reads an empty translation unit
 * and cannot block waiting for input.
 *
 * @param compilerPath - Executable path or bare command name
 * @param args - Arguments passed verbatim
 * @returns Effect with decoded output and exit status
 *
 * @pure false - launches a process
 * @effect Effect<ProcessOutput, CompilerLaunchFailed>
 */
export function runProcess(
	compilerPath: string,
	args: readonly string[],
): Effect.Effect<ProcessOutput, CompilerLaunchFailed> {
	return Effect.async<ProcessOutput, CompilerLaunchFailed>((resume) => {
		const stdout: Buffer[] = [];
		const stderr: Buffer[] = [];
		let settled = false;
		const settle = (
			effect: Effect.Effect<ProcessOutput, CompilerLaunchFailed>,
		): void => {
			if (settled) return;
			settled = true;
			resume(effect);
		};

		const started = startCompiler(compilerPath, args);
		if (Either.isLeft(started)) {
			settle(Effect.fail(started.left));
			return;
		}
		const child = started.right;

		child.stdout.on("data", (chunk: Buffer) => {
			stdout.push(chunk);
		});
		child.stderr.on("data", (chunk: Buffer) => {
			stderr.push(chunk);
		});

		// 'error' fires instead of a normal start for ENOENT, EACCES and friends
		child.once("error", (error) => {
			settle(
				Effect.fail(
					new CompilerLaunchFailed({
						compiler: compilerPath,
						reason: error.message,
					}),
				),
			);
		});

		child.once("close", (exitCode, signal) => {
			settle(
				Effect.succeed({
					stdout: decodeOutput(stdout),
					stderr: decodeOutput(stderr),
					exitCode,
					signal,
				}),
			);
		});
	});
}

/**
 * Production runner backed by {@link runProcess}.
 */
export const nodeCompilerRunner: CompilerRunner = {
	run: runProcess,
};
