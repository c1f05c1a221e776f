// CHANGE: CLI argument parsing for get-system-include-dirs
// PURITY: SHELL (defaults to process.argv)
// INVARIANT: Returns options or InvalidArguments; never exits the process
// COMPLEXITY: O(n) where n = |args|

import { Either } from "effect";

import { InvalidArguments } from "../../core/errors.js";
import type { CLIOptions } from "../../core/models.js";

type MutableOptions = {
	compiler: string | undefined;
	verbose: boolean;
	help: boolean;
};

interface ArgStep {
	readonly state: MutableOptions;
	readonly skipNext: boolean;
}

type FlagHandler = (
	state: MutableOptions,
	next: string | undefined,
) => Either.Either<ArgStep, InvalidArguments>;

function compilerValue(
	flag: string,
	value: string | undefined,
): Either.Either<string, InvalidArguments> {
	if (value === undefined || value.length === 0) {
		return Either.left(
			new InvalidArguments({
				detail: `a value is required for '${flag} <COMPILER>' but none was supplied`,
			}),
		);
	}
	return Either.right(value);
}

// A following argument that looks like a flag is never consumed as a value;
// "-" alone is a value.
const looksLikeFlag = (value: string): boolean =>
	value.length > 1 && value.startsWith("-");

const takeCompiler =
	(flag: string): FlagHandler =>
	(state, next) =>
		Either.map(
			compilerValue(
				flag,
				next !== undefined && looksLikeFlag(next) ? undefined : next,
			),
			(compiler) => ({ state: { ...state, compiler }, skipNext: true }),
		);

interface AttachedValue {
	readonly flag: string;
	readonly value: string;
}

/**
 * Splits `--compiler=<path>`, `-c<path>` and `-c=<path>` into flag and value.
 */
function attachedCompilerValue(arg: string): AttachedValue | undefined {
	if (arg.startsWith("--compiler=")) {
		return { flag: "--compiler", value: arg.slice("--compiler=".length) };
	}
	if (arg.startsWith("-c")) {
		const rest = arg.slice("-c".length);
		return { flag: "-c", value: rest.startsWith("=") ? rest.slice(1) : rest };
	}
	return undefined;
}

const showHelp: FlagHandler = (state) =>
	Either.right({ state: { ...state, help: true }, skipNext: false });

const flagHandlers: ReadonlyMap<string, FlagHandler> = new Map<
	string,
	FlagHandler
>([
	["-c", takeCompiler("-c")],
	["--compiler", takeCompiler("--compiler")],
	[
		"--verbose",
		(state) =>
			Either.right({ state: { ...state, verbose: true }, skipNext: false }),
	],
	["-h", showHelp],
	["--help", showHelp],
]);

function processArgument(
	arg: string,
	next: string | undefined,
	state: MutableOptions,
): Either.Either<ArgStep, InvalidArguments> {
	const handler = flagHandlers.get(arg);
	if (handler !== undefined) return handler(state, next);

	const attached = attachedCompilerValue(arg);
	if (attached !== undefined) {
		return Either.map(
			compilerValue(attached.flag, attached.value),
			(compiler) => ({ state: { ...state, compiler }, skipNext: false }),
		);
	}

	const detail = arg.startsWith("-")
		? `unexpected argument '${arg}' found`
		: `unexpected positional argument '${arg}' found`;
	return Either.left(new InvalidArguments({ detail }));
}

/**
 * Parses command-line arguments.
 *
 * @param args - Arguments without the node and script entries
 * @returns Right(options) or Left(InvalidArguments)
 *
 * @example
 * ```ts
 * parseCLIArgs(["--compiler", "/usr/bin/clang++"]);
 * // Right({ compiler: "/usr/bin/clang++", verbose: false, help: false })
 * ```
 */
export function parseCLIArgs(
	args: readonly string[] = process.argv.slice(2),
): Either.Either<CLIOptions, InvalidArguments> {
	let state: MutableOptions = {
		compiler: undefined,
		verbose: false,
		help: false,
	};

	for (let i = 0; i < args.length; i++) {
		const arg: string = args.at(i) ?? "";
		const step = processArgument(arg, args.at(i + 1), state);
		if (Either.isLeft(step)) return Either.left(step.left);
		state = step.right.state;
		if (step.right.skipNext) i++;
	}

	// exactOptionalPropertyTypes: an absent compiler is an absent key
	const { compiler, ...rest } = state;
	return Either.right(compiler === undefined ? rest : { ...rest, compiler });
}
