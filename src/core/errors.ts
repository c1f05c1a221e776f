// CHANGE: Typed domain error ADT for include-directory discovery using Effect.Data
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * The environment strategy found no value for its variable.
 *
 * @pure true (Data class)
 * @invariant variable.length > 0
 */
export class EnvironmentVariableMissing extends Data.TaggedError(
	"EnvironmentVariableMissing",
)<{
	readonly variable: string;
}> {}

/**
 * The compiler executable could not be started.
 *
 * @pure true (Data class)
 * @invariant reason carries the OS-level failure description
 */
export class CompilerLaunchFailed extends Data.TaggedError(
	"CompilerLaunchFailed",
)<{
	readonly compiler: string;
	readonly reason: string;
}> {}

/**
 * Parsing finished without a single directory entry.
 *
 * @pure true (Data class)
 */
export class NoIncludeDirectoriesFound extends Data.TaggedError(
	"NoIncludeDirectoriesFound",
) {}

/**
 * Command line could not be interpreted.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class InvalidArguments extends Data.TaggedError("InvalidArguments")<{
	readonly detail: string;
}> {}

/**
 * Union of all application errors for Effect signatures.
 *
 * @invariant All errors extend Data.TaggedError
 */
export type AppError =
	| EnvironmentVariableMissing
	| CompilerLaunchFailed
	| NoIncludeDirectoriesFound
	| InvalidArguments;
