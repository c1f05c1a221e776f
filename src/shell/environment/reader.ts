// CHANGE: Environment reader for INCLUDE-style toolchains
// PURITY: SHELL (reads an injected environment map)
// EFFECT: Effect<readonly string[], EnvironmentVariableMissing>
// INVARIANT: Unset variable → failure; set variable → success, possibly empty
// COMPLEXITY: O(n) where n = |value|

import { Effect } from "effect";

import { splitIncludeVariable } from "../../core/environment.js";
import { EnvironmentVariableMissing } from "../../core/errors.js";

/**
 * Environment variables visible to the tool.
 */
export type EnvironmentMap = Readonly<Record<string, string | undefined>>;

/**
 * Reads include directories from an environment variable.
 *
 * @param env - Environment map (process.env at the entry point)
 * @param variable - Variable name, `INCLUDE` in practice
 * @returns Effect with the ordered directories
 *
 * @pure false - depends on environment contents
 * @effect Effect<readonly string[], EnvironmentVariableMissing>
 */
export function readIncludeVariable(
	env: EnvironmentMap,
	variable: string,
): Effect.Effect<readonly string[], EnvironmentVariableMissing> {
	const value = env[variable];
	return value === undefined
		? Effect.fail(new EnvironmentVariableMissing({ variable }))
		: Effect.succeed(splitIncludeVariable(value));
}
