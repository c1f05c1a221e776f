// CHANGE: Map Node.js platform identifiers onto the Platform families the selector understands
// PURITY: CORE
// INVARIANT: Total function; unknown identifiers map to "other"
// COMPLEXITY: O(1)

import type { Platform } from "./models.js";

const POSIX_PLATFORMS: ReadonlySet<string> = new Set([
	"aix",
	"android",
	"cygwin",
	"darwin",
	"freebsd",
	"haiku",
	"linux",
	"netbsd",
	"openbsd",
	"sunos",
]);

/**
 * Classifies a `process.platform` value.
 *
 * @pure true
 *
 * @example
 * ```ts
 * detectPlatform("win32"); // "windows"
 * detectPlatform("darwin"); // "posix"
 * ```
 */
export function detectPlatform(nodePlatform: string): Platform {
	if (nodePlatform === "win32") return "windows";
	return POSIX_PLATFORMS.has(nodePlatform) ? "posix" : "other";
}
