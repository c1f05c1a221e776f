import { describe, expect, it } from "vitest";

import { detectPlatform } from "../../src/core/platform.js";

describe("detectPlatform", () => {
	it("maps win32 to windows", () => {
		expect(detectPlatform("win32")).toBe("windows");
	});

	it("maps Unix-like platforms to posix", () => {
		for (const id of ["linux", "darwin", "freebsd", "openbsd", "sunos", "aix"]) {
			expect(detectPlatform(id)).toBe("posix");
		}
	});

	it("maps unknown identifiers to other", () => {
		expect(detectPlatform("plan9")).toBe("other");
		expect(detectPlatform("")).toBe("other");
	});
});
