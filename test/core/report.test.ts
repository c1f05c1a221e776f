import { describe, expect, it } from "vitest";

import {
	CompilerLaunchFailed,
	EnvironmentVariableMissing,
	InvalidArguments,
	NoIncludeDirectoriesFound,
} from "../../src/core/errors.js";
import {
	describeError,
	describeStrategy,
	formatCompilerCommand,
	formatErrorLine,
	USAGE,
} from "../../src/core/report.js";

describe("describeError", () => {
	it("renders every error variant", () => {
		expect(
			describeError(new EnvironmentVariableMissing({ variable: "INCLUDE" })),
		).toBe("INCLUDE environment variable not set");
		expect(
			describeError(
				new CompilerLaunchFailed({
					compiler: "/missing/c++",
					reason: "spawn /missing/c++ ENOENT",
				}),
			),
		).toBe("Failed to execute compiler: spawn /missing/c++ ENOENT");
		expect(describeError(new NoIncludeDirectoriesFound())).toBe(
			"No include directories found in compiler output",
		);
		expect(
			describeError(new InvalidArguments({ detail: "unexpected argument '-x' found" })),
		).toBe("unexpected argument '-x' found");
	});
});

describe("formatErrorLine", () => {
	it("prefixes the message with Error:", () => {
		expect(formatErrorLine(new NoIncludeDirectoriesFound())).toBe(
			"Error: No include directories found in compiler output",
		);
	});
});

describe("formatCompilerCommand", () => {
	it("appends the query arguments", () => {
		expect(formatCompilerCommand("/usr/bin/c++")).toBe(
			"/usr/bin/c++ -v -E -x c++ -",
		);
	});

	it("quotes a compiler path containing spaces", () => {
		expect(formatCompilerCommand("C:\\Program Files\\LLVM\\bin\\clang++.exe")).toBe(
			'"C:\\Program Files\\LLVM\\bin\\clang++.exe" -v -E -x c++ -',
		);
	});
});

describe("describeStrategy", () => {
	it("names the variable for the environment strategy", () => {
		expect(describeStrategy({ _tag: "Environment", variable: "INCLUDE" })).toEqual([
			"↳ Strategy: environment variable INCLUDE",
		]);
	});

	it("names the compiler and command for the compiler strategy", () => {
		expect(
			describeStrategy({ _tag: "Compiler", compilerPath: "/usr/bin/c++" }),
		).toEqual([
			"↳ Strategy: query compiler /usr/bin/c++",
			"↳ Command: /usr/bin/c++ -v -E -x c++ -",
		]);
	});
});

describe("USAGE", () => {
	it("documents the compiler option", () => {
		expect(USAGE).toContain(
			"  -c, --compiler <COMPILER>  Path to the C++ compiler to query",
		);
	});
});
