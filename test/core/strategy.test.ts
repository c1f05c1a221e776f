// CHANGE: Unit tests for the strategy selector across every platform family
// PURITY: CORE
// INVARIANT: Platform is passed explicitly, so one run covers windows, posix and other

import { describe, expect, it } from "vitest";

import type { ExtractionStrategy } from "../../src/core/models.js";
import {
	isMsvcLikeCompiler,
	resolveCompilerPath,
	selectStrategy,
} from "../../src/core/strategy.js";

const environment: ExtractionStrategy = {
	_tag: "Environment",
	variable: "INCLUDE",
};

const compiler = (compilerPath: string): ExtractionStrategy => ({
	_tag: "Compiler",
	compilerPath,
});

describe("selectStrategy: defaults", () => {
	it("reads INCLUDE on Windows without a compiler", () => {
		expect(selectStrategy("windows", undefined)).toEqual(environment);
	});

	it("queries /usr/bin/c++ on POSIX without a compiler", () => {
		expect(selectStrategy("posix", undefined)).toEqual(
			compiler("/usr/bin/c++"),
		);
	});

	it("queries bare c++ on other platforms without a compiler", () => {
		expect(selectStrategy("other", undefined)).toEqual(compiler("c++"));
	});
});

describe("selectStrategy: explicit compiler", () => {
	it("uses the supplied compiler on POSIX", () => {
		expect(selectStrategy("posix", "/opt/llvm/bin/clang++")).toEqual(
			compiler("/opt/llvm/bin/clang++"),
		);
	});

	it("queries a gcc-like compiler on Windows", () => {
		expect(selectStrategy("windows", "C:\\msys64\\mingw64\\bin\\g++.exe")).toEqual(
			compiler("C:\\msys64\\mingw64\\bin\\g++.exe"),
		);
	});

	it("falls back to INCLUDE for MSVC-like compilers on Windows", () => {
		expect(selectStrategy("windows", "cl")).toEqual(environment);
		expect(selectStrategy("windows", "cl.exe")).toEqual(environment);
		expect(
			selectStrategy("windows", "C:\\VS\\VC\\Tools\\bin\\Hostx64\\x64\\cl.exe"),
		).toEqual(environment);
		expect(selectStrategy("windows", "C:/LLVM/bin/clang-cl.exe")).toEqual(
			environment,
		);
	});

	it("treats the MSVC pattern as case-sensitive", () => {
		expect(selectStrategy("windows", "C:\\VS\\CL.EXE")).toEqual(
			compiler("C:\\VS\\CL.EXE"),
		);
	});

	it("applies the MSVC check only on Windows", () => {
		expect(selectStrategy("posix", "/opt/wine/cl.exe")).toEqual(
			compiler("/opt/wine/cl.exe"),
		);
		expect(selectStrategy("other", "cl")).toEqual(compiler("cl"));
	});

	it("matches the file name, not a directory named cl", () => {
		expect(selectStrategy("windows", "C:\\cl\\bin\\g++")).toEqual(
			compiler("C:\\cl\\bin\\g++"),
		);
	});
});

describe("isMsvcLikeCompiler", () => {
	it("recognises cl, cl.exe, clang-cl and clang-cl.exe", () => {
		expect(isMsvcLikeCompiler("cl")).toBe(true);
		expect(isMsvcLikeCompiler("cl.exe")).toBe(true);
		expect(isMsvcLikeCompiler("/usr/bin/clang-cl")).toBe(true);
		expect(isMsvcLikeCompiler("C:\\LLVM\\bin\\clang-cl.exe")).toBe(true);
	});

	it("rejects gcc-like compilers", () => {
		expect(isMsvcLikeCompiler("/usr/bin/clang++")).toBe(false);
		expect(isMsvcLikeCompiler("g++.exe")).toBe(false);
		expect(isMsvcLikeCompiler("cl.exe.bak")).toBe(false);
	});
});

describe("resolveCompilerPath", () => {
	it("keeps an explicit compiler on every platform", () => {
		expect(resolveCompilerPath("posix", "/x/cc")).toBe("/x/cc");
		expect(resolveCompilerPath("windows", "/x/cc")).toBe("/x/cc");
		expect(resolveCompilerPath("other", "/x/cc")).toBe("/x/cc");
	});

	it("picks the platform default when absent", () => {
		expect(resolveCompilerPath("posix", undefined)).toBe("/usr/bin/c++");
		expect(resolveCompilerPath("windows", undefined)).toBe("c++");
		expect(resolveCompilerPath("other", undefined)).toBe("c++");
	});
});
