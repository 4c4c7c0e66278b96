import * as path from "node:path";

import { Either } from "effect";
import { describe, expect, it } from "vitest";

import { InvalidKeyError } from "../models/errors";
import { keyFromPath, resolveKey } from "./keys";

const ROOT = path.resolve("/srv/bucket");

function isDescendant(root: string, candidate: string): boolean {
	const relative = path.relative(root, candidate);
	return (
		relative !== "" &&
		!relative.startsWith("..") &&
		!path.isAbsolute(relative)
	);
}

describe("resolveKey", () => {
	it.each([
		["a.txt", "a.txt"],
		["photos/2024/cat.png", "photos/2024/cat.png"],
		["nested\\windows\\style.txt", "nested/windows/style.txt"],
		["trailing/", "trailing"],
		["dots.in..name", "dots.in..name"],
	])("should resolve %s under the root", (key, relative) => {
		const result = resolveKey(ROOT, key);

		expect(Either.isRight(result)).toBe(true);
		if (Either.isRight(result)) {
			expect(result.right).toBe(path.join(ROOT, ...relative.split("/")));
			expect(isDescendant(ROOT, result.right)).toBe(true);
		}
	});

	it.each([
		"",
		"/",
		"..",
		"../secret",
		"a/../../secret",
		"a/./b",
		"./a",
		"/etc/passwd",
		"a//b",
		"C:/windows",
		"a/C:evil",
		"nul\0byte",
	])("should reject %j", (key) => {
		const result = resolveKey(ROOT, key);

		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left).toBeInstanceOf(InvalidKeyError);
			expect(result.left.key).toBe(key);
		}
	});
});

describe("keyFromPath", () => {
	it("should produce slash-separated keys relative to the root", () => {
		expect(keyFromPath(ROOT, path.join(ROOT, "a", "c", "d.txt"))).toBe(
			"a/c/d.txt",
		);
	});
});
