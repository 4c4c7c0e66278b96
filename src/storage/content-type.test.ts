import { describe, expect, it } from "vitest";

import { contentDisposition, contentTypeFor, fileName } from "./content-type";

describe("contentTypeFor", () => {
	it.each([
		["cat.png", "image/png"],
		["a/b/photo.PNG", "image/png"],
		["photos/CAT.JPG", "image/jpeg"],
		["notes.txt", "text/plain; charset=utf-8"],
		["data.json", "application/json"],
		["archive.tar.gz", "application/octet-stream"],
		["Makefile", "application/octet-stream"],
		[".hidden", "application/octet-stream"],
		["trailing.", "application/octet-stream"],
		["constructor.toString", "application/octet-stream"],
		["notes/readme.txt/", "text/plain; charset=utf-8"],
	])("should map %j to %j", (key, expected) => {
		expect(contentTypeFor(key)).toBe(expected);
	});
});

describe("fileName", () => {
	it.each([
		["a/b/c.bin", "c.bin"],
		["dir/", "dir"],
		["a\\b.txt", "b.txt"],
		["", "file"],
	])("should name %j as %j", (key, expected) => {
		expect(fileName(key)).toBe(expected);
	});
});

describe("contentDisposition", () => {
	it("should use the last key segment as the filename", () => {
		expect(contentDisposition("a/b/report.pdf", true)).toBe(
			'attachment; filename="report.pdf"',
		);
		expect(contentDisposition("cat.png", false)).toBe('inline; filename="cat.png"');
	});

	it("should ignore a trailing separator", () => {
		expect(contentDisposition("dir/", true)).toBe('attachment; filename="dir"');
	});

	it("should escape quotes in the filename", () => {
		expect(contentDisposition('say "hi".txt', true)).toBe(
			'attachment; filename="say \\"hi\\".txt"',
		);
	});
});
