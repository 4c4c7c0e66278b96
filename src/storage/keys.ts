// src/storage/keys.ts
/**
 * Mapping between client-supplied object keys and paths under the store root.
 *
 * Keys are flat strings that may contain `/` (or `\`) separated segments:
 * - photos/2024/cat.png  -> {root}/photos/2024/cat.png
 *
 * Only segments are validated. A symlink that already exists inside the root
 * can still point outside of it; resolution does not follow links.
 */

import * as path from "node:path";

import { Either } from "effect";

import { InvalidKeyError } from "../models/errors";

const SEPARATOR = /[/\\]/;

/** Windows drive marker such as `C:` at the start of a segment */
const DRIVE_MARKER = /^[A-Za-z]:/;

function isNormalSegment(segment: string): boolean {
	return (
		segment.length > 0 &&
		segment !== "." &&
		segment !== ".." &&
		!DRIVE_MARKER.test(segment) &&
		!segment.includes("\0")
	);
}

/**
 * Split a key into validated path segments.
 * A single trailing separator is ignored (`a/b/` is `a/b`).
 */
function keySegments(
	key: string,
): Either.Either<string[], InvalidKeyError> {
	const segments = key.split(SEPARATOR);
	if (segments.length > 1 && segments[segments.length - 1] === "") {
		segments.pop();
	}

	if (segments.length === 0 || !segments.every(isNormalSegment)) {
		return Either.left(new InvalidKeyError({ key }));
	}
	return Either.right(segments);
}

/**
 * Resolve a key to a filesystem path that is a descendant of `root`.
 */
export function resolveKey(
	root: string,
	key: string,
): Either.Either<string, InvalidKeyError> {
	return Either.map(keySegments(key), (segments) =>
		path.join(root, ...segments),
	);
}

/**
 * Inverse of resolveKey: the canonical `/`-separated key for a path under `root`.
 */
export function keyFromPath(root: string, filePath: string): string {
	return path.relative(root, filePath).split(path.sep).join("/");
}
