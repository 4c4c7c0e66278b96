// src/services/objects.ts
import type { BigIntStats, Dirent } from "node:fs";
import type { FileHandle } from "node:fs/promises";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { ReadableStreamReadResult } from "node:stream/web";

import { Context, Effect, Layer, Option } from "effect";
import * as Predicate from "effect/Predicate";

import {
	describeCause,
	InvalidArgumentError,
	type InvalidKeyError,
	ObjectNotFoundError,
	PayloadTooLargeError,
	PreconditionFailedError,
	RangeNotSatisfiableError,
	StorageError,
} from "../models/errors";
import type {
	ByteRange,
	GetResult,
	HeadResult,
	ListedObject,
	ListOptions,
	PutResult,
	ReadConditions,
	StoredObject,
	WriteConditions,
} from "../models/object";
import { etagMatches, makeEtag, metadataFromStats } from "../storage/etag";
import { keyFromPath, resolveKey } from "../storage/keys";
import { parseRange } from "../storage/range";

/**
 * Object store backed by a directory tree.
 *
 * Storage layout (see src/storage/keys.ts):
 * - {root}/{key segments...} <- object bytes, one file per key
 *
 * There is no index and no sidecar metadata: size and modification time are
 * read from the filesystem on every request and the ETag is derived from them.
 *
 * Conditional writes are check-then-act. Two concurrent writers can both pass
 * the same precondition; there is no per-key lock.
 */

// =============================================================================
// Service Interface
// =============================================================================

export interface ObjectStoreOptions {
	/** Store root directory */
	root: string;
	/** Upload cap in bytes; undefined means unbounded */
	maxUploadBytes: number | undefined;
}

interface ObjectStoreService {
	/**
	 * Stream a request body into the object, creating parent directories.
	 * Preconditions are checked before anything is written.
	 */
	readonly put: (
		key: string,
		body: ReadableStream<Uint8Array> | null,
		conditions: WriteConditions,
	) => Effect.Effect<
		PutResult,
		| InvalidKeyError
		| InvalidArgumentError
		| PreconditionFailedError
		| PayloadTooLargeError
		| StorageError
	>;

	/**
	 * Current metadata of an object, or NotModified when If-None-Match
	 * carries its ETag
	 */
	readonly head: (
		key: string,
		conditions: ReadConditions,
	) => Effect.Effect<
		HeadResult,
		InvalidKeyError | ObjectNotFoundError | StorageError
	>;

	/**
	 * Open an object for streaming, honoring If-None-Match and one Range
	 */
	readonly get: (
		key: string,
		conditions: ReadConditions,
	) => Effect.Effect<
		GetResult,
		| InvalidKeyError
		| ObjectNotFoundError
		| RangeNotSatisfiableError
		| StorageError
	>;

	readonly remove: (
		key: string,
	) => Effect.Effect<void, InvalidKeyError | ObjectNotFoundError | StorageError>;

	/**
	 * Objects under an optional prefix, sorted by key.
	 * Only the prefix directory itself unless `recursive` is set.
	 */
	readonly list: (
		options: ListOptions,
	) => Effect.Effect<ListedObject[], InvalidKeyError | StorageError>;
}

// =============================================================================
// Service Tag
// =============================================================================

/**
 * Effect Context tag for ObjectStoreService
 */
export class ObjectStore extends Context.Tag("ObjectStore")<
	ObjectStore,
	ObjectStoreService
>() {}

// =============================================================================
// Implementation Helpers
// =============================================================================

/** Read size for streamed downloads */
const CHUNK_SIZE = 64 * 1024;

function errnoCode(error: unknown): string | undefined {
	return Predicate.hasProperty(error, "code") && typeof error.code === "string"
		? error.code
		: undefined;
}

/** The path, or one of its parents, does not exist as a directory entry */
function isMissing(error: unknown): boolean {
	const code = errnoCode(error);
	return code === "ENOENT" || code === "ENOTDIR";
}

function storageError(
	operation: string,
	target: string,
	error: unknown,
): StorageError {
	return new StorageError({ operation, target, cause: describeCause(error) });
}

function toStoredObject(
	key: string,
	filePath: string,
	stats: BigIntStats,
): StoredObject {
	const metadata = metadataFromStats(stats);
	return { key, path: filePath, metadata, etag: makeEtag(metadata) };
}

function notModified(object: StoredObject): {
	readonly _tag: "NotModified";
	readonly object: StoredObject;
} {
	return { _tag: "NotModified", object };
}

async function statIfPresent(filePath: string): Promise<BigIntStats | undefined> {
	try {
		return await fs.stat(filePath, { bigint: true });
	} catch (error) {
		if (isMissing(error)) return undefined;
		throw error;
	}
}

async function readdirIfPresent(dir: string): Promise<Dirent[]> {
	try {
		return await fs.readdir(dir, { withFileTypes: true });
	} catch (error) {
		if (isMissing(error)) return [];
		throw error;
	}
}

/**
 * Stat a path. Missing entries are Option.none(); other failures are
 * storage errors.
 */
function statPath(
	filePath: string,
	key: string,
): Effect.Effect<Option.Option<BigIntStats>, StorageError> {
	return Effect.tryPromise({
		try: async () => Option.fromNullable(await statIfPresent(filePath)),
		catch: (error) => storageError("stat", key, error),
	});
}

/**
 * Resolve and stat an object. Directories count as missing.
 */
function findObject(
	root: string,
	key: string,
): Effect.Effect<
	StoredObject,
	InvalidKeyError | ObjectNotFoundError | StorageError
> {
	return Effect.gen(function* () {
		const filePath = yield* resolveKey(root, key);
		const stats = yield* statPath(filePath, key);

		if (Option.isNone(stats) || !stats.value.isFile()) {
			return yield* Effect.fail(new ObjectNotFoundError({ key }));
		}
		return toStoredObject(key, filePath, stats.value);
	});
}

type WriteOutcome =
	| { readonly _tag: "Written" }
	| { readonly _tag: "TooLarge" }
	| { readonly _tag: "BodyFailed"; readonly cause: string };

/**
 * Pump the body into a truncated file, counting bytes after each chunk.
 * Filesystem errors are thrown; body and size failures are returned.
 */
async function writeBody(
	filePath: string,
	body: ReadableStream<Uint8Array> | null,
	limit: number | undefined,
): Promise<WriteOutcome> {
	const handle = await fs.open(filePath, "w");
	try {
		if (body === null) return { _tag: "Written" };

		const reader = body.getReader();
		let received = 0;
		for (;;) {
			let chunk: ReadableStreamReadResult<Uint8Array>;
			try {
				chunk = await reader.read();
			} catch (error) {
				return { _tag: "BodyFailed", cause: describeCause(error) };
			}
			if (chunk.done) return { _tag: "Written" };

			received += chunk.value.byteLength;
			if (limit !== undefined && received > limit) {
				await reader.cancel();
				return { _tag: "TooLarge" };
			}
			try {
				await handle.write(chunk.value);
			} catch (error) {
				await reader.cancel(describeCause(error));
				throw error;
			}
		}
	} finally {
		await handle.close();
	}
}

/** Remove a partially written object. A missing file is fine. */
function discard(
	filePath: string,
	key: string,
): Effect.Effect<void, StorageError> {
	return Effect.tryPromise({
		try: () => fs.rm(filePath, { force: true }),
		catch: (error) => storageError("cleanup", key, error),
	});
}

/**
 * Stream `range` (inclusive) of an open file. The handle is closed when the
 * stream ends, errors or is cancelled.
 */
export function fileStream(handle: FileHandle, range: ByteRange): ReadableStream<Uint8Array> {
	let position = range.start;
	return new ReadableStream<Uint8Array>({
		async pull(controller) {
			try {
				const remaining = range.end - position + 1;
				if (remaining <= 0) {
					await handle.close();
					controller.close();
					return;
				}

				const buffer = new Uint8Array(Math.min(CHUNK_SIZE, remaining));
				const { bytesRead } = await handle.read(buffer, 0, buffer.length, position);
				if (bytesRead === 0) {
					// Truncated underneath us
					await handle.close();
					controller.close();
					return;
				}

				position += bytesRead;
				controller.enqueue(buffer.subarray(0, bytesRead));
			} catch (error) {
				await handle.close();
				throw error;
			}
		},
		async cancel() {
			await handle.close();
		},
	});
}

function openObject(
	object: StoredObject,
): Effect.Effect<FileHandle, ObjectNotFoundError | StorageError> {
	return Effect.tryPromise({
		try: () => fs.open(object.path, "r"),
		catch: (error) =>
			isMissing(error)
				? new ObjectNotFoundError({ key: object.key })
				: storageError("open", object.key, error),
	});
}

/**
 * Explicit-stack directory walk. Symlinks and special files are skipped;
 * directories that vanish mid-walk are skipped.
 */
async function walk(
	root: string,
	start: string,
	recursive: boolean,
): Promise<ListedObject[]> {
	const found: ListedObject[] = [];
	const pending = [start];

	for (let dir = pending.pop(); dir !== undefined; dir = pending.pop()) {
		for (const entry of await readdirIfPresent(dir)) {
			const entryPath = path.join(dir, entry.name);
			if (entry.isDirectory()) {
				if (recursive) pending.push(entryPath);
				continue;
			}
			if (!entry.isFile()) continue;

			const stats = await statIfPresent(entryPath);
			if (stats === undefined) continue;
			found.push({
				key: keyFromPath(root, entryPath),
				size: Number(stats.size),
				modified: metadataFromStats(stats).modifiedSeconds,
			});
		}
	}

	return found;
}

function byKey(a: ListedObject, b: ListedObject): number {
	if (a.key < b.key) return -1;
	return a.key > b.key ? 1 : 0;
}

// =============================================================================
// Service Implementation
// =============================================================================

function makeObjectStoreService({
	root,
	maxUploadBytes,
}: ObjectStoreOptions): ObjectStoreService {
	return {
		put: (key, body, conditions) =>
			Effect.gen(function* () {
				const filePath = yield* resolveKey(root, key);
				const existing = yield* statPath(filePath, key);
				const current = Option.map(existing, (stats) =>
					makeEtag(metadataFromStats(stats)),
				);

				if (conditions.ifNoneMatch?.trim() === "*" && Option.isSome(current)) {
					return yield* Effect.fail(
						new PreconditionFailedError({ key, reason: "object already exists" }),
					);
				}
				if (conditions.ifMatch !== undefined) {
					if (Option.isNone(current)) {
						return yield* Effect.fail(
							new PreconditionFailedError({ key, reason: "object does not exist" }),
						);
					}
					if (!etagMatches(conditions.ifMatch, current.value)) {
						return yield* Effect.fail(
							new PreconditionFailedError({ key, reason: "etag mismatch" }),
						);
					}
				}

				yield* Effect.tryPromise({
					try: () => fs.mkdir(path.dirname(filePath), { recursive: true }),
					catch: (error) => storageError("mkdir", key, error),
				});

				const written = yield* Effect.tryPromise({
					try: () => writeBody(filePath, body, maxUploadBytes),
					catch: (error) => storageError("write", key, error),
				}).pipe(
					Effect.catchAll((error) =>
						Effect.zipRight(discard(filePath, key), Effect.fail(error)),
					),
				);

				switch (written._tag) {
					case "TooLarge":
						yield* discard(filePath, key);
						return yield* Effect.fail(
							new PayloadTooLargeError({ key, limit: maxUploadBytes ?? 0 }),
						);
					case "BodyFailed":
						yield* discard(filePath, key);
						return yield* Effect.fail(
							new InvalidArgumentError({
								reason: `request body stream failed: ${written.cause}`,
							}),
						);
					case "Written":
						break;
				}

				const object = yield* findObject(root, key).pipe(
					Effect.catchTag("ObjectNotFoundError", (error) =>
						Effect.fail(storageError("stat", key, error.message)),
					),
				);
				const result: PutResult = {
					outcome: Option.isSome(existing) ? "overwritten" : "created",
					object,
				};
				return result;
			}),

		head: (key, conditions) =>
			findObject(root, key).pipe(
				Effect.map((object): HeadResult =>
					etagMatches(conditions.ifNoneMatch, object.etag)
						? notModified(object)
						: { _tag: "Found", object },
				),
			),

		get: (key, conditions) =>
			Effect.gen(function* () {
				const object = yield* findObject(root, key);
				if (etagMatches(conditions.ifNoneMatch, object.etag)) {
					return notModified(object);
				}

				const size = object.metadata.size;
				let range: ByteRange | undefined;
				if (conditions.range !== undefined) {
					const parsed = parseRange(conditions.range, size);
					if (parsed === null) {
						return yield* Effect.fail(new RangeNotSatisfiableError({ key, size }));
					}
					range = parsed;
				}

				const handle = yield* openObject(object);
				const body = fileStream(handle, range ?? { start: 0, end: size - 1 });
				const result: GetResult = { _tag: "Content", object, range, body };
				return result;
			}),

		remove: (key) =>
			Effect.gen(function* () {
				const filePath = yield* resolveKey(root, key);
				yield* Effect.tryPromise({
					try: () => fs.unlink(filePath),
					catch: (error) =>
						isMissing(error) || errnoCode(error) === "EISDIR"
							? new ObjectNotFoundError({ key })
							: storageError("delete", key, error),
				});
			}),

		list: ({ prefix, recursive }) =>
			Effect.gen(function* () {
				let start = root;
				if (prefix !== undefined && prefix !== "") {
					start = yield* resolveKey(root, prefix);
					const stats = yield* statPath(start, prefix);
					if (Option.isSome(stats) && stats.value.isFile()) {
						return [
							{
								key: keyFromPath(root, start),
								size: Number(stats.value.size),
								modified: metadataFromStats(stats.value).modifiedSeconds,
							},
						];
					}
				}

				const found = yield* Effect.tryPromise({
					try: () => walk(root, start, recursive),
					catch: (error) => storageError("list", prefix ?? "", error),
				});
				return found.sort(byKey);
			}),
	};
}

// =============================================================================
// Layer
// =============================================================================

/**
 * Create a Layer for ObjectStoreService over a root directory
 */
export function makeObjectStoreLayer(
	options: ObjectStoreOptions,
): Layer.Layer<ObjectStore> {
	return Layer.succeed(ObjectStore, makeObjectStoreService(options));
}
