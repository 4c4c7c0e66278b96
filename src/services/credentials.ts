// src/services/credentials.ts
import * as fs from "node:fs/promises";
import * as path from "node:path";

import { Context, Effect, Layer, ParseResult, Schema } from "effect";
import * as Predicate from "effect/Predicate";

import {
	ConflictError,
	describeCause,
	StorageError,
	UnauthenticatedError,
} from "../models/errors";

/**
 * Dev-only credential store backed by a JSON file.
 *
 * Storage layout:
 * - {AUTH_USER_DB} <- JSON array of { username, password }
 *
 * Passwords are kept in plaintext. This store exists so a local setup can
 * mint HS256 tokens through /auth/login; it is not meant for production.
 */

// =============================================================================
// Schema
// =============================================================================

const StoredUser = Schema.Struct({
	username: Schema.String,
	password: Schema.String,
});
type StoredUser = typeof StoredUser.Type;

const StoredUsers = Schema.parseJson(Schema.Array(StoredUser));

// =============================================================================
// Service Interface
// =============================================================================

interface CredentialStoreService {
	/**
	 * Register a new user. Fails with ConflictError if the username is taken.
	 */
	readonly signup: (
		username: string,
		password: string,
	) => Effect.Effect<void, ConflictError | StorageError>;

	/**
	 * Check a username/password pair and return the username.
	 * Unknown users and wrong passwords fail the same way.
	 */
	readonly authenticate: (
		username: string,
		password: string,
	) => Effect.Effect<string, UnauthenticatedError | StorageError>;
}

// =============================================================================
// Service Tag
// =============================================================================

export class CredentialStore extends Context.Tag("CredentialStore")<
	CredentialStore,
	CredentialStoreService
>() {}

// =============================================================================
// Implementation Helpers
// =============================================================================

/**
 * Format parse errors for human-readable messages
 */
function formatParseError(error: ParseResult.ParseError): string {
	const issues = ParseResult.ArrayFormatter.formatErrorSync(error);
	return issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
}

/**
 * Read all users. A missing file is an empty store.
 */
function readUsers(
	filePath: string,
): Effect.Effect<readonly StoredUser[], StorageError> {
	return Effect.gen(function* () {
		const text = yield* Effect.tryPromise({
			try: async () => {
				try {
					return await fs.readFile(filePath, "utf8");
				} catch (error) {
					if (Predicate.hasProperty(error, "code") && error.code === "ENOENT") {
						return undefined;
					}
					throw error;
				}
			},
			catch: (error) =>
				new StorageError({
					operation: "read",
					target: filePath,
					cause: describeCause(error),
				}),
		});

		if (text === undefined) return [];

		return yield* Schema.decodeUnknown(StoredUsers)(text).pipe(
			Effect.mapError(
				(parseError) =>
					new StorageError({
						operation: "read",
						target: filePath,
						cause: `Schema validation failed: ${formatParseError(parseError)}`,
					}),
			),
		);
	});
}

function writeUsers(
	filePath: string,
	users: readonly StoredUser[],
): Effect.Effect<void, StorageError> {
	return Effect.tryPromise({
		try: async () => {
			await fs.mkdir(path.dirname(filePath), { recursive: true });
			await fs.writeFile(filePath, `${JSON.stringify(users, null, 2)}\n`);
		},
		catch: (error) =>
			new StorageError({
				operation: "write",
				target: filePath,
				cause: describeCause(error),
			}),
	});
}

// =============================================================================
// Service Implementation
// =============================================================================

function makeCredentialStoreService(filePath: string): CredentialStoreService {
	// Serializes read-modify-write cycles on the file
	const writeLock = Effect.unsafeMakeSemaphore(1);

	return {
		signup: (username, password) =>
			writeLock.withPermits(1)(
				Effect.gen(function* () {
					const users = yield* readUsers(filePath);

					if (users.some((user) => user.username === username)) {
						return yield* Effect.fail(
							new ConflictError({ reason: "username already exists" }),
						);
					}

					yield* writeUsers(filePath, [...users, { username, password }]);
				}),
			),

		authenticate: (username, password) =>
			Effect.gen(function* () {
				const users = yield* readUsers(filePath);
				const user = users.find((candidate) => candidate.username === username);

				if (user === undefined || user.password !== password) {
					return yield* Effect.fail(
						new UnauthenticatedError({ reason: "invalid credentials" }),
					);
				}
				return user.username;
			}),
	};
}

// =============================================================================
// Layer
// =============================================================================

/**
 * Create a Layer for CredentialStoreService over a JSON file
 */
export function makeCredentialStoreLayer(
	filePath: string,
): Layer.Layer<CredentialStore> {
	return Layer.succeed(CredentialStore, makeCredentialStoreService(filePath));
}
