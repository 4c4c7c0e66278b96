import { Schema } from "effect";
import * as Predicate from "effect/Predicate";

// Type ID for error identification
export const GatewayErrorTypeId: unique symbol = Symbol.for(
	"@bucket-gateway/GatewayError",
);
export type GatewayErrorTypeId = typeof GatewayErrorTypeId;

// --- Request Errors ---

export class InvalidKeyError extends Schema.TaggedError<InvalidKeyError>()(
	"InvalidKeyError",
	{ key: Schema.String },
) {
	/** @public Used by isGatewayError type guard */
	readonly [GatewayErrorTypeId]: GatewayErrorTypeId = GatewayErrorTypeId;

	readonly code = "INVALID_KEY";
	readonly httpStatus = 400;

	override get message(): string {
		return `Invalid object key "${this.key}"`;
	}
}

export class InvalidArgumentError extends Schema.TaggedError<InvalidArgumentError>()(
	"InvalidArgumentError",
	{ reason: Schema.String },
) {
	readonly [GatewayErrorTypeId]: GatewayErrorTypeId = GatewayErrorTypeId;

	readonly code = "INVALID_ARGUMENT";
	readonly httpStatus = 400;

	override get message(): string {
		return `Invalid argument: ${this.reason}`;
	}
}

// --- Auth Errors ---

export class UnauthenticatedError extends Schema.TaggedError<UnauthenticatedError>()(
	"UnauthenticatedError",
	{ reason: Schema.String },
) {
	readonly [GatewayErrorTypeId]: GatewayErrorTypeId = GatewayErrorTypeId;

	readonly code = "UNAUTHENTICATED";
	readonly httpStatus = 401;

	override get message(): string {
		return this.reason;
	}
}

export class ForbiddenError extends Schema.TaggedError<ForbiddenError>()(
	"ForbiddenError",
	{ required: Schema.Array(Schema.String) },
) {
	readonly [GatewayErrorTypeId]: GatewayErrorTypeId = GatewayErrorTypeId;

	readonly code = "FORBIDDEN";
	readonly httpStatus = 403;

	override get message(): string {
		return `Insufficient scope. Requires one of: ${this.required.join(", ")}`;
	}
}

export class MisconfiguredError extends Schema.TaggedError<MisconfiguredError>()(
	"MisconfiguredError",
	{ reason: Schema.String },
) {
	readonly [GatewayErrorTypeId]: GatewayErrorTypeId = GatewayErrorTypeId;

	readonly code = "MISCONFIGURED";
	readonly httpStatus = 500;

	override get message(): string {
		return `Server misconfigured: ${this.reason}`;
	}
}

// --- Object Errors ---

export class ObjectNotFoundError extends Schema.TaggedError<ObjectNotFoundError>()(
	"ObjectNotFoundError",
	{ key: Schema.String },
) {
	readonly [GatewayErrorTypeId]: GatewayErrorTypeId = GatewayErrorTypeId;

	readonly code = "NOT_FOUND";
	readonly httpStatus = 404;

	override get message(): string {
		return `Object "${this.key}" not found`;
	}
}

export class ConflictError extends Schema.TaggedError<ConflictError>()(
	"ConflictError",
	{ reason: Schema.String },
) {
	readonly [GatewayErrorTypeId]: GatewayErrorTypeId = GatewayErrorTypeId;

	readonly code = "CONFLICT";
	readonly httpStatus = 409;

	override get message(): string {
		return this.reason;
	}
}

export class PreconditionFailedError extends Schema.TaggedError<PreconditionFailedError>()(
	"PreconditionFailedError",
	{
		key: Schema.String,
		reason: Schema.String,
	},
) {
	readonly [GatewayErrorTypeId]: GatewayErrorTypeId = GatewayErrorTypeId;

	readonly code = "PRECONDITION_FAILED";
	readonly httpStatus = 412;

	override get message(): string {
		return `Precondition failed for "${this.key}": ${this.reason}`;
	}
}

export class PayloadTooLargeError extends Schema.TaggedError<PayloadTooLargeError>()(
	"PayloadTooLargeError",
	{
		key: Schema.String,
		limit: Schema.Number,
	},
) {
	readonly [GatewayErrorTypeId]: GatewayErrorTypeId = GatewayErrorTypeId;

	readonly code = "PAYLOAD_TOO_LARGE";
	readonly httpStatus = 413;

	override get message(): string {
		return `Upload for "${this.key}" exceeds the limit of ${this.limit} bytes`;
	}
}

export class RangeNotSatisfiableError extends Schema.TaggedError<RangeNotSatisfiableError>()(
	"RangeNotSatisfiableError",
	{
		key: Schema.String,
		size: Schema.Number,
	},
) {
	readonly [GatewayErrorTypeId]: GatewayErrorTypeId = GatewayErrorTypeId;

	readonly code = "RANGE_NOT_SATISFIABLE";
	readonly httpStatus = 416;

	override get message(): string {
		return `Requested range not satisfiable for "${this.key}" (${this.size} bytes)`;
	}
}

/**
 * Filesystem failure that is not part of the object protocol
 * (permissions, disk full, a directory where a file was expected).
 */
export class StorageError extends Schema.TaggedError<StorageError>()(
	"StorageError",
	{
		operation: Schema.String,
		target: Schema.String,
		cause: Schema.String,
	},
) {
	readonly [GatewayErrorTypeId]: GatewayErrorTypeId = GatewayErrorTypeId;

	readonly code = "INTERNAL";
	readonly httpStatus = 500;

	override get message(): string {
		return `Storage ${this.operation} failed for "${this.target}": ${this.cause}`;
	}
}

export type GatewayError =
	| InvalidKeyError
	| InvalidArgumentError
	| UnauthenticatedError
	| ForbiddenError
	| MisconfiguredError
	| ObjectNotFoundError
	| ConflictError
	| PreconditionFailedError
	| PayloadTooLargeError
	| RangeNotSatisfiableError
	| StorageError;

export const isGatewayError = (u: unknown): u is GatewayError =>
	Predicate.hasProperty(u, GatewayErrorTypeId);

/**
 * Render an unknown thrown value as a short string for error fields.
 */
export const describeCause = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);
