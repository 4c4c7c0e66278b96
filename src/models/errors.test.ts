import { describe, expect, it } from "vitest";

import {
	ForbiddenError,
	InvalidKeyError,
	isGatewayError,
	ObjectNotFoundError,
	PayloadTooLargeError,
	RangeNotSatisfiableError,
	StorageError,
	UnauthenticatedError,
} from "./errors";

describe("Error Models", () => {
	describe("Request Errors", () => {
		it("should create InvalidKeyError with correct message", () => {
			const error = new InvalidKeyError({ key: "../etc/passwd" });

			expect(error._tag).toBe("InvalidKeyError");
			expect(error.key).toBe("../etc/passwd");
			expect(error.httpStatus).toBe(400);
			expect(error.message).toBe('Invalid object key "../etc/passwd"');
		});
	});

	describe("Auth Errors", () => {
		it("should carry the reason as the message for UnauthenticatedError", () => {
			const error = new UnauthenticatedError({ reason: "token expired" });

			expect(error.code).toBe("UNAUTHENTICATED");
			expect(error.httpStatus).toBe(401);
			expect(error.message).toBe("token expired");
		});

		it("should list required scopes in ForbiddenError", () => {
			const error = new ForbiddenError({ required: ["obj:write", "admin"] });

			expect(error.httpStatus).toBe(403);
			expect(error.message).toBe(
				"Insufficient scope. Requires one of: obj:write, admin",
			);
		});
	});

	describe("Object Errors", () => {
		it("should map object errors to their HTTP statuses", () => {
			expect(new ObjectNotFoundError({ key: "a.txt" }).httpStatus).toBe(404);
			expect(
				new PayloadTooLargeError({ key: "a.txt", limit: 4 }).httpStatus,
			).toBe(413);
			expect(
				new RangeNotSatisfiableError({ key: "a.txt", size: 3 }).httpStatus,
			).toBe(416);
		});

		it("should include operation and cause in StorageError", () => {
			const error = new StorageError({
				operation: "write",
				target: "a/b.txt",
				cause: "EACCES",
			});

			expect(error.code).toBe("INTERNAL");
			expect(error.message).toBe(
				'Storage write failed for "a/b.txt": EACCES',
			);
		});
	});

	it("should identify gateway errors with type guard", () => {
		expect(isGatewayError(new ObjectNotFoundError({ key: "x" }))).toBe(true);
		expect(isGatewayError(new UnauthenticatedError({ reason: "x" }))).toBe(
			true,
		);
		expect(isGatewayError(new Error("random"))).toBe(false);
		expect(isGatewayError(null)).toBe(false);
	});
});
