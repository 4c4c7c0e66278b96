import { Effect, Exit } from "effect";
import { SignJWT } from "jose";
import { describe, expect, it } from "vitest";

import { MisconfiguredError, UnauthenticatedError } from "../models/errors";
import { signTestToken, TEST_SECRET } from "../test-utils/fixtures";
import { createAccessToken, verifyAccessToken } from "./token";

function failureOf<A, E>(exit: Exit.Exit<A, E>): E | undefined {
	if (Exit.isFailure(exit) && exit.cause._tag === "Fail") {
		return exit.cause.error;
	}
	return undefined;
}

async function verify(token: string, issuers: string[] = []) {
	return Effect.runPromiseExit(
		verifyAccessToken({ secret: TEST_SECRET, token, issuers }),
	);
}

describe("createAccessToken", () => {
	it("should mint a token that verifies with the same secret", async () => {
		const token = await Effect.runPromise(
			createAccessToken({
				secret: TEST_SECRET,
				subject: "alice",
				scope: "obj:read obj:write",
				ttlSecs: 60,
				issuer: "http://127.0.0.1:8080",
				audience: "api",
			}),
		);

		const user = await Effect.runPromise(
			verifyAccessToken({
				secret: TEST_SECRET,
				token,
				issuers: ["http://127.0.0.1:8080"],
				audience: "api",
			}),
		);

		expect(user.subject).toBe("alice");
		expect([...user.scopes]).toEqual(["obj:read", "obj:write"]);
		expect(user.audiences).toEqual(["api"]);
	});

	it("should fail with MisconfiguredError without a secret", async () => {
		const exit = await Effect.runPromiseExit(
			createAccessToken({ secret: "", subject: "u1", scope: "", ttlSecs: 60 }),
		);

		expect(failureOf(exit)).toBeInstanceOf(MisconfiguredError);
	});
});

describe("verifyAccessToken", () => {
	it("should reject an expired token", async () => {
		const token = await signTestToken({ expiresIn: -10 });
		const error = failureOf(await verify(token));

		expect(error).toBeInstanceOf(UnauthenticatedError);
		expect(error?.reason).toBe("token expired");
	});

	it("should reject a token signed with another secret", async () => {
		const token = await signTestToken({ secret: "other-secret" });

		expect(failureOf(await verify(token))?.reason).toBe("invalid token");
	});

	it("should reject algorithms other than HS256", async () => {
		const token = await signTestToken({ alg: "HS512" });

		expect(failureOf(await verify(token))?.reason).toBe("invalid token");
	});

	it("should reject garbage", async () => {
		expect(failureOf(await verify("not-a-jwt"))?.reason).toBe("invalid token");
	});

	it("should reject a token without exp", async () => {
		const token = await new SignJWT({ scope: "obj:read" })
			.setProtectedHeader({ alg: "HS256" })
			.sign(new TextEncoder().encode(TEST_SECRET));

		expect(failureOf(await verify(token))?.reason).toBe("exp missing");
	});

	it("should apply the issuer allow-list", async () => {
		const token = await signTestToken({ issuer: "issuer-b" });
		const exit = await verify(token, ["issuer-a"]);

		expect(failureOf(exit)?.reason).toBe("issuer not allowed");
	});
});
