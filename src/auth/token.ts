/**
 * HS256 access tokens: minting for /auth/login and the mint script,
 * verification for the gate. Both sides return Effects failing with the
 * gateway's tagged errors.
 */

import { Effect } from "effect";
import { errors, jwtVerify, SignJWT } from "jose";

import {
	describeCause,
	isGatewayError,
	MisconfiguredError,
	UnauthenticatedError,
} from "../models/errors";
import type { AuthUser } from "../models/principal";
import { type ClaimPolicy, validateClaims } from "./claims";

/** The only algorithm accepted for symmetric tokens */
const ALGORITHM = "HS256";

export interface CreateAccessTokenOptions {
	/** HMAC signing secret */
	secret: string;
	/** `sub` claim */
	subject: string;
	/** Space-delimited `scope` claim */
	scope: string;
	/** Lifetime in seconds */
	ttlSecs: number;
	issuer?: string;
	audience?: string;
}

export interface VerifyAccessTokenOptions extends ClaimPolicy {
	secret: string;
	token: string;
}

/**
 * Create a signed access token.
 *
 * @example
 * ```ts
 * const token = await Effect.runPromise(
 *   createAccessToken({
 *     secret: "test-secret",
 *     subject: "u1",
 *     scope: "obj:read obj:write",
 *     ttlSecs: 900,
 *   })
 * );
 * ```
 */
export const createAccessToken = (
	options: CreateAccessTokenOptions,
): Effect.Effect<string, MisconfiguredError> =>
	Effect.tryPromise({
		try: async () => {
			const { secret, subject, scope, ttlSecs, issuer, audience } = options;

			if (!secret) throw new Error("JWT secret is required");

			const now = Math.floor(Date.now() / 1000);
			const jwt = new SignJWT({ scope })
				.setProtectedHeader({ alg: ALGORITHM, typ: "JWT" })
				.setSubject(subject)
				.setIssuedAt(now)
				.setExpirationTime(now + ttlSecs);

			if (issuer !== undefined) jwt.setIssuer(issuer);
			if (audience !== undefined) jwt.setAudience(audience);

			return jwt.sign(new TextEncoder().encode(secret));
		},
		catch: (error) =>
			new MisconfiguredError({
				reason: `token signing failed: ${describeCause(error)}`,
			}),
	});

/**
 * Verify an HS256 access token and build the caller's principal.
 *
 * The signature check is pinned to HS256. `exp` is required and checked
 * again explicitly, then issuer and audience are enforced per policy.
 */
export const verifyAccessToken = (
	options: VerifyAccessTokenOptions,
): Effect.Effect<AuthUser, UnauthenticatedError> =>
	Effect.tryPromise({
		try: async () => {
			const { secret, token, issuers, audience } = options;

			const { payload } = await jwtVerify(
				token,
				new TextEncoder().encode(secret),
				{ algorithms: [ALGORITHM] },
			);

			return validateClaims(
				payload,
				{ issuers, audience },
				Math.floor(Date.now() / 1000),
			);
		},
		catch: (error) => {
			if (isGatewayError(error) && error._tag === "UnauthenticatedError") {
				return error;
			}
			if (error instanceof errors.JWTExpired) {
				return new UnauthenticatedError({ reason: "token expired" });
			}
			return new UnauthenticatedError({ reason: "invalid token" });
		},
	});
