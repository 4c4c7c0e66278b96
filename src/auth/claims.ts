/**
 * Pure helpers over decoded JWT claims.
 */

import type { JWTPayload } from "jose";

import { UnauthenticatedError } from "../models/errors";
import type { AuthUser } from "../models/principal";

/**
 * Claim checks applied after the signature is verified
 */
export interface ClaimPolicy {
	/** Allowed `iss` values; empty allows any */
	issuers: readonly string[];
	/** Required `aud` value, if configured */
	audience?: string;
}

function splitScopes(value: string): string[] {
	return value.split(/\s+/).filter((scope) => scope.length > 0);
}

/**
 * Scopes from `scope` (space-delimited), `scopes` (array) or `scp`
 * (space-delimited). The first claim present in the expected shape wins.
 */
export function scopesFromClaims(claims: JWTPayload): Set<string> {
	if (typeof claims.scope === "string") {
		return new Set(splitScopes(claims.scope));
	}
	if (Array.isArray(claims.scopes)) {
		return new Set(
			claims.scopes.filter((scope): scope is string => typeof scope === "string"),
		);
	}
	if (typeof claims.scp === "string") {
		return new Set(splitScopes(claims.scp));
	}
	return new Set();
}

/** `aud` as a list, whether the token carries a string or an array */
export function audienceValues(claims: JWTPayload): string[] {
	if (typeof claims.aud === "string") return [claims.aud];
	if (Array.isArray(claims.aud)) {
		return claims.aud.filter((aud): aud is string => typeof aud === "string");
	}
	return [];
}

/**
 * Any overlap between the route's required scopes and the token's scopes.
 * An empty requirement always passes.
 */
export function hasAnyScope(
	required: readonly string[],
	granted: ReadonlySet<string>,
): boolean {
	return required.length === 0 || required.some((scope) => granted.has(scope));
}

/**
 * Enforce exp, issuer and audience, then build the principal.
 *
 * @param nowSeconds - current Unix time; the token is expired once now >= exp
 */
export function validateClaims(
	claims: JWTPayload,
	policy: ClaimPolicy,
	nowSeconds: number,
): AuthUser {
	if (typeof claims.exp !== "number") {
		throw new UnauthenticatedError({ reason: "exp missing" });
	}
	if (nowSeconds >= claims.exp) {
		throw new UnauthenticatedError({ reason: "token expired" });
	}

	if (policy.issuers.length > 0) {
		if (typeof claims.iss !== "string") {
			throw new UnauthenticatedError({ reason: "iss missing" });
		}
		if (!policy.issuers.includes(claims.iss)) {
			throw new UnauthenticatedError({ reason: "issuer not allowed" });
		}
	}

	const audiences = audienceValues(claims);
	if (policy.audience !== undefined && !audiences.includes(policy.audience)) {
		throw new UnauthenticatedError({ reason: "audience mismatch" });
	}

	return {
		subject: typeof claims.sub === "string" ? claims.sub : undefined,
		scopes: scopesFromClaims(claims),
		issuer: typeof claims.iss === "string" ? claims.iss : undefined,
		audiences,
	};
}
