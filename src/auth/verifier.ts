import { Context, Effect, Layer } from "effect";

import type { GatewayConfig } from "../config";
import { MisconfiguredError, type UnauthenticatedError } from "../models/errors";
import type { AuthUser } from "../models/principal";
import { verifyAccessToken } from "./token";

// =============================================================================
// Service Interface
// =============================================================================

/**
 * Turns a raw bearer token into a principal.
 *
 * One implementation per AUTH_MODE. A verifier that cannot do its job
 * (missing secret, no key source) fails with MisconfiguredError so the
 * request is rejected rather than let through.
 */
export interface TokenVerifierService {
	readonly verify: (
		token: string,
	) => Effect.Effect<AuthUser, UnauthenticatedError | MisconfiguredError>;
}

export class TokenVerifier extends Context.Tag("TokenVerifier")<
	TokenVerifier,
	TokenVerifierService
>() {}

// =============================================================================
// Implementations
// =============================================================================

export function makeHs256Verifier(config: GatewayConfig): TokenVerifierService {
	return {
		verify: (token) => {
			const secret = config.jwtHsSecret;
			if (secret === undefined) {
				return Effect.fail(
					new MisconfiguredError({ reason: "JWT_HS_SECRET not set" }),
				);
			}
			return verifyAccessToken({
				secret,
				token,
				issuers: config.jwtIssuers,
				audience: config.jwtAudience,
			});
		},
	};
}

/**
 * Asymmetric (JWKS) verification is not wired up. Every token is refused
 * with a server-side error.
 */
export function makeJwksVerifier(config: GatewayConfig): TokenVerifierService {
	const sources = config.jwksUrls.length;
	return {
		verify: () =>
			Effect.fail(
				new MisconfiguredError({
					reason:
						sources === 0
							? "jwt_rs256 verification unavailable: no JWKS_URLS configured"
							: "jwt_rs256 verification unavailable",
				}),
			),
	};
}

/** Used when AUTH_MODE=off; the gate never reaches it */
const disabledVerifier: TokenVerifierService = {
	verify: () =>
		Effect.fail(new MisconfiguredError({ reason: "authentication is disabled" })),
};

// =============================================================================
// Layer
// =============================================================================

export function makeTokenVerifierLayer(
	config: GatewayConfig,
): Layer.Layer<TokenVerifier> {
	switch (config.authMode) {
		case "jwt_hs256":
			return Layer.succeed(TokenVerifier, makeHs256Verifier(config));
		case "jwt_rs256":
			return Layer.succeed(TokenVerifier, makeJwksVerifier(config));
		case "off":
			return Layer.succeed(TokenVerifier, disabledVerifier);
	}
}
