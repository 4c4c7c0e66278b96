/**
 * Route-class authorization.
 *
 * Decision order for a request:
 * 1. AUTH_MODE=off or the route class is unprotected: anonymous principal.
 * 2. No `Bearer <token>` header: 401.
 * 3. Token rejected by the verifier: 401 (or 500 when misconfigured).
 * 4. Token scopes do not overlap the route's required scopes: 403.
 */

import { Effect } from "effect";

import type { GatewayConfig, RouteClass, RoutePolicy } from "../config";
import {
	ForbiddenError,
	type MisconfiguredError,
	UnauthenticatedError,
} from "../models/errors";
import { type AuthUser, anonymousUser } from "../models/principal";
import { hasAnyScope } from "./claims";
import { TokenVerifier } from "./verifier";

const BEARER_PREFIX = "Bearer ";

/**
 * Extract the token from an Authorization header.
 * The scheme is case-sensitive; returns null when absent or empty.
 */
export function bearerToken(header: string | undefined): string | null {
	if (header === undefined || !header.startsWith(BEARER_PREFIX)) return null;
	const token = header.slice(BEARER_PREFIX.length).trim();
	return token.length > 0 ? token : null;
}

export function routePolicy(
	config: GatewayConfig,
	routeClass: RouteClass,
): RoutePolicy {
	return config.routes[routeClass];
}

export const authorize = (
	config: GatewayConfig,
	routeClass: RouteClass,
	authorization: string | undefined,
): Effect.Effect<
	AuthUser,
	UnauthenticatedError | ForbiddenError | MisconfiguredError,
	TokenVerifier
> =>
	Effect.gen(function* () {
		const policy = routePolicy(config, routeClass);
		if (config.authMode === "off" || !policy.protected) {
			return anonymousUser();
		}

		const token = bearerToken(authorization);
		if (token === null) {
			return yield* Effect.fail(
				new UnauthenticatedError({
					reason: "missing or invalid Authorization header",
				}),
			);
		}

		const verifier = yield* TokenVerifier;
		const user = yield* verifier.verify(token);

		if (!hasAnyScope(policy.requiredScopes, user.scopes)) {
			return yield* Effect.fail(
				new ForbiddenError({ required: [...policy.requiredScopes] }),
			);
		}

		return user;
	});
