/**
 * Dev-only session routes
 *
 * POST /auth/signup  register a username/password pair
 * POST /auth/login   exchange credentials for an HS256 access token
 * POST /auth/logout  no-op; tokens are stateless
 */

import { zValidator } from "@hono/zod-validator";
import { Effect } from "effect";
import { Hono } from "hono";

import { createAccessToken } from "../auth/token";
import type { GatewayConfig } from "../config";
import { InvalidArgumentError, MisconfiguredError } from "../models/errors";
import { type GatewayRuntime, runGateway } from "../runtime";
import { CredentialStore } from "../services/credentials";
import type { GatewayEnv } from "../types";
import {
	type LoginRequest,
	loginSchema,
	rejectInvalid,
	signupSchema,
} from "./schemas";

/** Requested lifetime when the login body names none */
const DEFAULT_TTL_SECS = 900;

const FALLBACK_SCOPE = "obj:write obj:read obj:list";

export type SessionRoutesDeps = {
	config: GatewayConfig;
	runtime: GatewayRuntime;
};

export interface TokenResponse {
	access_token: string;
	token_type: "Bearer";
	expires_in: number;
}

/**
 * Every scope any route class requires, sorted and de-duplicated.
 */
export function defaultLoginScope(config: GatewayConfig): string {
	const scopes = new Set([
		...config.routes.write.requiredScopes,
		...config.routes.read.requiredScopes,
		...config.routes.list.requiredScopes,
	]);
	if (scopes.size === 0) return FALLBACK_SCOPE;
	return [...scopes].sort().join(" ");
}

const issueToken = (config: GatewayConfig, request: LoginRequest) =>
	Effect.gen(function* () {
		if (config.authMode !== "jwt_hs256") {
			return yield* Effect.fail(
				new InvalidArgumentError({
					reason: "login available only in HS256 mode",
				}),
			);
		}
		const secret = config.jwtHsSecret;
		if (secret === undefined) {
			return yield* Effect.fail(
				new MisconfiguredError({ reason: "JWT_HS_SECRET not set" }),
			);
		}

		const credentials = yield* CredentialStore;
		const subject = yield* credentials.authenticate(
			request.username,
			request.password,
		);

		const ttlSecs = Math.min(
			request.ttl_secs ?? DEFAULT_TTL_SECS,
			config.authMaxTtlSecs,
		);
		const token = yield* createAccessToken({
			secret,
			subject,
			scope: request.scope ?? defaultLoginScope(config),
			ttlSecs,
			issuer: `http://${config.host}:${config.port}`,
			audience: config.jwtAudience,
		});

		const response: TokenResponse = {
			access_token: token,
			token_type: "Bearer",
			expires_in: ttlSecs,
		};
		return response;
	});

export const createSessionRoutes = (deps: SessionRoutesDeps) => {
	const { config, runtime } = deps;
	const routes = new Hono<GatewayEnv>();

	routes.post(
		"/signup",
		zValidator("json", signupSchema, rejectInvalid),
		async (c) => {
			const { username, password } = c.req.valid("json");
			c.get("telemetry").setMetadata({ username });

			await runGateway(
				runtime,
				Effect.flatMap(CredentialStore, (store) =>
					store.signup(username, password),
				),
			);
			return c.body(null, 201);
		},
	);

	routes.post(
		"/login",
		zValidator("json", loginSchema, rejectInvalid),
		async (c) => {
			const request = c.req.valid("json");
			c.get("telemetry").setMetadata({ username: request.username });

			const token = await runGateway(runtime, issueToken(config, request));
			return c.json(token);
		},
	);

	routes.post("/logout", (c) => c.body(null, 204));

	return routes;
};
