/**
 * Authorization Middleware for Hono
 *
 * One parameterized guard per route class. The decision itself lives in
 * gate.ts; this adapter runs it on the gateway runtime, records the auth
 * phase on the request's wide event and stores the principal on the context.
 */

import type { MiddlewareHandler } from "hono";

import type { GatewayConfig, RouteClass } from "../config";
import { type GatewayRuntime, runGateway } from "../runtime";
import type { GatewayEnv } from "../types";
import { authorize } from "./gate";

export type AuthMiddlewareDeps = {
	config: GatewayConfig;
	runtime: GatewayRuntime;
};

export const requireAccess = (
	routeClass: RouteClass,
	deps: AuthMiddlewareDeps,
): MiddlewareHandler<GatewayEnv> => {
	const { config, runtime } = deps;

	return async (c, next) => {
		const telemetry = c.get("telemetry");
		telemetry.startPhase("auth");
		try {
			const user = await runGateway(
				runtime,
				authorize(config, routeClass, c.req.header("Authorization")),
			);
			c.set("user", user);
			telemetry.setMetadata({
				routeClass,
				subject: user.subject ?? null,
			});
		} finally {
			telemetry.endPhase("auth");
		}

		await next();
	};
};
