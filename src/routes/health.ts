import { Hono } from "hono";

import type { GatewayConfig } from "../config";
import { SERVICE_NAME, SERVICE_VERSION } from "../services/telemetry";
import type { GatewayEnv } from "../types";

export const createHealthRoutes = (config: GatewayConfig) => {
	const routes = new Hono<GatewayEnv>();

	routes.get("/healthz", (c) => c.text("ok"));

	routes.get("/", (c) => {
		return c.json({
			name: SERVICE_NAME,
			version: SERVICE_VERSION,
			description: "HTTP gateway for a directory-backed object store",
			auth: config.authMode,
			endpoints: [
				"GET /objects",
				"PUT /objects/{key}",
				"HEAD /objects/{key}",
				"GET /objects/{key}",
				"DELETE /objects/{key}",
				"POST /auth/signup",
				"POST /auth/login",
				"POST /auth/logout",
				"GET /healthz",
			],
		});
	});

	return routes;
};
