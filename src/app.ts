/**
 * Gateway app assembly
 *
 * Builds the Hono app from an explicit config and runtime. Nothing here
 * reads the environment, so tests construct apps with their own settings.
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import { nanoid } from "nanoid";

import type { GatewayConfig } from "./config";
import { createObjectRoutes } from "./routes/objects";
import { handleError, handleNotFound } from "./routes/errors";
import { createHealthRoutes } from "./routes/health";
import { createSessionRoutes } from "./routes/session";
import type { GatewayRuntime } from "./runtime";
import {
	consoleSink,
	type EventSink,
	RequestEventBuilder,
} from "./services/telemetry";
import type { GatewayEnv } from "./types";

export type AppDeps = {
	config: GatewayConfig;
	runtime: GatewayRuntime;
	/** Where finished request events go; defaults to stdout */
	sink?: EventSink;
};

export const createApp = (deps: AppDeps) => {
	const { config, runtime, sink = consoleSink } = deps;
	const app = new Hono<GatewayEnv>();

	// One wide event per request
	app.use("*", async (c, next) => {
		const telemetry = new RequestEventBuilder(
			nanoid(16),
			c.req.method,
			c.req.path,
		);
		c.set("telemetry", telemetry);
		c.header("X-Request-Id", telemetry.requestId);

		await next();

		sink(telemetry.setStatus(c.res.status).finalize());
	});

	app.use(
		"*",
		cors({
			origin: "*",
			exposeHeaders: [
				"ETag",
				"Content-Length",
				"Content-Range",
				"Content-Disposition",
				"Accept-Ranges",
				"X-Request-Id",
			],
		}),
	);

	app.route("/", createHealthRoutes(config));
	app.route("/objects", createObjectRoutes({ config, runtime }));
	app.route("/auth", createSessionRoutes({ config, runtime }));

	app.onError(handleError);
	app.notFound(handleNotFound);

	return app;
};

export type GatewayApp = ReturnType<typeof createApp>;
