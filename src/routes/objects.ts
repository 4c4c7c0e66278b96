/**
 * Object routes
 *
 * GET    /objects          list (route class `list`)
 * PUT    /objects/{key}    upload (route class `write`)
 * HEAD   /objects/{key}    metadata (route class `read`)
 * GET    /objects/{key}    download (route class `read`)
 * DELETE /objects/{key}    remove (route class `write`)
 */

import { zValidator } from "@hono/zod-validator";
import { Effect } from "effect";
import { Hono } from "hono";

import { requireAccess } from "../auth/middleware";
import type { GatewayConfig } from "../config";
import type { StoredObject } from "../models/object";
import { type GatewayRuntime, runGateway } from "../runtime";
import { ObjectStore } from "../services/objects";
import { contentDisposition, contentTypeFor } from "../storage/content-type";
import { formatContentRange } from "../storage/range";
import type { GatewayEnv } from "../types";
import { listQuerySchema, objectQuerySchema, rejectInvalid } from "./schemas";

export type ObjectRoutesDeps = {
	config: GatewayConfig;
	runtime: GatewayRuntime;
};

const KEY_ROUTE = "/:key{.+}";

function representationHeaders(
	object: StoredObject,
	download: boolean,
): Record<string, string> {
	return {
		"Content-Type": contentTypeFor(object.key),
		"Content-Length": String(object.metadata.size),
		ETag: object.etag,
		"Accept-Ranges": "bytes",
		"Content-Disposition": contentDisposition(object.key, download),
	};
}

export const createObjectRoutes = (deps: ObjectRoutesDeps) => {
	const { runtime } = deps;
	const routes = new Hono<GatewayEnv>();

	routes.get(
		"/",
		requireAccess("list", deps),
		zValidator("query", listQuerySchema, rejectInvalid),
		async (c) => {
			const { prefix, recursive } = c.req.valid("query");
			c.get("telemetry").setMetadata({ prefix: prefix ?? null });

			const objects = await runGateway(
				runtime,
				Effect.flatMap(ObjectStore, (store) =>
					store.list({ prefix, recursive: recursive ?? false }),
				),
			);
			return c.json(objects);
		},
	);

	routes.put(KEY_ROUTE, requireAccess("write", deps), async (c) => {
		const key = c.req.param("key");
		c.get("telemetry").setMetadata({ key });

		const result = await runGateway(
			runtime,
			Effect.flatMap(ObjectStore, (store) =>
				store.put(key, c.req.raw.body, {
					ifMatch: c.req.header("If-Match"),
					ifNoneMatch: c.req.header("If-None-Match"),
				}),
			),
		);

		c.header("ETag", result.object.etag);
		return c.body(null, result.outcome === "created" ? 201 : 200);
	});

	// Hono dispatches HEAD here too; the raw method tells them apart
	routes.get(
		KEY_ROUTE,
		requireAccess("read", deps),
		zValidator("query", objectQuerySchema, rejectInvalid),
		async (c) => {
			const key = c.req.param("key");
			c.get("telemetry").setMetadata({ key });
			const download = c.req.valid("query").download ?? true;
			const conditions = {
				ifNoneMatch: c.req.header("If-None-Match"),
				range: c.req.header("Range"),
			};

			if (c.req.method === "HEAD") {
				const result = await runGateway(
					runtime,
					Effect.flatMap(ObjectStore, (store) => store.head(key, conditions)),
				);
				if (result._tag === "NotModified") {
					return c.body(null, 304, { ETag: result.object.etag });
				}
				return c.body(null, 200, representationHeaders(result.object, download));
			}

			const result = await runGateway(
				runtime,
				Effect.flatMap(ObjectStore, (store) => store.get(key, conditions)),
			);
			if (result._tag === "NotModified") {
				return c.body(null, 304, { ETag: result.object.etag });
			}

			const headers = representationHeaders(result.object, download);
			if (result.range === undefined) {
				return c.body(result.body, 200, headers);
			}

			const { start, end } = result.range;
			return c.body(result.body, 206, {
				...headers,
				"Content-Length": String(end - start + 1),
				"Content-Range": formatContentRange(
					result.range,
					result.object.metadata.size,
				),
			});
		},
	);

	routes.delete(KEY_ROUTE, requireAccess("write", deps), async (c) => {
		const key = c.req.param("key");
		c.get("telemetry").setMetadata({ key });

		await runGateway(
			runtime,
			Effect.flatMap(ObjectStore, (store) => store.remove(key)),
		);
		return c.body(null, 204);
	});

	return routes;
};
