import * as fs from "node:fs/promises";

import { serve } from "@hono/node-server";

import { createApp } from "./app";
import { configWarnings, describeConfig, loadConfig } from "./config";
import { makeGatewayRuntime } from "./runtime";
import { SERVICE_NAME, SERVICE_VERSION } from "./services/telemetry";

const config = loadConfig();
await fs.mkdir(config.rootDir, { recursive: true });

console.log(
	JSON.stringify({
		level: "info",
		type: "startup",
		service: SERVICE_NAME,
		version: SERVICE_VERSION,
		config: describeConfig(config),
	}),
);
for (const warning of configWarnings(config)) {
	console.warn(JSON.stringify({ level: "warn", type: "startup", warning }));
}

const runtime = makeGatewayRuntime(config);
const app = createApp({ config, runtime });

const server = serve(
	{ fetch: app.fetch, hostname: config.host, port: config.port },
	(info) => {
		console.log(
			JSON.stringify({
				level: "info",
				type: "listening",
				address: info.address,
				port: info.port,
			}),
		);
	},
);

const shutdown = (signal: string) => {
	console.log(JSON.stringify({ level: "info", type: "shutdown", signal }));
	server.close((error) => {
		runtime
			.dispose()
			.then(() => process.exit(error ? 1 : 0))
			.catch((disposeError: unknown) => {
				console.error(
					JSON.stringify({
						level: "error",
						type: "shutdown",
						error: String(disposeError),
					}),
				);
				process.exit(1);
			});
	});
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
