/**
 * Shared test fixtures: throwaway store directories, configs built through
 * the real env loader, signed tokens and an app wired to an in-memory sink.
 */

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";

import { SignJWT } from "jose";

import { createApp } from "../app";
import { type GatewayConfig, loadConfig } from "../config";
import { type GatewayRuntime, makeGatewayRuntime } from "../runtime";
import type { RequestEvent } from "../services/telemetry";

export const TEST_SECRET = "test-secret";

/**
 * Create an empty temp directory. Remove it with removeTempDir.
 */
export function makeTempDir(): Promise<string> {
	return fs.mkdtemp(path.join(os.tmpdir(), "bucket-gateway-"));
}

export function removeTempDir(dir: string): Promise<void> {
	return fs.rm(dir, { recursive: true, force: true });
}

/**
 * HS256 config rooted at `dir`, with overrides applied as env variables.
 */
export function testConfig(
	dir: string,
	env: Record<string, string> = {},
): GatewayConfig {
	return loadConfig({
		HOST: "127.0.0.1",
		PORT: "8080",
		BUCKET_DIR: path.join(dir, "bucket"),
		AUTH_USER_DB: path.join(dir, "auth", "users.json"),
		AUTH_MODE: "jwt_hs256",
		JWT_HS_SECRET: TEST_SECRET,
		...env,
	});
}

export interface TestTokenOptions {
	sub?: string;
	/** Raw claims merged over the defaults */
	claims?: Record<string, unknown>;
	scope?: string;
	/** Seconds from now; negative for an already expired token */
	expiresIn?: number;
	issuer?: string;
	audience?: string | string[];
	secret?: string;
	alg?: "HS256" | "HS384" | "HS512";
}

export function signTestToken(options: TestTokenOptions = {}): Promise<string> {
	const now = Math.floor(Date.now() / 1000);
	const alg = options.alg ?? "HS256";
	const claims = options.claims ?? {
		scope: options.scope ?? "obj:write obj:read obj:list",
	};

	const jwt = new SignJWT(claims)
		.setProtectedHeader({ alg, typ: "JWT" })
		.setSubject(options.sub ?? "u1")
		.setIssuedAt(now)
		.setExpirationTime(now + (options.expiresIn ?? 300));

	if (options.issuer !== undefined) jwt.setIssuer(options.issuer);
	if (options.audience !== undefined) jwt.setAudience(options.audience);

	return jwt.sign(new TextEncoder().encode(options.secret ?? TEST_SECRET));
}

export interface TestApp {
	app: ReturnType<typeof createApp>;
	config: GatewayConfig;
	runtime: GatewayRuntime;
	/** Every request event emitted so far */
	events: RequestEvent[];
}

export function createTestApp(config: GatewayConfig): TestApp {
	const runtime = makeGatewayRuntime(config);
	const events: RequestEvent[] = [];
	const app = createApp({
		config,
		runtime,
		sink: (event) => {
			events.push(event);
		},
	});
	return { app, config, runtime, events };
}

export function bearer(token: string): Record<string, string> {
	return { Authorization: `Bearer ${token}` };
}
