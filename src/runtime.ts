import { Cause, type Effect, Exit, Layer, ManagedRuntime } from "effect";

import { makeTokenVerifierLayer, type TokenVerifier } from "./auth/verifier";
import type { GatewayConfig } from "./config";
import { type CredentialStore, makeCredentialStoreLayer } from "./services/credentials";
import { makeObjectStoreLayer, type ObjectStore } from "./services/objects";

/**
 * Every service a request handler can depend on
 */
export type GatewayServices = ObjectStore | CredentialStore | TokenVerifier;

export type GatewayRuntime = ManagedRuntime.ManagedRuntime<GatewayServices, never>;

export function makeGatewayLayer(
	config: GatewayConfig,
): Layer.Layer<GatewayServices> {
	return Layer.mergeAll(
		makeObjectStoreLayer({
			root: config.rootDir,
			maxUploadBytes: config.maxUploadBytes,
		}),
		makeCredentialStoreLayer(config.userDbPath),
		makeTokenVerifierLayer(config),
	);
}

/**
 * One runtime per process, built once at startup and disposed on shutdown.
 */
export function makeGatewayRuntime(config: GatewayConfig): GatewayRuntime {
	return ManagedRuntime.make(makeGatewayLayer(config));
}

/**
 * Run an effect at the HTTP boundary.
 *
 * Typed failures are rethrown as-is (not wrapped) so Hono's error handler
 * can map them with isGatewayError. Defects and interruptions are rethrown
 * as whatever Cause.squash yields.
 */
export async function runGateway<A, E>(
	runtime: GatewayRuntime,
	effect: Effect.Effect<A, E, GatewayServices>,
): Promise<A> {
	const exit = await runtime.runPromiseExit(effect);
	if (Exit.isSuccess(exit)) return exit.value;
	throw Cause.squash(exit.cause);
}
