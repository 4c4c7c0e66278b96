/**
 * Caller identity for one request.
 *
 * Built from a verified token, or anonymous when the gate is disabled for
 * the route class. Never persisted.
 */
export interface AuthUser {
	readonly subject?: string;
	readonly scopes: ReadonlySet<string>;
	readonly issuer?: string;
	readonly audiences: readonly string[];
}

export const anonymousUser = (): AuthUser => ({
	scopes: new Set<string>(),
	audiences: [],
});
