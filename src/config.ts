/**
 * Gateway configuration.
 *
 * Loaded once from the environment at startup, deep-frozen, and passed
 * explicitly to the app factory. Nothing reads process.env after that.
 */

export type AuthMode = "off" | "jwt_hs256" | "jwt_rs256";

export type RouteClass = "write" | "read" | "list";

export interface RoutePolicy {
	/** Whether the gate checks tokens for this route class */
	readonly protected: boolean;
	/** Token must carry at least one of these; empty means no scope check */
	readonly requiredScopes: readonly string[];
}

export interface GatewayConfig {
	readonly host: string;
	readonly port: number;
	/** Store root directory */
	readonly rootDir: string;
	/** Upload cap in bytes; undefined means unbounded */
	readonly maxUploadBytes: number | undefined;
	/** Upper bound on the lifetime of tokens minted by /auth/login */
	readonly authMaxTtlSecs: number;
	readonly authMode: AuthMode;
	readonly routes: Readonly<Record<RouteClass, RoutePolicy>>;
	readonly jwtAudience: string | undefined;
	/** Issuer allow-list; empty allows any issuer */
	readonly jwtIssuers: readonly string[];
	readonly jwksUrls: readonly string[];
	readonly jwksTtlSecs: number;
	readonly jwtHsSecret: string | undefined;
	/** Dev-only credential store (JSON array of username/password) */
	readonly userDbPath: string;
}

type Env = Readonly<Record<string, string | undefined>>;

// ============================================================================
// Parsers
// ============================================================================

export function parseCsv(value: string | undefined): string[] | undefined {
	if (value === undefined) return undefined;
	return value
		.split(",")
		.map((item) => item.trim())
		.filter((item) => item.length > 0);
}

/** `1`, `true`, `yes`, `on` are true; any other value is false */
export function parseBool(value: string | undefined): boolean | undefined {
	if (value === undefined) return undefined;
	return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

export function parseAuthMode(value: string | undefined): AuthMode {
	switch (value?.trim().toLowerCase()) {
		case "off":
			return "off";
		case "jwt_hs256":
			return "jwt_hs256";
		default:
			return "jwt_rs256";
	}
}

function parseNonNegativeInt(value: string | undefined): number | undefined {
	if (value === undefined || !/^\d+$/.test(value.trim())) return undefined;
	const parsed = Number(value.trim());
	return Number.isSafeInteger(parsed) ? parsed : undefined;
}

function parsePort(value: string | undefined): number | undefined {
	const port = parseNonNegativeInt(value);
	return port !== undefined && port <= 65_535 ? port : undefined;
}

function nonBlank(value: string | undefined): string | undefined {
	return value !== undefined && value.trim() !== "" ? value : undefined;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
	for (const child of Object.values(value)) {
		if (typeof child === "object" && child !== null) {
			deepFreeze(child);
		}
	}
	return Object.freeze(value);
}

// ============================================================================
// Loader
// ============================================================================

export const loadConfig = (env: Env = process.env): GatewayConfig =>
	deepFreeze({
		host: env.HOST ?? "0.0.0.0",
		port: parsePort(env.PORT) ?? 8080,
		rootDir: env.BUCKET_DIR ?? "data",
		maxUploadBytes: parseNonNegativeInt(env.MAX_UPLOAD_BYTES),
		authMaxTtlSecs: parseNonNegativeInt(env.AUTH_MAX_TTL_SECS) ?? 900,
		authMode: parseAuthMode(env.AUTH_MODE),
		routes: {
			write: {
				protected: parseBool(env.AUTH_WRITE) ?? true,
				requiredScopes: parseCsv(env.JWT_SCOPES_WRITE) ?? ["obj:write"],
			},
			read: {
				protected: parseBool(env.AUTH_READ) ?? false,
				requiredScopes: parseCsv(env.JWT_SCOPES_READ) ?? ["obj:read"],
			},
			list: {
				protected: parseBool(env.AUTH_LIST) ?? false,
				requiredScopes: parseCsv(env.JWT_SCOPES_LIST) ?? ["obj:list"],
			},
		},
		jwtAudience: nonBlank(env.JWT_AUDIENCE),
		jwtIssuers: parseCsv(env.JWT_ISSUERS) ?? [],
		jwksUrls: parseCsv(env.JWKS_URLS) ?? [],
		jwksTtlSecs: parseNonNegativeInt(env.JWKS_TTL_SECS) ?? 300,
		jwtHsSecret: nonBlank(env.JWT_HS_SECRET),
		userDbPath: env.AUTH_USER_DB ?? "./auth/users.json",
	});

/**
 * Startup warnings for auth settings that will reject every protected request.
 */
export function configWarnings(config: GatewayConfig): string[] {
	const warnings: string[] = [];
	if (config.authMode === "jwt_hs256" && config.jwtHsSecret === undefined) {
		warnings.push("AUTH_MODE=jwt_hs256 but JWT_HS_SECRET is not set");
	}
	if (config.authMode === "jwt_rs256") {
		warnings.push(
			"AUTH_MODE=jwt_rs256 has no verifier yet; protected routes answer 500",
		);
	}
	return warnings;
}

/**
 * Config summary for the startup log line. Never includes the secret.
 */
export function describeConfig(config: GatewayConfig): Record<string, unknown> {
	return {
		host: config.host,
		port: config.port,
		rootDir: config.rootDir,
		maxUploadBytes: config.maxUploadBytes ?? null,
		authMode: config.authMode,
		routes: config.routes,
		audience: config.jwtAudience ?? null,
		issuers: config.jwtIssuers,
		jwksUrls: config.jwksUrls,
		jwksTtlSecs: config.jwksTtlSecs,
		hsSecretConfigured: config.jwtHsSecret !== undefined,
	};
}
