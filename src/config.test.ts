import { describe, expect, it } from "vitest";

import {
	configWarnings,
	describeConfig,
	loadConfig,
	parseAuthMode,
	parseBool,
	parseCsv,
} from "./config";

describe("loadConfig", () => {
	it("should apply defaults to an empty environment", () => {
		const config = loadConfig({});

		expect(config).toMatchObject({
			host: "0.0.0.0",
			port: 8080,
			rootDir: "data",
			maxUploadBytes: undefined,
			authMaxTtlSecs: 900,
			authMode: "jwt_rs256",
			jwtAudience: undefined,
			jwtIssuers: [],
			jwksUrls: [],
			jwksTtlSecs: 300,
			jwtHsSecret: undefined,
			userDbPath: "./auth/users.json",
		});
		expect(config.routes).toEqual({
			write: { protected: true, requiredScopes: ["obj:write"] },
			read: { protected: false, requiredScopes: ["obj:read"] },
			list: { protected: false, requiredScopes: ["obj:list"] },
		});
	});

	it("should read every variable", () => {
		const config = loadConfig({
			HOST: "127.0.0.1",
			PORT: "9000",
			BUCKET_DIR: "/srv/bucket",
			MAX_UPLOAD_BYTES: "1024",
			AUTH_MAX_TTL_SECS: "60",
			AUTH_MODE: "JWT_HS256",
			AUTH_WRITE: "no",
			AUTH_READ: "yes",
			AUTH_LIST: "on",
			JWT_SCOPES_WRITE: "w1, w2",
			JWT_SCOPES_READ: "r1",
			JWT_SCOPES_LIST: "",
			JWT_AUDIENCE: "api",
			JWT_ISSUERS: "issuer-a,issuer-b",
			JWKS_URLS: "http://keys.invalid/jwks.json",
			JWKS_TTL_SECS: "30",
			JWT_HS_SECRET: "test-secret",
			AUTH_USER_DB: "/tmp/users.json",
		});

		expect(config.host).toBe("127.0.0.1");
		expect(config.port).toBe(9000);
		expect(config.rootDir).toBe("/srv/bucket");
		expect(config.maxUploadBytes).toBe(1024);
		expect(config.authMaxTtlSecs).toBe(60);
		expect(config.authMode).toBe("jwt_hs256");
		expect(config.routes.write).toEqual({
			protected: false,
			requiredScopes: ["w1", "w2"],
		});
		expect(config.routes.read.protected).toBe(true);
		expect(config.routes.list).toEqual({ protected: true, requiredScopes: [] });
		expect(config.jwtAudience).toBe("api");
		expect(config.jwtIssuers).toEqual(["issuer-a", "issuer-b"]);
		expect(config.jwksUrls).toEqual(["http://keys.invalid/jwks.json"]);
		expect(config.jwksTtlSecs).toBe(30);
		expect(config.jwtHsSecret).toBe("test-secret");
		expect(config.userDbPath).toBe("/tmp/users.json");
	});

	it("should fall back on invalid numbers", () => {
		const config = loadConfig({
			PORT: "99999",
			MAX_UPLOAD_BYTES: "-1",
			AUTH_MAX_TTL_SECS: "soon",
		});

		expect(config.port).toBe(8080);
		expect(config.maxUploadBytes).toBeUndefined();
		expect(config.authMaxTtlSecs).toBe(900);
	});

	it("should treat blank secrets and audiences as unset", () => {
		const config = loadConfig({ JWT_HS_SECRET: "  ", JWT_AUDIENCE: "" });

		expect(config.jwtHsSecret).toBeUndefined();
		expect(config.jwtAudience).toBeUndefined();
	});

	it("should freeze the result deeply", () => {
		const config = loadConfig({});

		expect(Object.isFrozen(config)).toBe(true);
		expect(Object.isFrozen(config.routes.write)).toBe(true);
		expect(Object.isFrozen(config.routes.write.requiredScopes)).toBe(true);
	});
});

describe("parsers", () => {
	it("should split CSV values and drop empties", () => {
		expect(parseCsv(" a, b ,,c ")).toEqual(["a", "b", "c"]);
		expect(parseCsv("")).toEqual([]);
		expect(parseCsv(undefined)).toBeUndefined();
	});

	it.each([
		["1", true],
		["TRUE", true],
		["yes", true],
		["on", true],
		["0", false],
		["off", false],
		["maybe", false],
	])("should parse %j as %j", (value, expected) => {
		expect(parseBool(value)).toBe(expected);
	});

	it("should map unknown auth modes to jwt_rs256", () => {
		expect(parseAuthMode("off")).toBe("off");
		expect(parseAuthMode("jwt_hs256")).toBe("jwt_hs256");
		expect(parseAuthMode("basic")).toBe("jwt_rs256");
		expect(parseAuthMode(undefined)).toBe("jwt_rs256");
	});
});

describe("configWarnings", () => {
	it("should warn about HS256 without a secret", () => {
		expect(configWarnings(loadConfig({ AUTH_MODE: "jwt_hs256" }))).toEqual([
			"AUTH_MODE=jwt_hs256 but JWT_HS_SECRET is not set",
		]);
	});

	it("should warn that RS256 fails closed", () => {
		expect(configWarnings(loadConfig({}))).toHaveLength(1);
	});

	it("should stay quiet for a complete HS256 setup", () => {
		const config = loadConfig({ AUTH_MODE: "jwt_hs256", JWT_HS_SECRET: "test-secret" });

		expect(configWarnings(config)).toEqual([]);
	});
});

describe("describeConfig", () => {
	it("should never include the secret", () => {
		const summary = describeConfig(
			loadConfig({ AUTH_MODE: "jwt_hs256", JWT_HS_SECRET: "test-secret" }),
		);

		expect(summary.hsSecretConfigured).toBe(true);
		expect(JSON.stringify(summary)).not.toContain("test-secret");
	});
});
