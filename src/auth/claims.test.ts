import { describe, expect, it } from "vitest";

import { UnauthenticatedError } from "../models/errors";
import {
	audienceValues,
	hasAnyScope,
	scopesFromClaims,
	validateClaims,
} from "./claims";

const NOW = 1_700_000_000;

describe("scopesFromClaims", () => {
	it("should split a space-delimited scope claim", () => {
		expect([...scopesFromClaims({ scope: "obj:read  obj:write" })]).toEqual([
			"obj:read",
			"obj:write",
		]);
	});

	it("should read a scopes array when scope is absent", () => {
		expect([...scopesFromClaims({ scopes: ["obj:list", 7] })]).toEqual([
			"obj:list",
		]);
	});

	it("should fall back to scp", () => {
		expect([...scopesFromClaims({ scp: "obj:read" })]).toEqual(["obj:read"]);
	});

	it("should prefer scope over scopes and scp", () => {
		const scopes = scopesFromClaims({
			scope: "a",
			scopes: ["b"],
			scp: "c",
		});
		expect([...scopes]).toEqual(["a"]);
	});

	it("should skip a scope claim of the wrong shape", () => {
		expect([...scopesFromClaims({ scope: ["a"], scp: "c" })]).toEqual(["c"]);
	});

	it("should return no scopes when none are present", () => {
		expect(scopesFromClaims({}).size).toBe(0);
	});
});

describe("audienceValues", () => {
	it("should accept a string or an array", () => {
		expect(audienceValues({ aud: "api" })).toEqual(["api"]);
		expect(audienceValues({ aud: ["api", "web"] })).toEqual(["api", "web"]);
		expect(audienceValues({})).toEqual([]);
	});
});

describe("hasAnyScope", () => {
	it("should pass on any overlap", () => {
		expect(hasAnyScope(["obj:write", "admin"], new Set(["admin"]))).toBe(true);
	});

	it("should fail without overlap", () => {
		expect(hasAnyScope(["obj:write"], new Set(["obj:read"]))).toBe(false);
	});

	it("should pass an empty requirement", () => {
		expect(hasAnyScope([], new Set())).toBe(true);
	});
});

describe("validateClaims", () => {
	const reasonOf = (fn: () => unknown): string | undefined => {
		try {
			fn();
		} catch (error) {
			if (error instanceof UnauthenticatedError) return error.reason;
			throw error;
		}
		return undefined;
	};

	it("should build a principal from valid claims", () => {
		const user = validateClaims(
			{ sub: "u1", exp: NOW + 60, iss: "issuer-a", aud: "api", scope: "x y" },
			{ issuers: ["issuer-a"], audience: "api" },
			NOW,
		);

		expect(user.subject).toBe("u1");
		expect(user.issuer).toBe("issuer-a");
		expect(user.audiences).toEqual(["api"]);
		expect([...user.scopes]).toEqual(["x", "y"]);
	});

	it("should require exp", () => {
		expect(reasonOf(() => validateClaims({ sub: "u1" }, { issuers: [] }, NOW))).toBe(
			"exp missing",
		);
	});

	it("should reject a token at its expiry second", () => {
		expect(reasonOf(() => validateClaims({ exp: NOW }, { issuers: [] }, NOW))).toBe(
			"token expired",
		);
	});

	it("should enforce the issuer allow-list only when configured", () => {
		expect(
			reasonOf(() =>
				validateClaims({ exp: NOW + 1 }, { issuers: ["issuer-a"] }, NOW),
			),
		).toBe("iss missing");
		expect(
			reasonOf(() =>
				validateClaims(
					{ exp: NOW + 1, iss: "issuer-b" },
					{ issuers: ["issuer-a"] },
					NOW,
				),
			),
		).toBe("issuer not allowed");
		expect(
			reasonOf(() =>
				validateClaims({ exp: NOW + 1, iss: "anyone" }, { issuers: [] }, NOW),
			),
		).toBeUndefined();
	});

	it("should match the audience against string and array claims", () => {
		const policy = { issuers: [], audience: "api" };

		expect(
			reasonOf(() => validateClaims({ exp: NOW + 1, aud: ["web", "api"] }, policy, NOW)),
		).toBeUndefined();
		expect(
			reasonOf(() => validateClaims({ exp: NOW + 1, aud: "web" }, policy, NOW)),
		).toBe("audience mismatch");
		expect(reasonOf(() => validateClaims({ exp: NOW + 1 }, policy, NOW))).toBe(
			"audience mismatch",
		);
	});
});
