// src/routes/schemas.ts
import { z } from "zod";

import { InvalidArgumentError } from "../models/errors";

/**
 * Request schemas using Zod, validated at the route boundary with
 * @hono/zod-validator. Stored data (the credential file) uses Effect Schema
 * in ../services/ instead.
 */

/** Largest value a numeric query flag may carry */
const FLAG_MAX = 255;

/**
 * `0` is false, any other small non-negative integer is true
 */
const queryFlag = z
	.string()
	.regex(/^\d+$/, { message: "Must be a non-negative integer" })
	.transform(Number)
	.refine((value) => value <= FLAG_MAX, {
		message: `Must be at most ${FLAG_MAX}`,
	})
	.transform((value) => value !== 0);

/**
 * GET /objects query
 */
export const listQuerySchema = z.object({
	prefix: z.string().optional(),
	recursive: queryFlag.optional(),
});
export type ListQuery = z.infer<typeof listQuerySchema>;

/**
 * GET/HEAD /objects/{key} query
 */
export const objectQuerySchema = z.object({
	download: queryFlag.optional(),
});
export type ObjectQuery = z.infer<typeof objectQuerySchema>;

export const signupSchema = z.object({
	username: z.string().min(1),
	password: z.string(),
});
export type SignupRequest = z.infer<typeof signupSchema>;

export const loginSchema = z.object({
	username: z.string(),
	password: z.string(),
	/** Space-delimited scopes; defaults to every configured route scope */
	scope: z.string().optional(),
	/** Requested lifetime, capped by AUTH_MAX_TTL_SECS */
	ttl_secs: z.number().int().nonnegative().optional(),
});
export type LoginRequest = z.infer<typeof loginSchema>;

/**
 * Format validation issues for the error body
 */
export function formatZodError(error: z.ZodError): string {
	return error.issues
		.map((issue) =>
			issue.path.length > 0
				? `${issue.path.join(".")}: ${issue.message}`
				: issue.message,
		)
		.join("; ");
}

/**
 * zValidator hook: validation failures become InvalidArgumentError so the
 * app error handler renders them like every other 400.
 */
export function rejectInvalid(
	result: { success: true } | { success: false; error: z.ZodError },
): void {
	if (!result.success) {
		throw new InvalidArgumentError({ reason: formatZodError(result.error) });
	}
}
