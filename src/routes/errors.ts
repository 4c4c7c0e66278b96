import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";

import { isGatewayError } from "../models/errors";
import { formatUnsatisfiedRange } from "../storage/range";
import type { GatewayEnv } from "../types";

const INTERNAL_MESSAGE = "internal server error";

/**
 * App-wide error handler.
 *
 * Gateway errors carry their own status and code. Client errors echo the
 * message; server errors answer with a generic message and the cause is
 * only recorded on the request's wide event.
 */
export const handleError = (error: Error, c: Context<GatewayEnv>): Response => {
	const telemetry = c.get("telemetry");

	if (isGatewayError(error)) {
		telemetry.setError({
			type: error._tag,
			code: error.code,
			message: error.message,
		});

		if (error._tag === "RangeNotSatisfiableError") {
			c.header("Content-Range", formatUnsatisfiedRange(error.size));
		}

		const message = error.httpStatus >= 500 ? INTERNAL_MESSAGE : error.message;
		return c.json({ error: message, code: error.code }, error.httpStatus);
	}

	if (error instanceof HTTPException) {
		// Raised by Hono itself, e.g. malformed JSON in a validated body
		const code = error.status === 400 ? "INVALID_ARGUMENT" : "HTTP_ERROR";
		telemetry.setError({ type: "HTTPException", code, message: error.message });

		const message = error.status >= 500 ? INTERNAL_MESSAGE : error.message;
		return c.json({ error: message, code }, error.status);
	}

	telemetry.setError({
		type: error.name,
		code: "INTERNAL",
		message: error.message,
	});
	return c.json({ error: INTERNAL_MESSAGE, code: "INTERNAL" }, 500);
};

export const handleNotFound = (c: Context<GatewayEnv>): Response =>
	c.json({ error: "not found", code: "NOT_FOUND" }, 404);
