import type { AuthUser } from "./models/principal";
import type { RequestEventBuilder } from "./services/telemetry";

/**
 * Hono environment shared by every route and middleware
 */
export type GatewayEnv = {
	Variables: {
		/** Set by the auth middleware on object routes */
		user: AuthUser;
		/** Set by the request middleware for every request */
		telemetry: RequestEventBuilder;
	};
};
