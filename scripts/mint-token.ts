/**
 * Mint an HS256 access token for local testing.
 *
 * Usage:
 *   JWT_HS_SECRET=... npm run mint-token -- --sub u1 --scope "obj:write obj:read"
 */

import { Command, InvalidArgumentError } from "commander";
import { Effect } from "effect";

import { createAccessToken } from "../src/auth/token";

interface MintOptions {
	sub: string;
	scope: string;
	ttl: number;
	iss?: string;
	aud?: string;
}

function parseSeconds(value: string): number {
	if (!/^\d+$/.test(value)) {
		throw new InvalidArgumentError("Must be a whole number of seconds.");
	}
	return Number(value);
}

const program: Command = new Command();

program
	.name("mint-token")
	.description("Print a signed HS256 access token for the gateway")
	.option("--sub <subject>", "token subject", "u1")
	.option("--scope <scopes>", "space-delimited scopes", "obj:write obj:read")
	.option("--ttl <seconds>", "lifetime in seconds", parseSeconds, 3600)
	.option("--iss <issuer>", "issuer (defaults to TEST_ISS)", process.env.TEST_ISS)
	.option("--aud <audience>", "audience (defaults to JWT_AUDIENCE)", process.env.JWT_AUDIENCE)
	.action(async () => {
		const options = program.opts<MintOptions>();
		const secret = process.env.JWT_HS_SECRET;
		if (!secret) {
			program.error("JWT_HS_SECRET must be set");
		}

		const token = await Effect.runPromise(
			createAccessToken({
				secret,
				subject: options.sub,
				scope: options.scope,
				ttlSecs: options.ttl,
				issuer: options.iss,
				audience: options.aud,
			}),
		);
		console.log(token);
	});

await program.parseAsync();
