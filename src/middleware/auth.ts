/**
 * Bearer token middleware
 *
 * Rejects requests without an `Authorization: Bearer <token>` header before any
 * upstream call is made. The token itself is not inspected; OpenEMR validates it.
 */

import { createMiddleware } from "hono/factory";
import { GatewayError } from "../lib/errors.js";
import { extractBearerToken } from "../lib/transforms.js";
import type { AppEnv } from "../app.js";

export const bearerAuth = createMiddleware<AppEnv>(async (c, next) => {
	const token = extractBearerToken(c.req.header("Authorization"));

	if (!token) {
		throw new GatewayError("Authorization header with Bearer token required", 401);
	}

	c.set("accessToken", token);

	await next();
});
