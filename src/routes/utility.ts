/**
 * Utility Routes
 *
 * Service information and health check.
 */

import { Hono } from "hono";
import { maskSecret } from "../lib/token-storage.js";
import { APP_NAME, APP_VERSION } from "../lib/constants.js";
import type { AppEnv, GatewayDependencies } from "../app.js";

export function createUtilityRoutes({ config }: GatewayDependencies) {
	const utilityRoutes = new Hono<AppEnv>();

	/**
	 * GET / - Service info
	 */
	utilityRoutes.get("/", (c) => {
		return c.json({
			name: APP_NAME,
			version: APP_VERSION,
			openemr_url: config.baseUrl,
			fhir_base: `${config.apiBaseUrl}/fhir`,
			api_base: `${config.apiBaseUrl}/api`,
			oauth_client: config.clientId ? maskSecret(config.clientId) : null,
			health: "/health",
		});
	});

	/**
	 * GET /health
	 */
	utilityRoutes.get("/health", (c) => {
		return c.json({ status: "ok" });
	});

	return utilityRoutes;
}
