/**
 * OpenEMR Gateway - Main Hono Application
 */

import { Hono } from "hono";
import { logger } from "hono/logger";
import { handleError } from "./lib/errors.js";
import { OpenEmrClient } from "./lib/client.js";
import { MemoryTokenStore, type TokenStore } from "./lib/token-storage.js";
import type { GatewayConfig } from "./lib/config.js";
import { createOAuthRoutes } from "./routes/oauth.js";
import { createFhirRoutes } from "./routes/fhir.js";
import { createStandardApiRoutes } from "./routes/api.js";
import { createUtilityRoutes } from "./routes/utility.js";

// Variables interface for Hono context
interface Variables {
	accessToken: string;
}

export type AppEnv = { Variables: Variables };

/** Everything the routes need */
export interface GatewayDependencies {
	config: GatewayConfig;
	client: OpenEmrClient;
	store: TokenStore;
}

export function createDependencies(config: GatewayConfig): GatewayDependencies {
	return {
		config,
		client: new OpenEmrClient({
			apiBaseUrl: config.apiBaseUrl,
			oauthBaseUrl: config.oauthBaseUrl,
		}),
		store: new MemoryTokenStore(),
	};
}

const ALLOWED_METHODS = "GET, POST, PUT, PATCH, DELETE, OPTIONS";
const DEFAULT_ALLOWED_HEADERS = "Content-Type, Authorization";

/**
 * Pick the Access-Control-Allow-Origin value for a request, or null if not allowed.
 * With a wildcard allowlist the caller's origin is echoed so credentials still work.
 */
function resolveCorsOrigin(requestOrigin: string | undefined, allowed: string[]): string | null {
	if (allowed.includes("*")) {
		return requestOrigin || "*";
	}
	return requestOrigin && allowed.includes(requestOrigin) ? requestOrigin : null;
}

export function createApp(deps: GatewayDependencies) {
	const app = new Hono<AppEnv>();

	if (deps.config.requestLogging) {
		app.use("*", logger());
	}

	// CORS and security headers
	app.use("*", async (c, next) => {
		const corsOrigin = resolveCorsOrigin(c.req.header("Origin"), deps.config.corsAllowedOrigins);
		const allowCredentials = corsOrigin !== null && corsOrigin !== "*";

		// Handle OPTIONS preflight requests
		if (c.req.method === "OPTIONS") {
			return new Response(null, {
				status: 204,
				headers: {
					...(corsOrigin ? { "Access-Control-Allow-Origin": corsOrigin } : {}),
					...(allowCredentials ? { "Access-Control-Allow-Credentials": "true" } : {}),
					Vary: "Origin",
					"Access-Control-Allow-Methods": ALLOWED_METHODS,
					"Access-Control-Allow-Headers":
						c.req.header("Access-Control-Request-Headers") || DEFAULT_ALLOWED_HEADERS,
					"Access-Control-Max-Age": "600",
				},
			});
		}

		await next();

		if (corsOrigin) {
			c.res.headers.set("Access-Control-Allow-Origin", corsOrigin);
			if (allowCredentials) {
				c.res.headers.set("Access-Control-Allow-Credentials", "true");
			}
		}
		c.res.headers.append("Vary", "Origin");
		c.res.headers.set("X-Content-Type-Options", "nosniff");
	});

	app.onError((err) => handleError(err));

	app.route("/", createUtilityRoutes(deps)); // Service info, health
	app.route("/", createOAuthRoutes(deps)); // authorize, callback, token, register
	app.route("/", createFhirRoutes(deps)); // FHIR R4
	app.route("/", createStandardApiRoutes(deps)); // Standard API

	app.notFound((c) => {
		return c.json({ detail: "Not Found" }, 404);
	});

	return app;
}
