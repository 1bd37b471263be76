/**
 * OAuth 2.0 Routes
 *
 * Relays OpenEMR's authorization code flow:
 * - GET  /oauth/authorize  redirect to OpenEMR's authorize endpoint
 * - GET  /oauth/callback   exchange the returned code for a token
 * - POST /oauth/token      authorization_code / refresh_token grants
 * - POST /oauth/register   dynamic client registration
 */

import { Hono } from "hono";
import {
	AuthorizeQuerySchema,
	CallbackQuerySchema,
	ClientRegistrationSchema,
	TokenRequestSchema,
	parseInput,
	parseJsonBody,
} from "../lib/schemas.js";
import {
	buildAuthorizationRedirect,
	exchangeCallbackCode,
	exchangeToken,
} from "../lib/oauth.js";
import { fromWireParams } from "../lib/transforms.js";
import type { AppEnv, GatewayDependencies } from "../app.js";

export function createOAuthRoutes({ config, client, store }: GatewayDependencies) {
	const oauthRoutes = new Hono<AppEnv>();

	/**
	 * GET /oauth/authorize
	 * Missing client_id, redirect_uri and scope fall back to configured defaults.
	 */
	oauthRoutes.get("/oauth/authorize", async (c) => {
		const query = parseInput(AuthorizeQuerySchema, fromWireParams(c.req.query(), {}));
		const location = await buildAuthorizationRedirect(query, config, client, store);
		return c.redirect(location, 302);
	});

	/**
	 * GET /oauth/callback
	 * OpenEMR redirects here after the user authorizes.
	 */
	oauthRoutes.get("/oauth/callback", async (c) => {
		const { code, state } = parseInput(CallbackQuerySchema, fromWireParams(c.req.query(), {}));
		const token = await exchangeCallbackCode(code, state, config, client, store);
		c.header("Cache-Control", "no-store");
		return c.json(token);
	});

	/**
	 * POST /oauth/token
	 */
	oauthRoutes.post("/oauth/token", async (c) => {
		const request = await parseJsonBody(c.req, TokenRequestSchema);
		const token = await exchangeToken(client, request, config);
		c.header("Cache-Control", "no-store");
		c.header("Pragma", "no-cache");
		return c.json(token);
	});

	/**
	 * POST /oauth/register
	 * The response (client_id, client_secret) is relayed as-is and not kept.
	 */
	oauthRoutes.post("/oauth/register", async (c) => {
		const registration = await parseJsonBody(c.req, ClientRegistrationSchema);
		const result = await client.registerClient(registration);
		c.header("Cache-Control", "no-store");
		return c.json(result, 201);
	});

	return oauthRoutes;
}
