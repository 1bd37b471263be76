/**
 * OAuth 2.0 relay
 *
 * Builds the grant bodies and authorize redirects the gateway forwards to OpenEMR.
 * OpenEMR stays the authority on every grant; only fields needed to form a valid
 * request are checked here.
 */

import { GatewayError, UpstreamRequestError } from "./errors.js";
import { TokenRecordSchema, type AuthorizeQuery, type TokenRecord, type TokenRequest } from "./schemas.js";
import { generateState, type TokenStore } from "./token-storage.js";
import type { OpenEmrClient } from "./client.js";
import { DEFAULT_SCOPE, DEFAULT_TOKEN_EXPIRES_IN_SECONDS } from "./constants.js";

/** Client settings the relay needs from the gateway configuration */
export interface OAuthClientSettings {
	clientId: string;
	clientSecret: string;
	redirectUri: string;
}

/**
 * Build the form body for the token endpoint.
 *
 * Unrecognised grant types pass through without local checks.
 */
export function buildTokenForm(request: TokenRequest, settings: OAuthClientSettings): URLSearchParams {
	const form = new URLSearchParams({ grant_type: request.grant_type });

	if (request.grant_type === "authorization_code") {
		if (!request.code) {
			throw new GatewayError("code is required for authorization_code grant");
		}
		form.set("code", request.code);
		form.set("redirect_uri", request.redirect_uri || settings.redirectUri);
		if (request.code_verifier) {
			form.set("code_verifier", request.code_verifier);
		}
	} else if (request.grant_type === "refresh_token") {
		if (!request.refresh_token) {
			throw new GatewayError("refresh_token is required for refresh_token grant");
		}
		form.set("refresh_token", request.refresh_token);
	}

	if (settings.clientId) {
		form.set("client_id", settings.clientId);
	}
	if (settings.clientSecret) {
		form.set("client_secret", settings.clientSecret);
	}

	return form;
}

/**
 * Validate a token endpoint response as a TokenRecord
 */
export function parseTokenRecord(body: unknown): TokenRecord {
	const result = TokenRecordSchema.safeParse(body);
	if (!result.success) {
		throw new UpstreamRequestError("Malformed token response from OpenEMR", {
			cause: result.error,
		});
	}
	return result.data;
}

/**
 * Forward a grant to OpenEMR and return the issued token
 */
export async function exchangeToken(
	client: OpenEmrClient,
	request: TokenRequest,
	settings: OAuthClientSettings,
): Promise<TokenRecord> {
	const form = buildTokenForm(request, settings);
	return parseTokenRecord(await client.requestToken(form));
}

/**
 * Resolve the OpenEMR authorize URL for a browser redirect.
 * A state is generated and recorded when the caller supplies none.
 */
export async function buildAuthorizationRedirect(
	query: AuthorizeQuery,
	settings: OAuthClientSettings,
	client: OpenEmrClient,
	store: TokenStore,
): Promise<string> {
	const clientId = query.client_id || settings.clientId;
	if (!clientId) {
		throw new GatewayError("client_id is required");
	}

	let state = query.state;
	if (!state) {
		state = generateState();
		await store.put(state, { type: "oauth_state", createdAt: Date.now() });
	}

	return client.getAuthorizationUrl({
		response_type: query.response_type,
		client_id: clientId,
		redirect_uri: query.redirect_uri || settings.redirectUri,
		scope: query.scope || DEFAULT_SCOPE,
		state,
	});
}

/**
 * Exchange the code delivered to the callback and remember the issued token.
 *
 * NOTE: `state` is not compared against values recorded by
 * buildAuthorizationRedirect, so the callback offers no CSRF protection. Kept
 * as-is until it is decided whether OpenEMR-initiated callbacks without a
 * gateway-issued state must keep working.
 */
export async function exchangeCallbackCode(
	code: string,
	_state: string | undefined,
	settings: OAuthClientSettings,
	client: OpenEmrClient,
	store: TokenStore,
): Promise<TokenRecord> {
	const token = await exchangeToken(
		client,
		{
			grant_type: "authorization_code",
			code,
			redirect_uri: settings.redirectUri,
			refresh_token: undefined,
			code_verifier: undefined,
		},
		settings,
	);

	const expiresIn = token.expires_in ?? DEFAULT_TOKEN_EXPIRES_IN_SECONDS;
	await store.put(token.access_token, {
		type: "token",
		tokenData: token,
		expiresAt: Date.now() + expiresIn * 1000,
	});

	return token;
}
