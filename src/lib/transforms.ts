/**
 * Request and response transformation helpers
 */

import { MAX_ERROR_TEXT_LENGTH } from "./constants.js";

export type QueryValue = string | number | boolean | null | undefined;

/** JSON bodies the gateway relays: objects and arrays */
export type JsonBody = Record<string, unknown> | unknown[];

/**
 * Truncate a string to maxLen characters, appending "..." if truncated
 */
export function truncate(str: string, maxLen: number): string {
	return str.length > maxLen ? `${str.substring(0, maxLen)}...` : str;
}

/**
 * Extract the token from an Authorization header.
 * Only the exact, case-sensitive "Bearer " prefix is accepted.
 */
export function extractBearerToken(authorization?: string | null): string | null {
	if (!authorization || !authorization.startsWith("Bearer ")) {
		return null;
	}
	const token = authorization.slice("Bearer ".length);
	return token.length > 0 ? token : null;
}

/**
 * Map parsed query fields to their upstream wire names, dropping empty values.
 *
 * @param values - Parsed fields keyed by their local names
 * @param wireNames - Local name → upstream name, for fields that differ
 */
export function toUpstreamParams(
	values: Record<string, QueryValue>,
	wireNames: Readonly<Record<string, string>> = {},
): Record<string, string> {
	const params: Record<string, string> = {};
	for (const [key, value] of Object.entries(values)) {
		if (value === undefined || value === null || value === "") {
			continue;
		}
		params[wireNames[key] ?? key] = String(value);
	}
	return params;
}

/**
 * Rename incoming query fields from wire names to local names and drop blank values
 */
export function fromWireParams(
	query: Record<string, string>,
	wireNames: Readonly<Record<string, string>>,
): Record<string, string> {
	const localNames = new Map<string, string>(
		Object.entries(wireNames).map(([local, wire]): [string, string] => [wire, local]),
	);
	const values: Record<string, string> = {};
	for (const [key, value] of Object.entries(query)) {
		if (value === "") {
			continue;
		}
		values[localNames.get(key) ?? key] = value;
	}
	return values;
}

/**
 * Check that a parsed JSON value is an object or array
 */
export function isJsonBody(value: unknown): value is JsonBody {
	return typeof value === "object" && value !== null;
}

/**
 * Parse an upstream error body. Empty or non-JSON bodies become `{ error: fallback }`.
 */
export function parseErrorBody(text: string, fallback: string): unknown {
	if (text.trim() === "") {
		return { error: fallback };
	}
	try {
		return JSON.parse(text);
	} catch {
		return { error: `${fallback} - ${truncate(text, MAX_ERROR_TEXT_LENGTH)}` };
	}
}
