/**
 * Error handling utilities for the OpenEMR Gateway
 *
 * Routes and the upstream client throw the classes below; `handleError` turns any
 * of them into the HTTP response the caller sees.
 */
import type { ZodError } from "zod";
import { JSON_CONTENT_TYPE } from "./constants.js";

/**
 * Error for a non-2xx response from OpenEMR.
 * `status` and `data` are relayed to the caller unchanged.
 */
export class OpenEmrApiError extends Error {
	status: number;
	data: unknown;

	constructor(message: string, status: number, data: unknown) {
		super(message);
		this.name = "OpenEmrApiError";
		this.status = status;
		this.data = data;
	}
}

/**
 * Error for a request that never produced a usable upstream response:
 * timeout, connection failure or a malformed body.
 */
export class UpstreamRequestError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "UpstreamRequestError";
	}
}

/**
 * Client input error detected locally, never forwarded upstream
 */
export class GatewayError extends Error {
	status: 400 | 401;

	constructor(message: string, status: 400 | 401 = 400) {
		super(message);
		this.name = "GatewayError";
		this.status = status;
	}
}

export interface ValidationIssue {
	field: string;
	messages: string[];
}

/**
 * Group Zod issues by field path
 */
export function formatValidationIssues(issues: ZodError["errors"]): ValidationIssue[] {
	const messagesByPath = new Map<string, string[]>();

	for (const issue of issues) {
		const path = issue.path.length > 0 ? issue.path.join(".") : "body";
		const messages = messagesByPath.get(path) || [];
		messages.push(issue.message);
		messagesByPath.set(path, messages);
	}

	return Array.from(messagesByPath, ([field, messages]) => ({ field, messages }));
}

/**
 * Request body or query failed validation
 */
export class RequestValidationError extends Error {
	issues: ValidationIssue[];

	constructor(issues: ValidationIssue[]) {
		super("Request validation failed");
		this.name = "RequestValidationError";
		this.issues = issues;
	}

	static fromZodError(error: ZodError): RequestValidationError {
		return new RequestValidationError(formatValidationIssues(error.errors));
	}
}

/**
 * Safe error logger that avoids leaking tokens or request bodies
 */
export function safeLogError(context: string, error: unknown): void {
	const message = error instanceof Error ? error.message : "Unknown error";
	console.error(`${context}: ${message}`);
}

// Statuses a Response may not carry a body with
const NULL_BODY_STATUSES = new Set([204, 205, 304]);

/**
 * Build a JSON response with an arbitrary status code.
 * Upstream statuses are not known at compile time, so this bypasses Hono's
 * status-literal typing.
 */
export function jsonResponse(body: unknown, status: number, headers?: Record<string, string>): Response {
	return new Response(NULL_BODY_STATUSES.has(status) ? null : JSON.stringify(body), {
		status,
		headers: { "Content-Type": JSON_CONTENT_TYPE, ...headers },
	});
}

/**
 * Central error handler that maps errors to gateway responses
 */
export function handleError(error: unknown): Response {
	if (error instanceof OpenEmrApiError) {
		if (error.status >= 500) {
			safeLogError("OpenEMR returned an error", error);
		}
		return jsonResponse(error.data, error.status);
	}

	if (error instanceof GatewayError) {
		const headers: Record<string, string> =
			error.status === 401 ? { "WWW-Authenticate": "Bearer" } : {};
		return jsonResponse({ detail: error.message }, error.status, headers);
	}

	if (error instanceof RequestValidationError) {
		return jsonResponse(
			{ detail: error.message, errors: error.issues },
			422,
		);
	}

	if (error instanceof UpstreamRequestError) {
		safeLogError("OpenEMR request failed", error);
		return jsonResponse({ detail: `Request error: ${error.message}` }, 500);
	}

	safeLogError("Unhandled error", error);
	return jsonResponse(
		{
			error: "internal_server_error",
			message: "An unexpected error occurred",
		},
		500,
	);
}
