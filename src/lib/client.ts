/**
 * OpenEMR API Client
 *
 * Issues requests to OpenEMR's REST/FHIR API and OAuth 2.0 endpoints. Every failure
 * surfaces as either an OpenEmrApiError (upstream answered with a non-2xx status)
 * or an UpstreamRequestError (no usable answer).
 */

import { OpenEmrApiError, UpstreamRequestError } from "./errors.js";
import { isJsonBody, parseErrorBody, type JsonBody, type QueryValue } from "./transforms.js";
import type { ClientRegistration, FhirResource, PatientCreate } from "./schemas.js";
import {
	UPSTREAM_TIMEOUT_MS,
	FHIR_JSON,
	JSON_CONTENT_TYPE,
	FORM_CONTENT_TYPE,
} from "./constants.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export interface OpenEmrClientConfig {
	apiBaseUrl: string;
	oauthBaseUrl: string;
	timeoutMs?: number;
}

export interface RequestOptions {
	token?: string;
	params?: Record<string, QueryValue>;
	body?: unknown;
	headers?: Record<string, string>;
}

export class OpenEmrClient {
	private apiBaseUrl: string;
	private oauthBaseUrl: string;
	private timeoutMs: number;

	constructor(config: OpenEmrClientConfig) {
		this.apiBaseUrl = config.apiBaseUrl;
		this.oauthBaseUrl = config.oauthBaseUrl;
		this.timeoutMs = config.timeoutMs ?? UPSTREAM_TIMEOUT_MS;
	}

	// =========================================================================
	// Transport
	// =========================================================================

	/**
	 * Perform one fetch with the configured timeout and decode the JSON result.
	 * Not retried.
	 */
	private async send(url: string, init: RequestInit): Promise<JsonBody> {
		let response: Response;
		let text: string;
		try {
			response = await fetch(url, {
				...init,
				signal: AbortSignal.timeout(this.timeoutMs),
			});
			text = await response.text();
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			throw new UpstreamRequestError(message, { cause: error });
		}

		if (!response.ok) {
			const message = `OpenEMR error: ${response.status} ${response.statusText}`.trim();
			throw new OpenEmrApiError(message, response.status, parseErrorBody(text, message));
		}

		if (text.trim() === "") {
			return {};
		}

		let parsed: unknown;
		try {
			parsed = JSON.parse(text);
		} catch (error) {
			const reason = error instanceof Error ? error.message : "invalid JSON";
			throw new UpstreamRequestError(`Malformed response from OpenEMR: ${reason}`, {
				cause: error,
			});
		}
		if (!isJsonBody(parsed)) {
			throw new UpstreamRequestError("Malformed response from OpenEMR: expected an object or array");
		}
		return parsed;
	}

	/**
	 * Call an endpoint under the API base (`/apis/<site>`)
	 */
	async request(method: HttpMethod, endpoint: string, options: RequestOptions = {}): Promise<JsonBody> {
		const url = new URL(`${this.apiBaseUrl}${endpoint}`);
		for (const [key, value] of Object.entries(options.params ?? {})) {
			if (value !== undefined && value !== null && value !== "") {
				url.searchParams.append(key, String(value));
			}
		}

		const headers = new Headers(options.headers);
		if (options.token) {
			headers.set("Authorization", `Bearer ${options.token}`);
		}
		if (!headers.has("Accept")) {
			headers.set("Accept", FHIR_JSON);
		}
		if (!headers.has("Content-Type")) {
			headers.set("Content-Type", JSON_CONTENT_TYPE);
		}

		return this.send(url.toString(), {
			method,
			headers,
			body: options.body === undefined ? undefined : JSON.stringify(options.body),
		});
	}

	// =========================================================================
	// OAuth 2.0
	// =========================================================================

	/**
	 * Build the OpenEMR authorize URL for a browser redirect
	 */
	getAuthorizationUrl(params: Record<string, string>): string {
		const url = new URL(`${this.oauthBaseUrl}/authorize`);
		for (const [key, value] of Object.entries(params)) {
			url.searchParams.set(key, value);
		}
		return url.toString();
	}

	/**
	 * POST a form-encoded grant to the token endpoint
	 */
	async requestToken(form: URLSearchParams): Promise<JsonBody> {
		return this.send(`${this.oauthBaseUrl}/token`, {
			method: "POST",
			headers: { "Content-Type": FORM_CONTENT_TYPE },
			body: form.toString(),
		});
	}

	/**
	 * Dynamic client registration. OpenEMR returns client_id and client_secret.
	 */
	async registerClient(registration: ClientRegistration): Promise<JsonBody> {
		return this.send(`${this.oauthBaseUrl}/registration`, {
			method: "POST",
			headers: { "Content-Type": JSON_CONTENT_TYPE },
			body: JSON.stringify(registration),
		});
	}

	// =========================================================================
	// FHIR R4
	// =========================================================================

	/** Capability statement; OpenEMR serves it without a token */
	async getCapabilityStatement(): Promise<JsonBody> {
		return this.request("GET", "/fhir/metadata");
	}

	async searchFhir(resourceType: string, params: Record<string, QueryValue>, token: string): Promise<JsonBody> {
		return this.request("GET", `/fhir/${resourceType}`, { token, params });
	}

	async readFhir(resourceType: string, id: string, token: string): Promise<JsonBody> {
		return this.request("GET", `/fhir/${resourceType}/${encodeURIComponent(id)}`, { token });
	}

	async createFhir(resourceType: string, resource: FhirResource, token: string): Promise<JsonBody> {
		return this.request("POST", `/fhir/${resourceType}`, { token, body: resource });
	}

	/**
	 * Invoke a FHIR operation such as `DocumentReference/$docref`
	 */
	async fhirOperation(path: string, params: Record<string, QueryValue>, token: string): Promise<JsonBody> {
		return this.request("GET", `/fhir/${path}`, { token, params });
	}

	// =========================================================================
	// Standard API
	// =========================================================================

	async listPatients(params: Record<string, QueryValue>, token: string): Promise<JsonBody> {
		return this.request("GET", "/api/patient", { token, params });
	}

	async getPatient(pid: string, token: string): Promise<JsonBody> {
		return this.request("GET", `/api/patient/${encodeURIComponent(pid)}`, { token });
	}

	async createPatient(patient: PatientCreate, token: string): Promise<JsonBody> {
		return this.request("POST", "/api/patient", { token, body: patient });
	}

	async getPatientEncounters(pid: string, token: string): Promise<JsonBody> {
		return this.request("GET", `/api/patient/${encodeURIComponent(pid)}/encounter`, { token });
	}

	async listEncounters(params: Record<string, QueryValue>, token: string): Promise<JsonBody> {
		return this.request("GET", "/api/encounter", { token, params });
	}

	async listAppointments(params: Record<string, QueryValue>, token: string): Promise<JsonBody> {
		return this.request("GET", "/api/appointment", { token, params });
	}
}
