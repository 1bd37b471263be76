/**
 * Application Tests
 *
 * Service info, CORS handling and fallback responses.
 */

import { describe, it, expect } from "vitest";
import { createTestApp } from "./setup.js";

describe("utility routes", () => {
	it("should describe the gateway", async () => {
		const { app } = createTestApp();

		const res = await app.request("/");

		expect(res.status).toBe(200);
		expect(await res.json()).toEqual({
			name: "OpenEMR Gateway",
			version: "0.1.0",
			openemr_url: "https://emr.test",
			fhir_base: "https://emr.test/apis/default/fhir",
			api_base: "https://emr.test/apis/default/api",
			oauth_client: "*******ient",
			health: "/health",
		});
	});

	it("should report null when no client is configured", async () => {
		const { app } = createTestApp({ OPENEMR_CLIENT_ID: "" });

		const res = await app.request("/");

		expect(await res.json()).toHaveProperty("oauth_client", null);
	});

	it("should answer health checks", async () => {
		const { app } = createTestApp();

		const res = await app.request("/health");

		expect(res.status).toBe(200);
		expect(await res.json()).toEqual({ status: "ok" });
		expect(global.fetch).not.toHaveBeenCalled();
	});
});

describe("protected routes", () => {
	it.each([
		["GET", "/fhir/Patient"],
		["GET", "/fhir/Patient/p1"],
		["POST", "/fhir/Patient"],
		["GET", "/fhir/Observation"],
		["GET", "/fhir/Encounter"],
		["GET", "/fhir/MedicationRequest"],
		["GET", "/fhir/Condition"],
		["GET", "/fhir/Procedure"],
		["GET", "/fhir/Appointment"],
		["GET", "/fhir/DocumentReference/$docref"],
		["GET", "/api/patient"],
		["POST", "/api/patient"],
		["GET", "/api/patient/1"],
		["GET", "/api/patient/1/encounter"],
		["GET", "/api/encounter"],
		["GET", "/api/appointment"],
	])("should reject %s %s without a bearer token", async (method, path) => {
		const { app } = createTestApp();

		const missing = await app.request(path, { method });
		const wrongScheme = await app.request(path, { method, headers: { Authorization: "Token abc" } });

		expect(missing.status).toBe(401);
		expect(wrongScheme.status).toBe(401);
		expect(global.fetch).not.toHaveBeenCalled();
	});
});

describe("fallbacks", () => {
	it("should return 404 for unknown paths", async () => {
		const { app } = createTestApp();

		const res = await app.request("/not-a-route");

		expect(res.status).toBe(404);
		expect(res.headers.get("X-Content-Type-Options")).toBe("nosniff");
		expect(await res.json()).toEqual({ detail: "Not Found" });
	});
});

describe("CORS", () => {
	it("should echo the origin with credentials when all origins are allowed", async () => {
		const { app } = createTestApp();

		const res = await app.request("/health", { headers: { Origin: "https://app.test" } });

		expect(res.headers.get("Access-Control-Allow-Origin")).toBe("https://app.test");
		expect(res.headers.get("Access-Control-Allow-Credentials")).toBe("true");
		expect(res.headers.get("Vary")).toContain("Origin");
	});

	it("should use a wildcard without credentials when no origin is sent", async () => {
		const { app } = createTestApp();

		const res = await app.request("/health");

		expect(res.headers.get("Access-Control-Allow-Origin")).toBe("*");
		expect(res.headers.has("Access-Control-Allow-Credentials")).toBe(false);
	});

	it("should omit CORS headers for origins outside the allowlist", async () => {
		const { app } = createTestApp({ CORS_ALLOWED_ORIGINS: "https://allowed.test" });

		const allowed = await app.request("/health", { headers: { Origin: "https://allowed.test" } });
		const denied = await app.request("/health", { headers: { Origin: "https://other.test" } });

		expect(allowed.headers.get("Access-Control-Allow-Origin")).toBe("https://allowed.test");
		expect(denied.headers.has("Access-Control-Allow-Origin")).toBe(false);
	});

	it("should answer preflight requests without authentication", async () => {
		const { app } = createTestApp();

		const res = await app.request("/fhir/Patient", {
			method: "OPTIONS",
			headers: {
				Origin: "https://app.test",
				"Access-Control-Request-Method": "GET",
				"Access-Control-Request-Headers": "Authorization",
			},
		});

		expect(res.status).toBe(204);
		expect(res.headers.get("Access-Control-Allow-Origin")).toBe("https://app.test");
		expect(res.headers.get("Access-Control-Allow-Methods")).toBe("GET, POST, PUT, PATCH, DELETE, OPTIONS");
		expect(res.headers.get("Access-Control-Allow-Headers")).toBe("Authorization");
		expect(res.headers.get("Access-Control-Max-Age")).toBe("600");
	});

	it("should add CORS headers to error responses", async () => {
		const { app } = createTestApp();

		const res = await app.request("/api/patient", { headers: { Origin: "https://app.test" } });

		expect(res.status).toBe(401);
		expect(res.headers.get("Access-Control-Allow-Origin")).toBe("https://app.test");
	});
});
