/**
 * Standard API Route Tests
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { createTestApp, fetchCall, mockFetchError, mockFetchSuccess } from "../setup.js";

const API_BASE = "https://emr.test/apis/default/api";
const auth = { headers: { Authorization: "Bearer test-token" } };

afterEach(() => {
	vi.restoreAllMocks();
});

describe("Standard API", () => {
	it("should require a bearer token", async () => {
		const { app } = createTestApp();

		const res = await app.request("/api/patient");

		expect(res.status).toBe(401);
		expect(await res.json()).toEqual({ detail: "Authorization header with Bearer token required" });
		expect(global.fetch).not.toHaveBeenCalled();
	});

	it("should list patients with filters", async () => {
		const { app } = createTestApp();
		const patients = [{ pid: "1", fname: "Jane", lname: "Smith" }];
		mockFetchSuccess(patients);

		const res = await app.request("/api/patient?name=Smith&dob=", auth);

		expect(res.status).toBe(200);
		expect(await res.json()).toEqual(patients);
		expect(fetchCall().url).toBe(`${API_BASE}/patient?name=Smith`);
		expect(new Headers(fetchCall().init.headers).get("Authorization")).toBe("Bearer test-token");
	});

	it("should fetch a patient by pid", async () => {
		const { app } = createTestApp();
		mockFetchSuccess({ pid: "42" });

		const res = await app.request("/api/patient/42", auth);

		expect(await res.json()).toEqual({ pid: "42" });
		expect(fetchCall().url).toBe(`${API_BASE}/patient/42`);
	});

	it("should fetch a patient's encounters", async () => {
		const { app } = createTestApp();
		mockFetchSuccess([{ eid: "7" }]);

		const res = await app.request("/api/patient/42/encounter", auth);

		expect(await res.json()).toEqual([{ eid: "7" }]);
		expect(fetchCall().url).toBe(`${API_BASE}/patient/42/encounter`);
	});

	it("should list encounters", async () => {
		const { app } = createTestApp();
		mockFetchSuccess([]);

		await app.request("/api/encounter?pid=42&date=2024-03-01", auth);

		expect(fetchCall().url).toBe(`${API_BASE}/encounter?pid=42&date=2024-03-01`);
	});

	it("should list appointments", async () => {
		const { app } = createTestApp();
		mockFetchSuccess([]);

		await app.request("/api/appointment?pid=42&pc_eid=9", auth);

		expect(fetchCall().url).toBe(`${API_BASE}/appointment?pid=42&pc_eid=9`);
	});

	it("should relay upstream server errors", async () => {
		vi.spyOn(console, "error").mockImplementation(() => {});
		const { app } = createTestApp();
		mockFetchError(500, "Internal Server Error", { error: "database unavailable" });

		const res = await app.request("/api/encounter", auth);

		expect(res.status).toBe(500);
		expect(await res.json()).toEqual({ error: "database unavailable" });
	});
});

describe("POST /api/patient", () => {
	function post(body: string) {
		return {
			method: "POST",
			headers: { Authorization: "Bearer test-token", "Content-Type": "application/json" },
			body,
		};
	}

	it("should create a patient with the default sex", async () => {
		const { app } = createTestApp();
		mockFetchSuccess({ pid: "101" }, 201);

		const res = await app.request(
			"/api/patient",
			post(JSON.stringify({ fname: "Jane", lname: "Doe", dob: "1980-01-01", city: "Springfield" })),
		);

		expect(res.status).toBe(201);
		expect(await res.json()).toEqual({ pid: "101" });
		expect(fetchCall().url).toBe(`${API_BASE}/patient`);
		expect(JSON.parse(String(fetchCall().init.body))).toEqual({
			fname: "Jane",
			lname: "Doe",
			dob: "1980-01-01",
			sex: "Unknown",
			city: "Springfield",
		});
	});

	it("should return 422 listing the missing fields", async () => {
		const { app } = createTestApp();

		const res = await app.request("/api/patient", post(JSON.stringify({ fname: "Jane" })));

		expect(res.status).toBe(422);
		expect(await res.json()).toEqual({
			detail: "Request validation failed",
			errors: [
				{ field: "lname", messages: ["Required"] },
				{ field: "dob", messages: ["Required"] },
			],
		});
		expect(global.fetch).not.toHaveBeenCalled();
	});
});
