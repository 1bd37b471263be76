/**
 * Standard API Routes
 *
 * OpenEMR's native REST endpoints. All require a bearer token.
 */

import { Hono } from "hono";
import { bearerAuth } from "../middleware/auth.js";
import {
	AppointmentListQuery,
	EncounterListQuery,
	PatientCreateSchema,
	PatientListQuery,
	parseJsonBody,
	readSearchParams,
} from "../lib/schemas.js";
import type { AppEnv, GatewayDependencies } from "../app.js";

export function createStandardApiRoutes({ client }: GatewayDependencies) {
	const apiRoutes = new Hono<AppEnv>();

	apiRoutes.use("/api/*", bearerAuth);

	apiRoutes.get("/api/patient", async (c) => {
		const params = readSearchParams(c.req.query(), PatientListQuery);
		return c.json(await client.listPatients(params, c.get("accessToken")));
	});

	/**
	 * POST /api/patient
	 * fname, lname and dob are required; sex defaults to "Unknown".
	 */
	apiRoutes.post("/api/patient", async (c) => {
		const patient = await parseJsonBody(c.req, PatientCreateSchema);
		return c.json(await client.createPatient(patient, c.get("accessToken")), 201);
	});

	apiRoutes.get("/api/patient/:pid", async (c) => {
		return c.json(await client.getPatient(c.req.param("pid"), c.get("accessToken")));
	});

	apiRoutes.get("/api/patient/:pid/encounter", async (c) => {
		return c.json(await client.getPatientEncounters(c.req.param("pid"), c.get("accessToken")));
	});

	apiRoutes.get("/api/encounter", async (c) => {
		const params = readSearchParams(c.req.query(), EncounterListQuery);
		return c.json(await client.listEncounters(params, c.get("accessToken")));
	});

	apiRoutes.get("/api/appointment", async (c) => {
		const params = readSearchParams(c.req.query(), AppointmentListQuery);
		return c.json(await client.listAppointments(params, c.get("accessToken")));
	});

	return apiRoutes;
}
