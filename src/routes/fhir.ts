/**
 * FHIR R4 Routes
 *
 * Every route except /fhir/metadata requires a bearer token, which is passed
 * through to OpenEMR unchanged.
 */

import { Hono } from "hono";
import { bearerAuth } from "../middleware/auth.js";
import {
	AppointmentSearch,
	ConditionSearch,
	DocumentReferenceOperation,
	EncounterSearch,
	FhirResourceSchema,
	MedicationRequestSearch,
	ObservationSearch,
	PatientSearch,
	ProcedureSearch,
	parseJsonBody,
	readSearchParams,
	type SearchDefinition,
} from "../lib/schemas.js";
import type { AppEnv, GatewayDependencies } from "../app.js";

const SEARCHABLE_RESOURCES: ReadonlyArray<[resourceType: string, definition: SearchDefinition]> = [
	["Patient", PatientSearch],
	["Observation", ObservationSearch],
	["Encounter", EncounterSearch],
	["MedicationRequest", MedicationRequestSearch],
	["Condition", ConditionSearch],
	["Procedure", ProcedureSearch],
	["Appointment", AppointmentSearch],
];

export function createFhirRoutes({ client }: GatewayDependencies) {
	const fhirRoutes = new Hono<AppEnv>();

	/**
	 * GET /fhir/metadata
	 * CapabilityStatement, no authentication
	 */
	fhirRoutes.get("/fhir/metadata", async (c) => {
		return c.json(await client.getCapabilityStatement());
	});

	for (const [resourceType, definition] of SEARCHABLE_RESOURCES) {
		fhirRoutes.get(`/fhir/${resourceType}`, bearerAuth, async (c) => {
			const params = readSearchParams(c.req.query(), definition);
			return c.json(await client.searchFhir(resourceType, params, c.get("accessToken")));
		});
	}

	fhirRoutes.get("/fhir/Patient/:id", bearerAuth, async (c) => {
		return c.json(await client.readFhir("Patient", c.req.param("id"), c.get("accessToken")));
	});

	/**
	 * POST /fhir/Patient
	 * The resource is forwarded exactly as received.
	 */
	fhirRoutes.post("/fhir/Patient", bearerAuth, async (c) => {
		const patient = await parseJsonBody(c.req, FhirResourceSchema);
		return c.json(await client.createFhir("Patient", patient, c.get("accessToken")), 201);
	});

	/**
	 * GET /fhir/DocumentReference/$docref
	 * Generates a Continuity of Care Document for a patient.
	 */
	fhirRoutes.get("/fhir/DocumentReference/$docref", bearerAuth, async (c) => {
		const params = readSearchParams(c.req.query(), DocumentReferenceOperation);
		return c.json(
			await client.fhirOperation("DocumentReference/$docref", params, c.get("accessToken")),
		);
	});

	return fhirRoutes;
}
