/**
 * Zod schemas for gateway requests and upstream OAuth responses
 */
import { z } from "zod";
import { RequestValidationError } from "./errors.js";
import { fromWireParams, toUpstreamParams, type QueryValue } from "./transforms.js";
import { DEFAULT_SEARCH_COUNT, DEFAULT_TOKEN_ENDPOINT_AUTH_METHOD } from "./constants.js";

// JSON clients may send null for optional fields; treat it as absent.
const optionalString = z
	.string()
	.nullish()
	.transform((value) => value ?? undefined);

// _count=0 is a valid FHIR query for the total only.
const searchCount = z.coerce.number().int().default(DEFAULT_SEARCH_COUNT);

// ============================================================================
// OAuth
// ============================================================================

export const TokenRequestSchema = z.object({
	grant_type: z.string().min(1).describe("authorization_code or refresh_token"),
	code: optionalString.describe("Authorization code (authorization_code grant)"),
	redirect_uri: optionalString.describe("Redirect URI registered with OpenEMR"),
	refresh_token: optionalString.describe("Refresh token (refresh_token grant)"),
	code_verifier: optionalString.describe("PKCE code verifier"),
});
export type TokenRequest = z.infer<typeof TokenRequestSchema>;

export const TokenRecordSchema = z.object({
	access_token: z.string().min(1),
	token_type: z
		.string()
		.nullish()
		.transform((value) => value ?? "Bearer"),
	expires_in: z
		.union([z.number(), z.string().regex(/^\d+$/).transform(Number)])
		.pipe(z.number().int())
		.nullish()
		.transform((value) => value ?? undefined),
	refresh_token: optionalString,
	scope: optionalString,
	id_token: optionalString,
});
export type TokenRecord = z.infer<typeof TokenRecordSchema>;

export const ClientRegistrationSchema = z.object({
	client_name: z.string().describe("Name of the application"),
	redirect_uris: z.array(z.string()).describe("Allowed redirect URIs"),
	scope: optionalString.describe("Space-separated scopes"),
	token_endpoint_auth_method: z
		.string()
		.nullish()
		.transform((value) => value ?? DEFAULT_TOKEN_ENDPOINT_AUTH_METHOD),
});
export type ClientRegistration = z.infer<typeof ClientRegistrationSchema>;

export const AuthorizeQuerySchema = z.object({
	response_type: z.string().default("code"),
	client_id: z.string().optional(),
	redirect_uri: z.string().optional(),
	scope: z.string().optional(),
	state: z.string().optional(),
});
export type AuthorizeQuery = z.infer<typeof AuthorizeQuerySchema>;

export const CallbackQuerySchema = z.object({
	code: z.string().min(1).describe("Authorization code from OpenEMR"),
	state: z.string().optional(),
});

// ============================================================================
// Search parameter sets
// ============================================================================

/**
 * Query parameters accepted by one search route.
 * `wireNames` maps local field names to the names OpenEMR expects.
 */
export interface SearchDefinition {
	schema: z.ZodType<Record<string, QueryValue>, z.ZodTypeDef, unknown>;
	wireNames: Readonly<Record<string, string>>;
}

const FHIR_WIRE_NAMES = { id: "_id", count: "_count", sort: "_sort" } as const;

export const PatientSearch = {
	schema: z.object({
		name: z.string().optional(),
		birthdate: z.string().optional(),
		identifier: z.string().optional(),
		id: z.string().optional(),
		count: searchCount,
		sort: z.string().optional(),
	}),
	wireNames: FHIR_WIRE_NAMES,
} satisfies SearchDefinition;

export const ObservationSearch = {
	schema: z.object({
		patient: z.string().optional(),
		category: z.string().optional(),
		code: z.string().optional(),
		count: searchCount,
		sort: z.string().optional(),
	}),
	wireNames: FHIR_WIRE_NAMES,
} satisfies SearchDefinition;

export const EncounterSearch = {
	schema: z.object({
		patient: z.string().optional(),
		status: z.string().optional(),
		date: z.string().optional(),
		count: searchCount,
		sort: z.string().optional(),
	}),
	wireNames: FHIR_WIRE_NAMES,
} satisfies SearchDefinition;

export const MedicationRequestSearch = {
	schema: z.object({
		patient: z.string().optional(),
		status: z.string().optional(),
		count: searchCount,
	}),
	wireNames: FHIR_WIRE_NAMES,
} satisfies SearchDefinition;

export const ConditionSearch = {
	schema: z.object({
		patient: z.string().optional(),
		category: z.string().optional(),
		count: searchCount,
	}),
	wireNames: FHIR_WIRE_NAMES,
} satisfies SearchDefinition;

export const ProcedureSearch = {
	schema: z.object({
		patient: z.string().optional(),
		date: z.string().optional(),
		count: searchCount,
	}),
	wireNames: FHIR_WIRE_NAMES,
} satisfies SearchDefinition;

export const AppointmentSearch = {
	schema: z.object({
		patient: z.string().optional(),
		date: z.string().optional(),
		status: z.string().optional(),
		count: searchCount,
	}),
	wireNames: FHIR_WIRE_NAMES,
} satisfies SearchDefinition;

export const DocumentReferenceOperation = {
	schema: z.object({
		patient: z.string().optional(),
		start: z.string().optional(),
		end: z.string().optional(),
	}),
	wireNames: {},
} satisfies SearchDefinition;

// Standard (native) API

export const PatientListQuery = {
	schema: z.object({
		name: z.string().optional(),
		dob: z.string().optional(),
		pid: z.string().optional(),
	}),
	wireNames: {},
} satisfies SearchDefinition;

export const EncounterListQuery = {
	schema: z.object({
		pid: z.string().optional(),
		date: z.string().optional(),
	}),
	wireNames: {},
} satisfies SearchDefinition;

export const AppointmentListQuery = {
	schema: z.object({
		pid: z.string().optional(),
		pc_eid: z.string().optional(),
		date: z.string().optional(),
	}),
	wireNames: {},
} satisfies SearchDefinition;

// ============================================================================
// Resource payloads
// ============================================================================

/** Any FHIR resource body; OpenEMR performs the actual validation */
export const FhirResourceSchema = z.record(z.unknown());
export type FhirResource = z.infer<typeof FhirResourceSchema>;

export const PatientCreateSchema = z.object({
	fname: z.string().describe("First name"),
	lname: z.string().describe("Last name"),
	dob: z.string().describe("Date of birth (YYYY-MM-DD)"),
	sex: z
		.string()
		.nullish()
		.transform((value) => value ?? "Unknown"),
	street: optionalString,
	city: optionalString,
	state: optionalString,
	postal_code: optionalString,
	phone_cell: optionalString,
	email: optionalString,
});
export type PatientCreate = z.infer<typeof PatientCreateSchema>;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Parse caller input, raising a RequestValidationError (422) on failure
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
	const result = schema.safeParse(input);
	if (!result.success) {
		throw RequestValidationError.fromZodError(result.error);
	}
	return result.data;
}

/**
 * Read and validate a JSON request body
 */
export async function parseJsonBody<S extends z.ZodTypeAny>(
	req: { json(): Promise<unknown> },
	schema: S,
): Promise<z.output<S>> {
	let body: unknown;
	try {
		body = await req.json();
	} catch {
		throw new RequestValidationError([{ field: "body", messages: ["Body must be valid JSON"] }]);
	}
	return parseInput(schema, body);
}

/**
 * Validate a route's query string and build the upstream parameter set
 */
export function readSearchParams(
	query: Record<string, string>,
	definition: SearchDefinition,
): Record<string, string> {
	const values = parseInput(definition.schema, fromWireParams(query, definition.wireNames));
	return toUpstreamParams(values, definition.wireNames);
}
