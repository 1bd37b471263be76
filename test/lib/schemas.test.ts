import { describe, it, expect } from "vitest";
import {
	ClientRegistrationSchema,
	DocumentReferenceOperation,
	PatientCreateSchema,
	PatientSearch,
	TokenRequestSchema,
	parseInput,
	parseJsonBody,
	readSearchParams,
} from "../../src/lib/schemas.js";
import { RequestValidationError } from "../../src/lib/errors.js";

describe("readSearchParams", () => {
	it("should apply the default page size", () => {
		expect(readSearchParams({ name: "Smith" }, PatientSearch)).toEqual({ name: "Smith", _count: "10" });
	});

	it("should keep FHIR wire names for special parameters", () => {
		expect(readSearchParams({ _id: "p1", _count: "25", _sort: "-birthdate" }, PatientSearch)).toEqual({
			_id: "p1",
			_count: "25",
			_sort: "-birthdate",
		});
	});

	it("should drop blank and unknown parameters", () => {
		expect(readSearchParams({ name: "", unknown: "x" }, PatientSearch)).toEqual({ _count: "10" });
	});

	it("should reject a non-numeric page size", () => {
		expect(() => readSearchParams({ _count: "abc" }, PatientSearch)).toThrow(RequestValidationError);
	});

	it("should keep a zero page size", () => {
		expect(readSearchParams({ _count: "0" }, PatientSearch)).toEqual({ _count: "0" });
	});

	it("should not add a page size to operations", () => {
		expect(readSearchParams({ patient: "123" }, DocumentReferenceOperation)).toEqual({ patient: "123" });
	});
});

describe("PatientCreateSchema", () => {
	it("should default sex to Unknown", () => {
		const patient = parseInput(PatientCreateSchema, { fname: "Jane", lname: "Doe", dob: "1980-01-01" });

		expect(patient).toEqual({ fname: "Jane", lname: "Doe", dob: "1980-01-01", sex: "Unknown" });
	});

	it("should report each missing required field", () => {
		try {
			parseInput(PatientCreateSchema, { city: "Boston" });
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(RequestValidationError);
			expect(error).toHaveProperty("issues", [
				{ field: "fname", messages: ["Required"] },
				{ field: "lname", messages: ["Required"] },
				{ field: "dob", messages: ["Required"] },
			]);
		}
	});
});

describe("TokenRequestSchema", () => {
	it("should treat null optional fields as absent", () => {
		expect(parseInput(TokenRequestSchema, { grant_type: "refresh_token", code: null })).toEqual({
			grant_type: "refresh_token",
		});
	});

	it("should require a grant_type", () => {
		expect(() => parseInput(TokenRequestSchema, { grant_type: "" })).toThrow(RequestValidationError);
	});
});

describe("ClientRegistrationSchema", () => {
	it("should default the token endpoint auth method", () => {
		expect(
			parseInput(ClientRegistrationSchema, { client_name: "App", redirect_uris: ["https://app.test/cb"] }),
		).toEqual({
			client_name: "App",
			redirect_uris: ["https://app.test/cb"],
			token_endpoint_auth_method: "client_secret_basic",
		});
	});
});

describe("parseJsonBody", () => {
	it("should reject a body that is not JSON", async () => {
		const req = {
			json: async (): Promise<unknown> => {
				throw new SyntaxError("Unexpected token");
			},
		};

		const error = await parseJsonBody(req, TokenRequestSchema).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(RequestValidationError);
		expect(error).toHaveProperty("issues", [{ field: "body", messages: ["Body must be valid JSON"] }]);
	});

	it("should validate a parsed body", async () => {
		const req = { json: async (): Promise<unknown> => ({ grant_type: "authorization_code", code: "c" }) };

		expect(await parseJsonBody(req, TokenRequestSchema)).toEqual({ grant_type: "authorization_code", code: "c" });
	});
});
