/**
 * Gateway configuration
 *
 * Reads OPENEMR_* and server settings from the environment. Values from a local
 * .env file are loaded by the server entry point before this runs.
 */
import { z } from "zod";

const booleanFlag = z
	.enum(["true", "false", "1", "0", "yes", "no"])
	.transform((value) => value === "true" || value === "1" || value === "yes");

const EnvSchema = z.object({
	OPENEMR_BASE_URL: z
		.string()
		.url()
		.default("https://localhost:9300")
		.transform((url) => url.replace(/\/+$/, "")),
	OPENEMR_SITE: z.string().min(1).default("default"),
	OPENEMR_CLIENT_ID: z.string().default(""),
	OPENEMR_CLIENT_SECRET: z.string().default(""),
	OPENEMR_REDIRECT_URI: z.string().url().default("http://localhost:8000/oauth/callback"),
	PORT: z.coerce.number().int().min(1).max(65535).default(8000),
	HOST: z.string().min(1).default("0.0.0.0"),
	CORS_ALLOWED_ORIGINS: z.string().default("*"),
	REQUEST_LOGGING: booleanFlag.default("true"),
});

export interface GatewayConfig {
	baseUrl: string;
	apiBaseUrl: string;
	oauthBaseUrl: string;
	clientId: string;
	clientSecret: string;
	redirectUri: string;
	port: number;
	host: string;
	corsAllowedOrigins: string[];
	requestLogging: boolean;
}

/**
 * Parse gateway configuration from an environment map.
 * Empty strings count as unset so that blank .env entries fall back to defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
	const raw: Record<string, string> = {};
	for (const key of Object.keys(EnvSchema.shape)) {
		const value = env[key];
		if (value !== undefined && value.trim() !== "") {
			raw[key] = value.trim();
		}
	}

	const result = EnvSchema.safeParse(raw);
	if (!result.success) {
		const problems = result.error.errors.map(
			(issue) => `${issue.path.join(".")}: ${issue.message}`,
		);
		throw new Error(`Invalid configuration - ${problems.join("; ")}`);
	}

	const parsed = result.data;
	return {
		baseUrl: parsed.OPENEMR_BASE_URL,
		apiBaseUrl: `${parsed.OPENEMR_BASE_URL}/apis/${parsed.OPENEMR_SITE}`,
		oauthBaseUrl: `${parsed.OPENEMR_BASE_URL}/oauth2/${parsed.OPENEMR_SITE}`,
		clientId: parsed.OPENEMR_CLIENT_ID,
		clientSecret: parsed.OPENEMR_CLIENT_SECRET,
		redirectUri: parsed.OPENEMR_REDIRECT_URI,
		port: parsed.PORT,
		host: parsed.HOST,
		corsAllowedOrigins: parsed.CORS_ALLOWED_ORIGINS.split(",")
			.map((origin) => origin.trim())
			.filter(Boolean),
		requestLogging: parsed.REQUEST_LOGGING,
	};
}
