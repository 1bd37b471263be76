/**
 * Shared constants for the OpenEMR Gateway
 */

export const APP_NAME = "OpenEMR Gateway";
export const APP_VERSION = "0.1.0";

// Upstream request limits
export const UPSTREAM_TIMEOUT_MS = 30 * 1000; // 30 seconds

// OAuth defaults
export const DEFAULT_TOKEN_EXPIRES_IN_SECONDS = 60 * 60; // 1 hour
export const DEFAULT_SCOPE = "openid api:fhir patient/Patient.rs user/Patient.rs";
export const DEFAULT_TOKEN_ENDPOINT_AUTH_METHOD = "client_secret_basic";
export const STATE_BYTES = 32;

// FHIR search defaults
export const DEFAULT_SEARCH_COUNT = 10;

// Content types
export const FHIR_JSON = "application/fhir+json";
export const JSON_CONTENT_TYPE = "application/json";
export const FORM_CONTENT_TYPE = "application/x-www-form-urlencoded";

// Text truncation limits
export const MAX_ERROR_TEXT_LENGTH = 200;
