/**
 * OpenEMR Gateway - Entry Point
 *
 * Loads configuration from the environment (and .env) and serves the Hono app
 * on Node.js.
 */

import "dotenv/config";
import { serve } from "@hono/node-server";
import { createApp, createDependencies } from "./app.js";
import { loadConfig } from "./lib/config.js";
import { APP_NAME } from "./lib/constants.js";

const config = loadConfig();
const app = createApp(createDependencies(config));

serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
	console.log(`${APP_NAME} listening on http://${info.address}:${info.port}`);
	console.log(`Proxying OpenEMR at ${config.baseUrl}`);
});
