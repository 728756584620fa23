import { serve } from "@hono/node-server";
import { createApp } from "./app";
import {
	loadPolicy,
	loadPolicyFile,
	type PolicyConfiguration,
} from "./config/policy";
import { settings } from "./config/settings";
import { createMemoryRepositories } from "./db/memory-repository";
import {
	closeRegistry,
	initializeRegistry,
	pgRepositories,
} from "./db/registry";
import type { Repositories } from "./db/repository";
import { logger } from "./utils/logger";

async function resolvePolicy(): Promise<PolicyConfiguration> {
	if (settings.policy.file) {
		logger.info("Loading policy file", { file: settings.policy.file });
		return loadPolicyFile(settings.policy.file);
	}
	return loadPolicy();
}

// Initialize application
async function initialize(): Promise<Repositories> {
	logger.info("Initializing ISA enforcement engine", {
		storage: settings.storage.driver,
	});

	if (settings.storage.driver === "memory") {
		logger.warn("Using in-memory storage; data is lost on restart");
		return createMemoryRepositories();
	}

	await initializeRegistry();
	return pgRepositories;
}

// Start server
async function startServer() {
	const policy = await resolvePolicy();
	const repositories = await initialize();
	const { app, services } = createApp({
		repositories,
		policy,
		sweepIntervalMs: settings.sweeper.intervalMs,
	});
	services.sweeper.start();

	const port = settings.server.port;
	const host = settings.server.host;

	logger.info("Starting server", {
		host,
		port,
		policyVersion: policy.version,
	});

	const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
		logger.info("Server running", { url: `http://${host}:${info.port}` });
	});

	const shutdown = (signal: string) => {
		logger.info("Shutting down gracefully", { signal });
		services.sweeper.stop();
		server.close(() => {
			const closing =
				settings.storage.driver === "postgres"
					? closeRegistry()
					: Promise.resolve();
			void closing
				.catch((error) => {
					logger.error("Failed to close registry", error);
				})
				.finally(() => process.exit(0));
		});
	};
	process.once("SIGINT", () => shutdown("SIGINT"));
	process.once("SIGTERM", () => shutdown("SIGTERM"));
}

// Start the server
startServer().catch((error) => {
	logger.error("Failed to start server", error);
	process.exit(1);
});
