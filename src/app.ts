import { Hono } from "hono";
import { alertRoutes } from "./api/routes/alerts";
import { detectionRoutes } from "./api/routes/detection";
import { exportRoutes } from "./api/routes/export";
import { healthRoutes } from "./api/routes/health";
import { policyRoutes } from "./api/routes/policy";
import { rosterRoutes } from "./api/routes/roster";
import { violationRoutes } from "./api/routes/violations";
import type { PolicyConfiguration } from "./config/policy";
import { RiskScorer } from "./core/risk-scorer";
import { ViolationStore } from "./core/violation-store";
import type { Repositories } from "./db/repository";
import {
	AlertConflictError,
	AlertNotFoundError,
	EntityNotRequiredError,
	InvalidTransitionError,
	PolicyConfigurationError,
} from "./errors";
import {
	DetectionService,
	EnforcementService,
	ExportService,
	FollowUpSweeper,
	RosterService,
} from "./services";
import { logger } from "./utils/logger";

export interface AppOptions {
	repositories: Repositories;
	policy: PolicyConfiguration;
	sweepIntervalMs: number;
	clock?: () => Date;
}

export interface EngineServices {
	violationStore: ViolationStore;
	enforcementService: EnforcementService;
	rosterService: RosterService;
	detectionService: DetectionService;
	exportService: ExportService;
	sweeper: FollowUpSweeper;
}

export function createServices(options: AppOptions): EngineServices {
	const { repositories, policy } = options;
	const scorer = new RiskScorer(policy);
	const violationStore = new ViolationStore(repositories.violations, policy);
	const enforcementService = new EnforcementService(
		repositories.alerts,
		policy,
		options.clock,
	);
	const rosterService = new RosterService(
		violationStore,
		repositories.alerts,
		policy,
		scorer,
	);
	const detectionService = new DetectionService(
		violationStore,
		enforcementService,
		rosterService,
		policy,
		scorer,
	);

	return {
		violationStore,
		enforcementService,
		rosterService,
		detectionService,
		exportService: new ExportService(rosterService),
		sweeper: new FollowUpSweeper(enforcementService, options.sweepIntervalMs),
	};
}

export function createApp(options: AppOptions) {
	const services = createServices(options);
	const app = new Hono();

	app.onError((err, c) => {
		if (err instanceof AlertNotFoundError) {
			return c.json({ error: "not_found", message: err.message }, 404);
		}
		if (err instanceof AlertConflictError) {
			return c.json({ error: "conflict", message: err.message }, 409);
		}
		if (err instanceof InvalidTransitionError) {
			return c.json(
				{ error: "invalid_transition", message: err.message, from: err.from, to: err.to },
				409,
			);
		}
		if (err instanceof EntityNotRequiredError) {
			return c.json({ error: "not_required", message: err.message }, 422);
		}
		if (err instanceof PolicyConfigurationError) {
			return c.json({ error: "invalid_policy", issues: err.issues }, 400);
		}
		logger.error("Unhandled request error", err, {
			method: c.req.method,
			path: c.req.path,
		});
		return c.json({ error: "internal_error" }, 500);
	});

	app.notFound((c) => c.json({ error: "not_found" }, 404));

	// Middleware to inject services
	app.use("*", async (c, next) => {
		c.set("policy", options.policy);
		c.set("violationStore", services.violationStore);
		c.set("enforcementService", services.enforcementService);
		c.set("rosterService", services.rosterService);
		c.set("detectionService", services.detectionService);
		c.set("exportService", services.exportService);
		c.set("sweeper", services.sweeper);
		await next();
	});

	app.route("/", healthRoutes);
	app.route("/violations", violationRoutes);
	app.route("/roster", rosterRoutes);
	app.route("/detection", detectionRoutes);
	app.route("/alerts", alertRoutes);
	app.route("/policy", policyRoutes);
	app.route("/export", exportRoutes);

	return { app, services };
}
