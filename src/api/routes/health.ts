import { Hono } from "hono";
import type { ViolationStore } from "../../core/violation-store";
import type { FollowUpSweeper } from "../../services/follow-up-sweeper";

const app = new Hono();
const SERVICE_VERSION = "1.0.0";

declare module "hono" {
	interface ContextVariableMap {
		violationStore: ViolationStore;
		sweeper: FollowUpSweeper;
	}
}

app.get("/", (c) => {
	return c.json({
		status: "ok",
		service: "isa-enforcement-engine",
		version: SERVICE_VERSION,
	});
});

app.get("/health", async (c) => {
	const store = c.get("violationStore");
	const sweeper = c.get("sweeper");
	return c.json({
		status: "healthy",
		version: SERVICE_VERSION,
		violations: await store.count(),
		sweeper: sweeper.getStats(),
		timestamp: new Date().toISOString(),
	});
});

export const healthRoutes = app;
