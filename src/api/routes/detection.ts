import { Hono } from "hono";
import { z } from "zod";
import type { DetectionService } from "../../services/detection-service";
import { EntityKindSchema, SourceTypeSchema } from "../params";
import { serializeDetectionRun } from "../serializers";

const app = new Hono();

declare module "hono" {
	interface ContextVariableMap {
		detectionService: DetectionService;
	}
}

const RunRequestSchema = z.object({
	source_type: SourceTypeSchema.optional(),
	batch_id: z.string().min(1).optional(),
	actor: z.string().trim().min(1).optional(),
	rows: z.array(z.unknown()).min(1).max(50_000),
});

const ReconcileRequestSchema = z.object({
	entity_kind: EntityKindSchema,
	actor: z.string().trim().min(1).optional(),
});

app.post("/runs", async (c) => {
	const detectionService = c.get("detectionService");
	const body = await c.req.json().catch(() => null);
	if (!body) {
		return c.json({ error: "Invalid JSON body" }, 400);
	}

	const result = RunRequestSchema.safeParse(body);
	if (!result.success) {
		return c.json({ error: "Invalid request", details: result.error }, 400);
	}

	// a client disconnect aborts the run before the batch is committed
	const report = await detectionService.run(result.data.rows, {
		sourceType: result.data.source_type,
		batchId: result.data.batch_id,
		actor: result.data.actor,
		signal: c.req.raw.signal,
	});
	return c.json(serializeDetectionRun(report), 201);
});

app.post("/reconcile", async (c) => {
	const detectionService = c.get("detectionService");
	const body = await c.req.json().catch(() => null);
	if (!body) {
		return c.json({ error: "Invalid JSON body" }, 400);
	}

	const result = ReconcileRequestSchema.safeParse(body);
	if (!result.success) {
		return c.json({ error: "Invalid request", details: result.error }, 400);
	}

	const outcomes = await detectionService.reconcile(result.data.entity_kind, {
		actor: result.data.actor,
		signal: c.req.raw.signal,
	});
	return c.json({
		entity_kind: result.data.entity_kind,
		notices_sent: outcomes.filter((o) => o.outcome === "notice_sent").length,
		outcomes: outcomes.map((outcome) => ({
			entity_key: outcome.entityKey,
			total: outcome.total,
			risk_score: outcome.riskScore,
			outcome: outcome.outcome,
			alert_id: outcome.alertId,
		})),
	});
});

export const detectionRoutes = app;
