import { type Context, Hono } from "hono";
import { z } from "zod";
import type { DetectionService } from "../../services/detection-service";
import type { EnforcementService } from "../../services/enforcement-service";
import {
	ActorSchema,
	AlertStatusSchema,
	EntityKindSchema,
	ReferenceSchema,
} from "../params";
import { serializeAlert } from "../serializers";

const app = new Hono();

declare module "hono" {
	interface ContextVariableMap {
		enforcementService: EnforcementService;
		detectionService: DetectionService;
	}
}

const ListQuerySchema = z.object({
	status: AlertStatusSchema.optional(),
	entity_kind: EntityKindSchema.optional(),
	entity_key: z.string().min(1).optional(),
	limit: z.coerce.number().int().positive().max(1000).default(100),
});

const CreateAlertSchema = ActorSchema.extend({
	entity_kind: EntityKindSchema,
	entity_key: z.string().trim().min(1),
	reference: ReferenceSchema,
});

const SweepRequestSchema = z.object({
	now: z.string().datetime({ offset: true }).optional(),
});

// transition bodies are optional; an empty body means the default actor
async function readActor(c: Context) {
	const body = await c.req.json().catch(() => ({}));
	return ActorSchema.safeParse(body);
}

app.get("/", async (c) => {
	const enforcementService = c.get("enforcementService");
	const query = ListQuerySchema.safeParse(c.req.query());
	if (!query.success) {
		return c.json({ error: "Invalid request", details: query.error }, 400);
	}

	const alerts = await enforcementService.listAlerts({
		status: query.data.status,
		entityKind: query.data.entity_kind,
		entityKey: query.data.entity_key?.toUpperCase(),
		limit: query.data.limit,
	});
	return c.json({ count: alerts.length, alerts: alerts.map(serializeAlert) });
});

app.post("/", async (c) => {
	const detectionService = c.get("detectionService");
	const body = await c.req.json().catch(() => null);
	if (!body) {
		return c.json({ error: "Invalid JSON body" }, 400);
	}

	const result = CreateAlertSchema.safeParse(body);
	if (!result.success) {
		return c.json({ error: "Invalid request", details: result.error }, 400);
	}

	const alert = await detectionService.issueManualNotice(
		result.data.entity_kind,
		result.data.entity_key.toUpperCase(),
		{
			actor: result.data.actor,
			notes: result.data.notes,
			reference: result.data.reference,
		},
	);
	return c.json(serializeAlert(alert), 201);
});

app.post("/sweep", async (c) => {
	const enforcementService = c.get("enforcementService");
	const body = await c.req.json().catch(() => ({}));
	const result = SweepRequestSchema.safeParse(body);
	if (!result.success) {
		return c.json({ error: "Invalid request", details: result.error }, 400);
	}

	const now = result.data.now ? new Date(result.data.now) : undefined;
	const advanced = await enforcementService.advanceOverdue(now);
	return c.json({
		advanced: advanced.length,
		alerts: advanced.map(serializeAlert),
	});
});

app.get("/:alertId", async (c) => {
	const enforcementService = c.get("enforcementService");
	const detail = await enforcementService.getAlert(c.req.param("alertId"));
	return c.json({
		...serializeAlert(detail.alert),
		stage: detail.stage,
		transitions: detail.transitions.map((transition) => ({
			from_status: transition.fromStatus,
			to_status: transition.toStatus,
			actor: transition.actor,
			notes: transition.notes,
			created_at: transition.createdAt.toISOString(),
		})),
	});
});

app.post("/:alertId/follow-up", async (c) => {
	const enforcementService = c.get("enforcementService");
	const result = await readActor(c);
	if (!result.success) {
		return c.json({ error: "Invalid request", details: result.error }, 400);
	}
	const alert = await enforcementService.markFollowUpDue(
		c.req.param("alertId"),
		result.data.actor,
		result.data.notes,
	);
	return c.json(serializeAlert(alert));
});

app.post("/:alertId/comply", async (c) => {
	const enforcementService = c.get("enforcementService");
	const result = await readActor(c);
	if (!result.success) {
		return c.json({ error: "Invalid request", details: result.error }, 400);
	}
	const alert = await enforcementService.confirmInstallation(
		c.req.param("alertId"),
		result.data.actor,
		result.data.notes,
	);
	return c.json(serializeAlert(alert));
});

app.post("/:alertId/escalate", async (c) => {
	const enforcementService = c.get("enforcementService");
	const result = await readActor(c);
	if (!result.success) {
		return c.json({ error: "Invalid request", details: result.error }, 400);
	}
	const alert = await enforcementService.escalate(
		c.req.param("alertId"),
		result.data.actor,
		result.data.notes,
	);
	return c.json(serializeAlert(alert));
});

export const alertRoutes = app;
