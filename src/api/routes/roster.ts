import { Hono } from "hono";
import { z } from "zod";
import type { ExportService } from "../../services/export-service";
import type { RosterService } from "../../services/roster-service";
import { EntityKindSchema, ReferenceSchema, TierSchema } from "../params";
import { serializeRoster, serializeRosterEntry } from "../serializers";

const app = new Hono();

declare module "hono" {
	interface ContextVariableMap {
		rosterService: RosterService;
		exportService: ExportService;
	}
}

const RosterQuerySchema = z.object({
	reference: ReferenceSchema,
	tier: TierSchema.optional(),
	limit: z.coerce.number().int().positive().max(10_000).optional(),
});

const EntityQuerySchema = z.object({
	reference: ReferenceSchema,
	format: z.enum(["json", "text"]).default("json"),
});

app.get("/:kind", async (c) => {
	const rosterService = c.get("rosterService");
	const kind = EntityKindSchema.safeParse(c.req.param("kind"));
	const query = RosterQuerySchema.safeParse(c.req.query());
	if (!kind.success) {
		return c.json({ error: "Invalid request", details: kind.error }, 400);
	}
	if (!query.success) {
		return c.json({ error: "Invalid request", details: query.error }, 400);
	}

	const roster = await rosterService.buildRoster(
		kind.data,
		query.data.reference,
		{ tier: query.data.tier },
	);
	if (query.data.limit !== undefined) {
		roster.entries = roster.entries.slice(0, query.data.limit);
	}
	return c.json(serializeRoster(roster));
});

app.get("/:kind/:entityKey", async (c) => {
	const rosterService = c.get("rosterService");
	const exportService = c.get("exportService");
	const kind = EntityKindSchema.safeParse(c.req.param("kind"));
	const query = EntityQuerySchema.safeParse(c.req.query());
	if (!kind.success) {
		return c.json({ error: "Invalid request", details: kind.error }, 400);
	}
	if (!query.success) {
		return c.json({ error: "Invalid request", details: query.error }, 400);
	}

	const entityKey = c.req.param("entityKey").toUpperCase();
	const entry = await rosterService.findEntity(
		kind.data,
		entityKey,
		query.data.reference,
	);
	if (!entry) {
		return c.json(
			{ error: "not_found", message: `no counted violations for ${entityKey}` },
			404,
		);
	}

	if (query.data.format === "text") {
		return c.text(exportService.formatNoticeText(entry));
	}
	return c.json({
		...serializeRosterEntry(entry),
		violations: entry.violations,
	});
});

export const rosterRoutes = app;
