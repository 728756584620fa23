import { CsvError } from "csv-parse";
import { parse } from "csv-parse/sync";
import { Hono } from "hono";
import { z } from "zod";
import type { ViolationStore } from "../../core/violation-store";
import { EntityKindSchema, SourceTypeSchema } from "../params";

const app = new Hono();

declare module "hono" {
	interface ContextVariableMap {
		violationStore: ViolationStore;
	}
}

const MAX_ROWS = 50_000;

const IngestRequestSchema = z.object({
	source_type: SourceTypeSchema.optional(),
	batch_id: z.string().min(1).optional(),
	rows: z.array(z.unknown()).min(1).max(MAX_ROWS),
});

const UploadQuerySchema = z.object({
	source_type: SourceTypeSchema.optional(),
	batch_id: z.string().min(1).optional(),
});

const HistoryParamsSchema = z.object({
	kind: EntityKindSchema,
	entityKey: z.string().min(1),
});

app.post("/", async (c) => {
	const store = c.get("violationStore");
	const body = await c.req.json().catch(() => null);
	if (!body) {
		return c.json({ error: "Invalid JSON body" }, 400);
	}

	const result = IngestRequestSchema.safeParse(body);
	if (!result.success) {
		return c.json({ error: "Invalid request", details: result.error }, 400);
	}

	const report = await store.ingest(result.data.rows, {
		sourceType: result.data.source_type,
		batchId: result.data.batch_id,
	});
	return c.json(report, 201);
});

// CSV exports of the court and camera feeds, one violation per line
app.post("/upload", async (c) => {
	const store = c.get("violationStore");
	const query = UploadQuerySchema.safeParse(c.req.query());
	if (!query.success) {
		return c.json({ error: "Invalid request", details: query.error }, 400);
	}

	const text = await c.req.text();
	let rows: unknown[];
	try {
		rows = parse(text, {
			columns: true,
			skip_empty_lines: true,
			trim: true,
			bom: true,
		});
	} catch (error) {
		if (error instanceof CsvError) {
			return c.json({ error: "Invalid CSV", details: error.message }, 400);
		}
		throw error;
	}
	if (rows.length === 0) {
		return c.json({ error: "CSV contains no rows" }, 400);
	}
	if (rows.length > MAX_ROWS) {
		return c.json({ error: `CSV exceeds ${MAX_ROWS} rows` }, 413);
	}

	const report = await store.ingest(rows, {
		sourceType: query.data.source_type,
		batchId: query.data.batch_id,
	});
	return c.json(report, 201);
});

app.get("/:kind/:entityKey", async (c) => {
	const store = c.get("violationStore");
	const params = HistoryParamsSchema.safeParse(c.req.param());
	if (!params.success) {
		return c.json({ error: "Invalid request", details: params.error }, 400);
	}

	const violations = await store.history(
		params.data.kind,
		params.data.entityKey.toUpperCase(),
	);
	return c.json({
		entity_kind: params.data.kind,
		entity_key: params.data.entityKey.toUpperCase(),
		count: violations.length,
		violations,
	});
});

export const violationRoutes = app;
