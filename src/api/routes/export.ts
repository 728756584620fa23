import { Hono } from "hono";
import { z } from "zod";
import type { ExportService } from "../../services/export-service";
import { toDateString } from "../../utils/date-utils";
import { EntityKindSchema, ReferenceSchema } from "../params";

const app = new Hono();

declare module "hono" {
	interface ContextVariableMap {
		exportService: ExportService;
	}
}

const ExportQuerySchema = z.object({
	reference: ReferenceSchema,
	detail: z
		.enum(["true", "false", "1", "0"])
		.default("false")
		.transform((value) => value === "true" || value === "1"),
	format: z.enum(["csv", "json"]).default("csv"),
});

app.get("/:kind", async (c) => {
	const exportService = c.get("exportService");
	const kind = EntityKindSchema.safeParse(c.req.param("kind"));
	const query = ExportQuerySchema.safeParse(c.req.query());
	if (!kind.success) {
		return c.json({ error: "Invalid request", details: kind.error }, 400);
	}
	if (!query.success) {
		return c.json({ error: "Invalid request", details: query.error }, 400);
	}

	const { reference, detail, format } = query.data;
	const rows = detail
		? await exportService.detailRows(kind.data, reference)
		: await exportService.entityRows(kind.data, reference);

	if (format === "json") {
		return c.json({ count: rows.length, rows });
	}

	const stamp =
		reference === "latest" ? "latest" : toDateString(reference);
	c.header("Content-Type", "text/csv; charset=utf-8");
	c.header(
		"Content-Disposition",
		`attachment; filename="isa_${kind.data}_${detail ? "detail" : "roster"}_${stamp}.csv"`,
	);
	return c.body(exportService.toCsv(rows, detail));
});

export const exportRoutes = app;
