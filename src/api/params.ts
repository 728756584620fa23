import { z } from "zod";
import type { ReferenceSelector } from "../services/roster-service";

export const EntityKindSchema = z.enum(["driver", "vehicle"]);

export const SourceTypeSchema = z.enum(["camera", "officer"]);

export const TierSchema = z.enum(["COMPLIANT", "WARNING", "REQUIRED"]);

export const AlertStatusSchema = z.enum([
	"NEW",
	"NOTICE_SENT",
	"FOLLOW_UP_DUE",
	"COMPLIANT",
	"ESCALATED",
]);

/** `latest` (newest stored violation of the kind) or any ISO-8601 instant. */
export const ReferenceSchema = z
	.string()
	.default("latest")
	.transform((value, ctx): ReferenceSelector => {
		if (value === "latest") {
			return "latest";
		}
		const ms = Date.parse(value);
		if (Number.isNaN(ms)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: "reference must be an ISO-8601 instant or 'latest'",
			});
			return z.NEVER;
		}
		return new Date(ms);
	});

export const ActorSchema = z.object({
	actor: z.string().trim().min(1).default("operator"),
	notes: z.string().trim().min(1).optional(),
});
