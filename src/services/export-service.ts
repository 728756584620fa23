import { stringify } from "csv-stringify/sync";
import { ENFORCEMENT_STAGES } from "../core/enforcement-lifecycle";
import type { EntityKind } from "../types";
import { toDateString } from "../utils/date-utils";
import type {
	ReferenceSelector,
	RosterEntry,
	RosterService,
} from "./roster-service";

export interface EntityExportRow {
	entity_kind: EntityKind;
	entity_key: string;
	total: number;
	violation_count: number;
	first_violation: string;
	last_violation: string;
	jurisdictions: string;
	tier: string;
	super_speeder: boolean;
	risk_score: number;
	risk_level: string;
	enforcement_status: string;
}

export interface DetailExportRow extends EntityExportRow {
	record_id: string;
	violation_code: string;
	points: number;
	occurred_at: string;
	disposition: string;
	jurisdiction: string;
	source_type: string;
}

export const ENTITY_COLUMNS = [
	"entity_kind",
	"entity_key",
	"total",
	"violation_count",
	"first_violation",
	"last_violation",
	"jurisdictions",
	"tier",
	"super_speeder",
	"risk_score",
	"risk_level",
	"enforcement_status",
] as const;

export const DETAIL_COLUMNS = [
	...ENTITY_COLUMNS,
	"record_id",
	"violation_code",
	"points",
	"occurred_at",
	"disposition",
	"jurisdiction",
	"source_type",
] as const;

const RULE = "=".repeat(60);
const THIN_RULE = "-".repeat(60);
const RECENT_VIOLATION_LIMIT = 10;

function entityRow(entry: RosterEntry): EntityExportRow {
	const { aggregate, classification, risk } = entry;
	return {
		entity_kind: aggregate.entityKind,
		entity_key: aggregate.entityKey,
		total: aggregate.total,
		violation_count: aggregate.violationCount,
		first_violation: toDateString(aggregate.firstViolation),
		last_violation: toDateString(aggregate.lastViolation),
		jurisdictions: aggregate.distinctJurisdictions.join(";"),
		tier: classification.tier,
		super_speeder: classification.superSpeeder,
		risk_score: risk.score,
		risk_level: risk.level,
		enforcement_status: entry.enforcementStatus ?? "",
	};
}

/** Flat tables and plain-text notices for the enforcement roster. */
export class ExportService {
	constructor(private readonly roster: RosterService) {}

	async entityRows(
		entityKind: EntityKind,
		reference: ReferenceSelector,
	): Promise<EntityExportRow[]> {
		const roster = await this.roster.buildRoster(entityKind, reference);
		return roster.entries.map(entityRow);
	}

	async detailRows(
		entityKind: EntityKind,
		reference: ReferenceSelector,
	): Promise<DetailExportRow[]> {
		const roster = await this.roster.buildRoster(entityKind, reference);
		return roster.entries.flatMap((entry) => {
			const base = entityRow(entry);
			return entry.violations.map((violation) => ({
				...base,
				record_id: violation.recordId ?? "",
				violation_code: violation.violationCode,
				points: violation.points,
				occurred_at: violation.occurredAt.toISOString(),
				disposition: violation.disposition,
				jurisdiction: violation.jurisdiction,
				source_type: violation.sourceType,
			}));
		});
	}

	toCsv(
		rows: Array<EntityExportRow | DetailExportRow>,
		detail: boolean,
	): string {
		return stringify(rows, {
			header: true,
			columns: detail ? [...DETAIL_COLUMNS] : [...ENTITY_COLUMNS],
			cast: { boolean: (value) => (value ? "true" : "false") },
		});
	}

	/** Clipboard/print block for one entity, newest violations first. */
	formatNoticeText(entry: RosterEntry): string {
		const { aggregate, classification, risk } = entry;
		const heading =
			aggregate.entityKind === "driver"
				? `DRIVER LICENSE ID: ${aggregate.entityKey}`
				: `VEHICLE PLATE: ${aggregate.entityKey}`;
		const unit = aggregate.entityKind === "driver" ? "Points" : "Tickets";
		const status = entry.enforcementStatus
			? ENFORCEMENT_STAGES[entry.enforcementStatus].label
			: "None";

		const lines = [
			RULE,
			heading,
			RULE,
			`Total Violations: ${aggregate.violationCount}`,
			`Total ${unit}: ${aggregate.total} (threshold ${classification.threshold}, ${aggregate.windowMonths} months)`,
			`Tier: ${classification.tier}${classification.superSpeeder ? " (super speeder)" : ""}`,
			`Risk Score: ${risk.score} (${risk.level})`,
			`First Violation: ${toDateString(aggregate.firstViolation)}`,
			`Last Violation: ${toDateString(aggregate.lastViolation)}`,
			`Jurisdictions: ${aggregate.distinctJurisdictions.join(", ")}`,
			`Enforcement Status: ${status}`,
			"",
			"RECENT VIOLATIONS:",
			THIN_RULE,
		];

		const recent = [...entry.violations]
			.sort((a, b) => b.occurredAt.getTime() - a.occurredAt.getTime())
			.slice(0, RECENT_VIOLATION_LIMIT);
		for (const violation of recent) {
			lines.push(
				`${toDateString(violation.occurredAt)} | ${violation.sourceType} | ${violation.violationCode}`,
			);
			lines.push(
				`  Jurisdiction: ${violation.jurisdiction} | Points: ${violation.points} | Disposition: ${violation.disposition}`,
			);
			lines.push("");
		}

		return lines.join("\n");
	}
}
