import {
	lookupCameraCode,
	lookupViolationCode,
	type PolicyConfiguration,
} from "../config/policy";
import type {
	EntityKind,
	RejectionReason,
	RowRejection,
	SourceType,
	ViolationRecord,
} from "../types";
import { deriveRecordKey } from "./dedup";

export type RawRow = Record<string, unknown>;

export interface NormalizeOptions {
	batchId: string;
	sourceType?: SourceType;
}

export type NormalizeResult =
	| { ok: true; record: ViolationRecord }
	| { ok: false; rejection: RowRejection };

const COLUMN_ALIASES = {
	recordId: ["summons_number", "ticket_number", "record_id"],
	license: [
		"license_id",
		"lic_id",
		"driver_id",
		"driver_license_number",
		"license_number",
	],
	plate: ["plate", "plate_id"],
	plateState: ["state", "plate_state", "registration_state"],
	code: ["violation_code", "v_code", "violation"],
	occurredAt: [
		"occurred_at",
		"date_of_violation",
		"issue_date",
		"issued_date",
		"violation_date",
	],
	time: ["violation_time"],
	year: ["violation_year", "v_year", "issue_year"],
	month: ["violation_month", "v_month", "issue_month"],
	day: ["violation_day", "issue_day"],
	disposition: ["disposition", "violation_status"],
	jurisdiction: ["jurisdiction", "county", "police_agency", "issuing_agency"],
	sourceType: ["source_type", "data_source"],
} as const;

type Column = keyof typeof COLUMN_ALIASES;

function canonicalColumnName(name: string): string {
	return name.trim().toLowerCase().replace(/[\s-]+/g, "_");
}

function indexColumns(raw: object): Map<string, unknown> {
	const columns = new Map<string, unknown>();
	for (const [name, value] of Object.entries(raw)) {
		columns.set(canonicalColumnName(name), value);
	}
	return columns;
}

function pick(columns: Map<string, unknown>, column: Column): string | null {
	for (const alias of COLUMN_ALIASES[column]) {
		const value = columns.get(alias);
		if (value instanceof Date) {
			return value.toISOString();
		}
		if (typeof value === "string" && value.trim().length > 0) {
			return value.trim();
		}
		if (typeof value === "number" && Number.isFinite(value)) {
			return String(value);
		}
	}
	return null;
}

export function parseSourceType(value: string | null): SourceType | null {
	if (!value) {
		return null;
	}
	const lower = value.toLowerCase();
	if (lower.includes("camera")) {
		return "camera";
	}
	if (lower.includes("officer") || lower.includes("traffic")) {
		return "officer";
	}
	return null;
}

function entityKindFor(sourceType: SourceType): EntityKind {
	return sourceType === "camera" ? "vehicle" : "driver";
}

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const US_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const NAIVE_DATE_TIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;
const ZONED_DATE_TIME =
	/^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/i;

interface ParsedInstant {
	date: Date;
	timeOfDayKnown: boolean;
}

function utcDate(year: number, month: number, day: number): Date | null {
	if (month < 1 || month > 12 || day < 1 || day > 31) {
		return null;
	}
	const date = new Date(Date.UTC(year, month - 1, day));
	// rejects 2024-02-31 rolling into March
	return date.getUTCMonth() === month - 1 ? date : null;
}

/** Timestamps without an offset are read as UTC. */
export function parseInstant(value: string): ParsedInstant | null {
	const dateOnly = DATE_ONLY.exec(value);
	if (dateOnly) {
		const date = utcDate(
			Number(dateOnly[1]),
			Number(dateOnly[2]),
			Number(dateOnly[3]),
		);
		return date ? { date, timeOfDayKnown: false } : null;
	}

	const usDate = US_DATE.exec(value);
	if (usDate) {
		const date = utcDate(
			Number(usDate[3]),
			Number(usDate[1]),
			Number(usDate[2]),
		);
		return date ? { date, timeOfDayKnown: false } : null;
	}

	let iso: string | null = null;
	if (NAIVE_DATE_TIME.test(value)) {
		iso = `${value.replace(" ", "T")}Z`;
	} else if (ZONED_DATE_TIME.test(value)) {
		iso = value.replace(" ", "T");
	}
	if (!iso) {
		return null;
	}
	const ms = Date.parse(iso);
	return Number.isNaN(ms)
		? null
		: { date: new Date(ms), timeOfDayKnown: true };
}

/** Parses `02:43P`, `10:52 AM` or `14:05` into hour and minute. */
export function parseTimeOfDay(
	value: string,
): { hour: number; minute: number } | null {
	const match = /^(\d{1,2}):(\d{2})\s*([AP])?M?$/i.exec(value.trim());
	if (!match) {
		return null;
	}
	let hour = Number(match[1]);
	const minute = Number(match[2]);
	const meridiem = match[3]?.toUpperCase();
	if (minute > 59) {
		return null;
	}
	if (meridiem) {
		if (hour < 1 || hour > 12) {
			return null;
		}
		hour = (hour % 12) + (meridiem === "P" ? 12 : 0);
	} else if (hour > 23) {
		return null;
	}
	return { hour, minute };
}

function reject(
	rowIndex: number,
	reason: RejectionReason,
	detail: string,
): NormalizeResult {
	return { ok: false, rejection: { rowIndex, reason, detail } };
}

function resolveInstant(
	columns: Map<string, unknown>,
): ParsedInstant | RejectionReason {
	const occurredAt = pick(columns, "occurredAt");
	let parsed: ParsedInstant | null = null;

	if (occurredAt) {
		parsed = parseInstant(occurredAt);
		if (!parsed) {
			return "invalid_occurred_at";
		}
	} else {
		const year = pick(columns, "year");
		const month = pick(columns, "month");
		if (!year || !month) {
			return "missing_occurred_at";
		}
		const day = pick(columns, "day") ?? "1";
		const date = utcDate(Number(year), Number(month), Number(day));
		if (!date) {
			return "invalid_occurred_at";
		}
		parsed = { date, timeOfDayKnown: false };
	}

	const time = pick(columns, "time");
	if (!parsed.timeOfDayKnown && time) {
		const timeOfDay = parseTimeOfDay(time);
		if (timeOfDay) {
			const date = new Date(parsed.date);
			date.setUTCHours(timeOfDay.hour, timeOfDay.minute, 0, 0);
			parsed = { date, timeOfDayKnown: true };
		}
	}

	return parsed;
}

/**
 * Maps one raw feed row onto a violation record. Problems with the row are
 * returned as a rejection; the caller decides what to do with the batch.
 */
export function normalizeRow(
	raw: unknown,
	rowIndex: number,
	policy: PolicyConfiguration,
	options: NormalizeOptions,
): NormalizeResult {
	if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
		return reject(rowIndex, "invalid_row", "row must be an object");
	}
	const columns = indexColumns(raw);

	const sourceType =
		parseSourceType(pick(columns, "sourceType")) ?? options.sourceType ?? null;
	if (!sourceType) {
		return reject(
			rowIndex,
			"missing_source_type",
			"row has no recognizable source_type and the batch sets none",
		);
	}
	const entityKind = entityKindFor(sourceType);

	let entityKey: string;
	if (entityKind === "driver") {
		const license = pick(columns, "license");
		if (!license) {
			return reject(
				rowIndex,
				"missing_entity_key",
				"officer-issued rows require a license number",
			);
		}
		entityKey = license.toUpperCase();
	} else {
		const plate = pick(columns, "plate");
		if (!plate) {
			return reject(
				rowIndex,
				"missing_entity_key",
				"camera-issued rows require a plate",
			);
		}
		const plateState = pick(columns, "plateState");
		if (!plateState) {
			return reject(
				rowIndex,
				"missing_plate_state",
				`plate ${plate.toUpperCase()} has no registration state`,
			);
		}
		entityKey = `${plate.toUpperCase()}:${plateState.toUpperCase()}`;
	}

	const violationCode = pick(columns, "code")?.toUpperCase() ?? null;
	if (!violationCode) {
		return reject(rowIndex, "missing_violation_code", "violation code is empty");
	}

	const instant = resolveInstant(columns);
	if (typeof instant === "string") {
		return reject(
			rowIndex,
			instant,
			instant === "missing_occurred_at"
				? "no occurrence timestamp or year/month columns"
				: `unparseable occurrence timestamp: ${pick(columns, "occurredAt") ?? "year/month"}`,
		);
	}

	const codeEntry =
		entityKind === "vehicle"
			? lookupCameraCode(policy, violationCode)
			: lookupViolationCode(policy, violationCode);
	if (!codeEntry) {
		return reject(
			rowIndex,
			"unknown_violation_code",
			`violation code ${violationCode} is not in policy ${policy.version}`,
		);
	}

	const recordId = pick(columns, "recordId");
	return {
		ok: true,
		record: {
			recordKey: deriveRecordKey({
				recordId,
				entityKind,
				entityKey,
				occurredAt: instant.date,
				violationCode,
			}),
			recordId,
			entityKind,
			entityKey,
			violationCode,
			points: codeEntry.points,
			severityTier: codeEntry.severityTier,
			occurredAt: instant.date,
			timeOfDayKnown: instant.timeOfDayKnown,
			disposition: pick(columns, "disposition")?.toUpperCase() ?? "PENDING",
			jurisdiction: pick(columns, "jurisdiction")?.toUpperCase() ?? "UNKNOWN",
			sourceType,
			batchId: options.batchId,
		},
	};
}
