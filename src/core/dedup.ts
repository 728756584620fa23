import type { EntityKind, ViolationRecord } from "../types";

/**
 * Natural identity of a violation. Source ticket numbers are preferred, scoped
 * by entity kind: court and camera summons numbers are issued independently.
 * Rows without one fall back to (entity, instant, code), which merges two
 * genuinely distinct violations of the same code at the same instant.
 */
export function deriveRecordKey(input: {
	recordId: string | null;
	entityKind: EntityKind;
	entityKey: string;
	occurredAt: Date;
	violationCode: string;
}): string {
	if (input.recordId) {
		return `id:${input.entityKind}:${input.recordId}`;
	}
	return `composite:${input.entityKind}:${input.entityKey}:${input.occurredAt.toISOString()}:${input.violationCode}`;
}

/** Compares the facts of two records, ignoring which batch delivered them. */
export function samePayload(a: ViolationRecord, b: ViolationRecord): boolean {
	return (
		a.entityKind === b.entityKind &&
		a.entityKey === b.entityKey &&
		a.violationCode === b.violationCode &&
		a.points === b.points &&
		a.occurredAt.getTime() === b.occurredAt.getTime() &&
		a.disposition === b.disposition &&
		a.jurisdiction === b.jurisdiction &&
		a.sourceType === b.sourceType
	);
}

export interface DedupResult {
	kept: ViolationRecord[];
	duplicates: Array<{ record: ViolationRecord; conflicting: boolean }>;
}

/** First occurrence of each record key wins; later copies are reported, never kept. */
export function dedupeRecords(
	records: Iterable<ViolationRecord>,
	seen: Map<string, ViolationRecord> = new Map(),
): DedupResult {
	const kept: ViolationRecord[] = [];
	const duplicates: DedupResult["duplicates"] = [];

	for (const record of records) {
		const existing = seen.get(record.recordKey);
		if (existing) {
			duplicates.push({ record, conflicting: !samePayload(existing, record) });
			continue;
		}
		seen.set(record.recordKey, record);
		kept.push(record);
	}

	return { kept, duplicates };
}
