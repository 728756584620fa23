import { describe, expect, it } from "vitest";
import { loadPolicy } from "../config/policy";
import { createMemoryRepositories } from "../db/memory-repository";
import type { ViolationRecord } from "../types";
import { dedupeRecords, deriveRecordKey } from "./dedup";
import { ViolationStore } from "./violation-store";

const policy = loadPolicy();

function courtRow(overrides: Record<string, unknown> = {}) {
	return {
		summons_number: "S-1",
		license_id: "D1",
		violation_code: "1180B",
		issue_date: "2024-03-05",
		disposition: "GUILTY",
		county: "KINGS",
		...overrides,
	};
}

function createStore(): ViolationStore {
	return new ViolationStore(createMemoryRepositories().violations, policy);
}

function violation(overrides: Partial<ViolationRecord> = {}): ViolationRecord {
	const base: ViolationRecord = {
		recordKey: "",
		recordId: "S-1",
		entityKind: "driver",
		entityKey: "D1",
		violationCode: "1180A",
		points: 2,
		severityTier: 1,
		occurredAt: new Date("2024-01-10T12:00:00Z"),
		timeOfDayKnown: true,
		disposition: "GUILTY",
		jurisdiction: "KINGS",
		sourceType: "officer",
		batchId: "b1",
		...overrides,
	};
	return { ...base, recordKey: overrides.recordKey ?? deriveRecordKey(base) };
}

describe("dedupeRecords", () => {
	it("keeps the first copy and flags conflicting later copies", () => {
		const first = violation();
		const sameFacts = violation({ batchId: "b2" });
		const conflicting = violation({ disposition: "DISMISSED" });

		const result = dedupeRecords([first, sameFacts, conflicting]);

		expect(result.kept).toEqual([first]);
		expect(result.duplicates.map((d) => d.conflicting)).toEqual([false, true]);
	});

	it("derives composite keys for rows without a ticket number", () => {
		expect(
			deriveRecordKey({
				recordId: null,
				entityKind: "vehicle",
				entityKey: "T1:NY",
				occurredAt: new Date("2024-01-02T03:04:05Z"),
				violationCode: "1180A",
			}),
		).toBe("composite:vehicle:T1:NY:2024-01-02T03:04:05.000Z:1180A");
	});
});

describe("ViolationStore", () => {
	it("reports duplicates and conflicts inside one batch", async () => {
		const store = createStore();
		const report = await store.ingest(
			[
				courtRow(),
				courtRow(),
				courtRow({ violation_code: "1180C" }),
				courtRow({ summons_number: "S-2", license_id: "" }),
			],
			{ sourceType: "officer", batchId: "batch-1" },
		);

		expect(report).toEqual({
			batchId: "batch-1",
			received: 4,
			accepted: 1,
			duplicates: 2,
			conflicts: 1,
			rejected: [
				{
					rowIndex: 3,
					reason: "missing_entity_key",
					detail: "officer-issued rows require a license number",
				},
			],
			duplicateRecords: [
				{ recordKey: "id:driver:S-1", rowIndex: 1, conflicting: false },
				{ recordKey: "id:driver:S-1", rowIndex: 2, conflicting: true },
			],
		});

		const stored = await store.history("driver", "D1");
		expect(stored.map((r) => r.violationCode)).toEqual(["1180B"]);
	});

	it("treats records already stored as duplicates of the stored copy", async () => {
		const store = createStore();
		await store.ingest([courtRow()], { sourceType: "officer" });

		const again = await store.ingest(
			[courtRow(), courtRow({ summons_number: "S-2" })],
			{ sourceType: "officer" },
		);
		expect(again.accepted).toBe(1);
		expect(again.duplicates).toBe(1);
		expect(again.conflicts).toBe(0);

		const conflicting = await store.ingest(
			[courtRow({ disposition: "DISMISSED" })],
			{ sourceType: "officer" },
		);
		expect(conflicting.accepted).toBe(0);
		expect(conflicting.conflicts).toBe(1);

		expect(await store.count()).toBe(2);
		const [first] = await store.history("driver", "D1");
		expect(first.disposition).toBe("GUILTY");
	});

	it("keeps court and camera summons with the same number apart", async () => {
		const store = createStore();
		const report = await store.ingest([
			courtRow({ source_type: "officer" }),
			{
				summons_number: "S-1",
				plate: "t1",
				state: "ny",
				violation: "PHTO SCHOOL ZN SPEED VIOLATION",
				issue_date: "2024-03-05",
				source_type: "camera",
			},
		]);

		expect(report.accepted).toBe(2);
		expect(report.duplicates).toBe(0);
		const [ticket] = await store.history("vehicle", "T1:NY");
		expect(ticket.recordKey).toBe("id:vehicle:S-1");
		expect(ticket.points).toBe(0);
	});

	it("does not write a prepared batch until it is committed", async () => {
		const store = createStore();
		const batch = await store.prepare([courtRow()], { sourceType: "officer" });

		expect(batch.records).toHaveLength(1);
		expect(await store.count()).toBe(0);

		expect(await store.commit(batch)).toBe(1);
		expect(await store.count()).toBe(1);
	});
});
