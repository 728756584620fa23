import { describe, expect, it } from "vitest";
import type { ViolationRecord } from "../types";
import { deriveRecordKey } from "./dedup";
import {
	aggregate,
	type AggregateOptions,
	isInWindow,
	latestOccurrence,
} from "./windowed-aggregator";

let sequence = 0;

function violation(overrides: Partial<ViolationRecord> = {}): ViolationRecord {
	sequence += 1;
	const base: ViolationRecord = {
		recordKey: "",
		recordId: `S-${sequence}`,
		entityKind: "driver",
		entityKey: "D1",
		violationCode: "1180A",
		points: 2,
		severityTier: 1,
		occurredAt: new Date("2024-06-01T12:00:00Z"),
		timeOfDayKnown: true,
		disposition: "GUILTY",
		jurisdiction: "KINGS",
		sourceType: "officer",
		batchId: "b1",
		...overrides,
	};
	return { ...base, recordKey: deriveRecordKey(base) };
}

const reference = new Date("2025-01-15T00:00:00Z");

const driverOptions: AggregateOptions = {
	entityKind: "driver",
	windowMonths: 24,
	referenceInstant: reference,
	sustainedDispositions: ["GUILTY"],
	dismissedDispositions: ["DISMISSED"],
	severeTier: 4,
};

describe("aggregate", () => {
	it("includes both window ends and nothing outside them", () => {
		const records = [
			violation({ occurredAt: new Date("2023-01-15T00:00:00Z") }),
			violation({ occurredAt: new Date("2023-01-14T23:59:59.999Z") }),
			violation({ occurredAt: reference }),
			violation({ occurredAt: new Date("2025-01-15T00:00:00.001Z") }),
		];

		const entity = aggregate(records, driverOptions).entities.get("D1");

		expect(entity?.total).toBe(4);
		expect(entity?.violationCount).toBe(2);
		expect(entity?.firstViolation.toISOString()).toBe("2023-01-15T00:00:00.000Z");
		expect(entity?.lastViolation.toISOString()).toBe("2025-01-15T00:00:00.000Z");
		expect(isInWindow(new Date("2023-01-15T00:00:00Z"), reference, 24)).toBe(true);
	});

	it("counts only sustained dispositions", () => {
		const snapshot = aggregate(
			[
				violation({ points: 8, violationCode: "1180D", severityTier: 4 }),
				violation({ disposition: "PENDING" }),
				violation({ entityKey: "D2", disposition: "DISMISSED" }),
			],
			driverOptions,
		);

		expect(Array.from(snapshot.entities.keys())).toEqual(["D1"]);
		expect(snapshot.entities.get("D1")?.total).toBe(8);
		expect(snapshot.entities.get("D1")?.severeViolationCount).toBe(1);
	});

	it("counts tickets for vehicles and ignores other kinds", () => {
		const snapshot = aggregate(
			[
				violation({ entityKind: "vehicle", entityKey: "T1:NY", sourceType: "camera", points: 2 }),
				violation({ entityKind: "vehicle", entityKey: "T1:NY", sourceType: "camera", points: 3, jurisdiction: "QUEENS" }),
				violation(),
			],
			{ ...driverOptions, entityKind: "vehicle", windowMonths: 12 },
		);

		const entity = snapshot.entities.get("T1:NY");
		expect(snapshot.entities.size).toBe(1);
		expect(entity?.total).toBe(2);
		expect(entity?.distinctJurisdictions).toEqual(["KINGS", "QUEENS"]);
	});

	it("counts vehicle tickets unless they were dismissed", () => {
		const ticket = (overrides: Partial<ViolationRecord>) =>
			violation({
				entityKind: "vehicle",
				entityKey: "T1:NY",
				sourceType: "camera",
				points: 0,
				...overrides,
			});
		const snapshot = aggregate(
			[
				ticket({ disposition: "PENDING" }),
				ticket({ disposition: "PAID" }),
				ticket({ disposition: "DISMISSED" }),
				ticket({ entityKey: "T2:NJ", disposition: "DISMISSED" }),
			],
			{ ...driverOptions, entityKind: "vehicle", windowMonths: 12 },
		);

		expect(Array.from(snapshot.entities.keys())).toEqual(["T1:NY"]);
		expect(snapshot.entities.get("T1:NY")?.total).toBe(2);
	});

	it("gives equal snapshots for equal inputs", () => {
		const records = [
			violation({ entityKey: "D2" }),
			violation({ entityKey: "D1", points: 5 }),
		];
		const first = aggregate(records, driverOptions);
		const second = aggregate([...records], driverOptions);

		expect(second).toEqual(first);
		expect(Array.from(first.entities.keys())).toEqual(["D1", "D2"]);
	});

	it("stops between entities once aborted", () => {
		const controller = new AbortController();
		controller.abort();
		expect(() =>
			aggregate([violation()], { ...driverOptions, signal: controller.signal }),
		).toThrow();
	});
});

describe("latestOccurrence", () => {
	it("returns the newest instant of the requested kind", () => {
		const records = [
			violation({ occurredAt: new Date("2024-02-01T00:00:00Z") }),
			violation({
				entityKind: "vehicle",
				entityKey: "T1:NY",
				occurredAt: new Date("2024-09-01T00:00:00Z"),
			}),
		];
		expect(latestOccurrence(records, "driver")?.toISOString()).toBe(
			"2024-02-01T00:00:00.000Z",
		);
		expect(latestOccurrence(records)?.toISOString()).toBe(
			"2024-09-01T00:00:00.000Z",
		);
		expect(latestOccurrence([])).toBeNull();
	});
});
