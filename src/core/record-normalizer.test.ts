import { describe, expect, it } from "vitest";
import { loadPolicy } from "../config/policy";
import {
	normalizeRow,
	parseInstant,
	parseSourceType,
	parseTimeOfDay,
} from "./record-normalizer";

const policy = loadPolicy();

describe("normalizeRow", () => {
	it("maps an officer-issued court row onto a driver violation", () => {
		const result = normalizeRow(
			{
				"Summons Number": "S-1",
				"License ID": "d123",
				"Violation Code": "1180b",
				"Issue Date": "2024-03-05",
				"Violation Time": "02:43P",
				Disposition: "guilty",
				County: "kings",
				source_type: "officer",
			},
			0,
			policy,
			{ batchId: "b1" },
		);

		expect(result).toEqual({
			ok: true,
			record: {
				recordKey: "id:driver:S-1",
				recordId: "S-1",
				entityKind: "driver",
				entityKey: "D123",
				violationCode: "1180B",
				points: 3,
				severityTier: 2,
				occurredAt: new Date("2024-03-05T14:43:00Z"),
				timeOfDayKnown: true,
				disposition: "GUILTY",
				jurisdiction: "KINGS",
				sourceType: "officer",
				batchId: "b1",
			},
		});
	});

	it("keys camera rows by plate and state with a composite record key", () => {
		const result = normalizeRow(
			{
				plate: "abc123",
				state: "ny",
				violation_code: "1180A",
				occurred_at: "2024-01-02 23:15",
				source_type: "speed camera",
			},
			4,
			policy,
			{ batchId: "b2" },
		);

		if (!result.ok) {
			throw new Error(`unexpected rejection: ${result.rejection.reason}`);
		}
		expect(result.record.entityKind).toBe("vehicle");
		expect(result.record.entityKey).toBe("ABC123:NY");
		expect(result.record.occurredAt.toISOString()).toBe(
			"2024-01-02T23:15:00.000Z",
		);
		expect(result.record.disposition).toBe("PENDING");
		expect(result.record.jurisdiction).toBe("UNKNOWN");
		expect(result.record.recordKey).toBe(
			"composite:vehicle:ABC123:NY:2024-01-02T23:15:00.000Z:1180A",
		);
	});

	it("accepts camera descriptors as ticket-only codes", () => {
		const options = { batchId: "b5", sourceType: "camera" } as const;
		const described = normalizeRow(
			{
				summons_number: "X1",
				plate: "t1",
				state: "ny",
				violation: "PHTO SCHOOL ZN SPEED VIOLATION",
				issue_date: "2024-01-01",
			},
			0,
			policy,
			options,
		);
		const unmapped = normalizeRow(
			{ plate: "t1", state: "ny", violation: "BUS LANE", issue_date: "2024-01-02" },
			1,
			policy,
			options,
		);

		if (!described.ok || !unmapped.ok) {
			throw new Error("camera rows should not be rejected for their code");
		}
		expect(described.record).toMatchObject({
			recordKey: "id:vehicle:X1",
			entityKey: "T1:NY",
			violationCode: "PHTO SCHOOL ZN SPEED VIOLATION",
			points: 0,
			severityTier: 1,
			disposition: "PENDING",
		});
		expect(unmapped.record.violationCode).toBe("BUS LANE");
		expect(unmapped.record.points).toBe(0);
		expect(unmapped.record.severityTier).toBe(1);
	});

	it("falls back to year and month columns without a time of day", () => {
		const result = normalizeRow(
			{
				license_id: "D1",
				violation_code: "1180A",
				violation_year: 2023,
				violation_month: 7,
			},
			0,
			policy,
			{ batchId: "b3", sourceType: "officer" },
		);

		if (!result.ok) {
			throw new Error(`unexpected rejection: ${result.rejection.reason}`);
		}
		expect(result.record.occurredAt.toISOString()).toBe(
			"2023-07-01T00:00:00.000Z",
		);
		expect(result.record.timeOfDayKnown).toBe(false);
	});

	it("rejects rows instead of patching them", () => {
		const options = { batchId: "b4" };
		expect(
			normalizeRow(
				{ plate: "abc123", violation_code: "1180A", occurred_at: "2024-01-02", source_type: "camera" },
				1,
				policy,
				options,
			),
		).toEqual({
			ok: false,
			rejection: {
				rowIndex: 1,
				reason: "missing_plate_state",
				detail: "plate ABC123 has no registration state",
			},
		});

		const reasons = [
			normalizeRow("not a row", 0, policy, options),
			normalizeRow({ license_id: "D1", violation_code: "1180A", occurred_at: "2024-01-02" }, 0, policy, options),
			normalizeRow({ violation_code: "1180A", occurred_at: "2024-01-02", source_type: "officer" }, 0, policy, options),
			normalizeRow({ license_id: "D1", occurred_at: "2024-01-02", source_type: "officer" }, 0, policy, options),
			normalizeRow({ license_id: "D1", violation_code: "1180A", source_type: "officer" }, 0, policy, options),
			normalizeRow({ license_id: "D1", violation_code: "1180A", occurred_at: "2024-02-31", source_type: "officer" }, 0, policy, options),
			normalizeRow({ license_id: "D1", violation_code: "1111", occurred_at: "2024-02-01", source_type: "officer" }, 0, policy, options),
		].map((result) => (result.ok ? "ok" : result.rejection.reason));

		expect(reasons).toEqual([
			"invalid_row",
			"missing_source_type",
			"missing_entity_key",
			"missing_violation_code",
			"missing_occurred_at",
			"invalid_occurred_at",
			"unknown_violation_code",
		]);
	});
});

describe("field parsers", () => {
	it("parses feed time formats", () => {
		expect(parseTimeOfDay("10:52 AM")).toEqual({ hour: 10, minute: 52 });
		expect(parseTimeOfDay("12:05A")).toEqual({ hour: 0, minute: 5 });
		expect(parseTimeOfDay("14:05")).toEqual({ hour: 14, minute: 5 });
		expect(parseTimeOfDay("25:00")).toBeNull();
	});

	it("honours explicit offsets and reads naive timestamps as UTC", () => {
		expect(parseInstant("2024-06-01T10:00:00+02:00")?.date.toISOString()).toBe(
			"2024-06-01T08:00:00.000Z",
		);
		expect(parseInstant("2024-06-01T10:00:00")?.date.toISOString()).toBe(
			"2024-06-01T10:00:00.000Z",
		);
		expect(parseInstant("06/01/2024")).toEqual({
			date: new Date("2024-06-01T00:00:00Z"),
			timeOfDayKnown: false,
		});
		expect(parseInstant("yesterday")).toBeNull();
	});

	it("recognizes source types", () => {
		expect(parseSourceType("Speed Camera")).toBe("camera");
		expect(parseSourceType("Traffic Court")).toBe("officer");
		expect(parseSourceType("drone")).toBeNull();
	});
});
