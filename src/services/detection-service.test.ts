import { afterEach, describe, expect, it, vi } from "vitest";
import { createServices } from "../app";
import { loadPolicy } from "../config/policy";
import { createMemoryRepositories } from "../db/memory-repository";
import { EntityNotRequiredError } from "../errors";

function setup() {
	return createServices({
		repositories: createMemoryRepositories(),
		policy: loadPolicy(),
		sweepIntervalMs: 60_000,
		clock: () => new Date("2024-07-01T00:00:00Z"),
	});
}

function courtRow(license: string, month: number) {
	return {
		summons_number: `${license}-${month}`,
		license_id: license,
		violation_code: "1180A",
		issue_date: `2024-${String(month).padStart(2, "0")}-10`,
		disposition: "GUILTY",
		county: "KINGS",
	};
}

function courtRows(license: string, months: number[]) {
	return months.map((month) => courtRow(license, month));
}

function cameraRow(date: string) {
	return {
		plate: "t1",
		state: "ny",
		violation: "PHTO SCHOOL ZN SPEED VIOLATION",
		issue_date: date,
		county: "QUEENS",
	};
}

describe("DetectionService", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("opens a notice for a driver the batch pushes over the threshold", async () => {
		const services = setup();
		await services.violationStore.ingest(courtRows("D100", [1, 2, 3, 4, 5]), {
			sourceType: "officer",
		});

		const report = await services.detectionService.run(
			[courtRow("D100", 6)],
			{ sourceType: "officer", batchId: "batch-6" },
		);

		expect(report.batch.accepted).toBe(1);
		expect(report.committed).toBe(1);
		expect(report.deltas).toEqual([
			{
				entityKind: "driver",
				referenceInstant: new Date("2024-06-10T00:00:00Z"),
				newCrossings: ["D100"],
			},
			{ entityKind: "vehicle", referenceInstant: null, newCrossings: [] },
		]);
		expect(report.outcomes).toHaveLength(1);
		expect(report.outcomes[0]).toMatchObject({
			entityKind: "driver",
			entityKey: "D100",
			total: 12,
			threshold: 11,
			riskScore: 65.5,
			outcome: "notice_sent",
			detail: null,
		});

		const [alert] = await services.enforcementService.listAlerts({ limit: 10 });
		expect(alert.alertId).toBe(report.outcomes[0].alertId);
		expect(alert.triggerReason).toBe("12 points in 24 months (threshold: 11)");
		expect(await services.violationStore.count()).toBe(6);

		const again = await services.detectionService.run([courtRow("D100", 7)], {
			sourceType: "officer",
		});
		expect(again.outcomes).toEqual([]);
		expect(again.deltas[0].newCrossings).toEqual([]);
	});

	it("detects vehicles crossing the ticket threshold", async () => {
		const services = setup();
		const history = Array.from({ length: 15 }, (_, i) =>
			cameraRow(`2024-01-${String(i + 1).padStart(2, "0")}`),
		);
		await services.violationStore.ingest(history, { sourceType: "camera" });

		const report = await services.detectionService.run(
			[cameraRow("2024-02-01")],
			{ sourceType: "camera" },
		);

		expect(report.deltas[1].newCrossings).toEqual(["T1:NY"]);
		expect(report.outcomes[0]).toMatchObject({
			entityKind: "vehicle",
			entityKey: "T1:NY",
			total: 16,
			threshold: 16,
			riskScore: 60,
			outcome: "notice_sent",
		});

		const roster = await services.rosterService.buildRoster("vehicle", "latest");
		expect(
			roster.entries.map((e) => [
				e.aggregate.entityKey,
				e.aggregate.total,
				e.classification.tier,
				e.enforcementStatus,
			]),
		).toEqual([["T1:NY", 16, "REQUIRED", "NOTICE_SENT"]]);
	});

	it("leaves the store untouched when the run is aborted", async () => {
		const services = setup();
		await services.violationStore.ingest(courtRows("D200", [1, 2, 3, 4, 5]), {
			sourceType: "officer",
		});
		const controller = new AbortController();
		controller.abort();

		await expect(
			services.detectionService.run([courtRow("D200", 6)], {
				sourceType: "officer",
				signal: controller.signal,
			}),
		).rejects.toThrow();

		expect(await services.violationStore.count()).toBe(5);
		expect(await services.enforcementService.listAlerts({ limit: 10 })).toEqual([]);
	});

	it("keeps the records of entities already noticed when stopped mid-run", async () => {
		const services = setup();
		await services.violationStore.ingest(
			[...courtRows("DA", [1, 2, 3, 4, 5]), ...courtRows("DB", [1, 2, 3, 4, 5])],
			{ sourceType: "officer" },
		);
		const controller = new AbortController();
		const { enforcementService } = services;
		const issueNotice = enforcementService.issueNotice.bind(enforcementService);
		vi.spyOn(enforcementService, "issueNotice").mockImplementation(
			async (input) => {
				const alert = await issueNotice(input);
				controller.abort();
				return alert;
			},
		);
		vi.spyOn(console, "warn").mockImplementation(() => {});

		await expect(
			services.detectionService.run([courtRow("DA", 6), courtRow("DB", 6)], {
				sourceType: "officer",
				signal: controller.signal,
			}),
		).rejects.toThrow();

		const alerts = await enforcementService.listAlerts({ limit: 10 });
		expect(alerts.map((a) => [a.entityKey, a.status])).toEqual([
			["DA", "NOTICE_SENT"],
		]);
		expect(await services.violationStore.count()).toBe(11);
		const roster = await services.rosterService.buildRoster("driver", "latest");
		expect(
			roster.entries.map((e) => [e.aggregate.entityKey, e.classification.tier]),
		).toEqual([
			["DA", "REQUIRED"],
			["DB", "WARNING"],
		]);
	});

	it("reports a conflict when the entity already has an open alert", async () => {
		const services = setup();
		await services.violationStore.ingest(courtRows("D300", [1, 2, 3, 4, 5]), {
			sourceType: "officer",
		});
		const manual = await services.enforcementService.issueNotice({
			entityKind: "driver",
			entityKey: "D300",
			riskScore: 50,
			total: 10,
			triggerReason: null,
			actor: "officer-7",
		});

		const report = await services.detectionService.run([courtRow("D300", 6)], {
			sourceType: "officer",
		});

		expect(report.outcomes).toHaveLength(1);
		expect(report.outcomes[0].outcome).toBe("conflict");
		expect(report.outcomes[0].alertId).toBeNull();
		expect(report.outcomes[0].detail).toBe(
			`driver D300 already has open alert ${manual.alertId} (NOTICE_SENT)`,
		);
		expect(report.committed).toBe(1);
	});

	it("only issues manual notices for REQUIRED entities", async () => {
		const services = setup();
		await services.violationStore.ingest(courtRows("D400", [1, 2, 3, 4, 5]), {
			sourceType: "officer",
		});

		await expect(
			services.detectionService.issueManualNotice("driver", "D400", {
				actor: "officer-7",
			}),
		).rejects.toBeInstanceOf(EntityNotRequiredError);
		await expect(
			services.detectionService.issueManualNotice("driver", "NOBODY", {
				actor: "officer-7",
			}),
		).rejects.toBeInstanceOf(EntityNotRequiredError);

		await services.violationStore.ingest([courtRow("D400", 6)], {
			sourceType: "officer",
		});
		const alert = await services.detectionService.issueManualNotice(
			"driver",
			"D400",
			{ actor: "officer-7", notes: "Walk-in review" },
		);
		expect(alert.totalAtCreation).toBe(12);
		expect(alert.notes).toBe(
			"[2024-07-01 00:00] officer-7: Transitioned to NOTICE_SENT. Walk-in review",
		);
	});

	it("reconciles REQUIRED entities that were never alerted", async () => {
		const services = setup();
		await services.violationStore.ingest(
			courtRows("D500", [1, 2, 3, 4, 5, 6]),
			{ sourceType: "officer" },
		);

		const first = await services.detectionService.reconcile("driver");
		expect(first.map((o) => [o.entityKey, o.outcome])).toEqual([
			["D500", "notice_sent"],
		]);
		expect(await services.detectionService.reconcile("driver")).toEqual([]);
	});
});
