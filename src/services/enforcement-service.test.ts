import { describe, expect, it } from "vitest";
import { loadPolicy } from "../config/policy";
import { createMemoryRepositories } from "../db/memory-repository";
import {
	AlertConflictError,
	AlertNotFoundError,
	InvalidTransitionError,
} from "../errors";
import { type IssueNoticeInput, EnforcementService } from "./enforcement-service";

const policy = loadPolicy();

function createService(start: string) {
	const clock = { now: new Date(start) };
	const repositories = createMemoryRepositories();
	const service = new EnforcementService(
		repositories.alerts,
		policy,
		() => clock.now,
	);
	return { service, clock, repositories };
}

function notice(overrides: Partial<IssueNoticeInput> = {}): IssueNoticeInput {
	return {
		entityKind: "driver",
		entityKey: "D1",
		riskScore: 72.5,
		total: 12,
		triggerReason: "12 points in 24 months (threshold: 11)",
		actor: "detection",
		...overrides,
	};
}

describe("EnforcementService", () => {
	it("opens alerts directly in NOTICE_SENT with a notice due date", async () => {
		const { service } = createService("2024-07-01T09:30:00Z");
		const alert = await service.issueNotice(notice());

		expect(alert.status).toBe("NOTICE_SENT");
		expect(alert.dueDate?.toISOString()).toBe("2024-07-15T09:30:00.000Z");
		expect(alert.resolvedAt).toBeNull();
		expect(alert.notes).toBe(
			"[2024-07-01 09:30] detection: Transitioned to NOTICE_SENT.",
		);

		const detail = await service.getAlert(alert.alertId);
		expect(detail.stage.label).toBe("Notice Sent");
		expect(
			detail.transitions.map((t) => [t.fromStatus, t.toStatus, t.actor]),
		).toEqual([["NEW", "NOTICE_SENT", "detection"]]);
	});

	it("allows one open alert per entity even under concurrent issuers", async () => {
		const { service } = createService("2024-07-01T09:30:00Z");

		const results = await Promise.allSettled([
			service.issueNotice(notice()),
			service.issueNotice(notice()),
		]);

		const rejected = results.filter(
			(r): r is PromiseRejectedResult => r.status === "rejected",
		);
		expect(results.filter((r) => r.status === "fulfilled")).toHaveLength(1);
		expect(rejected).toHaveLength(1);
		expect(rejected[0].reason).toBeInstanceOf(AlertConflictError);

		await expect(
			service.issueNotice(notice({ entityKind: "vehicle", entityKey: "D1" })),
		).resolves.toMatchObject({ status: "NOTICE_SENT" });
	});

	it("walks an alert through follow-up to compliance", async () => {
		const { service, clock } = createService("2024-07-01T09:30:00Z");
		const opened = await service.issueNotice(notice());

		await expect(
			service.confirmInstallation(opened.alertId, "officer-7"),
		).rejects.toBeInstanceOf(InvalidTransitionError);

		clock.now = new Date("2024-07-03T10:00:00Z");
		const followUp = await service.markFollowUpDue(
			opened.alertId,
			"officer-7",
			"Called owner",
		);
		expect(followUp.status).toBe("FOLLOW_UP_DUE");
		expect(followUp.dueDate?.toISOString()).toBe("2024-07-10T10:00:00.000Z");
		expect(followUp.notes.split("\n")).toEqual([
			"[2024-07-01 09:30] detection: Transitioned to NOTICE_SENT.",
			"[2024-07-03 10:00] officer-7: Transitioned to FOLLOW_UP_DUE. Called owner",
		]);

		clock.now = new Date("2024-07-08T16:45:00Z");
		const compliant = await service.confirmInstallation(
			opened.alertId,
			"officer-7",
		);
		expect(compliant.status).toBe("COMPLIANT");
		expect(compliant.resolvedAt?.toISOString()).toBe("2024-07-08T16:45:00.000Z");

		await expect(
			service.escalate(opened.alertId, "officer-7"),
		).rejects.toBeInstanceOf(InvalidTransitionError);

		const reopened = await service.issueNotice(notice());
		expect(reopened.alertId).not.toBe(opened.alertId);
	});

	it("escalates from FOLLOW_UP_DUE", async () => {
		const { service } = createService("2024-07-01T09:30:00Z");
		const opened = await service.issueNotice(notice());
		await service.markFollowUpDue(opened.alertId, "officer-7");

		const escalated = await service.escalate(opened.alertId, "supervisor");
		expect(escalated.status).toBe("ESCALATED");
		expect(escalated.resolvedAt?.toISOString()).toBe("2024-07-01T09:30:00.000Z");

		const detail = await service.getAlert(opened.alertId);
		expect(detail.transitions.map((t) => t.toStatus)).toEqual([
			"NOTICE_SENT",
			"FOLLOW_UP_DUE",
			"ESCALATED",
		]);
	});

	it("advances notices only once their due date has passed", async () => {
		const { service } = createService("2024-07-01T09:30:00Z");
		const opened = await service.issueNotice(notice());

		expect(
			await service.advanceOverdue(new Date("2024-07-15T09:29:59Z")),
		).toEqual([]);

		const advanced = await service.advanceOverdue(
			new Date("2024-07-15T09:30:00Z"),
		);
		expect(advanced.map((a) => a.alertId)).toEqual([opened.alertId]);
		expect(advanced[0].status).toBe("FOLLOW_UP_DUE");
		expect(advanced[0].dueDate?.toISOString()).toBe("2024-07-22T09:30:00.000Z");
		expect(advanced[0].notes.split("\n")[1]).toBe(
			"[2024-07-15 09:30] system: Transitioned to FOLLOW_UP_DUE. Notice period elapsed",
		);

		expect(
			await service.advanceOverdue(new Date("2024-08-01T00:00:00Z")),
		).toEqual([]);
	});

	it("reports unknown alerts", async () => {
		const { service } = createService("2024-07-01T09:30:00Z");
		await expect(service.getAlert("alert_missing")).rejects.toBeInstanceOf(
			AlertNotFoundError,
		);
		await expect(
			service.markFollowUpDue("alert_missing", "officer-7"),
		).rejects.toBeInstanceOf(AlertNotFoundError);
	});

	it("rejects stale conditional writes in the repository", async () => {
		const { service, repositories } = createService("2024-07-01T09:30:00Z");
		const opened = await service.issueNotice(notice());
		await service.markFollowUpDue(opened.alertId, "officer-7");

		const now = new Date("2024-07-02T00:00:00Z");
		await expect(
			repositories.alerts.transitionAlert(
				opened.alertId,
				"NOTICE_SENT",
				{ status: "FOLLOW_UP_DUE", notes: "", updatedAt: now },
				{
					alertId: opened.alertId,
					fromStatus: "NOTICE_SENT",
					toStatus: "FOLLOW_UP_DUE",
					actor: "officer-8",
					notes: "",
					createdAt: now,
				},
			),
		).rejects.toBeInstanceOf(AlertConflictError);
	});
});
