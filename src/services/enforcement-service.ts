import { randomUUID } from "node:crypto";
import type { PolicyConfiguration } from "../config/policy";
import {
	appendNote,
	assertTransition,
	ENFORCEMENT_STAGES,
	isTerminalStatus,
} from "../core/enforcement-lifecycle";
import { KeyedMutex } from "../core/entity-lock";
import type { AlertQuery, AlertRepository, AlertUpdate } from "../db/repository";
import { AlertConflictError, AlertNotFoundError } from "../errors";
import type {
	AlertStatus,
	AlertTransition,
	EnforcementAlert,
	EntityKind,
} from "../types";
import { addDays } from "../utils/date-utils";
import { logger } from "../utils/logger";

export interface IssueNoticeInput {
	entityKind: EntityKind;
	entityKey: string;
	riskScore: number;
	total: number;
	triggerReason: string | null;
	actor: string;
	notes?: string;
}

export interface AlertDetail {
	alert: EnforcementAlert;
	stage: (typeof ENFORCEMENT_STAGES)[AlertStatus];
	transitions: AlertTransition[];
}

const SYSTEM_ACTOR = "system";
const TRANSITION_HISTORY_LIMIT = 50;

function lockKey(entityKind: EntityKind, entityKey: string): string {
	return `${entityKind}:${entityKey}`;
}

export class EnforcementService {
	private readonly locks = new KeyedMutex();

	constructor(
		private readonly alerts: AlertRepository,
		private readonly policy: PolicyConfiguration,
		private readonly clock: () => Date = () => new Date(),
	) {}

	/** Opens an alert directly in NOTICE_SENT. One open alert per entity. */
	async issueNotice(input: IssueNoticeInput): Promise<EnforcementAlert> {
		return this.locks.runExclusive(
			lockKey(input.entityKind, input.entityKey),
			async () => {
				const open = await this.alerts.findOpenAlert(
					input.entityKind,
					input.entityKey,
				);
				if (open) {
					throw new AlertConflictError(
						input.entityKind,
						input.entityKey,
						`${input.entityKind} ${input.entityKey} already has open alert ${open.alertId} (${open.status})`,
					);
				}

				const now = this.clock();
				const alertId = `alert_${randomUUID()}`;
				const notes = appendNote("", now, input.actor, "NOTICE_SENT", input.notes);
				const alert: EnforcementAlert = {
					alertId,
					entityKind: input.entityKind,
					entityKey: input.entityKey,
					status: "NOTICE_SENT",
					riskScoreAtCreation: input.riskScore,
					totalAtCreation: input.total,
					triggerReason: input.triggerReason,
					createdAt: now,
					dueDate: addDays(now, this.policy.noticePeriodDays),
					resolvedAt: null,
					updatedAt: now,
					notes,
				};

				const created = await this.alerts.insertOpenAlert(alert, {
					alertId,
					fromStatus: "NEW",
					toStatus: "NOTICE_SENT",
					actor: input.actor,
					notes: input.notes ?? "",
					createdAt: now,
				});
				logger.info("Enforcement notice issued", {
					alertId,
					entityKind: input.entityKind,
					entityKey: input.entityKey,
					dueDate: created.dueDate?.toISOString(),
				});
				return created;
			},
		);
	}

	async markFollowUpDue(
		alertId: string,
		actor: string,
		notes?: string,
	): Promise<EnforcementAlert> {
		return this.transition(alertId, "FOLLOW_UP_DUE", actor, notes);
	}

	async confirmInstallation(
		alertId: string,
		actor: string,
		notes?: string,
	): Promise<EnforcementAlert> {
		return this.transition(alertId, "COMPLIANT", actor, notes);
	}

	async escalate(
		alertId: string,
		actor: string,
		notes?: string,
	): Promise<EnforcementAlert> {
		return this.transition(alertId, "ESCALATED", actor, notes);
	}

	/** Current time on the service's clock. */
	now(): Date {
		return this.clock();
	}

	/** Moves every NOTICE_SENT alert whose notice period has elapsed to FOLLOW_UP_DUE. */
	async advanceOverdue(now: Date = this.clock()): Promise<EnforcementAlert[]> {
		const overdue = await this.alerts.listOverdueNotices(now);
		const advanced: EnforcementAlert[] = [];

		for (const alert of overdue) {
			try {
				advanced.push(
					await this.transition(
						alert.alertId,
						"FOLLOW_UP_DUE",
						SYSTEM_ACTOR,
						"Notice period elapsed",
						now,
					),
				);
			} catch (error) {
				if (!(error instanceof AlertConflictError)) {
					throw error;
				}
				logger.warn("Overdue alert changed before follow-up", {
					alertId: alert.alertId,
					reason: error.message,
				});
			}
		}

		if (advanced.length > 0) {
			logger.info("Advanced overdue notices", { count: advanced.length });
		}
		return advanced;
	}

	async listAlerts(query: AlertQuery): Promise<EnforcementAlert[]> {
		return this.alerts.listAlerts(query);
	}

	async getAlert(alertId: string): Promise<AlertDetail> {
		const alert = await this.alerts.getAlert(alertId);
		if (!alert) {
			throw new AlertNotFoundError(alertId);
		}
		const transitions = await this.alerts.listTransitions(
			alertId,
			TRANSITION_HISTORY_LIMIT,
		);
		return { alert, stage: ENFORCEMENT_STAGES[alert.status], transitions };
	}

	private async transition(
		alertId: string,
		to: AlertStatus,
		actor: string,
		notes?: string,
		at?: Date,
	): Promise<EnforcementAlert> {
		const existing = await this.alerts.getAlert(alertId);
		if (!existing) {
			throw new AlertNotFoundError(alertId);
		}

		return this.locks.runExclusive(
			lockKey(existing.entityKind, existing.entityKey),
			async () => {
				const current = await this.alerts.getAlert(alertId);
				if (!current) {
					throw new AlertNotFoundError(alertId);
				}
				assertTransition(current, to);

				const now = at ?? this.clock();
				const update: AlertUpdate = {
					status: to,
					notes: appendNote(current.notes, now, actor, to, notes),
					updatedAt: now,
				};
				if (to === "FOLLOW_UP_DUE") {
					update.dueDate = addDays(now, this.policy.followUpPeriodDays);
				}
				if (isTerminalStatus(to)) {
					update.resolvedAt = now;
				}

				const updated = await this.alerts.transitionAlert(
					alertId,
					current.status,
					update,
					{
						alertId,
						fromStatus: current.status,
						toStatus: to,
						actor,
						notes: notes ?? "",
						createdAt: now,
					},
				);
				logger.info("Alert transitioned", {
					alertId,
					from: current.status,
					to,
					actor,
				});
				return updated;
			},
		);
	}
}
