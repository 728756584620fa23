import { AlertConflictError, AlertNotFoundError } from "../errors";
import {
	type AlertTransition,
	type EnforcementAlert,
	OPEN_ALERT_STATUSES,
	type ViolationRecord,
} from "../types";
import type {
	AlertQuery,
	AlertRepository,
	AlertUpdate,
	Repositories,
	ViolationQuery,
	ViolationRepository,
} from "./repository";

function byOccurrence(a: ViolationRecord, b: ViolationRecord): number {
	const diff = a.occurredAt.getTime() - b.occurredAt.getTime();
	if (diff !== 0) {
		return diff;
	}
	return a.recordKey < b.recordKey ? -1 : a.recordKey > b.recordKey ? 1 : 0;
}

function cloneAlert(alert: EnforcementAlert): EnforcementAlert {
	return { ...alert };
}

/** Process-local store with the same guarantees as the Postgres registry. */
export class MemoryViolationRepository implements ViolationRepository {
	private readonly records = new Map<string, ViolationRecord>();

	async findByKeys(recordKeys: string[]): Promise<Map<string, ViolationRecord>> {
		const found = new Map<string, ViolationRecord>();
		for (const key of recordKeys) {
			const record = this.records.get(key);
			if (record) {
				found.set(key, record);
			}
		}
		return found;
	}

	async appendRecords(records: ViolationRecord[]): Promise<string[]> {
		const inserted: string[] = [];
		for (const record of records) {
			if (this.records.has(record.recordKey)) {
				continue;
			}
			this.records.set(record.recordKey, { ...record });
			inserted.push(record.recordKey);
		}
		return inserted;
	}

	async listRecords(query: ViolationQuery = {}): Promise<ViolationRecord[]> {
		return Array.from(this.records.values())
			.filter(
				(record) =>
					(!query.entityKind || record.entityKind === query.entityKind) &&
					(!query.entityKey || record.entityKey === query.entityKey),
			)
			.sort(byOccurrence);
	}

	async countRecords(): Promise<number> {
		return this.records.size;
	}
}

export class MemoryAlertRepository implements AlertRepository {
	private readonly alerts: EnforcementAlert[] = [];
	private readonly transitions: AlertTransition[] = [];

	private find(alertId: string): EnforcementAlert | undefined {
		return this.alerts.find((alert) => alert.alertId === alertId);
	}

	async insertOpenAlert(
		alert: EnforcementAlert,
		transition: AlertTransition,
	): Promise<EnforcementAlert> {
		const open = await this.findOpenAlert(alert.entityKind, alert.entityKey);
		if (open) {
			throw new AlertConflictError(alert.entityKind, alert.entityKey);
		}
		this.alerts.push(cloneAlert(alert));
		this.transitions.push({ ...transition });
		return cloneAlert(alert);
	}

	async transitionAlert(
		alertId: string,
		expectedStatus: EnforcementAlert["status"],
		update: AlertUpdate,
		transition: AlertTransition,
	): Promise<EnforcementAlert> {
		const stored = this.find(alertId);
		if (!stored) {
			throw new AlertNotFoundError(alertId);
		}
		if (stored.status !== expectedStatus) {
			throw new AlertConflictError(
				stored.entityKind,
				stored.entityKey,
				`alert ${alertId} is ${stored.status}, expected ${expectedStatus}`,
			);
		}
		stored.status = update.status;
		if (update.dueDate !== undefined) {
			stored.dueDate = update.dueDate;
		}
		if (update.resolvedAt !== undefined) {
			stored.resolvedAt = update.resolvedAt;
		}
		stored.notes = update.notes;
		stored.updatedAt = update.updatedAt;
		this.transitions.push({ ...transition });
		return cloneAlert(stored);
	}

	async getAlert(alertId: string): Promise<EnforcementAlert | undefined> {
		const alert = this.find(alertId);
		return alert ? cloneAlert(alert) : undefined;
	}

	async findOpenAlert(
		entityKind: EnforcementAlert["entityKind"],
		entityKey: string,
	): Promise<EnforcementAlert | undefined> {
		const alert = this.alerts.find(
			(candidate) =>
				candidate.entityKind === entityKind &&
				candidate.entityKey === entityKey &&
				OPEN_ALERT_STATUSES.includes(candidate.status),
		);
		return alert ? cloneAlert(alert) : undefined;
	}

	async listAlerts(query: AlertQuery): Promise<EnforcementAlert[]> {
		// newest first; insertion order breaks ties like the serial id does
		return this.alerts
			.map((alert, index) => ({ alert, index }))
			.filter(
				({ alert }) =>
					(!query.status || alert.status === query.status) &&
					(!query.entityKind || alert.entityKind === query.entityKind) &&
					(!query.entityKey || alert.entityKey === query.entityKey),
			)
			.sort(
				(a, b) =>
					b.alert.createdAt.getTime() - a.alert.createdAt.getTime() ||
					b.index - a.index,
			)
			.slice(0, query.limit)
			.map(({ alert }) => cloneAlert(alert));
	}

	async listOverdueNotices(now: Date): Promise<EnforcementAlert[]> {
		return this.alerts
			.filter(
				(alert) =>
					alert.status === "NOTICE_SENT" &&
					alert.dueDate !== null &&
					alert.dueDate.getTime() <= now.getTime(),
			)
			.sort(
				(a, b) => (a.dueDate?.getTime() ?? 0) - (b.dueDate?.getTime() ?? 0),
			)
			.map(cloneAlert);
	}

	async latestAlertsByEntity(
		entityKind: EnforcementAlert["entityKind"],
	): Promise<Map<string, EnforcementAlert>> {
		const latest = new Map<string, EnforcementAlert>();
		for (const alert of this.alerts) {
			if (alert.entityKind !== entityKind) {
				continue;
			}
			const current = latest.get(alert.entityKey);
			if (!current || alert.createdAt.getTime() >= current.createdAt.getTime()) {
				latest.set(alert.entityKey, cloneAlert(alert));
			}
		}
		return latest;
	}

	async listTransitions(
		alertId: string,
		limit: number,
	): Promise<AlertTransition[]> {
		return this.transitions
			.filter((transition) => transition.alertId === alertId)
			.slice(0, limit)
			.map((transition) => ({ ...transition }));
	}
}

export function createMemoryRepositories(): Repositories {
	return {
		violations: new MemoryViolationRepository(),
		alerts: new MemoryAlertRepository(),
	};
}
