import type {
	AlertStatus,
	AlertTransition,
	EnforcementAlert,
	EntityKind,
	ViolationRecord,
} from "../types";

export interface ViolationQuery {
	entityKind?: EntityKind;
	entityKey?: string;
}

export interface ViolationRepository {
	findByKeys(recordKeys: string[]): Promise<Map<string, ViolationRecord>>;
	/** Inserts records whose key is not stored yet; returns the inserted keys. */
	appendRecords(records: ViolationRecord[]): Promise<string[]>;
	listRecords(query?: ViolationQuery): Promise<ViolationRecord[]>;
	countRecords(): Promise<number>;
}

export interface AlertUpdate {
	status: AlertStatus;
	dueDate?: Date;
	resolvedAt?: Date | null;
	notes: string;
	updatedAt: Date;
}

export interface AlertQuery {
	status?: AlertStatus;
	entityKind?: EntityKind;
	entityKey?: string;
	limit: number;
}

export interface AlertRepository {
	/**
	 * Stores a new open alert with its first audit row. Fails with
	 * AlertConflictError when the entity already has an open alert.
	 */
	insertOpenAlert(
		alert: EnforcementAlert,
		transition: AlertTransition,
	): Promise<EnforcementAlert>;
	/**
	 * Conditional write: applies `update` only while the alert is still in
	 * `expectedStatus`. Fails with AlertNotFoundError or AlertConflictError.
	 */
	transitionAlert(
		alertId: string,
		expectedStatus: AlertStatus,
		update: AlertUpdate,
		transition: AlertTransition,
	): Promise<EnforcementAlert>;
	getAlert(alertId: string): Promise<EnforcementAlert | undefined>;
	findOpenAlert(
		entityKind: EntityKind,
		entityKey: string,
	): Promise<EnforcementAlert | undefined>;
	listAlerts(query: AlertQuery): Promise<EnforcementAlert[]>;
	/** NOTICE_SENT alerts whose due date is at or before `now`. */
	listOverdueNotices(now: Date): Promise<EnforcementAlert[]>;
	/** Most recently created alert per entity of the given kind. */
	latestAlertsByEntity(
		entityKind: EntityKind,
	): Promise<Map<string, EnforcementAlert>>;
	listTransitions(alertId: string, limit: number): Promise<AlertTransition[]>;
}

export interface Repositories {
	violations: ViolationRepository;
	alerts: AlertRepository;
}
