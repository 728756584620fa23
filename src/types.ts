export type EntityKind = "driver" | "vehicle";

export type SourceType = "camera" | "officer";

export type Tier = "COMPLIANT" | "WARNING" | "REQUIRED";

export type AlertStatus =
	| "NEW"
	| "NOTICE_SENT"
	| "FOLLOW_UP_DUE"
	| "COMPLIANT"
	| "ESCALATED";

export const OPEN_ALERT_STATUSES: readonly AlertStatus[] = [
	"NOTICE_SENT",
	"FOLLOW_UP_DUE",
];

export type RiskLevel = "LOW" | "MODERATE" | "HIGH" | "SEVERE";

export interface ViolationRecord {
	recordKey: string;
	recordId: string | null;
	entityKind: EntityKind;
	entityKey: string;
	violationCode: string;
	points: number;
	severityTier: number;
	occurredAt: Date;
	timeOfDayKnown: boolean;
	disposition: string;
	jurisdiction: string;
	sourceType: SourceType;
	batchId: string;
}

export type RejectionReason =
	| "invalid_row"
	| "missing_source_type"
	| "missing_entity_key"
	| "missing_plate_state"
	| "missing_occurred_at"
	| "invalid_occurred_at"
	| "missing_violation_code"
	| "unknown_violation_code";

export interface RowRejection {
	rowIndex: number;
	reason: RejectionReason;
	detail: string;
}

export interface DuplicateRecord {
	recordKey: string;
	rowIndex: number;
	conflicting: boolean;
}

export interface DeduplicationReport {
	batchId: string;
	received: number;
	accepted: number;
	duplicates: number;
	conflicts: number;
	rejected: RowRejection[];
	duplicateRecords: DuplicateRecord[];
}

export interface EntityAggregate {
	entityKey: string;
	entityKind: EntityKind;
	windowMonths: number;
	referenceInstant: Date;
	total: number;
	violationCount: number;
	firstViolation: Date;
	lastViolation: Date;
	distinctJurisdictions: string[];
	severeViolationCount: number;
}

export interface AggregateSnapshot {
	entityKind: EntityKind;
	windowMonths: number;
	referenceInstant: Date;
	entities: ReadonlyMap<string, EntityAggregate>;
}

export interface Classification {
	entityKey: string;
	entityKind: EntityKind;
	tier: Tier;
	total: number;
	threshold: number;
	remainingToThreshold: number;
	hasSevereViolation: boolean;
	superSpeeder: boolean;
	triggerReason: string | null;
}

export interface RiskAssessment {
	entityKey: string;
	score: number;
	level: RiskLevel;
	breakdown: {
		severity: number;
		nighttime: number;
		crossJurisdiction: number;
	};
	reasoning: string;
}

export interface EnforcementAlert {
	alertId: string;
	entityKind: EntityKind;
	entityKey: string;
	status: AlertStatus;
	riskScoreAtCreation: number;
	totalAtCreation: number;
	triggerReason: string | null;
	createdAt: Date;
	dueDate: Date | null;
	resolvedAt: Date | null;
	updatedAt: Date;
	notes: string;
}

export interface AlertTransition {
	alertId: string;
	fromStatus: AlertStatus;
	toStatus: AlertStatus;
	actor: string;
	notes: string;
	createdAt: Date;
}
