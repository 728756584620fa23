import type { AlertStatus, EntityKind } from "./types";

export class PolicyConfigurationError extends Error {
	constructor(readonly issues: string[]) {
		super(`invalid policy configuration: ${issues.join("; ")}`);
		this.name = "PolicyConfigurationError";
	}
}

/** Baseline and current snapshots were not computed against the same window end. */
export class ReferenceInstantMismatchError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ReferenceInstantMismatchError";
	}
}

export class AlertConflictError extends Error {
	constructor(
		readonly entityKind: EntityKind,
		readonly entityKey: string,
		message?: string,
	) {
		super(message ?? `open alert already exists for ${entityKind} ${entityKey}`);
		this.name = "AlertConflictError";
	}
}

export class InvalidTransitionError extends Error {
	constructor(
		readonly alertId: string,
		readonly from: AlertStatus,
		readonly to: AlertStatus,
	) {
		super(`alert ${alertId} cannot move from ${from} to ${to}`);
		this.name = "InvalidTransitionError";
	}
}

export class AlertNotFoundError extends Error {
	constructor(readonly alertId: string) {
		super(`alert not found: ${alertId}`);
		this.name = "AlertNotFoundError";
	}
}

export class EntityNotRequiredError extends Error {
	constructor(
		readonly entityKind: EntityKind,
		readonly entityKey: string,
	) {
		super(`${entityKind} ${entityKey} is not above the ISA threshold`);
		this.name = "EntityNotRequiredError";
	}
}
