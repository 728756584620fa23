import { InvalidTransitionError } from "../errors";
import {
	type AlertStatus,
	type EnforcementAlert,
	OPEN_ALERT_STATUSES,
} from "../types";
import { toNoteTimestamp } from "../utils/date-utils";

const TRANSITIONS: Record<AlertStatus, readonly AlertStatus[]> = {
	NEW: ["NOTICE_SENT"],
	NOTICE_SENT: ["FOLLOW_UP_DUE"],
	FOLLOW_UP_DUE: ["COMPLIANT", "ESCALATED"],
	COMPLIANT: [],
	ESCALATED: [],
};

export const ENFORCEMENT_STAGES: Record<
	AlertStatus,
	{ order: number; label: string; nextAction: string | null }
> = {
	NEW: { order: 1, label: "New Case", nextAction: "Send Notice" },
	NOTICE_SENT: {
		order: 2,
		label: "Notice Sent",
		nextAction: "Mark Follow-Up Due",
	},
	FOLLOW_UP_DUE: {
		order: 3,
		label: "Follow-Up Due",
		nextAction: "Confirm Installation or Escalate",
	},
	COMPLIANT: { order: 4, label: "Compliant", nextAction: null },
	ESCALATED: { order: 5, label: "Escalated", nextAction: null },
};

export function isOpenStatus(status: AlertStatus): boolean {
	return OPEN_ALERT_STATUSES.includes(status);
}

export function isTerminalStatus(status: AlertStatus): boolean {
	return TRANSITIONS[status].length === 0;
}

export function canTransition(from: AlertStatus, to: AlertStatus): boolean {
	return TRANSITIONS[from].includes(to);
}

export function assertTransition(
	alert: Pick<EnforcementAlert, "alertId" | "status">,
	to: AlertStatus,
): void {
	if (!canTransition(alert.status, to)) {
		throw new InvalidTransitionError(alert.alertId, alert.status, to);
	}
}

export function appendNote(
	notes: string,
	at: Date,
	actor: string,
	to: AlertStatus,
	extra?: string,
): string {
	const line = `[${toNoteTimestamp(at)}] ${actor}: Transitioned to ${to}.${extra ? ` ${extra}` : ""}`;
	return notes.length > 0 ? `${notes}\n${line}` : line;
}
