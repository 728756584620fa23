import type { DetectionRunReport } from "../services/detection-service";
import type { Roster, RosterEntry } from "../services/roster-service";
import type { EnforcementAlert } from "../types";

function iso(date: Date | null): string | null {
	return date ? date.toISOString() : null;
}

export function serializeRosterEntry(entry: RosterEntry) {
	const { aggregate, classification, risk } = entry;
	return {
		entity_kind: aggregate.entityKind,
		entity_key: aggregate.entityKey,
		total: aggregate.total,
		violation_count: aggregate.violationCount,
		first_violation: iso(aggregate.firstViolation),
		last_violation: iso(aggregate.lastViolation),
		jurisdictions: aggregate.distinctJurisdictions,
		tier: classification.tier,
		threshold: classification.threshold,
		remaining_to_threshold: classification.remainingToThreshold,
		super_speeder: classification.superSpeeder,
		has_severe_violation: classification.hasSevereViolation,
		trigger_reason: classification.triggerReason,
		risk_score: risk.score,
		risk_level: risk.level,
		risk_breakdown: {
			severity: risk.breakdown.severity,
			nighttime: risk.breakdown.nighttime,
			cross_jurisdiction: risk.breakdown.crossJurisdiction,
		},
		risk_reasoning: risk.reasoning,
		enforcement_status: entry.enforcementStatus,
		alert_id: entry.alertId,
	};
}

export function serializeRoster(roster: Roster) {
	return {
		entity_kind: roster.entityKind,
		window_months: roster.windowMonths,
		reference_instant: iso(roster.referenceInstant),
		count: roster.entries.length,
		entries: roster.entries.map(serializeRosterEntry),
	};
}

export function serializeAlert(alert: EnforcementAlert) {
	return {
		alert_id: alert.alertId,
		entity_kind: alert.entityKind,
		entity_key: alert.entityKey,
		status: alert.status,
		risk_score_at_creation: alert.riskScoreAtCreation,
		total_at_creation: alert.totalAtCreation,
		trigger_reason: alert.triggerReason,
		created_at: iso(alert.createdAt),
		due_date: iso(alert.dueDate),
		resolved_at: iso(alert.resolvedAt),
		updated_at: iso(alert.updatedAt),
		notes: alert.notes,
	};
}

export function serializeDetectionRun(report: DetectionRunReport) {
	return {
		batch: report.batch,
		committed: report.committed,
		deltas: report.deltas.map((delta) => ({
			entity_kind: delta.entityKind,
			reference_instant: iso(delta.referenceInstant),
			new_crossings: delta.newCrossings,
		})),
		outcomes: report.outcomes.map((outcome) => ({
			entity_kind: outcome.entityKind,
			entity_key: outcome.entityKey,
			total: outcome.total,
			threshold: outcome.threshold,
			risk_score: outcome.riskScore,
			outcome: outcome.outcome,
			alert_id: outcome.alertId,
			detail: outcome.detail,
		})),
	};
}
