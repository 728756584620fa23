import {
	checkWeights,
	type PolicyConfiguration,
	thresholdFor,
} from "../config/policy";
import { PolicyConfigurationError } from "../errors";
import type {
	EntityKind,
	RiskAssessment,
	RiskLevel,
	ViolationRecord,
} from "../types";
import { hourInTimeZone, isWithinHourWindow } from "../utils/date-utils";

function clamp(value: number, min: number, max: number): number {
	if (Number.isNaN(value)) {
		return min;
	}
	return Math.min(Math.max(value, min), max);
}

function round1(value: number): number {
	return Math.round(value * 10) / 10;
}

export function riskLevelFor(score: number): RiskLevel {
	if (score >= 75) {
		return "SEVERE";
	}
	if (score >= 50) {
		return "HIGH";
	}
	if (score >= 25) {
		return "MODERATE";
	}
	return "LOW";
}

/**
 * Crash-risk estimate (0-100) from severity relative to the threshold, the
 * share of night-time violations and whether violations span jurisdictions.
 */
export class RiskScorer {
	constructor(private readonly policy: PolicyConfiguration) {
		const issues = checkWeights(policy);
		if (issues.length > 0) {
			throw new PolicyConfigurationError(issues);
		}
	}

	/** `violations` are the entity's counted records (in window, sustained). */
	score(
		entityKey: string,
		violations: readonly ViolationRecord[],
		entityKind: EntityKind,
	): RiskAssessment {
		const policy = this.policy;
		const total =
			entityKind === "driver"
				? violations.reduce((sum, v) => sum + v.points, 0)
				: violations.length;

		const severityFactor = Math.min(
			total / thresholdFor(policy, entityKind),
			policy.severityCap,
		);

		const timed = violations.filter((v) => v.timeOfDayKnown);
		const nightCount = timed.filter((v) =>
			isWithinHourWindow(
				hourInTimeZone(v.occurredAt, policy.timeZone),
				policy.nightStartHour,
				policy.nightEndHour,
			),
		).length;
		const nighttimeFraction = timed.length > 0 ? nightCount / timed.length : 0;

		const jurisdictions = new Set(violations.map((v) => v.jurisdiction));
		const crossJurisdictionFlag = jurisdictions.size > 1 ? 1 : 0;

		const severity = policy.severityWeight * severityFactor;
		const nighttime = policy.nighttimeWeight * nighttimeFraction;
		const crossJurisdiction =
			policy.crossJurisdictionWeight * crossJurisdictionFlag;

		// Malformed code tables can push the sum out of range either way.
		const score = round1(
			100 * clamp(severity + nighttime + crossJurisdiction, 0, 1),
		);

		const breakdown = {
			severity: round1(100 * severity),
			nighttime: round1(100 * nighttime),
			crossJurisdiction: round1(100 * crossJurisdiction),
		};

		return {
			entityKey,
			score,
			level: riskLevelFor(score),
			breakdown,
			reasoning: this.buildReasoning(score, breakdown, {
				total,
				nightCount,
				timedCount: timed.length,
				jurisdictionCount: jurisdictions.size,
			}),
		};
	}

	private buildReasoning(
		score: number,
		breakdown: RiskAssessment["breakdown"],
		facts: {
			total: number;
			nightCount: number;
			timedCount: number;
			jurisdictionCount: number;
		},
	): string {
		const factors = [
			`severity ${breakdown.severity} (${facts.total} total)`,
			`nighttime ${breakdown.nighttime} (${facts.nightCount}/${facts.timedCount} at night)`,
			`cross-jurisdiction ${breakdown.crossJurisdiction} (${facts.jurisdictionCount} jurisdictions)`,
		];
		return `Risk score: ${score}. Factors: ${factors.join(", ")}`;
	}
}
