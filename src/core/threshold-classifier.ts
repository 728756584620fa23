import {
	highestSeverityTier,
	type PolicyConfiguration,
	thresholdFor,
	warningBandFor,
	windowMonthsFor,
} from "../config/policy";
import type {
	AggregateSnapshot,
	Classification,
	EntityAggregate,
	EntityKind,
	Tier,
	ViolationRecord,
} from "../types";
import { aggregate, countedRecords } from "./windowed-aggregator";

export function tierFor(
	total: number,
	threshold: number,
	band: readonly [number, number],
): Tier {
	if (total >= threshold) {
		return "REQUIRED";
	}
	const [low, high] = band;
	if (total >= low && total < high) {
		return "WARNING";
	}
	return "COMPLIANT";
}

function unitFor(kind: EntityKind): string {
	return kind === "driver" ? "points" : "tickets";
}

/**
 * Tier from the entity's own threshold and warning band. The super-speeder
 * signal is kept separate: a single top-tier violation sets it regardless of
 * the total.
 */
export function classify(
	entity: EntityAggregate,
	policy: PolicyConfiguration,
): Classification {
	const threshold = thresholdFor(policy, entity.entityKind);
	const tier = tierFor(
		entity.total,
		threshold,
		warningBandFor(policy, entity.entityKind),
	);
	const hasSevereViolation = entity.severeViolationCount > 0;

	let triggerReason: string | null = null;
	if (tier === "REQUIRED") {
		triggerReason = `${entity.total} ${unitFor(entity.entityKind)} in ${entity.windowMonths} months (threshold: ${threshold})`;
	} else if (hasSevereViolation && entity.entityKind === "driver") {
		triggerReason = `${entity.severeViolationCount} top-tier severity violation(s)`;
	}

	return {
		entityKey: entity.entityKey,
		entityKind: entity.entityKind,
		tier,
		total: entity.total,
		threshold,
		remainingToThreshold: Math.max(threshold - entity.total, 0),
		hasSevereViolation,
		superSpeeder:
			tier === "REQUIRED" ||
			(entity.entityKind === "driver" && hasSevereViolation),
		triggerReason,
	};
}

export function classifySnapshot(
	snapshot: AggregateSnapshot,
	policy: PolicyConfiguration,
): Map<string, Classification> {
	const result = new Map<string, Classification>();
	for (const [entityKey, entity] of snapshot.entities) {
		result.set(entityKey, classify(entity, policy));
	}
	return result;
}

/** Aggregates one kind with the window, dispositions and severity tier the policy sets. */
export function aggregateWithPolicy(
	records: Iterable<ViolationRecord>,
	entityKind: EntityKind,
	referenceInstant: Date,
	policy: PolicyConfiguration,
	signal?: AbortSignal,
): AggregateSnapshot {
	return aggregate(records, {
		entityKind,
		windowMonths: windowMonthsFor(policy, entityKind),
		referenceInstant,
		sustainedDispositions: policy.sustainedDispositions,
		dismissedDispositions: policy.dismissedDispositions,
		severeTier: highestSeverityTier(policy),
		signal,
	});
}

/** Counted records per entity, the input the risk scorer expects. */
export function countedByEntity(
	records: Iterable<ViolationRecord>,
	entityKind: EntityKind,
	referenceInstant: Date,
	policy: PolicyConfiguration,
): Map<string, ViolationRecord[]> {
	const byEntity = new Map<string, ViolationRecord[]>();
	const counted = countedRecords(records, {
		entityKind,
		windowMonths: windowMonthsFor(policy, entityKind),
		referenceInstant,
		sustainedDispositions: policy.sustainedDispositions,
		dismissedDispositions: policy.dismissedDispositions,
	});
	for (const record of counted) {
		const group = byEntity.get(record.entityKey);
		if (group) {
			group.push(record);
		} else {
			byEntity.set(record.entityKey, [record]);
		}
	}
	return byEntity;
}
