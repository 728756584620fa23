import type { PolicyConfiguration } from "../config/policy";
import { ReferenceInstantMismatchError } from "../errors";
import type {
	AggregateSnapshot,
	EntityAggregate,
	EntityKind,
	ViolationRecord,
} from "../types";
import { dedupeRecords } from "./dedup";
import { aggregateWithPolicy, classify } from "./threshold-classifier";
import { latestOccurrence } from "./windowed-aggregator";

export interface DeltaReport {
	entityKind: EntityKind;
	/** Null when the combined population is empty. */
	referenceInstant: Date | null;
	newCrossings: ReadonlySet<string>;
	/** Current aggregates of the newly crossed entities, ordered by entity key. */
	crossings: EntityAggregate[];
}

/**
 * Guards the comparison itself: two snapshots are only comparable when they
 * cover the same kind, window length and window end.
 */
export function assertComparable(
	baseline: AggregateSnapshot,
	current: AggregateSnapshot,
): void {
	if (baseline.entityKind !== current.entityKind) {
		throw new ReferenceInstantMismatchError(
			`entity kinds differ: ${baseline.entityKind} vs ${current.entityKind}`,
		);
	}
	if (baseline.windowMonths !== current.windowMonths) {
		throw new ReferenceInstantMismatchError(
			`window lengths differ: ${baseline.windowMonths} vs ${current.windowMonths} months`,
		);
	}
	if (
		baseline.referenceInstant.getTime() !== current.referenceInstant.getTime()
	) {
		throw new ReferenceInstantMismatchError(
			`reference instants differ: ${baseline.referenceInstant.toISOString()} vs ${current.referenceInstant.toISOString()}`,
		);
	}
}

/** Entities REQUIRED in `current` that were not REQUIRED in `baseline`. */
export function compareSnapshots(
	baseline: AggregateSnapshot,
	current: AggregateSnapshot,
	policy: PolicyConfiguration,
): EntityAggregate[] {
	assertComparable(baseline, current);

	const crossings: EntityAggregate[] = [];
	for (const [entityKey, entity] of current.entities) {
		if (classify(entity, policy).tier !== "REQUIRED") {
			continue;
		}
		const before = baseline.entities.get(entityKey);
		if (before && classify(before, policy).tier === "REQUIRED") {
			continue;
		}
		crossings.push(entity);
	}
	return crossings.sort((a, b) =>
		a.entityKey < b.entityKey ? -1 : a.entityKey > b.entityKey ? 1 : 0,
	);
}

/**
 * Entities that cross into REQUIRED because of `incoming`. Baseline and
 * current are aggregated at one reference instant, the latest occurrence in
 * the combined population, so only the new records differ between the two.
 */
export function findNewCrossings(
	history: readonly ViolationRecord[],
	incoming: readonly ViolationRecord[],
	entityKind: EntityKind,
	policy: PolicyConfiguration,
	signal?: AbortSignal,
): DeltaReport {
	const ofKind = (records: readonly ViolationRecord[]) =>
		records.filter((record) => record.entityKind === entityKind);

	const baselineRecords = dedupeRecords(ofKind(history)).kept;
	const combinedRecords = dedupeRecords([
		...ofKind(history),
		...ofKind(incoming),
	]).kept;

	const referenceInstant = latestOccurrence(combinedRecords);
	if (!referenceInstant) {
		return {
			entityKind,
			referenceInstant: null,
			newCrossings: new Set(),
			crossings: [],
		};
	}

	const baseline = aggregateWithPolicy(
		baselineRecords,
		entityKind,
		referenceInstant,
		policy,
		signal,
	);
	const current = aggregateWithPolicy(
		combinedRecords,
		entityKind,
		referenceInstant,
		policy,
		signal,
	);
	const crossings = compareSnapshots(baseline, current, policy);

	return {
		entityKind,
		referenceInstant,
		newCrossings: new Set(crossings.map((entity) => entity.entityKey)),
		crossings,
	};
}
