import type {
	AggregateSnapshot,
	EntityAggregate,
	EntityKind,
	ViolationRecord,
} from "../types";
import { subtractMonths } from "../utils/date-utils";

export interface AggregateOptions {
	entityKind: EntityKind;
	windowMonths: number;
	/** End of the trailing window. Never defaulted to the wall clock. */
	referenceInstant: Date;
	/** Dispositions that make a driver's violation count toward points. */
	sustainedDispositions: readonly string[];
	/** Dispositions that void a vehicle ticket; any other ticket counts. */
	dismissedDispositions: readonly string[];
	/** Severity tier counted in `severeViolationCount`. */
	severeTier?: number;
	signal?: AbortSignal;
}

export function windowStart(referenceInstant: Date, windowMonths: number): Date {
	return subtractMonths(referenceInstant, windowMonths);
}

/** Inclusive at both ends. */
export function isInWindow(
	occurredAt: Date,
	referenceInstant: Date,
	windowMonths: number,
): boolean {
	const ts = occurredAt.getTime();
	return (
		ts >= windowStart(referenceInstant, windowMonths).getTime() &&
		ts <= referenceInstant.getTime()
	);
}

/**
 * Records of one entity kind that count toward its total at the reference
 * instant: inside the trailing window, and for drivers with a sustained
 * disposition. Vehicle tickets count unless they were dismissed.
 */
export function countedRecords(
	records: Iterable<ViolationRecord>,
	options: Omit<AggregateOptions, "signal" | "severeTier">,
): ViolationRecord[] {
	const from = windowStart(
		options.referenceInstant,
		options.windowMonths,
	).getTime();
	const to = options.referenceInstant.getTime();
	const sustained = new Set(options.sustainedDispositions);
	const dismissed = new Set(options.dismissedDispositions);
	const counts =
		options.entityKind === "driver"
			? (disposition: string) => sustained.has(disposition)
			: (disposition: string) => !dismissed.has(disposition);

	const counted: ViolationRecord[] = [];
	for (const record of records) {
		if (record.entityKind !== options.entityKind) {
			continue;
		}
		const ts = record.occurredAt.getTime();
		if (ts < from || ts > to) {
			continue;
		}
		if (!counts(record.disposition)) {
			continue;
		}
		counted.push(record);
	}
	return counted;
}

/**
 * Per-entity totals over a trailing window. Drivers sum points, vehicles count
 * tickets. A pure function of its inputs; the same records, window and
 * reference instant always give equal snapshots.
 */
export function aggregate(
	records: Iterable<ViolationRecord>,
	options: AggregateOptions,
): AggregateSnapshot {
	const groups = new Map<string, ViolationRecord[]>();
	for (const record of countedRecords(records, options)) {
		const group = groups.get(record.entityKey);
		if (group) {
			group.push(record);
		} else {
			groups.set(record.entityKey, [record]);
		}
	}

	const entities = new Map<string, EntityAggregate>();
	const keys = Array.from(groups.keys()).sort();
	for (const entityKey of keys) {
		options.signal?.throwIfAborted();
		const group = groups.get(entityKey) ?? [];
		entities.set(entityKey, summarize(entityKey, group, options));
	}

	return {
		entityKind: options.entityKind,
		windowMonths: options.windowMonths,
		referenceInstant: new Date(options.referenceInstant),
		entities,
	};
}

function summarize(
	entityKey: string,
	group: ViolationRecord[],
	options: AggregateOptions,
): EntityAggregate {
	let total = 0;
	let first = group[0].occurredAt.getTime();
	let last = first;
	let severe = 0;
	const jurisdictions = new Set<string>();

	for (const record of group) {
		total += options.entityKind === "driver" ? record.points : 1;
		const ts = record.occurredAt.getTime();
		first = Math.min(first, ts);
		last = Math.max(last, ts);
		jurisdictions.add(record.jurisdiction);
		if (
			options.severeTier !== undefined &&
			record.severityTier >= options.severeTier
		) {
			severe++;
		}
	}

	return {
		entityKey,
		entityKind: options.entityKind,
		windowMonths: options.windowMonths,
		referenceInstant: new Date(options.referenceInstant),
		total,
		violationCount: group.length,
		firstViolation: new Date(first),
		lastViolation: new Date(last),
		distinctJurisdictions: Array.from(jurisdictions).sort(),
		severeViolationCount: severe,
	};
}

/** Latest occurrence among the records, used as an "as of latest data" reference. */
export function latestOccurrence(
	records: Iterable<ViolationRecord>,
	entityKind?: EntityKind,
): Date | null {
	let latest: number | null = null;
	for (const record of records) {
		if (entityKind && record.entityKind !== entityKind) {
			continue;
		}
		const ts = record.occurredAt.getTime();
		if (latest === null || ts > latest) {
			latest = ts;
		}
	}
	return latest === null ? null : new Date(latest);
}
