import {
	type PolicyConfiguration,
	windowMonthsFor,
} from "../config/policy";
import type { RiskScorer } from "../core/risk-scorer";
import {
	aggregateWithPolicy,
	classify,
	countedByEntity,
} from "../core/threshold-classifier";
import type { ViolationStore } from "../core/violation-store";
import { latestOccurrence } from "../core/windowed-aggregator";
import type { AlertRepository } from "../db/repository";
import type {
	AlertStatus,
	Classification,
	EntityAggregate,
	EntityKind,
	RiskAssessment,
	Tier,
	ViolationRecord,
} from "../types";

export type ReferenceSelector = Date | "latest";

export interface RosterEntry {
	aggregate: EntityAggregate;
	classification: Classification;
	risk: RiskAssessment;
	/** Status of the entity's latest alert; NEW when REQUIRED and never alerted. */
	enforcementStatus: AlertStatus | null;
	alertId: string | null;
	violations: ViolationRecord[];
}

export interface Roster {
	entityKind: EntityKind;
	windowMonths: number;
	referenceInstant: Date | null;
	entries: RosterEntry[];
}

const TIER_ORDER: Record<Tier, number> = {
	REQUIRED: 0,
	WARNING: 1,
	COMPLIANT: 2,
};

function compareEntries(a: RosterEntry, b: RosterEntry): number {
	return (
		TIER_ORDER[a.classification.tier] - TIER_ORDER[b.classification.tier] ||
		b.aggregate.total - a.aggregate.total ||
		(a.aggregate.entityKey < b.aggregate.entityKey ? -1 : 1)
	);
}

/** Classified, risk-scored view of one entity kind at a reference instant. */
export class RosterService {
	constructor(
		private readonly store: ViolationStore,
		private readonly alerts: AlertRepository,
		private readonly policy: PolicyConfiguration,
		private readonly scorer: RiskScorer,
	) {}

	async buildRoster(
		entityKind: EntityKind,
		reference: ReferenceSelector,
		options: { tier?: Tier; entityKey?: string } = {},
	): Promise<Roster> {
		const records = await this.store.snapshot(entityKind);
		const referenceInstant =
			reference === "latest" ? latestOccurrence(records, entityKind) : reference;
		const windowMonths = windowMonthsFor(this.policy, entityKind);
		if (!referenceInstant) {
			return { entityKind, windowMonths, referenceInstant: null, entries: [] };
		}

		const snapshot = aggregateWithPolicy(
			records,
			entityKind,
			referenceInstant,
			this.policy,
		);
		const counted = countedByEntity(
			records,
			entityKind,
			referenceInstant,
			this.policy,
		);
		const latestAlerts = await this.alerts.latestAlertsByEntity(entityKind);

		const entries: RosterEntry[] = [];
		for (const [entityKey, aggregate] of snapshot.entities) {
			if (options.entityKey && options.entityKey !== entityKey) {
				continue;
			}
			const classification = classify(aggregate, this.policy);
			if (options.tier && classification.tier !== options.tier) {
				continue;
			}
			const violations = counted.get(entityKey) ?? [];
			const latestAlert = latestAlerts.get(entityKey);
			entries.push({
				aggregate,
				classification,
				risk: this.scorer.score(entityKey, violations, entityKind),
				enforcementStatus:
					latestAlert?.status ??
					(classification.tier === "REQUIRED" ? "NEW" : null),
				alertId: latestAlert?.alertId ?? null,
				violations,
			});
		}

		return {
			entityKind,
			windowMonths,
			referenceInstant,
			entries: entries.sort(compareEntries),
		};
	}

	async findEntity(
		entityKind: EntityKind,
		entityKey: string,
		reference: ReferenceSelector,
	): Promise<RosterEntry | null> {
		const roster = await this.buildRoster(entityKind, reference, { entityKey });
		return roster.entries[0] ?? null;
	}
}
