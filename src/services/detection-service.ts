import type { PolicyConfiguration } from "../config/policy";
import { findNewCrossings } from "../core/delta-detector";
import type { RiskScorer } from "../core/risk-scorer";
import { classify, countedByEntity } from "../core/threshold-classifier";
import type {
	IngestOptions,
	PreparedBatch,
	ViolationStore,
} from "../core/violation-store";
import { AlertConflictError, EntityNotRequiredError } from "../errors";
import type {
	DeduplicationReport,
	EnforcementAlert,
	EntityKind,
	ViolationRecord,
} from "../types";
import { logger } from "../utils/logger";
import type { EnforcementService } from "./enforcement-service";
import type { ReferenceSelector, RosterService } from "./roster-service";

const ENTITY_KINDS: readonly EntityKind[] = ["driver", "vehicle"];

export interface DetectionOutcome {
	entityKind: EntityKind;
	entityKey: string;
	total: number;
	threshold: number;
	riskScore: number;
	outcome: "notice_sent" | "conflict";
	alertId: string | null;
	detail: string | null;
}

export interface KindDelta {
	entityKind: EntityKind;
	referenceInstant: Date | null;
	newCrossings: string[];
}

export interface DetectionRunReport {
	batch: DeduplicationReport;
	deltas: KindDelta[];
	outcomes: DetectionOutcome[];
	committed: number;
}

export interface DetectionRunOptions extends IngestOptions {
	actor?: string;
	signal?: AbortSignal;
}

const DETECTION_ACTOR = "detection";

function entityRef(entityKind: EntityKind, entityKey: string): string {
	return `${entityKind}:${entityKey}`;
}

/**
 * One incoming batch end to end: prepare it against the stored history,
 * find the entities it pushes over their threshold, open a notice for each,
 * then commit the batch. A run stopped before any notice leaves the store
 * untouched; a run stopped later commits the records of the entities it had
 * already handled, so every open alert has its triggering facts stored.
 */
export class DetectionService {
	constructor(
		private readonly store: ViolationStore,
		private readonly enforcement: EnforcementService,
		private readonly roster: RosterService,
		private readonly policy: PolicyConfiguration,
		private readonly scorer: RiskScorer,
	) {}

	async run(
		rows: readonly unknown[],
		options: DetectionRunOptions = {},
	): Promise<DetectionRunReport> {
		const { signal } = options;
		const actor = options.actor ?? DETECTION_ACTOR;
		const batch = await this.store.prepare(rows, options);
		const history = await this.store.snapshot();

		const deltas: KindDelta[] = [];
		const outcomes: DetectionOutcome[] = [];
		const handled = new Set<string>();

		try {
			await this.detect(batch, history, { signal, actor, deltas, outcomes, handled });
			signal?.throwIfAborted();
		} catch (error) {
			await this.commitHandled(batch, handled);
			throw error;
		}

		const committed = await this.store.commit(batch);
		logger.info("Detection run completed", {
			batchId: batch.report.batchId,
			newCrossings: deltas.reduce((n, d) => n + d.newCrossings.length, 0),
			notices: outcomes.filter((o) => o.outcome === "notice_sent").length,
		});

		return { batch: batch.report, deltas, outcomes, committed };
	}

	private async detect(
		batch: PreparedBatch,
		history: readonly ViolationRecord[],
		run: {
			signal: AbortSignal | undefined;
			actor: string;
			deltas: KindDelta[];
			outcomes: DetectionOutcome[];
			handled: Set<string>;
		},
	): Promise<void> {
		const { signal, actor, deltas, outcomes, handled } = run;
		for (const entityKind of ENTITY_KINDS) {
			signal?.throwIfAborted();
			const delta = findNewCrossings(
				history,
				batch.records,
				entityKind,
				this.policy,
				signal,
			);
			deltas.push({
				entityKind,
				referenceInstant: delta.referenceInstant,
				newCrossings: Array.from(delta.newCrossings),
			});
			if (!delta.referenceInstant || delta.crossings.length === 0) {
				continue;
			}

			const counted = countedByEntity(
				[...history, ...batch.records],
				entityKind,
				delta.referenceInstant,
				this.policy,
			);
			for (const crossing of delta.crossings) {
				signal?.throwIfAborted();
				const classification = classify(crossing, this.policy);
				const risk = this.scorer.score(
					crossing.entityKey,
					counted.get(crossing.entityKey) ?? [],
					entityKind,
				);
				outcomes.push(
					await this.openNotice({
						entityKind,
						entityKey: crossing.entityKey,
						total: crossing.total,
						threshold: classification.threshold,
						riskScore: risk.score,
						triggerReason: classification.triggerReason,
						actor,
					}),
				);
				handled.add(entityRef(entityKind, crossing.entityKey));
			}
		}
	}

	private async commitHandled(
		batch: PreparedBatch,
		handled: ReadonlySet<string>,
	): Promise<void> {
		if (handled.size === 0) {
			return;
		}
		const records = batch.records.filter((record) =>
			handled.has(entityRef(record.entityKind, record.entityKey)),
		);
		try {
			const committed = await this.store.commit({ ...batch, records });
			logger.warn("Detection run stopped; kept records of handled entities", {
				batchId: batch.report.batchId,
				entities: handled.size,
				committed,
			});
		} catch (error) {
			logger.error("Failed to keep records of handled entities", error, {
				batchId: batch.report.batchId,
			});
		}
	}

	/** Operator-initiated notice for an entity that is currently REQUIRED. */
	async issueManualNotice(
		entityKind: EntityKind,
		entityKey: string,
		options: { actor: string; notes?: string; reference?: ReferenceSelector },
	): Promise<EnforcementAlert> {
		const entry = await this.roster.findEntity(
			entityKind,
			entityKey,
			options.reference ?? "latest",
		);
		if (!entry || entry.classification.tier !== "REQUIRED") {
			throw new EntityNotRequiredError(entityKind, entityKey);
		}
		return this.enforcement.issueNotice({
			entityKind,
			entityKey,
			riskScore: entry.risk.score,
			total: entry.aggregate.total,
			triggerReason: entry.classification.triggerReason,
			actor: options.actor,
			notes: options.notes,
		});
	}

	/**
	 * Opens notices for REQUIRED entities that have never been alerted, e.g.
	 * after history was loaded without detection runs.
	 */
	async reconcile(
		entityKind: EntityKind,
		options: { actor?: string; signal?: AbortSignal } = {},
	): Promise<DetectionOutcome[]> {
		const roster = await this.roster.buildRoster(entityKind, "latest", {
			tier: "REQUIRED",
		});
		const outcomes: DetectionOutcome[] = [];
		for (const entry of roster.entries) {
			options.signal?.throwIfAborted();
			if (entry.alertId) {
				continue;
			}
			outcomes.push(
				await this.openNotice({
					entityKind,
					entityKey: entry.aggregate.entityKey,
					total: entry.aggregate.total,
					threshold: entry.classification.threshold,
					riskScore: entry.risk.score,
					triggerReason: entry.classification.triggerReason,
					actor: options.actor ?? DETECTION_ACTOR,
				}),
			);
		}
		return outcomes;
	}

	private async openNotice(input: {
		entityKind: EntityKind;
		entityKey: string;
		total: number;
		threshold: number;
		riskScore: number;
		triggerReason: string | null;
		actor: string;
	}): Promise<DetectionOutcome> {
		const base = {
			entityKind: input.entityKind,
			entityKey: input.entityKey,
			total: input.total,
			threshold: input.threshold,
			riskScore: input.riskScore,
		};
		try {
			const alert = await this.enforcement.issueNotice({
				entityKind: input.entityKind,
				entityKey: input.entityKey,
				riskScore: input.riskScore,
				total: input.total,
				triggerReason: input.triggerReason,
				actor: input.actor,
			});
			return { ...base, outcome: "notice_sent", alertId: alert.alertId, detail: null };
		} catch (error) {
			if (!(error instanceof AlertConflictError)) {
				throw error;
			}
			return { ...base, outcome: "conflict", alertId: null, detail: error.message };
		}
	}
}
