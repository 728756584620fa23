import { randomUUID } from "node:crypto";
import type { PolicyConfiguration } from "../config/policy";
import type { ViolationRepository } from "../db/repository";
import type {
	DeduplicationReport,
	DuplicateRecord,
	EntityKind,
	RowRejection,
	SourceType,
	ViolationRecord,
} from "../types";
import { logger } from "../utils/logger";
import { dedupeRecords, samePayload } from "./dedup";
import { normalizeRow } from "./record-normalizer";

export interface IngestOptions {
	sourceType?: SourceType;
	batchId?: string;
}

export interface PreparedBatch {
	report: DeduplicationReport;
	/** Records not yet stored, in row order. */
	records: ViolationRecord[];
}

/**
 * Append-only violation history. A batch is prepared (normalized and
 * deduplicated against itself and the stored history) before anything is
 * written, so a caller can inspect or abandon it.
 */
export class ViolationStore {
	constructor(
		private readonly repository: ViolationRepository,
		private readonly policy: PolicyConfiguration,
	) {}

	async prepare(
		rows: readonly unknown[],
		options: IngestOptions = {},
	): Promise<PreparedBatch> {
		const batchId = options.batchId ?? `batch_${randomUUID()}`;
		const rejected: RowRejection[] = [];
		const rowIndexes = new Map<ViolationRecord, number>();
		const valid: ViolationRecord[] = [];

		rows.forEach((row, rowIndex) => {
			const result = normalizeRow(row, rowIndex, this.policy, {
				batchId,
				sourceType: options.sourceType,
			});
			if (result.ok) {
				rowIndexes.set(result.record, rowIndex);
				valid.push(result.record);
			} else {
				rejected.push(result.rejection);
			}
		});

		const inBatch = dedupeRecords(valid);
		const duplicateRecords: DuplicateRecord[] = inBatch.duplicates.map(
			({ record, conflicting }) => ({
				recordKey: record.recordKey,
				rowIndex: rowIndexes.get(record) ?? -1,
				conflicting,
			}),
		);

		const stored = await this.repository.findByKeys(
			inBatch.kept.map((record) => record.recordKey),
		);
		const fresh: ViolationRecord[] = [];
		for (const record of inBatch.kept) {
			const existing = stored.get(record.recordKey);
			if (!existing) {
				fresh.push(record);
				continue;
			}
			duplicateRecords.push({
				recordKey: record.recordKey,
				rowIndex: rowIndexes.get(record) ?? -1,
				conflicting: !samePayload(existing, record),
			});
		}
		duplicateRecords.sort((a, b) => a.rowIndex - b.rowIndex);

		const conflicts = duplicateRecords.filter((d) => d.conflicting).length;
		if (conflicts > 0) {
			logger.warn("Conflicting duplicate violations ignored", {
				batchId,
				conflicts,
			});
		}

		return {
			report: {
				batchId,
				received: rows.length,
				accepted: fresh.length,
				duplicates: duplicateRecords.length,
				conflicts,
				rejected,
				duplicateRecords,
			},
			records: fresh,
		};
	}

	async commit(batch: PreparedBatch): Promise<number> {
		const inserted = await this.repository.appendRecords(batch.records);
		if (inserted.length < batch.records.length) {
			// another writer stored the same keys between prepare and commit
			logger.warn("Violations already stored at commit", {
				batchId: batch.report.batchId,
				skipped: batch.records.length - inserted.length,
			});
		}
		logger.info("Violation batch committed", {
			batchId: batch.report.batchId,
			received: batch.report.received,
			inserted: inserted.length,
			duplicates: batch.report.duplicates,
			rejected: batch.report.rejected.length,
		});
		return inserted.length;
	}

	async ingest(
		rows: readonly unknown[],
		options: IngestOptions = {},
	): Promise<DeduplicationReport> {
		const batch = await this.prepare(rows, options);
		await this.commit(batch);
		return batch.report;
	}

	async snapshot(entityKind?: EntityKind): Promise<ViolationRecord[]> {
		return this.repository.listRecords({ entityKind });
	}

	async history(
		entityKind: EntityKind,
		entityKey: string,
	): Promise<ViolationRecord[]> {
		return this.repository.listRecords({ entityKind, entityKey });
	}

	async count(): Promise<number> {
		return this.repository.countRecords();
	}
}
