import { type SQL, and, asc, count, desc, eq, inArray, lte } from "drizzle-orm";
import { drizzle } from "drizzle-orm/node-postgres";
import { Pool } from "pg";
import { settings } from "../config/settings";
import { AlertConflictError, AlertNotFoundError } from "../errors";
import type {
	AlertStatus,
	AlertTransition,
	EnforcementAlert,
	EntityKind,
	SourceType,
	ViolationRecord,
} from "../types";
import type {
	AlertQuery,
	AlertRepository,
	AlertUpdate,
	Repositories,
	ViolationQuery,
	ViolationRepository,
} from "./repository";
import type {
	AlertTransitionRow,
	EnforcementAlertRow,
	ViolationRow,
} from "./schema";
import * as schema from "./schema";

const INSERT_CHUNK_SIZE = 1000;
const UNIQUE_VIOLATION = "23505";

const pool = new Pool({
	host: settings.postgres.host,
	port: settings.postgres.port,
	database: settings.postgres.database,
	user: settings.postgres.user,
	password: settings.postgres.password,
	ssl: false,
});

export const db = drizzle(pool, { schema });

export async function initializeRegistry(): Promise<void> {
	await pool.query(`
		CREATE TABLE IF NOT EXISTS violations (
			record_key TEXT PRIMARY KEY,
			record_id TEXT,
			entity_kind TEXT NOT NULL,
			entity_key TEXT NOT NULL,
			violation_code TEXT NOT NULL,
			points INTEGER NOT NULL,
			severity_tier INTEGER NOT NULL,
			occurred_at TIMESTAMPTZ NOT NULL,
			time_of_day_known BOOLEAN NOT NULL,
			disposition TEXT NOT NULL,
			jurisdiction TEXT NOT NULL,
			source_type TEXT NOT NULL,
			batch_id TEXT NOT NULL,
			ingested_at TIMESTAMPTZ DEFAULT NOW()
		);

		CREATE INDEX IF NOT EXISTS idx_violations_entity
			ON violations (entity_kind, entity_key, occurred_at);

		CREATE TABLE IF NOT EXISTS enforcement_alerts (
			id SERIAL PRIMARY KEY,
			alert_id TEXT NOT NULL UNIQUE,
			entity_kind TEXT NOT NULL,
			entity_key TEXT NOT NULL,
			status TEXT NOT NULL,
			risk_score_at_creation DOUBLE PRECISION NOT NULL,
			total_at_creation INTEGER NOT NULL,
			trigger_reason TEXT,
			due_date TIMESTAMPTZ,
			resolved_at TIMESTAMPTZ,
			notes TEXT NOT NULL DEFAULT '',
			created_at TIMESTAMPTZ NOT NULL,
			updated_at TIMESTAMPTZ NOT NULL
		);

		CREATE UNIQUE INDEX IF NOT EXISTS uq_enforcement_alerts_open_entity
			ON enforcement_alerts (entity_kind, entity_key)
			WHERE status IN ('NOTICE_SENT', 'FOLLOW_UP_DUE');

		CREATE INDEX IF NOT EXISTS idx_enforcement_alerts_due_date
			ON enforcement_alerts (due_date);

		CREATE TABLE IF NOT EXISTS alert_transitions (
			id SERIAL PRIMARY KEY,
			alert_id TEXT NOT NULL,
			from_status TEXT NOT NULL,
			to_status TEXT NOT NULL,
			actor TEXT NOT NULL,
			notes TEXT NOT NULL DEFAULT '',
			created_at TIMESTAMPTZ NOT NULL
		);
	`);
}

export async function closeRegistry(): Promise<void> {
	await pool.end();
}

function isUniqueViolation(error: unknown): boolean {
	let current: unknown = error;
	while (typeof current === "object" && current !== null) {
		if ("code" in current && current.code === UNIQUE_VIOLATION) {
			return true;
		}
		current = "cause" in current ? current.cause : undefined;
	}
	return false;
}

function toEntityKind(value: string): EntityKind {
	if (value === "driver" || value === "vehicle") {
		return value;
	}
	throw new Error(`unexpected entity_kind in registry: ${value}`);
}

function toSourceType(value: string): SourceType {
	if (value === "camera" || value === "officer") {
		return value;
	}
	throw new Error(`unexpected source_type in registry: ${value}`);
}

function toAlertStatus(value: string): AlertStatus {
	switch (value) {
		case "NEW":
		case "NOTICE_SENT":
		case "FOLLOW_UP_DUE":
		case "COMPLIANT":
		case "ESCALATED":
			return value;
		default:
			throw new Error(`unexpected alert status in registry: ${value}`);
	}
}

function toViolation(row: ViolationRow): ViolationRecord {
	return {
		recordKey: row.recordKey,
		recordId: row.recordId,
		entityKind: toEntityKind(row.entityKind),
		entityKey: row.entityKey,
		violationCode: row.violationCode,
		points: row.points,
		severityTier: row.severityTier,
		occurredAt: row.occurredAt,
		timeOfDayKnown: row.timeOfDayKnown,
		disposition: row.disposition,
		jurisdiction: row.jurisdiction,
		sourceType: toSourceType(row.sourceType),
		batchId: row.batchId,
	};
}

function toAlert(row: EnforcementAlertRow): EnforcementAlert {
	return {
		alertId: row.alertId,
		entityKind: toEntityKind(row.entityKind),
		entityKey: row.entityKey,
		status: toAlertStatus(row.status),
		riskScoreAtCreation: row.riskScoreAtCreation,
		totalAtCreation: row.totalAtCreation,
		triggerReason: row.triggerReason,
		createdAt: row.createdAt,
		dueDate: row.dueDate,
		resolvedAt: row.resolvedAt,
		updatedAt: row.updatedAt,
		notes: row.notes,
	};
}

function toTransition(row: AlertTransitionRow): AlertTransition {
	return {
		alertId: row.alertId,
		fromStatus: toAlertStatus(row.fromStatus),
		toStatus: toAlertStatus(row.toStatus),
		actor: row.actor,
		notes: row.notes,
		createdAt: row.createdAt,
	};
}

// Violation store functions
export const violationRegistry: ViolationRepository = {
	async findByKeys(recordKeys) {
		const found = new Map<string, ViolationRecord>();
		for (let i = 0; i < recordKeys.length; i += INSERT_CHUNK_SIZE) {
			const chunk = recordKeys.slice(i, i + INSERT_CHUNK_SIZE);
			const rows = await db
				.select()
				.from(schema.violations)
				.where(inArray(schema.violations.recordKey, chunk));
			for (const row of rows) {
				found.set(row.recordKey, toViolation(row));
			}
		}
		return found;
	},

	async appendRecords(records) {
		const inserted: string[] = [];
		for (let i = 0; i < records.length; i += INSERT_CHUNK_SIZE) {
			const chunk = records.slice(i, i + INSERT_CHUNK_SIZE);
			const rows = await db
				.insert(schema.violations)
				.values(chunk)
				.onConflictDoNothing({ target: schema.violations.recordKey })
				.returning({ recordKey: schema.violations.recordKey });
			inserted.push(...rows.map((row) => row.recordKey));
		}
		return inserted;
	},

	async listRecords(query: ViolationQuery = {}) {
		const conditions: SQL[] = [];
		if (query.entityKind) {
			conditions.push(eq(schema.violations.entityKind, query.entityKind));
		}
		if (query.entityKey) {
			conditions.push(eq(schema.violations.entityKey, query.entityKey));
		}
		const rows = await db
			.select()
			.from(schema.violations)
			.where(conditions.length > 0 ? and(...conditions) : undefined)
			.orderBy(asc(schema.violations.occurredAt), asc(schema.violations.recordKey));
		return rows.map(toViolation);
	},

	async countRecords() {
		const [row] = await db.select({ total: count() }).from(schema.violations);
		return row?.total ?? 0;
	},
};

// Enforcement alert functions
export const alertRegistry: AlertRepository = {
	async insertOpenAlert(alert, transition) {
		try {
			return await db.transaction(async (tx) => {
				const [row] = await tx
					.insert(schema.enforcementAlerts)
					.values({
						alertId: alert.alertId,
						entityKind: alert.entityKind,
						entityKey: alert.entityKey,
						status: alert.status,
						riskScoreAtCreation: alert.riskScoreAtCreation,
						totalAtCreation: alert.totalAtCreation,
						triggerReason: alert.triggerReason,
						dueDate: alert.dueDate,
						resolvedAt: alert.resolvedAt,
						notes: alert.notes,
						createdAt: alert.createdAt,
						updatedAt: alert.updatedAt,
					})
					.returning();
				await tx.insert(schema.alertTransitions).values(transition);
				return toAlert(row);
			});
		} catch (error) {
			if (isUniqueViolation(error)) {
				throw new AlertConflictError(alert.entityKind, alert.entityKey);
			}
			throw error;
		}
	},

	async transitionAlert(
		alertId: string,
		expectedStatus: AlertStatus,
		update: AlertUpdate,
		transition: AlertTransition,
	) {
		return db.transaction(async (tx) => {
			const [row] = await tx
				.update(schema.enforcementAlerts)
				.set({
					status: update.status,
					dueDate: update.dueDate,
					resolvedAt: update.resolvedAt,
					notes: update.notes,
					updatedAt: update.updatedAt,
				})
				.where(
					and(
						eq(schema.enforcementAlerts.alertId, alertId),
						eq(schema.enforcementAlerts.status, expectedStatus),
					),
				)
				.returning();

			if (!row) {
				const existing = await tx.query.enforcementAlerts.findFirst({
					where: eq(schema.enforcementAlerts.alertId, alertId),
				});
				if (!existing) {
					throw new AlertNotFoundError(alertId);
				}
				throw new AlertConflictError(
					toEntityKind(existing.entityKind),
					existing.entityKey,
					`alert ${alertId} is ${existing.status}, expected ${expectedStatus}`,
				);
			}

			await tx.insert(schema.alertTransitions).values(transition);
			return toAlert(row);
		});
	},

	async getAlert(alertId) {
		const row = await db.query.enforcementAlerts.findFirst({
			where: eq(schema.enforcementAlerts.alertId, alertId),
		});
		return row ? toAlert(row) : undefined;
	},

	async findOpenAlert(entityKind, entityKey) {
		const row = await db.query.enforcementAlerts.findFirst({
			where: and(
				eq(schema.enforcementAlerts.entityKind, entityKind),
				eq(schema.enforcementAlerts.entityKey, entityKey),
				inArray(schema.enforcementAlerts.status, ["NOTICE_SENT", "FOLLOW_UP_DUE"]),
			),
		});
		return row ? toAlert(row) : undefined;
	},

	async listAlerts(query: AlertQuery) {
		const conditions: SQL[] = [];
		if (query.status) {
			conditions.push(eq(schema.enforcementAlerts.status, query.status));
		}
		if (query.entityKind) {
			conditions.push(eq(schema.enforcementAlerts.entityKind, query.entityKind));
		}
		if (query.entityKey) {
			conditions.push(eq(schema.enforcementAlerts.entityKey, query.entityKey));
		}
		const rows = await db.query.enforcementAlerts.findMany({
			where: conditions.length > 0 ? and(...conditions) : undefined,
			orderBy: [desc(schema.enforcementAlerts.createdAt), desc(schema.enforcementAlerts.id)],
			limit: query.limit,
		});
		return rows.map(toAlert);
	},

	async listOverdueNotices(now) {
		const rows = await db.query.enforcementAlerts.findMany({
			where: and(
				eq(schema.enforcementAlerts.status, "NOTICE_SENT"),
				lte(schema.enforcementAlerts.dueDate, now),
			),
			orderBy: [asc(schema.enforcementAlerts.dueDate)],
		});
		return rows.map(toAlert);
	},

	async latestAlertsByEntity(entityKind) {
		const rows = await db
			.selectDistinctOn([schema.enforcementAlerts.entityKey])
			.from(schema.enforcementAlerts)
			.where(eq(schema.enforcementAlerts.entityKind, entityKind))
			.orderBy(
				schema.enforcementAlerts.entityKey,
				desc(schema.enforcementAlerts.createdAt),
				desc(schema.enforcementAlerts.id),
			);
		return new Map(rows.map((row) => [row.entityKey, toAlert(row)]));
	},

	async listTransitions(alertId, limit) {
		const rows = await db.query.alertTransitions.findMany({
			where: eq(schema.alertTransitions.alertId, alertId),
			orderBy: [asc(schema.alertTransitions.id)],
			limit,
		});
		return rows.map(toTransition);
	},
};

export const pgRepositories: Repositories = {
	violations: violationRegistry,
	alerts: alertRegistry,
};
