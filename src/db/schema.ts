import { sql } from "drizzle-orm";
import {
	boolean,
	doublePrecision,
	index,
	integer,
	pgTable,
	serial,
	text,
	timestamp,
	uniqueIndex,
} from "drizzle-orm/pg-core";

// Append-only violation facts, keyed by natural identity
export const violations = pgTable(
	"violations",
	{
		recordKey: text("record_key").primaryKey(),
		recordId: text("record_id"),
		entityKind: text("entity_kind").notNull(), // 'driver' | 'vehicle'
		entityKey: text("entity_key").notNull(),
		violationCode: text("violation_code").notNull(),
		points: integer("points").notNull(),
		severityTier: integer("severity_tier").notNull(),
		occurredAt: timestamp("occurred_at", { withTimezone: true }).notNull(),
		timeOfDayKnown: boolean("time_of_day_known").notNull(),
		disposition: text("disposition").notNull(),
		jurisdiction: text("jurisdiction").notNull(),
		sourceType: text("source_type").notNull(), // 'camera' | 'officer'
		batchId: text("batch_id").notNull(),
		ingestedAt: timestamp("ingested_at", { withTimezone: true }).defaultNow(),
	},
	(table) => ({
		entityIdx: index("idx_violations_entity").on(
			table.entityKind,
			table.entityKey,
			table.occurredAt,
		),
	}),
);

export const enforcementAlerts = pgTable(
	"enforcement_alerts",
	{
		id: serial("id").primaryKey(),
		alertId: text("alert_id").notNull().unique(),
		entityKind: text("entity_kind").notNull(),
		entityKey: text("entity_key").notNull(),
		status: text("status").notNull(), // NEW | NOTICE_SENT | FOLLOW_UP_DUE | COMPLIANT | ESCALATED
		riskScoreAtCreation: doublePrecision("risk_score_at_creation").notNull(),
		totalAtCreation: integer("total_at_creation").notNull(),
		triggerReason: text("trigger_reason"),
		dueDate: timestamp("due_date", { withTimezone: true }),
		resolvedAt: timestamp("resolved_at", { withTimezone: true }),
		notes: text("notes").notNull().default(""),
		createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
		updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
	},
	(table) => ({
		// at most one open alert per entity
		oneOpenPerEntity: uniqueIndex("uq_enforcement_alerts_open_entity")
			.on(table.entityKind, table.entityKey)
			.where(sql`status IN ('NOTICE_SENT', 'FOLLOW_UP_DUE')`),
		dueDateIdx: index("idx_enforcement_alerts_due_date").on(table.dueDate),
	}),
);

// Audit trail; alerts are transitioned, never deleted
export const alertTransitions = pgTable("alert_transitions", {
	id: serial("id").primaryKey(),
	alertId: text("alert_id").notNull(),
	fromStatus: text("from_status").notNull(),
	toStatus: text("to_status").notNull(),
	actor: text("actor").notNull(),
	notes: text("notes").notNull().default(""),
	createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
});

export type ViolationRow = typeof violations.$inferSelect;
export type EnforcementAlertRow = typeof enforcementAlerts.$inferSelect;
export type AlertTransitionRow = typeof alertTransitions.$inferSelect;
