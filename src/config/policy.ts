import { readFile } from "node:fs/promises";
import { z } from "zod";
import { PolicyConfigurationError } from "../errors";
import type { EntityKind } from "../types";

const WEIGHT_TOLERANCE = 1e-6;

const BandSchema = z.tuple([z.number().int(), z.number().int()]);

const ViolationCodeSchema = z.object({
	points: z.number().int(),
	severityTier: z.number().int().min(1),
	description: z.string().optional(),
});

export const PolicySchema = z.object({
	version: z.string().min(1).default("1.0"),
	pointsThreshold: z.number().int().default(11),
	ticketThreshold: z.number().int().default(16),
	driverWindowMonths: z.number().int().default(24),
	vehicleWindowMonths: z.number().int().default(12),
	warningBandPoints: BandSchema.default([8, 11]),
	warningBandTickets: BandSchema.default([13, 16]),
	severityWeight: z.number().default(0.6),
	nighttimeWeight: z.number().default(0.25),
	crossJurisdictionWeight: z.number().default(0.15),
	severityCap: z.number().default(2),
	nightStartHour: z.number().int().default(22),
	nightEndHour: z.number().int().default(4),
	timeZone: z.string().min(1).default("UTC"),
	noticePeriodDays: z.number().int().default(14),
	followUpPeriodDays: z.number().int().default(7),
	sustainedDispositions: z
		.array(z.string().min(1))
		.default(["GUILTY", "SUSTAINED", "CONVICTED", "PAID"]),
	// Camera tickets count unless adjudicated away.
	dismissedDispositions: z
		.array(z.string().min(1))
		.default(["DISMISSED", "NOT GUILTY", "VACATED", "VOID"]),
	// NY VTL 1180 speeding codes
	violationCodes: z.record(z.string(), ViolationCodeSchema).default({
		"1180A": { points: 2, severityTier: 1, description: "1-10 mph over" },
		"1180B": { points: 3, severityTier: 2, description: "11-20 mph over" },
		"1180C": { points: 5, severityTier: 3, description: "21-30 mph over" },
		"1180D": { points: 8, severityTier: 4, description: "31+ mph over" },
		"1180D2": { points: 8, severityTier: 4, description: "31+ mph over" },
		"1180DJ": { points: 8, severityTier: 4, description: "31+ mph over" },
		"1180E": { points: 6, severityTier: 3, description: "school zone" },
		"1180F": { points: 6, severityTier: 3, description: "work zone" },
	}),
	// Camera feeds carry descriptors rather than VTL codes; vehicles count tickets.
	cameraViolationCodes: z.record(z.string(), ViolationCodeSchema).default({
		"PHTO SCHOOL ZN SPEED VIOLATION": {
			points: 0,
			severityTier: 1,
			description: "school zone speed camera",
		},
	}),
	cameraDefaultSeverityTier: z.number().int().min(1).default(1),
});

export type PolicyInput = z.input<typeof PolicySchema>;

export type PolicyConfiguration = Readonly<z.output<typeof PolicySchema>>;

export type ViolationCodeEntry = z.output<typeof ViolationCodeSchema>;

function isValidTimeZone(timeZone: string): boolean {
	try {
		new Intl.DateTimeFormat("en-US", { timeZone });
		return true;
	} catch (error) {
		if (error instanceof RangeError) {
			return false;
		}
		throw error;
	}
}

function checkBand(
	issues: string[],
	name: string,
	band: readonly [number, number],
	threshold: number,
): void {
	const [low, high] = band;
	if (low < 0) {
		issues.push(`${name} lower bound must be >= 0`);
	}
	if (low >= high) {
		issues.push(`${name} must be a non-empty range [low, high)`);
	}
	if (high > threshold) {
		issues.push(`${name} upper bound ${high} exceeds threshold ${threshold}`);
	}
}

export function checkWeights(policy: PolicyConfiguration): string[] {
	const issues: string[] = [];
	const weights = {
		severityWeight: policy.severityWeight,
		nighttimeWeight: policy.nighttimeWeight,
		crossJurisdictionWeight: policy.crossJurisdictionWeight,
	};
	for (const [name, value] of Object.entries(weights)) {
		if (value < 0) {
			issues.push(`${name} must be >= 0`);
		}
	}
	const sum =
		policy.severityWeight +
		policy.nighttimeWeight +
		policy.crossJurisdictionWeight;
	if (Math.abs(sum - 1) > WEIGHT_TOLERANCE) {
		issues.push(`scoring weights must sum to 1, got ${sum}`);
	}
	return issues;
}

function validate(policy: PolicyConfiguration): string[] {
	const issues: string[] = [];

	if (policy.pointsThreshold <= 0) {
		issues.push("pointsThreshold must be > 0");
	}
	if (policy.ticketThreshold <= 0) {
		issues.push("ticketThreshold must be > 0");
	}
	if (policy.driverWindowMonths <= 0) {
		issues.push("driverWindowMonths must be > 0");
	}
	if (policy.vehicleWindowMonths <= 0) {
		issues.push("vehicleWindowMonths must be > 0");
	}
	checkBand(
		issues,
		"warningBandPoints",
		policy.warningBandPoints,
		policy.pointsThreshold,
	);
	checkBand(
		issues,
		"warningBandTickets",
		policy.warningBandTickets,
		policy.ticketThreshold,
	);
	issues.push(...checkWeights(policy));

	if (policy.severityCap <= 0) {
		issues.push("severityCap must be > 0");
	}
	for (const [name, hour] of [
		["nightStartHour", policy.nightStartHour],
		["nightEndHour", policy.nightEndHour],
	] as const) {
		if (hour < 0 || hour > 23) {
			issues.push(`${name} must be within 0-23`);
		}
	}
	if (policy.nightStartHour === policy.nightEndHour) {
		issues.push("night window must not be empty");
	}
	if (!isValidTimeZone(policy.timeZone)) {
		issues.push(`unknown time zone: ${policy.timeZone}`);
	}
	if (policy.noticePeriodDays <= 0) {
		issues.push("noticePeriodDays must be > 0");
	}
	if (policy.followUpPeriodDays <= 0) {
		issues.push("followUpPeriodDays must be > 0");
	}
	if (policy.sustainedDispositions.length === 0) {
		issues.push("sustainedDispositions must not be empty");
	}
	const overlap = policy.dismissedDispositions.filter((d) =>
		policy.sustainedDispositions.includes(d),
	);
	if (overlap.length > 0) {
		issues.push(
			`dispositions both sustained and dismissed: ${overlap.join(", ")}`,
		);
	}
	if (Object.keys(policy.violationCodes).length === 0) {
		issues.push("violationCodes must not be empty");
	}

	return issues;
}

function upperCaseKeys<T>(table: Record<string, T>): Record<string, T> {
	return Object.fromEntries(
		Object.entries(table).map(([code, entry]) => [
			code.trim().toUpperCase(),
			entry,
		]),
	);
}

/**
 * Builds the immutable policy for a run. Anything that would need clamping or
 * renormalizing is rejected instead.
 */
export function loadPolicy(input: unknown = {}): PolicyConfiguration {
	const parsed = PolicySchema.safeParse(input);
	if (!parsed.success) {
		throw new PolicyConfigurationError(
			parsed.error.issues.map(
				(issue) => `${issue.path.join(".") || "policy"}: ${issue.message}`,
			),
		);
	}

	const data = parsed.data;
	const policy: PolicyConfiguration = {
		...data,
		sustainedDispositions: data.sustainedDispositions.map((d) =>
			d.trim().toUpperCase(),
		),
		dismissedDispositions: data.dismissedDispositions.map((d) =>
			d.trim().toUpperCase(),
		),
		violationCodes: upperCaseKeys(data.violationCodes),
		cameraViolationCodes: upperCaseKeys(data.cameraViolationCodes),
	};

	const issues = validate(policy);
	if (issues.length > 0) {
		throw new PolicyConfigurationError(issues);
	}

	return Object.freeze(policy);
}

export async function loadPolicyFile(
	path: string,
	overrides: PolicyInput = {},
): Promise<PolicyConfiguration> {
	const content = await readFile(path, "utf-8");
	let fileInput: unknown;
	try {
		fileInput = JSON.parse(content);
	} catch (error) {
		throw new PolicyConfigurationError([
			`${path} is not valid JSON: ${String(error)}`,
		]);
	}
	if (typeof fileInput !== "object" || fileInput === null) {
		throw new PolicyConfigurationError([`${path} must contain a JSON object`]);
	}
	return loadPolicy({ ...fileInput, ...overrides });
}

export function thresholdFor(
	policy: PolicyConfiguration,
	kind: EntityKind,
): number {
	return kind === "driver" ? policy.pointsThreshold : policy.ticketThreshold;
}

export function windowMonthsFor(
	policy: PolicyConfiguration,
	kind: EntityKind,
): number {
	return kind === "driver"
		? policy.driverWindowMonths
		: policy.vehicleWindowMonths;
}

export function warningBandFor(
	policy: PolicyConfiguration,
	kind: EntityKind,
): readonly [number, number] {
	return kind === "driver"
		? policy.warningBandPoints
		: policy.warningBandTickets;
}

export function highestSeverityTier(policy: PolicyConfiguration): number {
	return Math.max(
		...Object.values(policy.violationCodes).map((entry) => entry.severityTier),
	);
}

export function lookupViolationCode(
	policy: PolicyConfiguration,
	code: string,
): ViolationCodeEntry | undefined {
	return policy.violationCodes[code.trim().toUpperCase()];
}

/**
 * Camera-issued codes: the VTL table first, then the camera descriptor table,
 * else a ticket-only entry. Vehicles are never rejected for an unmapped code.
 */
export function lookupCameraCode(
	policy: PolicyConfiguration,
	code: string,
): ViolationCodeEntry {
	const key = code.trim().toUpperCase();
	return (
		policy.violationCodes[key] ??
		policy.cameraViolationCodes[key] ?? {
			points: 0,
			severityTier: policy.cameraDefaultSeverityTier,
		}
	);
}

export function isSustained(
	policy: Pick<PolicyConfiguration, "sustainedDispositions">,
	disposition: string,
): boolean {
	return policy.sustainedDispositions.includes(
		disposition.trim().toUpperCase(),
	);
}

export function isDismissed(
	policy: Pick<PolicyConfiguration, "dismissedDispositions">,
	disposition: string,
): boolean {
	return policy.dismissedDispositions.includes(
		disposition.trim().toUpperCase(),
	);
}

export function summarizePolicy(policy: PolicyConfiguration) {
	return {
		version: policy.version,
		points_threshold: policy.pointsThreshold,
		ticket_threshold: policy.ticketThreshold,
		driver_window_months: policy.driverWindowMonths,
		vehicle_window_months: policy.vehicleWindowMonths,
		warning_band_points: policy.warningBandPoints,
		warning_band_tickets: policy.warningBandTickets,
		notice_period_days: policy.noticePeriodDays,
		follow_up_period_days: policy.followUpPeriodDays,
	};
}
