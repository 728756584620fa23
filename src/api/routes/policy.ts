import { Hono } from "hono";
import {
	highestSeverityTier,
	type PolicyConfiguration,
	summarizePolicy,
} from "../../config/policy";
import { ENFORCEMENT_STAGES } from "../../core/enforcement-lifecycle";

const app = new Hono();

declare module "hono" {
	interface ContextVariableMap {
		policy: PolicyConfiguration;
	}
}

app.get("/", (c) => {
	const policy = c.get("policy");
	return c.json({
		...summarizePolicy(policy),
		sustained_dispositions: policy.sustainedDispositions,
		dismissed_dispositions: policy.dismissedDispositions,
		night_window: {
			start_hour: policy.nightStartHour,
			end_hour: policy.nightEndHour,
			time_zone: policy.timeZone,
		},
		weights: {
			severity: policy.severityWeight,
			nighttime: policy.nighttimeWeight,
			cross_jurisdiction: policy.crossJurisdictionWeight,
		},
		severity_cap: policy.severityCap,
		highest_severity_tier: highestSeverityTier(policy),
		violation_codes: policy.violationCodes,
		camera_violation_codes: policy.cameraViolationCodes,
		enforcement_stages: ENFORCEMENT_STAGES,
	});
});

export const policyRoutes = app;
