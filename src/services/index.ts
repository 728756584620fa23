export { DetectionService } from "./detection-service";
export { EnforcementService } from "./enforcement-service";
export { ExportService } from "./export-service";
export { FollowUpSweeper } from "./follow-up-sweeper";
export { RosterService } from "./roster-service";
