import { logger } from "../utils/logger";
import type { EnforcementService } from "./enforcement-service";

export interface SweepStats {
	runs: number;
	advanced: number;
	failures: number;
	lastRunAt: string | null;
}

/** Periodically moves notices whose due date has passed to FOLLOW_UP_DUE. */
export class FollowUpSweeper {
	private timer: NodeJS.Timeout | null = null;
	private running = false;
	private stats: SweepStats = {
		runs: 0,
		advanced: 0,
		failures: 0,
		lastRunAt: null,
	};

	constructor(
		private readonly enforcement: EnforcementService,
		private readonly intervalMs: number,
	) {}

	start(): void {
		if (this.timer) {
			return;
		}
		this.timer = setInterval(() => {
			void this.sweep();
		}, this.intervalMs);
		this.timer.unref();
	}

	stop(): void {
		if (this.timer) {
			clearInterval(this.timer);
			this.timer = null;
		}
	}

	/**
	 * Returns the number of alerts advanced; overlapping sweeps are skipped.
	 * Without `at` the enforcement service's clock decides what is overdue.
	 */
	async sweep(at?: Date): Promise<number> {
		if (this.running) {
			return 0;
		}
		this.running = true;
		const now = at ?? this.enforcement.now();
		try {
			const advanced = await this.enforcement.advanceOverdue(now);
			this.stats.advanced += advanced.length;
			return advanced.length;
		} catch (error) {
			this.stats.failures += 1;
			logger.error("Follow-up sweep failed", error);
			return 0;
		} finally {
			this.stats.runs += 1;
			this.stats.lastRunAt = now.toISOString();
			this.running = false;
		}
	}

	getStats(): SweepStats {
		return { ...this.stats };
	}
}
