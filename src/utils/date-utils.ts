const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Calendar-month subtraction in UTC. The day of month is clamped to the
 * length of the target month (31 March minus one month is 28/29 February).
 */
export function subtractMonths(date: Date, months: number): Date {
	const year = date.getUTCFullYear();
	const month = date.getUTCMonth() - months;
	const targetYear = year + Math.floor(month / 12);
	const targetMonth = ((month % 12) + 12) % 12;
	const lastDay = new Date(
		Date.UTC(targetYear, targetMonth + 1, 0),
	).getUTCDate();
	const day = Math.min(date.getUTCDate(), lastDay);

	return new Date(
		Date.UTC(
			targetYear,
			targetMonth,
			day,
			date.getUTCHours(),
			date.getUTCMinutes(),
			date.getUTCSeconds(),
			date.getUTCMilliseconds(),
		),
	);
}

export function addDays(date: Date, days: number): Date {
	return new Date(date.getTime() + days * DAY_MS);
}

const hourFormatters = new Map<string, Intl.DateTimeFormat>();

/** Hour of day (0-23) of an instant as seen on a wall clock in `timeZone`. */
export function hourInTimeZone(date: Date, timeZone: string): number {
	let formatter = hourFormatters.get(timeZone);
	if (!formatter) {
		formatter = new Intl.DateTimeFormat("en-US", {
			timeZone,
			hour: "numeric",
			hourCycle: "h23",
		});
		hourFormatters.set(timeZone, formatter);
	}
	const hourPart = formatter
		.formatToParts(date)
		.find((part) => part.type === "hour");
	return Number(hourPart?.value ?? "0") % 24;
}

/** True when `hour` falls in [start, end), wrapping past midnight when start > end. */
export function isWithinHourWindow(
	hour: number,
	start: number,
	end: number,
): boolean {
	if (start < end) {
		return hour >= start && hour < end;
	}
	return hour >= start || hour < end;
}

export function toDateString(date: Date): string {
	return date.toISOString().slice(0, 10);
}

/** `YYYY-MM-DD HH:MM` in UTC, used in alert notes. */
export function toNoteTimestamp(date: Date): string {
	return date.toISOString().slice(0, 16).replace("T", " ");
}
