import { TZDate } from "@date-fns/tz";
import {
	addDays,
	differenceInCalendarDays,
	endOfDay,
	format,
	getDate,
	getMonth,
	isValid,
	startOfDay,
} from "date-fns";
import { InvalidWindowError, WindowTooLargeError } from "./errors";
import type { ExpansionWindow, WindowEntry } from "./types";

const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const KEY_DATE_FORMAT = "yyyy-MM-dd";

export type WindowLimits = {
	maxDateRange: number;
	timezone: string;
};

function checkSpan(days: number, maxDateRange: number): void {
	if (days > maxDateRange) {
		throw new WindowTooLargeError(days, maxDateRange);
	}
}

/**
 * Midnight of the given calendar day in `timezone`. Strings must be
 * `YYYY-MM-DD`; dates contribute their calendar day as seen in `timezone`.
 */
export function toCalendarDay(value: Date | string, timezone: string): TZDate {
	if (typeof value === "string") {
		const match = CALENDAR_DATE.exec(value);
		if (!match) {
			throw new InvalidWindowError(
				`Invalid start date [${value}]. Expected [YYYY-MM-DD].`,
			);
		}
		const [, year, month, day] = match;
		const date = new TZDate(
			Number(year),
			Number(month) - 1,
			Number(day),
			0,
			0,
			0,
			0,
			timezone,
		);
		if (getMonth(date) !== Number(month) - 1 || getDate(date) !== Number(day)) {
			throw new InvalidWindowError(`Start date [${value}] does not exist.`);
		}
		return date;
	}

	if (!isValid(value)) {
		throw new InvalidWindowError("Invalid start date.");
	}
	return startOfDay(new TZDate(value, timezone));
}

/**
 * Window shared by every expression of a batch: whole calendar days from
 * `startDate` through `startDate + daysForward`.
 */
export function globalWindow(
	startDate: Date | string,
	daysForward: number,
	limits: WindowLimits,
): ExpansionWindow {
	if (!Number.isInteger(daysForward) || daysForward < 0) {
		throw new InvalidWindowError(
			`Days forward [${daysForward}] must be a non-negative integer.`,
		);
	}
	checkSpan(daysForward, limits.maxDateRange);

	const startAt = toCalendarDay(startDate, limits.timezone);
	return {
		startAt,
		endAt: endOfDay(addDays(startAt, daysForward)),
		days: daysForward,
		timezone: limits.timezone,
	};
}

/** Window of a single entry, bounded by its own start and end instants. */
export function entryWindow(
	entry: Pick<WindowEntry, "startAt" | "endAt">,
	limits: WindowLimits,
): ExpansionWindow {
	if (!isValid(entry.startAt) || !isValid(entry.endAt)) {
		throw new InvalidWindowError("Window start and end must be valid dates.");
	}

	const startAt = new TZDate(entry.startAt, limits.timezone);
	const endAt = new TZDate(entry.endAt, limits.timezone);
	if (startAt.getTime() >= endAt.getTime()) {
		throw new InvalidWindowError(
			`Window start [${entry.startAt.toISOString()}] must be before its end [${entry.endAt.toISOString()}].`,
		);
	}

	const days = differenceInCalendarDays(endAt, startAt);
	checkSpan(days, limits.maxDateRange);

	return { startAt, endAt, days, timezone: limits.timezone };
}

/** `<cron>-<start day>-<end day>`, identifying one entry's expansion. */
export function windowKey(cron: string, window: ExpansionWindow): string {
	return `${cron}-${format(window.startAt, KEY_DATE_FORMAT)}-${format(window.endAt, KEY_DATE_FORMAT)}`;
}
