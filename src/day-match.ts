import { getDate, getDay, getDaysInMonth } from "date-fns";
import { InvalidConfigurationError } from "./errors";
import type { CronExpression, DayMatchMode, DayMatchPolicy } from "./types";

const VAL_ANY = "*";

export const DAY_MATCH_POLICIES = [
	"vixie",
	"contains",
	"union",
	"intersect",
] as const satisfies readonly DayMatchPolicy[];

/**
 * Decides whether the day-of-month and day-of-week fields of an expression
 * are combined with OR (`union`) or AND (`intersect`).
 *
 * `vixie` intersects when either raw day field starts with `*`, matching the
 * behavior of Vixie cron (see https://crontab.guru/cron-bug.html). `contains`
 * intersects when either raw day field holds a `*` anywhere. Only the raw
 * field text is looked at, so `1,*` is not wildcard-led under `vixie`.
 */
export function resolveDayMatchMode(
	expression: Pick<CronExpression, "raw">,
	policy: DayMatchPolicy,
): DayMatchMode {
	const { day_of_month, day_of_week } = expression.raw;

	switch (policy) {
		case "union":
		case "intersect":
			return policy;
		case "vixie":
			return day_of_month.startsWith(VAL_ANY) ||
				day_of_week.startsWith(VAL_ANY)
				? "intersect"
				: "union";
		case "contains":
			return day_of_month.includes(VAL_ANY) || day_of_week.includes(VAL_ANY)
				? "intersect"
				: "union";
		default:
			throw new InvalidConfigurationError(
				`Unknown day match mode [${String(policy)}]. Expected one of [${DAY_MATCH_POLICIES.join(", ")}].`,
			);
	}
}

/** Matched day-of-month values that exist in the month of `date`. */
export function daysOfMonthIn(date: Date, dayOfMonth: number[]): Set<number> {
	const lastDay = getDaysInMonth(date);
	return new Set(dayOfMonth.filter((day) => day <= lastDay));
}

export function matchesDay(
	date: Date,
	dayOfMonth: ReadonlySet<number>,
	dayOfWeek: ReadonlySet<number>,
	mode: DayMatchMode,
): boolean {
	const dayOfMonthMatches = dayOfMonth.has(getDate(date));
	const dayOfWeekMatches = dayOfWeek.has(getDay(date));

	return mode === "union"
		? dayOfMonthMatches || dayOfWeekMatches
		: dayOfMonthMatches && dayOfWeekMatches;
}
