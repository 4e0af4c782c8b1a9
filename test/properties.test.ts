import { describe, expect, it } from "vitest";
import {
	DAY_MATCH_POLICIES,
	expandCron,
	expandExpression,
	parseExpression,
	resolveDayMatchMode,
} from "../src";
import type { DayMatchPolicy } from "../src";

const MINUTE = 60_000;

// Covers the end of February in a leap year and a whole March
const window = {
	startAt: new Date("2024-02-20T00:00:00Z"),
	endAt: new Date("2024-03-31T23:59:00Z"),
};

const crons = [
	"5-29/2,31-59/4 */3 4/5 * TUE-WED,1-3",
	"1-5/2,6-10/2,59 6,7,8,9-11/1 */2 2 0,1,2,3",
	"15 23 1 3 2",
	"*/59 0-23/1 1-31/4 2-3/1 WED-FRI/2",
	"0 12 15 * MON",
	"0 0 29-31 * *",
	"*/20 */6 * * SUN",
	"30 8 1,* * 5-7",
];

/** Every minute of the window whose fields all match, found by scanning. */
function scan(cron: string, policy: DayMatchPolicy): string[] {
	const expression = parseExpression(cron);
	const values = expandExpression(expression);
	const mode = resolveDayMatchMode(expression, policy);
	const matches: string[] = [];

	for (
		let time = window.startAt.getTime();
		time <= window.endAt.getTime();
		time += MINUTE
	) {
		const date = new Date(time);
		const dayOfMonth = values.day_of_month.includes(date.getUTCDate());
		const dayOfWeek = values.day_of_week.includes(date.getUTCDay());
		const day =
			mode === "union" ? dayOfMonth || dayOfWeek : dayOfMonth && dayOfWeek;

		if (
			day &&
			values.minute.includes(date.getUTCMinutes()) &&
			values.hour.includes(date.getUTCHours()) &&
			values.month.includes(date.getUTCMonth() + 1)
		) {
			matches.push(date.toISOString());
		}
	}

	return matches;
}

describe.each(DAY_MATCH_POLICIES)("with day match mode %s", (dayMatchMode) => {
	it.each(crons)("[%s] matches a minute-by-minute scan", (cron) => {
		const matches = expandCron(cron, window, { dayMatchMode }).map((date) =>
			date.toISOString(),
		);

		expect(matches).toEqual(scan(cron, dayMatchMode));
	});
});

describe("expansion properties", () => {
	it.each(crons)("[%s] only fires on matched field values", (cron) => {
		const values = expandExpression(parseExpression(cron));

		for (const date of expandCron(cron, window, { dayMatchMode: "union" })) {
			expect(values.minute).toContain(date.getUTCMinutes());
			expect(values.hour).toContain(date.getUTCHours());
			expect(values.month).toContain(date.getUTCMonth() + 1);
			expect(date.getUTCSeconds()).toBe(0);
		}
	});

	it.each(crons)("[%s] union is a superset of intersect", (cron) => {
		const union = new Set(
			expandCron(cron, window, { dayMatchMode: "union" }).map((date) =>
				date.getTime(),
			),
		);

		for (const date of expandCron(cron, window, { dayMatchMode: "intersect" })) {
			expect(union.has(date.getTime())).toBe(true);
		}
	});

	it.each(["0 0 * * 1", "0 0 1 * *", "0 0 1 1 5", "*/30 * */2 * *"])(
		"vixie and contains agree on [%s]",
		(cron) => {
			expect(expandCron(cron, window, { dayMatchMode: "vixie" })).toEqual(
				expandCron(cron, window, { dayMatchMode: "contains" }),
			);
		},
	);

	it("vixie and contains differ when a wildcard is not leading", () => {
		// 2024-03-01 is a Friday
		const vixie = expandCron("30 8 1,* * 5-7", window, { dayMatchMode: "vixie" });
		const contains = expandCron("30 8 1,* * 5-7", window, {
			dayMatchMode: "contains",
		});

		expect(vixie.length).toBeGreaterThan(contains.length);
		expect(contains.map((date) => date.getUTCDay())).not.toContain(1);
	});

	it("produces distinct timestamps", () => {
		const matches = expandCron("0-59/5,*/10 * * * *", window).map((date) =>
			date.getTime(),
		);

		expect(new Set(matches).size).toBe(matches.length);
	});
});
