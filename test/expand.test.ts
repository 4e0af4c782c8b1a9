import { describe, expect, it } from "vitest";
import {
	expandExpression,
	expandField,
	expandSubentry,
	parseExpression,
	parseField,
	traceField,
} from "../src";

describe("expandSubentry", () => {
	it("steps from the start of the range", () => {
		expect(
			expandSubentry({ from: 5, to: 59, step: 15, source: "5/15" }, "minute"),
		).toEqual([5, 20, 35, 50]);
	});

	it("includes the end when the step lands on it", () => {
		expect(
			expandSubentry({ from: 0, to: 12, step: 4, source: "0-12/4" }, "hour"),
		).toEqual([0, 4, 8, 12]);
	});

	it("folds day-of-week 7 onto Sunday", () => {
		expect(
			expandSubentry({ from: 5, to: 7, step: 1, source: "5-7" }, "day_of_week"),
		).toEqual([0, 5, 6]);
		expect(
			expandSubentry({ from: 0, to: 7, step: 1, source: "0-7" }, "day_of_week"),
		).toEqual([0, 1, 2, 3, 4, 5, 6]);
	});
});

describe("expandField", () => {
	it("unions overlapping subentries", () => {
		expect(expandField(parseField("TUE-WED,1-3", "day_of_week"), "day_of_week")).toEqual(
			[1, 2, 3],
		);
	});

	it("expands stepped lists", () => {
		expect(expandField(parseField("5-29/2,31-59/4", "minute"), "minute")).toEqual(
			[
				5, 7, 9, 11, 13, 15, 17, 19, 21, 23, 25, 27, 29, 31, 35, 39, 43, 47,
				51, 55, 59,
			],
		);
	});

	it("treats */1 and * alike", () => {
		expect(expandField(parseField("*/1", "hour"), "hour")).toEqual(
			expandField(parseField("*", "hour"), "hour"),
		);
	});
});

describe("expandExpression", () => {
	it("expands every field", () => {
		expect(expandExpression(parseExpression("*/59 0-23/1 1-31/4 7-7/2 WED-FRI/2"))).toEqual({
			minute: [0, 59],
			hour: [
				0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14, 15, 16, 17, 18, 19,
				20, 21, 22, 23,
			],
			day_of_month: [1, 5, 9, 13, 17, 21, 25, 29],
			month: [7],
			day_of_week: [3, 5],
		});
	});

	it("keeps the full day-of-month domain regardless of month length", () => {
		expect(expandExpression(parseExpression("0 0 30 2 *")).day_of_month).toEqual([30]);
	});
});

describe("traceField", () => {
	it("lists every subentry that matched each value", () => {
		const trace = traceField(
			parseField("TUE-WED,1-3", "day_of_week"),
			"day_of_week",
		);

		expect([...trace.entries()]).toEqual([
			[1, ["1-3"]],
			[2, ["2-3", "1-3"]],
			[3, ["2-3", "1-3"]],
		]);
	});

	it("orders values ascending", () => {
		const trace = traceField(parseField("30,0-10/5", "minute"), "minute");

		expect([...trace.keys()]).toEqual([0, 5, 10, 30]);
	});
});
