import type {
	CronExpression,
	FieldSubentry,
	FieldType,
	FieldValues,
} from "./types";

function normalizeValue(value: number, field: FieldType): number {
	// Sunday may be written as 7
	return field === "day_of_week" && value === 7 ? 0 : value;
}

/** Every domain value the subentry matches, in ascending order. */
export function expandSubentry(
	subentry: FieldSubentry,
	field: FieldType,
): number[] {
	const values = new Set<number>();
	for (let v = subentry.from; v <= subentry.to; v += subentry.step) {
		values.add(normalizeValue(v, field));
	}
	return [...values].sort((a, b) => a - b);
}

/** Union of the values matched by the comma-separated subentries of one field. */
export function expandField(
	subentries: FieldSubentry[],
	field: FieldType,
): number[] {
	const values = new Set<number>();
	for (const subentry of subentries) {
		for (const value of expandSubentry(subentry, field)) {
			values.add(value);
		}
	}
	return [...values].sort((a, b) => a - b);
}

export function expandExpression(expression: CronExpression): FieldValues {
	return {
		minute: expandField(expression.fields.minute, "minute"),
		hour: expandField(expression.fields.hour, "hour"),
		day_of_month: expandField(expression.fields.day_of_month, "day_of_month"),
		month: expandField(expression.fields.month, "month"),
		day_of_week: expandField(expression.fields.day_of_week, "day_of_week"),
	};
}

/**
 * For each matched value, the sources of the subentries that matched it, in
 * the order they appear in the field.
 */
export function traceField(
	subentries: FieldSubentry[],
	field: FieldType,
): Map<number, string[]> {
	const trace = new Map<number, string[]>();
	for (const subentry of subentries) {
		for (const value of expandSubentry(subentry, field)) {
			const sources = trace.get(value);
			if (sources) {
				sources.push(subentry.source);
			} else {
				trace.set(value, [subentry.source]);
			}
		}
	}
	return new Map([...trace.entries()].sort(([a], [b]) => a - b));
}
