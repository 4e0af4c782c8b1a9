import { MalformedExpressionError, MalformedFieldError } from "./errors";
import type {
	CronExpression,
	FieldSubentry,
	FieldType,
	ParsedCronExpression,
} from "./types";

const VAL_ANY = "*";
const VAL_RANGE = "-";
const VAL_STEP = "/";
const VAL_SEPARATOR = ",";

const NUMERIC = /^\d+$/;
const NAME = /[a-z]+/gi;

export interface FieldInfo {
	min: number;
	max: number;
	/** Highest literal accepted when it differs from `max` (day-of-week 7 is Sunday). */
	literalMax?: number;
	alias?: Record<string, number>;
}

export const FIELD_INFO: Record<FieldType, FieldInfo> = {
	minute: { min: 0, max: 59 },
	hour: { min: 0, max: 23 },
	day_of_month: { min: 1, max: 31 },
	month: {
		min: 1,
		max: 12,
		alias: {
			jan: 1,
			feb: 2,
			mar: 3,
			apr: 4,
			may: 5,
			jun: 6,
			jul: 7,
			aug: 8,
			sep: 9,
			oct: 10,
			nov: 11,
			dec: 12,
		},
	},
	day_of_week: {
		min: 0,
		max: 6,
		literalMax: 7,
		alias: {
			sun: 0,
			mon: 1,
			tue: 2,
			wed: 3,
			thu: 4,
			fri: 5,
			sat: 6,
		},
	},
};

export const CronFields: FieldType[] = [
	"minute",
	"hour",
	"day_of_month",
	"month",
	"day_of_week",
];

export function splitExpression(expression: string): string[] {
	return expression
		.split(/\s+/)
		.map((part) => part.trim())
		.filter((part) => part);
}

/**
 * Replaces every `*` with the field's full range and every month or weekday
 * name with its number, leaving plain numeric list/range/step syntax.
 */
export function substituteField(fieldText: string, field: FieldType): string {
	const info = FIELD_INFO[field];
	const alias = info.alias;

	return fieldText
		.replaceAll(VAL_ANY, `${info.min}${VAL_RANGE}${info.max}`)
		.replace(NAME, (name) => {
			const key = name.toLowerCase();
			if (!alias || !Object.hasOwn(alias, key)) {
				throw new MalformedFieldError(
					field,
					fieldText,
					`Unknown name [${name}].`,
				);
			}
			return alias[key].toString();
		});
}

function parseSubentry(
	token: string,
	field: FieldType,
	fieldText: string,
): FieldSubentry {
	const info = FIELD_INFO[field];
	const fail = (detail: string) =>
		new MalformedFieldError(field, fieldText, detail);

	const parseInteger = (value: string): number => {
		if (!NUMERIC.test(value)) {
			throw fail(`Invalid numeric value [${value}].`);
		}
		return Number.parseInt(value, 10);
	};

	if (token === "") {
		throw fail("Empty list entry.");
	}

	const stepParts = token.split(VAL_STEP);
	if (stepParts.length > 2) {
		throw fail(`Entry [${token}] has more than one step.`);
	}
	const [rangeSpec, stepSpec] = stepParts;
	const hasStep = stepParts.length === 2;

	const step = hasStep && stepSpec !== "" ? parseInteger(stepSpec) : 1;
	if (step === 0) {
		throw fail(`Step of entry [${token}] must be at least 1.`);
	}

	const bounds = rangeSpec.split(VAL_RANGE);
	if (bounds.length > 2) {
		throw fail(`Entry [${token}] is not a valid range.`);
	}

	let from = parseInteger(bounds[0]);
	let to: number;
	if (bounds.length === 2 && bounds[1] !== "") {
		to = parseInteger(bounds[1]);
	} else {
		// `N/S` runs to the end of the domain, a bare `N` is a single value
		to = hasStep ? info.max : from;
	}

	if (field === "day_of_week" && from === 7) {
		from = 0;
		if (to === 7) {
			to = 0;
		}
	}

	const upper = info.literalMax ?? info.max;
	for (const value of [from, to]) {
		if (value < info.min || value > upper) {
			throw fail(
				`Value [${value}] out of range. It must be between [${info.min}] and [${upper}].`,
			);
		}
	}

	if (from > to) {
		throw fail(`Range [${token}] starts after it ends.`);
	}

	return { from, to, step, source: token };
}

export function parseField(fieldText: string, field: FieldType): FieldSubentry[] {
	if (!fieldText) {
		throw new MalformedFieldError(field, fieldText, "Empty field.");
	}

	return substituteField(fieldText, field)
		.split(VAL_SEPARATOR)
		.map((token) => parseSubentry(token, field, fieldText));
}

export function parseExpression(pattern: string): CronExpression {
	const parts = splitExpression(pattern);

	if (parts.length !== CronFields.length) {
		throw new MalformedExpressionError(
			pattern,
			`Expected [${CronFields.length}] fields but found [${parts.length}] fields.`,
		);
	}

	const [minute, hour, day_of_month, month, day_of_week] = parts;
	const raw: Record<FieldType, string> = {
		minute,
		hour,
		day_of_month,
		month,
		day_of_week,
	};

	try {
		return {
			pattern,
			raw,
			fields: {
				minute: parseField(minute, "minute"),
				hour: parseField(hour, "hour"),
				day_of_month: parseField(day_of_month, "day_of_month"),
				month: parseField(month, "month"),
				day_of_week: parseField(day_of_week, "day_of_week"),
			},
		};
	} catch (e: unknown) {
		if (e instanceof MalformedFieldError) {
			throw e.withPattern(pattern);
		}
		throw e;
	}
}

export function parse(expression: string): ParsedCronExpression {
	if (!expression) {
		return {
			success: false,
			pattern: expression,
			error: "Empty expression",
		};
	}

	try {
		return {
			success: true,
			pattern: expression,
			expression: parseExpression(expression),
		};
	} catch (e: unknown) {
		if (e instanceof Error) {
			return {
				success: false,
				pattern: expression,
				error: e.message,
			};
		}
		return {
			success: false,
			pattern: expression,
			error: "Parse error (unknown error)",
		};
	}
}
