import type { FieldType } from "./types";

export type CronErrorKind =
	| "expression"
	| "field"
	| "window"
	| "window-size"
	| "configuration"
	| "result-limit";

/** Base class of every error the library throws. */
export class CronError extends Error {
	readonly kind: CronErrorKind;

	constructor(kind: CronErrorKind, message: string) {
		super(message);
		this.name = "CronError";
		this.kind = kind;
	}
}

export class MalformedExpressionError extends CronError {
	readonly pattern: string;

	constructor(pattern: string, message: string) {
		super("expression", `Invalid cron expression [${pattern}]. ${message}`);
		this.name = "MalformedExpressionError";
		this.pattern = pattern;
	}
}

export class MalformedFieldError extends CronError {
	readonly field: FieldType;
	readonly fieldText: string;
	readonly detail: string;
	readonly pattern?: string;

	constructor(
		field: FieldType,
		fieldText: string,
		detail: string,
		pattern?: string,
	) {
		super(
			"field",
			pattern === undefined
				? `Invalid field [${field}] value [${fieldText}]. ${detail}`
				: `Invalid cron expression [${pattern}], field [${field}] value [${fieldText}]. ${detail}`,
		);
		this.name = "MalformedFieldError";
		this.field = field;
		this.fieldText = fieldText;
		this.detail = detail;
		this.pattern = pattern;
	}

	/** Copy of this error that names the expression the field came from. */
	withPattern(pattern: string): MalformedFieldError {
		return new MalformedFieldError(
			this.field,
			this.fieldText,
			this.detail,
			pattern,
		);
	}
}

export class InvalidWindowError extends CronError {
	constructor(message: string) {
		super("window", message);
		this.name = "InvalidWindowError";
	}
}

export class WindowTooLargeError extends CronError {
	readonly days: number;
	readonly maxDateRange: number;

	constructor(days: number, maxDateRange: number) {
		super(
			"window-size",
			`Window spans [${days}] days, more than the allowed [${maxDateRange}].`,
		);
		this.name = "WindowTooLargeError";
		this.days = days;
		this.maxDateRange = maxDateRange;
	}
}

export class InvalidConfigurationError extends CronError {
	constructor(message: string) {
		super("configuration", message);
		this.name = "InvalidConfigurationError";
	}
}

export class ResultLimitExceededError extends CronError {
	readonly maxResults: number;

	constructor(maxResults: number) {
		super(
			"result-limit",
			`Expansion produced more than [${maxResults}] timestamps.`,
		);
		this.name = "ResultLimitExceededError";
		this.maxResults = maxResults;
	}
}
