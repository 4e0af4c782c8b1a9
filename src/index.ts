export {
	DEFAULT_MAX_DATE_RANGE,
	DEFAULT_TIMEZONE,
	type ExpansionOptions,
	expansionOptionsSchema,
	type ResolvedOptions,
	resolveOptions,
} from "./config";
export {
	DAY_MATCH_POLICIES,
	daysOfMonthIn,
	matchesDay,
	resolveDayMatchMode,
} from "./day-match";
export {
	CronError,
	type CronErrorKind,
	InvalidConfigurationError,
	InvalidWindowError,
	MalformedExpressionError,
	MalformedFieldError,
	ResultLimitExceededError,
	WindowTooLargeError,
} from "./errors";
export {
	expandExpression,
	expandField,
	expandSubentry,
	traceField,
} from "./expand";
export { type CronLogger, type LogContext, silentLogger } from "./logger";
export {
	collectInstants,
	estimateMaxResults,
	expandCron,
	expandGlobalWindow,
	expandPerEntryWindow,
	iterateTimestamps,
} from "./match";
export {
	CronFields,
	FIELD_INFO,
	type FieldInfo,
	parse,
	parseExpression,
	parseField,
	splitExpression,
	substituteField,
} from "./parse";
export type * from "./types";
export {
	entryWindow,
	globalWindow,
	toCalendarDay,
	type WindowLimits,
	windowKey,
} from "./window";
