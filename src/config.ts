import { z } from "zod";
import { DAY_MATCH_POLICIES } from "./day-match";
import { InvalidConfigurationError } from "./errors";
import { type CronLogger, silentLogger } from "./logger";

export const DEFAULT_MAX_DATE_RANGE = 1095; // 365 * 3
export const DEFAULT_TIMEZONE = "UTC";

function isTimeZone(value: string): boolean {
	try {
		new Intl.DateTimeFormat("en-US", { timeZone: value });
		return true;
	} catch (e: unknown) {
		if (e instanceof RangeError) {
			return false;
		}
		throw e;
	}
}

export const expansionOptionsSchema = z
	.object({
		dayMatchMode: z.enum(DAY_MATCH_POLICIES).default("vixie"),
		maxDateRange: z.number().int().positive().default(DEFAULT_MAX_DATE_RANGE),
		timezone: z
			.string()
			.refine(isTimeZone, { message: "Unknown time zone" })
			.default(DEFAULT_TIMEZONE),
		maxResults: z.number().int().positive().optional(),
	})
	.strict();

export type ExpansionOptions = z.input<typeof expansionOptionsSchema> & {
	logger?: CronLogger;
};

export type ResolvedOptions = z.output<typeof expansionOptionsSchema> & {
	logger: CronLogger;
};

export function resolveOptions(options: ExpansionOptions = {}): ResolvedOptions {
	const { logger, ...settings } = options;
	const result = expansionOptionsSchema.safeParse(settings);

	if (!result.success) {
		const issues = result.error.issues
			.map((issue) => `[${issue.path.join(".")}] ${issue.message}`)
			.join("; ");
		throw new InvalidConfigurationError(`Invalid expansion options: ${issues}`);
	}

	return { ...result.data, logger: logger ?? silentLogger };
}
