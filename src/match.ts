import { TZDate } from "@date-fns/tz";
import { addDays, getDate, getMonth, getYear, startOfDay } from "date-fns";
import { type ExpansionOptions, type ResolvedOptions, resolveOptions } from "./config";
import { daysOfMonthIn, matchesDay, resolveDayMatchMode } from "./day-match";
import { CronError, ResultLimitExceededError } from "./errors";
import { expandExpression } from "./expand";
import { parseExpression } from "./parse";
import type {
    CronExpression,
    DayMatchMode,
    ExpansionResult,
    ExpansionWindow,
    GlobalEntry,
    TriggerInstant,
    WindowEntry,
} from "./types";
import { entryWindow, globalWindow, windowKey } from "./window";

/**
 * Lazily yields every instant in `window` (bounds inclusive) at which the
 * expression fires, in chronological order.
 *
 * Days are walked one at a time; each day whose month matches and that passes
 * the day filter is fanned out over the matched hours and minutes.
 */
export function* iterateTimestamps(
    expression: CronExpression,
    window: ExpansionWindow,
    mode: DayMatchMode,
): Generator<Date, void, undefined> {
    const values = expandExpression(expression);
    const months = new Set(values.month);
    const daysOfWeek = new Set(values.day_of_week);
    const start = window.startAt.getTime();
    const end = window.endAt.getTime();

    // Offset from the first day each time: where local midnight is skipped
    // the day starts at 01:00, and chained addDays would keep that hour.
    const firstDay = startOfDay(window.startAt);
    let currentMonth = -1;
    let daysOfMonth = new Set<number>();

    for (let index = 0; index <= window.days; index++) {
        const day = addDays(firstDay, index);
        const year = getYear(day);
        const month = getMonth(day);
        const dayOfMonth = getDate(day);

        if (months.has(month + 1)) {
            // Drop day-of-month values this month does not have (Feb 30)
            if (year * 12 + month !== currentMonth) {
                currentMonth = year * 12 + month;
                daysOfMonth = daysOfMonthIn(day, values.day_of_month);
            }

            if (matchesDay(day, daysOfMonth, daysOfWeek, mode)) {
                // A skipped DST hour can map two wall times onto one instant
                const emitted = new Set<number>();
                for (const hour of values.hour) {
                    for (const minute of values.minute) {
                        const time = new TZDate(
                            year,
                            month,
                            dayOfMonth,
                            hour,
                            minute,
                            0,
                            0,
                            window.timezone,
                        ).getTime();
                        if (time < start || time > end || emitted.has(time)) {
                            continue;
                        }
                        emitted.add(time);
                        yield new Date(time);
                    }
                }
            }
        }
    }
}

/** Upper bound on the number of instants an expansion can produce. */
export function estimateMaxResults(
    expression: CronExpression,
    window: ExpansionWindow,
): number {
    const values = expandExpression(expression);
    return (window.days + 1) * values.hour.length * values.minute.length;
}

function collect(
    expression: CronExpression,
    window: ExpansionWindow,
    options: ResolvedOptions,
): Date[] {
    const mode = resolveDayMatchMode(expression, options.dayMatchMode);
    const matches: Date[] = [];

    for (const timestamp of iterateTimestamps(expression, window, mode)) {
        if (
            options.maxResults !== undefined &&
            matches.length >= options.maxResults
        ) {
            throw new ResultLimitExceededError(options.maxResults);
        }
        matches.push(timestamp);
    }

    options.logger.debug("Expanded cron expression", {
        cron: expression.pattern,
        dayMatchMode: mode,
        count: matches.length,
    });
    return matches;
}

/**
 * Every instant between `startAt` and `endAt` (both inclusive) at which the
 * cron expression fires. Throws a `CronError` for a malformed expression,
 * window or options.
 */
export function expandCron(
    cron: string,
    window: Pick<WindowEntry, "startAt" | "endAt">,
    options: ExpansionOptions = {},
): Date[] {
    const resolved = resolveOptions(options);
    return collect(
        parseExpression(cron),
        entryWindow(window, resolved),
        resolved,
    );
}

function expandEntry<E extends GlobalEntry>(
    entry: E,
    options: ResolvedOptions,
    expand: (entry: E) => TriggerInstant[],
): ExpansionResult<E> {
    try {
        return { success: true, entry, instants: expand(entry) };
    } catch (e: unknown) {
        if (!(e instanceof CronError)) {
            throw e;
        }
        options.logger.warn("Skipping cron entry", {
            cron: entry.cron,
            error: e.message,
        });
        return { success: false, entry, error: e };
    }
}

/**
 * Expands each distinct expression over whole days from `startDate` through
 * `startDate + daysForward`. Invalid options or an invalid window throw;
 * a malformed expression only fails its own result.
 *
 * Results are materialized; pass `maxResults` to cap each expression, or use
 * `iterateTimestamps` to consume a large window lazily.
 */
export function expandGlobalWindow(
    cronExpressions: string[],
    startDate: Date | string,
    daysForward: number,
    options: ExpansionOptions = {},
): ExpansionResult<GlobalEntry>[] {
    const resolved = resolveOptions(options);
    const window = globalWindow(startDate, daysForward, resolved);

    return [...new Set(cronExpressions)].map((cron) =>
        expandEntry({ cron }, resolved, () =>
            collect(parseExpression(cron), window, resolved).map(
                (timestamp) => ({ cron, timestamp }),
            ),
        ),
    );
}

function entryKey(entry: WindowEntry): string {
    return [
        entry.id === undefined ? "" : `id:${entry.id}`,
        entry.cron,
        entry.startAt.getTime(),
        entry.endAt.getTime(),
    ].join("\u0000");
}

/**
 * Expands each distinct entry over its own `[startAt, endAt]` window, both
 * bounds inclusive. Invalid options throw; a malformed expression or window
 * only fails its own result. As with `expandGlobalWindow`, `maxResults` caps
 * each entry.
 */
export function expandPerEntryWindow(
    entries: WindowEntry[],
    options: ExpansionOptions = {},
): ExpansionResult<WindowEntry>[] {
    const resolved = resolveOptions(options);
    const distinct = new Map<string, WindowEntry>();
    for (const entry of entries) {
        const key = entryKey(entry);
        if (!distinct.has(key)) {
            distinct.set(key, entry);
        }
    }

    return [...distinct.values()].map((entry) =>
        expandEntry(entry, resolved, ({ id, cron, startAt, endAt }) => {
            const window = entryWindow({ startAt, endAt }, resolved);
            const key = windowKey(cron, window);
            return collect(parseExpression(cron), window, resolved).map(
                (timestamp) => ({
                    cron,
                    timestamp,
                    windowKey: key,
                    ...(id === undefined ? {} : { id }),
                }),
            );
        }),
    );
}

function instantOwner(instant: TriggerInstant): string {
    if (instant.id !== undefined) {
        return `id:${instant.id}`;
    }
    return instant.windowKey === undefined ? "" : `window:${instant.windowKey}`;
}

/**
 * Instants of every successful result, with repeats of the same
 * `(id or window key, cron, timestamp)` collapsed to one.
 */
export function collectInstants<E>(
    results: ExpansionResult<E>[],
): TriggerInstant[] {
    const seen = new Set<string>();
    const instants: TriggerInstant[] = [];

    for (const result of results) {
        if (!result.success) {
            continue;
        }
        for (const instant of result.instants) {
            const key = [
                instantOwner(instant),
                instant.cron,
                instant.timestamp.getTime(),
            ].join("\u0000");
            if (!seen.has(key)) {
                seen.add(key);
                instants.push(instant);
            }
        }
    }

    return instants;
}
