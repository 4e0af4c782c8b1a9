import type { TZDate } from "@date-fns/tz";
import type { CronError } from "./errors";

export type FieldType =
    | "minute"
    | "hour"
    | "day_of_month"
    | "month"
    | "day_of_week";

export type FieldSubentry = {
    from: number;
    /** Within the field's domain, except that a day-of-week range may end at 7 (Sunday). */
    to: number;
    step: number;
    /** Subentry text after wildcard and name substitution, e.g. `0-59/15`. */
    source: string;
};

export type CronExpression = {
    pattern: string;
    raw: Record<FieldType, string>;
    fields: Record<FieldType, FieldSubentry[]>;
};

export type FieldValues = Record<FieldType, number[]>;

export type DayMatchMode = "union" | "intersect";

export type DayMatchPolicy = "vixie" | "contains" | DayMatchMode;

export type ParsedCronExpression =
    | {
          success: true;
          pattern: string;
          expression: CronExpression;
      }
    | {
          success: false;
          pattern: string;
          error: string;
      };

/** Inclusive bounds of one expansion, in the reference timezone. */
export type ExpansionWindow = {
    startAt: TZDate;
    endAt: TZDate;
    /** Calendar days from the first day to the last; a single-day window has 0. */
    days: number;
    timezone: string;
};

export type WindowEntry = {
    id?: string;
    cron: string;
    startAt: Date;
    endAt: Date;
};

export type GlobalEntry = {
    cron: string;
};

export type TriggerInstant = {
    cron: string;
    timestamp: Date;
    id?: string;
    windowKey?: string;
};

export type ExpansionResult<E> =
    | {
          success: true;
          entry: E;
          instants: TriggerInstant[];
      }
    | {
          success: false;
          entry: E;
          error: CronError;
      };
