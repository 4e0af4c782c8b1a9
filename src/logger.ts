export type LogContext = Record<string, unknown>;

/** Minimal logging surface; `console` satisfies it. */
export interface CronLogger {
	debug(message: string, context?: LogContext): void;
	warn(message: string, context?: LogContext): void;
}

export const silentLogger: CronLogger = {
	debug: () => undefined,
	warn: () => undefined,
};
