/**
 * Logger that keeps parsed JSON records in memory for assertions.
 */

import { type LogLevel, type Logger, createLogger } from "./index.js";

export interface CapturedLogger {
	readonly logger: Logger;
	/** Parsed lines in emission order. */
	records(): Array<Record<string, unknown>>;
	/** Records whose `msg` equals `msg`. */
	find(msg: string): Array<Record<string, unknown>>;
}

export function createCapturingLogger(level: LogLevel = "debug"): CapturedLogger {
	const lines: string[] = [];
	const logger = createLogger({
		level,
		destination: {
			write(msg: string) {
				lines.push(msg);
			},
		},
	});
	const records = (): Array<Record<string, unknown>> =>
		lines.map((l) => JSON.parse(l) as Record<string, unknown>);
	return {
		logger,
		records,
		find: (msg) => records().filter((r) => r["msg"] === msg),
	};
}
