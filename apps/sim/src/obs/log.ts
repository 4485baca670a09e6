import { z } from "zod";
import { redactRecord } from "./redact";

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const rank: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

let threshold: LogLevel = "info";

export const setLogLevel = (level: LogLevel) => {
	threshold = level;
};

export const log = (
	level: LogLevel,
	message: string,
	fields?: Record<string, unknown>,
) => {
	if (rank[level] < rank[threshold]) return;

	const payload = {
		timestamp: new Date().toISOString(),
		level,
		message,
		...(fields ? redactRecord(fields) : {}),
	};

	// eslint-disable-next-line no-console
	console[level](JSON.stringify(payload));
};
