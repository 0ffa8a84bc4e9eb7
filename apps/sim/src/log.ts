export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

let minLevel: LogLevel = "info";

export const setLogLevel = (level: LogLevel) => {
	minLevel = level;
};

export const log = (
	level: LogLevel,
	message: string,
	fields?: Record<string, unknown>,
) => {
	if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
	const payload = {
		timestamp: new Date().toISOString(),
		level,
		message,
		...fields,
	};

	// eslint-disable-next-line no-console
	const fn = console[level] ?? console.log;
	fn(JSON.stringify(payload));
};
