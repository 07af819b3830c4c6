/**
 * Leveled logger.
 *
 * Writes to stderr: stdout is reserved for the MCP stdio transport.
 * Components take a Logger by injection; nothing in the core imports a global.
 */

export type LogLevel = "debug" | "info" | "warn" | "error"

export type LogData = Record<string, unknown>

export interface Logger {
	debug(message: string, data?: LogData): void
	info(message: string, data?: LogData): void
	warn(message: string, data?: LogData): void
	error(message: string, data?: LogData): void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
}

const LEVEL_LABEL: Record<LogLevel, string> = {
	debug: "[DEBUG]",
	info: "[INFO]",
	warn: "[WARN]",
	error: "[ERROR]",
}

/**
 * Parse a level name case-insensitively ("DEBUG", "Warn", ...).
 * Unknown or missing values fall back to "info".
 */
export function parseLogLevel(value: string | undefined): LogLevel {
	switch (value?.trim().toLowerCase()) {
		case "debug":
			return "debug"
		case "warn":
		case "warning":
			return "warn"
		case "error":
			return "error"
		default:
			return "info"
	}
}

function serialize(data: LogData): string {
	try {
		return JSON.stringify(data, (_key, value: unknown) =>
			value instanceof Error ? { name: value.name, message: value.message } : value,
		)
	} catch {
		return "[unserializable data]"
	}
}

export function formatLogLine(level: LogLevel, message: string, data?: LogData): string {
	const base = `${LEVEL_LABEL[level]} ${message}`
	if (!data || Object.keys(data).length === 0) return base
	return `${base} ${serialize(data)}`
}

export function createLogger(
	level: LogLevel = "info",
	write: (line: string) => void = (line) => process.stderr.write(`${line}\n`),
): Logger {
	const threshold = LEVEL_ORDER[level]
	const emit = (lvl: LogLevel) => (message: string, data?: LogData) => {
		if (LEVEL_ORDER[lvl] < threshold) return
		write(formatLogLine(lvl, message, data))
	}
	return {
		debug: emit("debug"),
		info: emit("info"),
		warn: emit("warn"),
		error: emit("error"),
	}
}

/** Logger that drops everything (tests, embedding) */
export const silentLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
}
