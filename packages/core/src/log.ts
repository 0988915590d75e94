/**
 * @title Logging
 * @description Leveled log output for the cache engine.
 *
 * Messages are written when their level is at or below the configured
 * threshold. The threshold defaults to the MUXCACHE_LOG_LEVEL environment
 * variable, or "warn".
 *
 * @module log
 *
 * @envvar MUXCACHE_LOG_LEVEL - One of "error", "warn", "info", "debug".
 */

/**
 * Log levels, most severe first.
 */
export type LogLevel = "error" | "warn" | "info" | "debug";

/**
 * Receives every message that passes the level threshold.
 */
export type LogSink = (message: string, level: LogLevel) => void;

const LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

const DEFAULT_LOG_LEVEL: LogLevel = "warn";

const consoleSink: LogSink = (message, level) => {
	console[level](`[muxcache] ${message}`);
};

let sink: LogSink = consoleSink;
let explicitLevel: LogLevel | undefined;
let cachedLevel: LogLevel | undefined;

/**
 * Check whether a string names a log level.
 */
export function isLogLevel(value: string): value is LogLevel {
	return (LEVELS as readonly string[]).includes(value);
}

/**
 * Get the active log level.
 * The environment is read once and cached until resetLogLevelCache() is called.
 */
export function getLogLevel(): LogLevel {
	if (explicitLevel) {
		return explicitLevel;
	}
	if (!cachedLevel) {
		const fromEnv = process.env["MUXCACHE_LOG_LEVEL"]?.trim().toLowerCase();
		cachedLevel = fromEnv && isLogLevel(fromEnv) ? fromEnv : DEFAULT_LOG_LEVEL;
	}
	return cachedLevel;
}

/**
 * Override the log level. Pass undefined to fall back to the environment.
 */
export function setLogLevel(level: LogLevel | undefined): void {
	explicitLevel = level;
}

/**
 * Forget the level read from the environment.
 */
export function resetLogLevelCache(): void {
	cachedLevel = undefined;
}

/**
 * Replace the log sink. Pass undefined to restore console output.
 */
export function setLogSink(newSink: LogSink | undefined): void {
	sink = newSink ?? consoleSink;
}

/**
 * Log a message if its level is at or below the configured level.
 *
 * @param message - The message to log
 * @param type - The level of the message
 */
export function logMessage(message: string, type: LogLevel = "info"): void {
	if (LEVELS.indexOf(type) <= LEVELS.indexOf(getLogLevel())) {
		sink(message, type);
	}
}
