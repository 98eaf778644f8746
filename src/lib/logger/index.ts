/**
 * Logger wrapper: domain-agnostic structured logging backed by pino.
 *
 * Engine code depends on the Logger interface only; pino stays behind this
 * module so tests can capture output through a plain `write` destination.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe, plus `silent`. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = [
	"trace",
	"debug",
	"info",
	"warn",
	"error",
	"fatal",
	"silent",
];

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	/** Bindings attached to every line (e.g. the engine name) */
	readonly bindings?: Record<string, unknown>;
	readonly destination?: { write(msg: string): void };
}

/** Structured logger interface. */
export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
	isLevelEnabled(level: LogLevel): boolean;
}

// ── Factory ─────────────────────────────────────────────────────────

type LevelMethod = "info" | "warn" | "error" | "debug";

function emit(
	pinoLogger: pino.Logger,
	level: LevelMethod,
	msgOrObj: unknown,
	msg: string | undefined,
): void {
	if (typeof msgOrObj === "string" || msgOrObj === undefined || msgOrObj === null) {
		pinoLogger[level](String(msgOrObj ?? ""));
	} else if (typeof msgOrObj === "object") {
		pinoLogger[level](msgOrObj, msg ?? "");
	} else {
		pinoLogger[level](String(msgOrObj));
	}
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		info(msgOrObj: unknown, msg?: string): void {
			emit(pinoLogger, "info", msgOrObj, msg);
		},
		warn(msgOrObj: unknown, msg?: string): void {
			emit(pinoLogger, "warn", msgOrObj, msg);
		},
		error(msgOrObj: unknown, msg?: string): void {
			emit(pinoLogger, "error", msgOrObj, msg);
		},
		debug(msgOrObj: unknown, msg?: string): void {
			emit(pinoLogger, "debug", msgOrObj, msg);
		},
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
		isLevelEnabled(level: LogLevel): boolean {
			return level !== "silent" && pinoLogger.isLevelEnabled(level);
		},
	};
}

/**
 * Creates a Logger backed by pino with an optional custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "debug", bindings: { engine: "api" } });
 * logger.debug({ fields: 3 }, "schema built");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};
	if (config.bindings) {
		pinoOptions.base = { ...config.bindings };
	}

	let pinoLogger: pino.Logger;

	if (config.destination) {
		const destination = config.destination;
		const stream: pino.DestinationStream = {
			write(chunk: string): void {
				destination.write(chunk);
			},
		};
		pinoLogger = pino(pinoOptions, stream);
	} else {
		pinoLogger = pino(pinoOptions);
	}

	return wrapPino(pinoLogger);
}

/** Logger that discards everything. Default for engines and registries. */
export const silentLogger: Logger = createLogger({ level: "silent" });
