/**
 * Engine configuration.
 *
 * Defaults are safe for library use: a silent logger and a generic name.
 * Environment overrides are read only when the caller asks for them.
 */

import { LOG_LEVELS } from "../lib/logger/index.js";
import type { LogLevel } from "../lib/logger/index.js";
import { describeSettingIssues, validateSettings, z } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";

export interface EngineConfig {
	/** Name bound to every log line emitted by the engine */
	readonly name: string;
	/** Minimum level written by the engine logger */
	readonly logLevel: LogLevel;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
	name: "validkit",
	logLevel: "silent",
};

const logLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

const engineConfigSchema = z
	.object({
		name: z.string().trim().min(1, "must not be empty").default(DEFAULT_ENGINE_CONFIG.name),
		logLevel: logLevelSchema.default(DEFAULT_ENGINE_CONFIG.logLevel),
	})
	.strict();

/**
 * Fills defaults and validates a partial configuration.
 * @throws ConfigError listing every invalid setting
 */
export function resolveConfig(partial: Partial<EngineConfig> = {}): EngineConfig {
	const result = validateSettings(engineConfigSchema, partial);
	if (!result.ok) {
		throw new ConfigError(`Invalid engine config: ${describeSettingIssues(result.error)}`, {
			issues: result.error,
		});
	}
	return result.value;
}

/** Mutable builder shape for constructing Partial<EngineConfig>. */
interface MutableEngineConfig {
	name?: string;
	logLevel?: LogLevel;
}

function isLogLevel(raw: string): raw is LogLevel {
	return LOG_LEVELS.some((level) => level === raw);
}

/**
 * Reads engine config values from environment variables.
 * Supported: VALIDKIT_NAME, VALIDKIT_LOG_LEVEL.
 * @throws ConfigError if VALIDKIT_LOG_LEVEL is not a known level
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<EngineConfig> {
	const result: MutableEngineConfig = {};

	const envName = env.VALIDKIT_NAME;
	if (envName) {
		result.name = envName;
	}

	const rawLevel = env.VALIDKIT_LOG_LEVEL;
	if (rawLevel) {
		const level = rawLevel.trim().toLowerCase();
		if (!isLogLevel(level)) {
			throw new ConfigError(
				`Invalid VALIDKIT_LOG_LEVEL: "${rawLevel}" must be one of ${LOG_LEVELS.join(", ")}`,
			);
		}
		result.logLevel = level;
	}

	return result;
}
