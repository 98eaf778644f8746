import { describe, expect, it } from "vitest";
import { DEFAULT_ENGINE_CONFIG, configFromEnv, resolveConfig } from "./config.js";
import { ConfigError } from "./errors.js";

describe("EngineConfig", () => {
	describe("DEFAULT_ENGINE_CONFIG", () => {
		it("is silent by default", () => {
			expect(DEFAULT_ENGINE_CONFIG.name).toBe("validkit");
			expect(DEFAULT_ENGINE_CONFIG.logLevel).toBe("silent");
		});

		it("all fields are defined (no undefined values)", () => {
			for (const [key, value] of Object.entries(DEFAULT_ENGINE_CONFIG)) {
				expect(value, `${key} should not be undefined`).toBeDefined();
			}
		});
	});

	describe("resolveConfig", () => {
		it("fills defaults", () => {
			expect(resolveConfig()).toEqual(DEFAULT_ENGINE_CONFIG);
			expect(resolveConfig({ logLevel: "debug" })).toEqual({
				name: "validkit",
				logLevel: "debug",
			});
		});

		it("trims the name", () => {
			expect(resolveConfig({ name: "  api  " }).name).toBe("api");
		});

		it("throws ConfigError for an empty name", () => {
			expect(() => resolveConfig({ name: "   " })).toThrow(ConfigError);
			expect(() => resolveConfig({ name: "   " })).toThrow("name: must not be empty");
		});

		it("throws ConfigError for unknown keys", () => {
			const input = { logLevel: "info" as const, verbose: true };
			expect(() => resolveConfig(input)).toThrow(ConfigError);
		});
	});

	describe("configFromEnv", () => {
		it("returns empty object when no VALIDKIT_ env vars", () => {
			expect(configFromEnv({})).toEqual({});
		});

		it("reads VALIDKIT_NAME", () => {
			expect(configFromEnv({ VALIDKIT_NAME: "forms" })).toEqual({ name: "forms" });
		});

		it("reads VALIDKIT_LOG_LEVEL case-insensitively", () => {
			expect(configFromEnv({ VALIDKIT_LOG_LEVEL: " DEBUG " })).toEqual({ logLevel: "debug" });
		});

		it("throws ConfigError for an unknown level", () => {
			expect(() => configFromEnv({ VALIDKIT_LOG_LEVEL: "loud" })).toThrow(ConfigError);
			expect(() => configFromEnv({ VALIDKIT_LOG_LEVEL: "loud" })).toThrow(
				'Invalid VALIDKIT_LOG_LEVEL: "loud"',
			);
		});

		it("defaults to process.env", () => {
			process.env.VALIDKIT_NAME = "from-process";
			expect(configFromEnv().name).toBe("from-process");
			Reflect.deleteProperty(process.env, "VALIDKIT_NAME");
		});
	});
});
