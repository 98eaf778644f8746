/**
 * Engine: owns the type and constraint registries, the message catalog and
 * the logger, and builds schemas against them.
 *
 * Registries are populated when the engine is created and are append-only
 * afterwards. Separate engines never share registrations.
 */

import { ConstraintRegistry } from "../constraints/registry.js";
import type { CustomConstraintDefinition } from "../constraints/types.js";
import { createMessageCatalog } from "../issues/messages.js";
import type { MessageCatalog, MessageKey } from "../issues/messages.js";
import { createLogger } from "../lib/logger/index.js";
import type { Logger } from "../lib/logger/index.js";
import { Schema } from "../schema/schema.js";
import type { SchemaBuild, SchemaDeps, SchemaOptions } from "../schema/types.js";
import { resolveConfig } from "../shared/config.js";
import type { EngineConfig } from "../shared/config.js";
import { TypeRegistry } from "../types/registry.js";
import type { CustomTypeDefinition } from "../types/types.js";

export interface EngineOptions {
	config?: Partial<EngineConfig> | undefined;
	/** Either a full catalog or overrides of the default English texts */
	messages?: MessageCatalog | Partial<Record<MessageKey, string>> | undefined;
	/** Replaces the logger built from `config` */
	logger?: Logger | undefined;
	types?: TypeRegistry | undefined;
	constraints?: ConstraintRegistry | undefined;
}

export interface Engine {
	readonly config: EngineConfig;
	readonly logger: Logger;
	readonly messages: MessageCatalog;
	readonly types: TypeRegistry;
	readonly constraints: ConstraintRegistry;
	/** Builds an immutable schema from a builder callback. */
	schema(build: SchemaBuild, options?: SchemaOptions): Schema;
	/** Registers a plug-in type usable by name in every later schema. */
	defineType(name: string, definition: CustomTypeDefinition): Engine;
	/** Registers a plug-in constraint usable through a field's `constraints` option. */
	defineConstraint(name: string, definition: CustomConstraintDefinition): Engine;
}

function isMessageCatalog(
	messages: MessageCatalog | Partial<Record<MessageKey, string>>,
): messages is MessageCatalog {
	return "render" in messages && "template" in messages;
}

/**
 * Creates an engine with the built-in types and constraints registered.
 * @throws ConfigError for an invalid configuration
 */
export function createEngine(options: EngineOptions = {}): Engine {
	const config = resolveConfig(options.config);
	const logger =
		options.logger ?? createLogger({ level: config.logLevel, bindings: { engine: config.name } });
	const messages =
		options.messages === undefined
			? createMessageCatalog()
			: isMessageCatalog(options.messages)
				? options.messages
				: createMessageCatalog(options.messages);
	const types = options.types ?? TypeRegistry.withBuiltins(logger.child({ component: "types" }));
	const constraints =
		options.constraints ?? ConstraintRegistry.withBuiltins(logger.child({ component: "constraints" }));

	const deps: SchemaDeps = {
		types,
		constraints,
		messages,
		logger: logger.child({ component: "schema" }),
	};

	logger.debug(
		{ types: types.names().length, constraints: constraints.names().length },
		"engine ready",
	);

	const engine: Engine = {
		config,
		logger,
		messages,
		types,
		constraints,
		schema: (build, schemaOptions = {}) => Schema.define(build, schemaOptions, deps),
		defineType(name, definition) {
			types.define(name, definition);
			return engine;
		},
		defineConstraint(name, definition) {
			constraints.define(name, definition);
			return engine;
		},
	};
	return Object.freeze(engine);
}
