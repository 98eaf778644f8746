import type { Logger } from "../lib/logger/index.js";
import { DefinitionError, UnknownTypeError } from "../shared/errors.js";
import { Registry } from "../shared/registry.js";
import { ArrayType } from "./array.js";
import { BooleanType } from "./boolean.js";
import { CustomType } from "./custom.js";
import { DecimalType } from "./decimal.js";
import { DiscriminatedUnionType } from "./discriminated-union.js";
import { LiteralType } from "./literal.js";
import { FloatType, IntegerType } from "./number.js";
import { ObjectType } from "./object.js";
import { StringType } from "./string.js";
import { DateType, InstantType } from "./temporal.js";
import type { CustomTypeDefinition, SchemaType, TypeFactory, TypeOptions } from "./types.js";
import { UnionType } from "./union.js";

/**
 * Name → type factory table owned by an engine.
 *
 * @example
 * ```ts
 * const types = TypeRegistry.withBuiltins();
 * types.build("array", { of: types.build("integer") }).typeName(); // "array<integer>"
 * ```
 */
export class TypeRegistry {
	private readonly registry: Registry<TypeFactory>;

	private constructor(logger: Logger | undefined) {
		this.registry = Registry.create<TypeFactory>(
			"Type",
			(name, known) => new UnknownTypeError(name, known),
			logger,
		);
	}

	/** Creates an empty registry. */
	static create(logger?: Logger): TypeRegistry {
		return new TypeRegistry(logger);
	}

	/** Creates a registry holding every built-in type and alias. */
	static withBuiltins(logger?: Logger): TypeRegistry {
		const registry = new TypeRegistry(logger);
		for (const [name, factory] of BUILTIN_TYPES) {
			registry.register(name, factory);
		}
		return registry;
	}

	/** @throws DuplicateRegistrationError if the name is taken */
	register(name: string, factory: TypeFactory): this {
		this.registry.register(name, factory);
		return this;
	}

	/** Registers a plug-in type under `name`. */
	define(name: string, definition: CustomTypeDefinition): this {
		const type = new CustomType(name, definition);
		return this.register(name, () => type);
	}

	has(name: string): boolean {
		return this.registry.has(name);
	}

	lookup(name: string): TypeFactory | null {
		return this.registry.lookup(name);
	}

	names(): string[] {
		return this.registry.names();
	}

	/**
	 * Builds a type instance.
	 * @throws UnknownTypeError if the name is not registered
	 * @throws DefinitionError if the factory rejects the options
	 */
	build(name: string, options: TypeOptions = {}): SchemaType {
		return this.registry.require(name)(options);
	}
}

// ── Built-ins ───────────────────────────────────────────────────────

function requireOption<T>(value: T | undefined, type: string, option: string): T {
	if (value === undefined) {
		throw new DefinitionError(`Type ${type} requires the ${option} option`, { type, option });
	}
	return value;
}

const stringType = new StringType();
const integerType = new IntegerType();
const floatType = new FloatType();
const decimalType = new DecimalType();
const booleanType = new BooleanType();
const dateType = new DateType();
const datetimeType = new InstantType("datetime");
const timeType = new InstantType("time");

const objectFactory: TypeFactory = (options) => new ObjectType(options.schema);

const BUILTIN_TYPES: ReadonlyArray<readonly [string, TypeFactory]> = [
	["string", () => stringType],
	["integer", () => integerType],
	["float", () => floatType],
	["decimal", () => decimalType],
	["bigdecimal", () => decimalType],
	["boolean", () => booleanType],
	["bool", () => booleanType],
	["date", () => dateType],
	["datetime", () => datetimeType],
	["date_time", () => datetimeType],
	["time", () => timeType],
	["array", (options) => new ArrayType(options.of)],
	["object", objectFactory],
	["hash", objectFactory],
	["union", (options) => new UnionType(requireOption(options.members, "union", "union"))],
	[
		"discriminated_union",
		(options) =>
			new DiscriminatedUnionType(
				requireOption(options.discriminator, "discriminated_union", "discriminator"),
				requireOption(options.mapping, "discriminated_union", "mapping"),
			),
	],
	["literal", (options) => new LiteralType(requireOption(options.values, "literal", "literal"))],
];
