import type { Logger } from "../lib/logger/index.js";
import { UnknownConstraintError } from "../shared/errors.js";
import { Registry } from "../shared/registry.js";
import { MaxConstraint, MinConstraint } from "./bound.js";
import { CustomConstraint } from "./custom.js";
import { EnumConstraint } from "./enum.js";
import { FormatConstraint } from "./format.js";
import { LengthConstraint } from "./length.js";
import type { Constraint, ConstraintFactory, CustomConstraintDefinition } from "./types.js";

/** Name → constraint factory table owned by an engine. */
export class ConstraintRegistry {
	private readonly registry: Registry<ConstraintFactory>;

	private constructor(logger: Logger | undefined) {
		this.registry = Registry.create<ConstraintFactory>(
			"Constraint",
			(name, known) => new UnknownConstraintError(name, known),
			logger,
		);
	}

	static create(logger?: Logger): ConstraintRegistry {
		return new ConstraintRegistry(logger);
	}

	/** Creates a registry holding min, max, length, format and enum. */
	static withBuiltins(logger?: Logger): ConstraintRegistry {
		const registry = new ConstraintRegistry(logger);
		for (const [name, factory] of BUILTIN_CONSTRAINTS) {
			registry.register(name, factory);
		}
		return registry;
	}

	/** @throws DuplicateRegistrationError if the name is taken */
	register(name: string, factory: ConstraintFactory): this {
		this.registry.register(name, factory);
		return this;
	}

	/** Registers a plug-in constraint usable through a field's `constraints` option. */
	define(name: string, definition: CustomConstraintDefinition): this {
		return this.register(name, (options) => new CustomConstraint(name, definition, options));
	}

	has(name: string): boolean {
		return this.registry.has(name);
	}

	lookup(name: string): ConstraintFactory | null {
		return this.registry.lookup(name);
	}

	names(): string[] {
		return this.registry.names();
	}

	/**
	 * @throws UnknownConstraintError if the name is not registered
	 * @throws DefinitionError if the factory rejects the options
	 */
	build(name: string, options: unknown): Constraint {
		return this.registry.require(name)(options);
	}
}

const BUILTIN_CONSTRAINTS: ReadonlyArray<readonly [string, ConstraintFactory]> = [
	["min", (options) => new MinConstraint(options)],
	["max", (options) => new MaxConstraint(options)],
	["length", (options) => new LengthConstraint(options)],
	["format", (options) => new FormatConstraint(options)],
	["enum", (options) => new EnumConstraint(options)],
];
