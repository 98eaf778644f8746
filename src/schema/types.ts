import type { ConstraintRegistry } from "../constraints/registry.js";
import type { FieldDefinitionOptions } from "../field/types.js";
import type { PathSegment } from "../issues/issue.js";
import type { MessageCatalog } from "../issues/messages.js";
import type { Logger } from "../lib/logger/index.js";
import type { Context } from "../shared/context.js";
import type { TypeRegistry } from "../types/registry.js";
import type { SchemaType } from "../types/types.js";
import type { SchemaBuilder } from "./builder.js";
import type { Schema } from "./schema.js";

/** Registries, messages and logger a schema is built and run with. */
export interface SchemaDeps {
	readonly types: TypeRegistry;
	readonly constraints: ConstraintRegistry;
	readonly messages: MessageCatalog;
	readonly logger: Logger;
}

export interface SchemaOptions {
	/** Reported by introspection; unknown keys are dropped either way */
	strict?: boolean | undefined;
	/** Copy undeclared keys to the output after the declared fields */
	passthrough?: boolean | undefined;
}

export interface ResolvedSchemaOptions {
	readonly strict: boolean;
	readonly passthrough: boolean;
}

export interface ParseOptions {
	context?: Context | Readonly<Record<string, unknown>> | undefined;
	/** Prepended to every issue path */
	pathPrefix?: readonly PathSegment[] | undefined;
}

/** A registered type name, a type instance, or a schema (an object of that schema). */
export type TypeRef = string | SchemaType | Schema;

/** Options that configure the field's type rather than its policy. */
export interface StructuralOptions {
	of?: TypeRef | undefined;
	schema?: Schema | undefined;
	union?: readonly TypeRef[] | undefined;
	literal?: readonly unknown[] | undefined;
	discriminator?: string | undefined;
	mapping?: Readonly<Record<string, Schema>> | ReadonlyMap<string, Schema> | undefined;
}

export interface FieldOptions extends FieldDefinitionOptions, StructuralOptions {}

/** Builder callback declaring a schema's fields and validators. */
export type SchemaBuild = (s: SchemaBuilder) => void;
