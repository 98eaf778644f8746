/**
 * Registry: append-only name → entry table.
 *
 * Backs the type and constraint registries. Names are registered once;
 * re-registration throws so a plug-in can never silently replace a built-in.
 */

import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import { DefinitionError, DuplicateRegistrationError } from "./errors.js";

/** Builds the error thrown when a name is not registered. */
export type UnknownEntryError = (name: string, known: readonly string[]) => Error;

export class Registry<E> {
	private readonly entries: Map<string, E>;
	private readonly label: string;
	private readonly logger: Logger;
	private readonly unknownEntry: UnknownEntryError;

	private constructor(label: string, unknownEntry: UnknownEntryError, logger: Logger) {
		this.entries = new Map();
		this.label = label;
		this.unknownEntry = unknownEntry;
		this.logger = logger;
	}

	/**
	 * Creates an empty registry.
	 * @param label - Entry kind used in messages and logs, e.g. "Type"
	 * @param unknownEntry - Error factory for {@link Registry.require}
	 * @param logger - Receives one debug line per registration
	 */
	static create<E>(label: string, unknownEntry: UnknownEntryError, logger?: Logger): Registry<E> {
		return new Registry<E>(label, unknownEntry, logger ?? silentLogger);
	}

	/**
	 * Adds an entry.
	 * @throws DefinitionError for an empty name
	 * @throws DuplicateRegistrationError if the name is taken
	 */
	register(name: string, entry: E): void {
		if (name.trim().length === 0) {
			throw new DefinitionError(`${this.label} name must not be empty`);
		}
		if (this.entries.has(name)) {
			throw new DuplicateRegistrationError(this.label, name);
		}
		this.entries.set(name, entry);
		this.logger.debug({ registry: this.label, name }, "registered");
	}

	has(name: string): boolean {
		return this.entries.has(name);
	}

	lookup(name: string): E | null {
		return this.entries.get(name) ?? null;
	}

	/** @throws the error built by the registry's unknown-entry factory */
	require(name: string): E {
		const entry = this.entries.get(name);
		if (entry === undefined) {
			throw this.unknownEntry(name, this.names());
		}
		return entry;
	}

	/** Registered names in registration order. */
	names(): string[] {
		return [...this.entries.keys()];
	}

	get size(): number {
		return this.entries.size;
	}
}
