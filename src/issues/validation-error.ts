import { ErrorCategory, ValidkitError } from "../shared/errors.js";
import { ErrorCollection } from "./error-collection.js";
import type { ValidationIssue } from "./issue.js";

/**
 * Thrown by `parse` and `dump` when input fails validation.
 * Carries the complete ErrorCollection of the failed call.
 */
export class ValidationError extends ValidkitError {
	readonly errors: ErrorCollection;

	constructor(errors: ErrorCollection | Iterable<ValidationIssue>) {
		const collection = errors instanceof ErrorCollection ? errors : ErrorCollection.of(errors);
		const messages = collection.fullMessages();
		super(
			messages.length === 0 ? "Validation failed" : `Validation failed: ${messages.join("; ")}`,
			"VALIDATION_FAILED",
			ErrorCategory.Validation,
			{ issueCount: collection.size },
		);
		this.name = "ValidationError";
		this.errors = collection;
	}

	toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), errors: this.errors.toArray() };
	}
}

/** Type guard for ValidationError. */
export function isValidationError(e: unknown): e is ValidationError {
	return e instanceof ValidationError;
}
