/**
 * ParseResult: outcome of a schema parse.
 *
 * Both variants are frozen at construction. Combinators run only on Success;
 * a Failure passes through them untouched.
 */

import { ErrorCollection } from "./error-collection.js";
import type { ValidationIssue } from "./issue.js";

export interface Success<T> {
	readonly success: true;
	readonly data: T;
}

export interface Failure {
	readonly success: false;
	readonly errors: ErrorCollection;
}

export type ParseResult<T> = Success<T> | Failure;

// ── Factories ───────────────────────────────────────────────────────

export function success<T>(data: T): Success<T> {
	const result: Success<T> = { success: true, data };
	return Object.freeze(result);
}

export function failure(errors: ErrorCollection | Iterable<ValidationIssue>): Failure {
	const collection = errors instanceof ErrorCollection ? errors : ErrorCollection.of(errors);
	const result: Failure = { success: false, errors: collection };
	return Object.freeze(result);
}

// ── Guards ──────────────────────────────────────────────────────────

export function isSuccess<T>(result: ParseResult<T>): result is Success<T> {
	return result.success;
}

export function isFailure<T>(result: ParseResult<T>): result is Failure {
	return !result.success;
}

// ── Combinators ─────────────────────────────────────────────────────

export function mapSuccess<T, U>(result: ParseResult<T>, fn: (data: T) => U): ParseResult<U> {
	return result.success ? success(fn(result.data)) : result;
}

export function flatMapSuccess<T, U>(
	result: ParseResult<T>,
	fn: (data: T) => ParseResult<U>,
): ParseResult<U> {
	return result.success ? fn(result.data) : result;
}

/**
 * The data on success. On failure, the fallback, or the result of calling it
 * with the errors when it is a function.
 */
export function valueOr<T>(
	result: ParseResult<T>,
	fallback: T | ((errors: ErrorCollection) => T),
): T {
	if (result.success) return result.data;
	return isFallbackFn(fallback) ? fallback(result.errors) : fallback;
}

function isFallbackFn<T>(
	fallback: T | ((errors: ErrorCollection) => T),
): fallback is (errors: ErrorCollection) => T {
	return typeof fallback === "function";
}

/** Issues of a result; empty for Success. */
export function issuesOf<T>(result: ParseResult<T>): ErrorCollection {
	return result.success ? ErrorCollection.empty() : result.errors;
}
