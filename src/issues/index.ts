export {
	IssueCode,
	type IssueCodeLike,
	type PathSegment,
	type ValidationIssue,
	issue,
	withMessage,
	fullPath,
	formatIssue,
	issuesEqual,
	pathStartsWith,
} from "./issue.js";

export { ErrorCollection } from "./error-collection.js";

export {
	type ParseResult,
	type Success,
	type Failure,
	success,
	failure,
	isSuccess,
	isFailure,
	mapSuccess,
	flatMapSuccess,
	valueOr,
	issuesOf,
} from "./parse-result.js";

export {
	DEFAULT_MESSAGES,
	type MessageKey,
	type MessageParams,
	type MessageCatalog,
	createMessageCatalog,
	defaultMessages,
	interpolate,
	isMessageKey,
} from "./messages.js";

export { ValidationError, isValidationError } from "./validation-error.js";
