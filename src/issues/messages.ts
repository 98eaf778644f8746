/**
 * Message catalog: renders issue messages from keys and parameters.
 *
 * Texts use `%{name}` placeholders. Callers may override any subset of keys to
 * localise or reword messages; unknown placeholders are left as written.
 */

export const DEFAULT_MESSAGES = {
	required: "is required",
	type_coercion: "cannot coerce %{actual} to %{type}",
	type_invalid: "must be a %{type}",
	min: "must be at least %{value}",
	min_length: "length must be at least %{value} (got %{actual})",
	max: "must be at most %{value}",
	max_length: "length must be at most %{value} (got %{actual})",
	length_exact: "length must be exactly %{value} (got %{actual})",
	length_range: "length must be between %{min} and %{max} (got %{actual})",
	length_min: "length must be at least %{min} (got %{actual})",
	length_max: "length must be at most %{max} (got %{actual})",
	format: "must match format %{pattern}",
	format_named: "must be a valid %{name}",
	enum: "must be one of: %{values}",
	refinement: "failed refinement",
	union_type_error: "must be one of: %{types}",
	discriminator_missing: "discriminator field is required",
	invalid_discriminator: "must be one of: %{values}",
	not_object: "must be an object",
	literal: "must be %{expected}, got %{actual}",
} as const;

export type MessageKey = keyof typeof DEFAULT_MESSAGES;

export type MessageParams = Readonly<Record<string, string | number | bigint>>;

export interface MessageCatalog {
	render(key: MessageKey, params?: MessageParams): string;
	/** Raw template for a key, after overrides. */
	template(key: MessageKey): string;
}

function messageKeys(): MessageKey[] {
	return Object.keys(DEFAULT_MESSAGES).filter(isMessageKey);
}

export function isMessageKey(key: string): key is MessageKey {
	return Object.hasOwn(DEFAULT_MESSAGES, key);
}

const PLACEHOLDER = /%\{(\w+)\}/g;

/** Replaces `%{name}` placeholders; unknown names are kept verbatim. */
export function interpolate(text: string, params: MessageParams = {}): string {
	return text.replace(PLACEHOLDER, (whole, name: string) => {
		const value = params[name];
		return value === undefined ? whole : String(value);
	});
}

export function createMessageCatalog(
	overrides: Partial<Record<MessageKey, string>> = {},
): MessageCatalog {
	const templates: Record<MessageKey, string> = { ...DEFAULT_MESSAGES };
	for (const key of messageKeys()) {
		const text = overrides[key];
		if (text !== undefined) templates[key] = text;
	}
	return {
		template: (key) => templates[key],
		render: (key, params) => interpolate(templates[key], params),
	};
}

export const defaultMessages: MessageCatalog = createMessageCatalog();
