/**
 * Percent-encode everything outside the RFC 3986 unreserved set
 * (`A-Z a-z 0-9 - . _ ~`), as UTF-8 bytes with upper-case hex digits.
 */
export function percentEncode(text: string): string {
	return encodeURIComponent(text).replace(
		/[!'()*]/g,
		(c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`,
	);
}

/** Quote text as one literal shell word. */
export function shellQuote(text: string): string {
	return `'${text.replace(/'/g, "'\\''")}'`;
}

/**
 * Escape text for the body of an unquoted heredoc, where `$`, backquote and
 * backslash are live.
 */
export function escapeHeredoc(text: string): string {
	return text.replace(/[\\$`]/g, (c) => `\\${c}`);
}

/**
 * Escape a collapse replacement for double quotes. `$1` and `${1}` stay live
 * and stand for the matched value; everything else is literal.
 */
export function escapeReplacement(text: string): string {
	return text.replace(/\$\{1\}|\$1|[\\"`$]/g, (match) =>
		match.length > 1 ? match : `\\${match}`,
	);
}

const PATTERN_SAFE = /[A-Za-z0-9_./:,=+%@-]/;

/**
 * Render text as a `case` pattern that matches exactly that text: every
 * character that could be a glob or shell metacharacter is backslash-escaped.
 */
export function escapePattern(text: string): string {
	if (text === "") return "''";
	if (text.includes("\n")) return shellQuote(text);
	return Array.from(text, (c) => (PATTERN_SAFE.test(c) ? c : `\\${c}`)).join(
		"",
	);
}

export function hasWhitespace(text: string): boolean {
	return /\s/.test(text);
}

/**
 * Token an inline adds to the search terms: nothing for an empty value, the
 * value double-quoted when it contains whitespace.
 */
export function formatInlineToken(
	keyword: string,
	value: string,
): string | null {
	if (value === "") return null;
	if (hasWhitespace(value)) return `${keyword}:"${value}"`;
	return `${keyword}:${value}`;
}

/** Fold text onto one line, for shell comments. */
export function toCommentText(text: string): string {
	return text.replace(/\s*\n\s*/g, " ");
}
