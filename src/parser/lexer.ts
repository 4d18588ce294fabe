export enum TokenType {
	RESERVED = 'RESERVED',
	STRING = 'STRING',
	IDENTIFIER = 'IDENTIFIER',
	EOF = 'EOF',
}

// Token represents one lexical token of the normalized statement
export interface Token {
	type: TokenType;
	/** Canonical upper-case text for reserved words, inner text for quoted strings */
	value: string;
	/** Offset of the first character of the token */
	offset: number;
	/** Number of characters consumed, quotes included. 0 means nothing could be read. */
	length: number;
}

/**
 * Reserved words and punctuation, tried in this order.
 * The first entry matching the upcoming text wins, so two-character operators
 * precede their one-character prefixes and multi-word entries precede their first word.
 */
export const RESERVED_WORDS: readonly string[] = Object.freeze([
	'(', ')', '>=', '<=', '!=', ',', '=', '>', '<',
	'SELECT', 'TOP', 'INSERT INTO', 'VALUES', 'UPDATE', 'DELETE FROM', 'WHERE', 'FROM', 'SET',
	'ON DUPLICATE KEY UPDATE', 'ORDER BY', 'ASC', 'DESC',
	'LEFT JOIN', 'RIGHT JOIN', 'INNER JOIN', 'JOIN', 'ON',
]);

/** The catalogue without punctuation. */
export const RESERVED_WORDS_ONLY: readonly string[] = Object.freeze(
	RESERVED_WORDS.filter(word => /^[A-Z]/.test(word))
);

const IDENTIFIER_CHAR = /[.\-a-zA-Z0-9_*]/;
const NAME = '[a-zA-Z_][a-zA-Z0-9_\\-]*';
const IDENTIFIER_SHAPE = new RegExp(`^${NAME}(\\.${NAME})?$`);
const QUALIFIED_WILDCARD = new RegExp(`^${NAME}\\.\\*$`);

function isIdentifierChar(c: string | undefined): boolean {
	return c !== undefined && IDENTIFIER_CHAR.test(c);
}

function matchReservedWord(text: string, offset: number): string | undefined {
	for (const word of RESERVED_WORDS) {
		const candidate = text.slice(offset, offset + word.length).toUpperCase();
		if (candidate !== word) continue;
		// Words must end on a boundary: `description` is not `DESC`
		if (/[A-Z]$/.test(word) && isIdentifierChar(text[offset + word.length])) continue;
		return word;
	}
	return undefined;
}

/**
 * Reads a single-quoted literal starting at `offset`.
 * There is no escape mechanism; an unterminated literal yields a zero-length token.
 */
export function scanQuotedString(text: string, offset: number): Token {
	if (text[offset] !== "'") {
		return { type: TokenType.STRING, value: '', offset, length: 0 };
	}
	const close = text.indexOf("'", offset + 1);
	if (close === -1) {
		return { type: TokenType.STRING, value: '', offset, length: 0 };
	}
	return { type: TokenType.STRING, value: text.slice(offset + 1, close), offset, length: close - offset + 1 };
}

function scanIdentifier(text: string, offset: number): Token {
	let end = offset;
	while (end < text.length && isIdentifierChar(text[end])) {
		end++;
	}
	return { type: TokenType.IDENTIFIER, value: text.slice(offset, end), offset, length: end - offset };
}

/**
 * Returns the token starting at `offset` without consuming anything.
 * Priority: reserved word, quoted literal, identifier.
 */
export function scanToken(text: string, offset: number): Token {
	if (offset >= text.length) {
		return { type: TokenType.EOF, value: '', offset: text.length, length: 0 };
	}

	const reserved = matchReservedWord(text, offset);
	if (reserved !== undefined) {
		return { type: TokenType.RESERVED, value: reserved, offset, length: reserved.length };
	}

	if (text[offset] === "'") {
		return scanQuotedString(text, offset);
	}

	return scanIdentifier(text, offset);
}

/** Returns the offset of the first non-space character at or after `offset`. */
export function skipSpaces(text: string, offset: number): number {
	let i = offset;
	while (i < text.length && text[i] === ' ') {
		i++;
	}
	return i;
}

/** True when `s` is one of the catalogue's words (punctuation excluded), in any case. */
export function isReservedWord(s: string): boolean {
	return RESERVED_WORDS_ONLY.includes(s.toUpperCase());
}

/** True for `name` or `qualifier.name` that is not a catalogue entry. */
export function isIdentifier(s: string): boolean {
	if (RESERVED_WORDS.includes(s.toUpperCase())) return false;
	return IDENTIFIER_SHAPE.test(s);
}

/** Identifiers plus the `*` and `table.*` wildcards. */
export function isIdentifierOrWildcard(s: string): boolean {
	return s === '*' || QUALIFIED_WILDCARD.test(s) || isIdentifier(s);
}
