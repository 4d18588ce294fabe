import { BatchError, MisuseError, SqlParserError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import { createQuery, type Query } from './ast.js';
import { normalizeSql } from './normalize.js';
import { Parser } from './parser.js';

export * from './ast.js';
export * from './lexer.js';
export { Parser } from './parser.js';
export { normalizeSql } from './normalize.js';
export { validateQuery, type ParserState } from './validator.js';
export type { Step, StepKind } from './steps.js';

const log = createLogger('parser:api');

export type ParseResult =
	| { ok: true; query: Query }
	| { ok: false; query: Query; error: SqlParserError };

export interface BatchResult {
	/** Queries parsed before the first failure, in input order */
	queries: Query[];
	error?: SqlParserError;
	/** Index of the statement that failed */
	failedIndex?: number;
}

function requireString(sql: unknown): string {
	if (typeof sql !== 'string') {
		throw new MisuseError(`Expected SQL text, got ${sql === null ? 'null' : typeof sql}`);
	}
	return sql;
}

/**
 * Parse a single statement
 *
 * @param sql Statement text; backticks and extra whitespace are normalized away
 * @returns The validated query AST
 * @throws ParseError if the statement does not fit the grammar
 * @throws ValidationError if the statement is structurally incomplete
 */
export function parse(sql: string): Query {
	return new Parser().parse(normalizeSql(requireString(sql)));
}

/**
 * Parse a single statement without throwing for grammar or validation errors.
 * On failure `query` is an empty AST; the partially built one is on `error.partial`.
 */
export function tryParse(sql: string): ParseResult {
	try {
		return { ok: true, query: parse(sql) };
	} catch (e) {
		if (e instanceof SqlParserError && !(e instanceof MisuseError)) {
			return { ok: false, query: createQuery(), error: e };
		}
		throw e;
	}
}

/**
 * Parse statements in order, stopping at the first failure.
 */
export function tryParseMany(sqls: readonly string[]): BatchResult {
	if (!Array.isArray(sqls)) {
		throw new MisuseError('Expected an array of SQL statements');
	}

	const queries: Query[] = [];
	for (const [index, sql] of sqls.entries()) {
		const result = tryParse(sql);
		if (!result.ok) {
			log('Statement %d of %d failed: %s', index + 1, sqls.length, result.error.message);
			return { queries, error: result.error, failedIndex: index };
		}
		queries.push(result.query);
	}
	return { queries };
}

/**
 * Parse statements in order.
 *
 * @returns One query per statement
 * @throws BatchError wrapping the first failure; it carries the queries parsed before it
 */
export function parseMany(sqls: readonly string[]): Query[] {
	const { queries, error, failedIndex } = tryParseMany(sqls);
	if (error) {
		throw new BatchError(failedIndex ?? queries.length, queries, error);
	}
	return queries;
}
