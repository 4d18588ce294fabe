import { StatusCode } from './types.js';
import type { Query } from '../parser/ast.js';
import { normalizeSql } from '../parser/normalize.js';

/**
 * Base class for all errors raised by the parser
 * Provides position information and status code support
 */
export class SqlParserError extends Error {
	public code: number;
	public cause?: Error;
	public position?: number;

	constructor(message: string, code: number = StatusCode.ERROR, cause?: Error, position?: number) {
		super(message);
		this.code = code;
		this.name = 'SqlParserError';
		this.cause = cause;
		this.position = position;

		// Enhance message with location if available
		if (position !== undefined) {
			this.message = `${message} (at position ${position})`;
		}

		// Maintain stack trace in V8
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, SqlParserError);
		}
	}
}

/** Clause names used to locate grammar and validation errors. */
export type Clause = 'SELECT' | 'INSERT INTO' | 'UPDATE' | 'DELETE FROM' | 'WHERE' | 'ORDER BY' | 'JOIN' | 'ON';

/**
 * Grammar error raised by the state machine at the first token that does not fit.
 * `partial` holds the AST as it stood when parsing stopped.
 */
export class ParseError extends SqlParserError {
	public clause?: Clause;
	public expectation: string;
	public partial?: Query;

	constructor(clause: Clause | undefined, expectation: string, position: number, partial?: Query, code: number = StatusCode.SYNTAX) {
		super(clause ? `at ${clause}: ${expectation}` : expectation, code, undefined, position);
		this.clause = clause;
		this.expectation = expectation;
		this.partial = partial;
		this.name = 'ParseError';
		Object.setPrototypeOf(this, ParseError.prototype);
	}
}

/**
 * Structural problem found by the post-parse validator
 */
export class ValidationError extends SqlParserError {
	public clause?: Clause;
	public partial?: Query;

	constructor(message: string, clause?: Clause, partial?: Query) {
		super(clause ? `at ${clause}: ${message}` : message, StatusCode.CONSTRAINT);
		this.clause = clause;
		this.partial = partial;
		this.name = 'ValidationError';
		Object.setPrototypeOf(this, ValidationError.prototype);
	}
}

/**
 * Raised by `parseMany` for the first statement of a batch that fails.
 * Carries the queries parsed before it.
 */
export class BatchError extends SqlParserError {
	public index: number;
	public queries: Query[];

	constructor(index: number, queries: Query[], cause: SqlParserError) {
		super(`statement ${index + 1}: ${cause.message}`, cause.code, cause);
		this.index = index;
		this.queries = queries;
		this.name = 'BatchError';
		Object.setPrototypeOf(this, BatchError.prototype);
	}
}

/**
 * Error thrown when the API is used incorrectly
 */
export class MisuseError extends SqlParserError {
	constructor(message: string = "API misuse") {
		super(message, StatusCode.MISUSE);
		this.name = 'MisuseError';
		Object.setPrototypeOf(this, MisuseError.prototype);
	}
}

/**
 * Renders the normalized statement with a caret under the failing position, followed by the message.
 * Positions count characters of the normalized text, so raw input is normalized first.
 * Errors without a position render the message alone.
 *
 * @example
 * formatErrorLocation('SELECT a FROM t WHERE = 1', error)
 * // SELECT a FROM t WHERE = 1
 * //                       ^
 * // at WHERE: expected field (at position 22)
 */
export function formatErrorLocation(sql: string, error: SqlParserError): string {
	if (error.position === undefined) {
		return error.message;
	}
	const text = normalizeSql(sql);
	const caret = ' '.repeat(Math.min(error.position, text.length)) + '^';
	return `${text}\n${caret}\n${error.message}`;
}
