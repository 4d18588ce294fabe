/**
 * Whole-statement checks run once the state machine has consumed the input.
 * These cover what no single step can see: missing clauses, half-read conditions
 * and the shape of INSERT rows.
 */

import { ParseError, ValidationError, type SqlParserError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import { Operator, QueryType, type Query } from './ast.js';
import { describeStep, isTerminalStep, type Step } from './steps.js';

const log = createLogger('validator');

/** Where the state machine stopped. */
export interface ParserState {
	step: Step;
	/** Normalized statement text */
	sql: string;
}

/**
 * Validate a parsed query.
 * @returns The first failing check, or undefined when the query is well-formed
 */
export function validateQuery(query: Query, state: ParserState): SqlParserError | undefined {
	const error = findViolation(query, state);
	if (error) {
		log('Validation failed: %s', error.message);
	} else {
		log('Validated %s on %s', query.type, query.table);
	}
	return error;
}

function findViolation(query: Query, state: ParserState): SqlParserError | undefined {
	if (query.conditions.length === 0 && state.step.kind === 'whereField') {
		return new ValidationError('empty WHERE clause', 'WHERE', query);
	}
	if (query.type === QueryType.Unknown) {
		return new ValidationError('query type cannot be empty', undefined, query);
	}
	if (query.table === '') {
		return new ValidationError('table name cannot be empty', undefined, query);
	}
	if (query.conditions.length === 0 && (query.type === QueryType.Update || query.type === QueryType.Delete)) {
		return new ValidationError('WHERE clause is mandatory for UPDATE & DELETE', 'WHERE', query);
	}

	for (const c of query.conditions) {
		if (c.operator === Operator.Unknown) {
			return new ValidationError('condition without operator', 'WHERE', query);
		}
		if (c.operand1 === '' && c.operand1IsField) {
			return new ValidationError('condition with empty left side operand', 'WHERE', query);
		}
		if (c.operand2 === undefined || (c.operand2 === '' && c.operand2IsField)) {
			return new ValidationError('condition with empty right side operand', 'WHERE', query);
		}
	}

	if (query.type === QueryType.Insert) {
		if (query.inserts.length === 0) {
			return new ValidationError('need at least one row to insert', 'INSERT INTO', query);
		}
		if (query.inserts.some(row => row.length !== query.fields.length)) {
			return new ValidationError("value count doesn't match field count", 'INSERT INTO', query);
		}
	}

	// Input ran out while a clause was still open, e.g. `... ORDER BY`
	if (!isTerminalStep(state.step)) {
		const { clause, expectation } = describeStep(state.step);
		return new ParseError(clause, expectation, state.sql.length, query);
	}

	return undefined;
}
