import type { Clause } from '../common/errors.js';
import type { Operator } from './ast.js';

/**
 * Grammar position of the parser: which token it expects next.
 * Steps that remember part of a clause carry it in their payload.
 */
export type Step =
	| { kind: 'statementType' }
	| { kind: 'top' }
	| { kind: 'topCount' }
	| { kind: 'selectField' }
	| { kind: 'selectComma' }
	| { kind: 'selectFrom' }
	| { kind: 'selectTable' }
	| { kind: 'selectClauses' }
	| { kind: 'insertTable' }
	| { kind: 'insertFieldsOpen' }
	| { kind: 'insertField' }
	| { kind: 'insertFieldCommaOrClose' }
	| { kind: 'insertValuesKeyword' }
	| { kind: 'insertValuesOpen' }
	| { kind: 'insertValue' }
	| { kind: 'insertValueCommaOrClose' }
	| { kind: 'insertRowSeparator' }
	| { kind: 'updateTable' }
	| { kind: 'updateSet' }
	| { kind: 'updateField' }
	| { kind: 'updateEquals'; field: string }
	| { kind: 'updateValue'; field: string }
	| { kind: 'updateCommaOrWhere' }
	| { kind: 'deleteTable' }
	| { kind: 'where' }
	| { kind: 'whereField' }
	| { kind: 'whereOperator' }
	| { kind: 'whereValue' }
	| { kind: 'whereAndOrOrder' }
	| { kind: 'order' }
	| { kind: 'orderField' }
	| { kind: 'orderDirectionOrComma' }
	| { kind: 'orderComma' }
	| { kind: 'join' }
	| { kind: 'joinTable' }
	| { kind: 'joinOnOrClause' }
	| { kind: 'joinLeft' }
	| { kind: 'joinOperator'; table1: string; operand1: string }
	| { kind: 'joinRight'; table1: string; operand1: string; operator: Operator }
	| { kind: 'joinAndOrClause' };

export type StepKind = Step['kind'];

export interface StepExpectation {
	clause?: Clause;
	expectation: string;
}

const EXPECTATIONS: Record<StepKind, StepExpectation> = {
	statementType: { expectation: 'invalid query type' },
	top: { clause: 'SELECT', expectation: 'expected TOP' },
	topCount: { clause: 'SELECT', expectation: 'expected row count after TOP' },
	selectField: { clause: 'SELECT', expectation: 'expected field to SELECT' },
	selectComma: { clause: 'SELECT', expectation: 'expected comma or FROM' },
	selectFrom: { clause: 'SELECT', expectation: 'expected FROM' },
	selectTable: { clause: 'SELECT', expectation: 'expected table name' },
	selectClauses: { clause: 'SELECT', expectation: 'expected WHERE, ORDER BY or JOIN' },
	insertTable: { clause: 'INSERT INTO', expectation: 'expected table name' },
	insertFieldsOpen: { clause: 'INSERT INTO', expectation: 'expected opening parens' },
	insertField: { clause: 'INSERT INTO', expectation: 'expected field to insert' },
	insertFieldCommaOrClose: { clause: 'INSERT INTO', expectation: 'expected comma or closing parens' },
	insertValuesKeyword: { clause: 'INSERT INTO', expectation: "expected 'VALUES'" },
	insertValuesOpen: { clause: 'INSERT INTO', expectation: 'expected opening parens' },
	insertValue: { clause: 'INSERT INTO', expectation: 'expected quoted value' },
	insertValueCommaOrClose: { clause: 'INSERT INTO', expectation: 'expected comma or closing parens' },
	insertRowSeparator: { clause: 'INSERT INTO', expectation: 'expected comma' },
	updateTable: { clause: 'UPDATE', expectation: 'expected table name' },
	updateSet: { clause: 'UPDATE', expectation: "expected 'SET'" },
	updateField: { clause: 'UPDATE', expectation: 'expected field to update' },
	updateEquals: { clause: 'UPDATE', expectation: "expected '='" },
	updateValue: { clause: 'UPDATE', expectation: 'expected quoted value' },
	updateCommaOrWhere: { clause: 'UPDATE', expectation: "expected ',' or WHERE" },
	deleteTable: { clause: 'DELETE FROM', expectation: 'expected table name' },
	where: { expectation: 'expected WHERE' },
	whereField: { clause: 'WHERE', expectation: 'expected field' },
	whereOperator: { clause: 'WHERE', expectation: 'unknown operator' },
	whereValue: { clause: 'WHERE', expectation: 'expected quoted value' },
	whereAndOrOrder: { clause: 'WHERE', expectation: 'expected AND or ORDER BY' },
	order: { expectation: 'expected ORDER BY' },
	orderField: { clause: 'ORDER BY', expectation: 'expected field to ORDER' },
	orderDirectionOrComma: { clause: 'ORDER BY', expectation: 'expected ASC, DESC or comma' },
	orderComma: { clause: 'ORDER BY', expectation: 'expected comma' },
	join: { clause: 'JOIN', expectation: 'expected JOIN' },
	joinTable: { clause: 'JOIN', expectation: 'expected table name' },
	joinOnOrClause: { clause: 'JOIN', expectation: 'expected ON, JOIN, WHERE or ORDER BY' },
	joinLeft: { clause: 'ON', expectation: 'expected <tablename>.<fieldname>' },
	joinOperator: { clause: 'ON', expectation: 'unknown operator' },
	joinRight: { clause: 'ON', expectation: 'expected <tablename>.<fieldname>' },
	joinAndOrClause: { clause: 'ON', expectation: 'expected AND, JOIN, WHERE or ORDER BY' },
};

// Steps in which the statement may legitimately end
const TERMINAL_STEPS: ReadonlySet<StepKind> = new Set<StepKind>([
	'selectClauses',
	'insertRowSeparator',
	'updateCommaOrWhere',
	'whereAndOrOrder',
	'orderDirectionOrComma',
	'orderComma',
	'joinOnOrClause',
	'joinAndOrClause',
]);

export function describeStep(step: Step): StepExpectation {
	return EXPECTATIONS[step.kind];
}

export function isTerminalStep(step: Step): boolean {
	return TERMINAL_STEPS.has(step.kind);
}
