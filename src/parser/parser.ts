import { createLogger } from '../common/logger.js';
import { ParseError, SqlParserError } from '../common/errors.js';
import { StatusCode } from '../common/types.js';
import { scanToken, skipSpaces, isIdentifier, isIdentifierOrWildcard, type Token, TokenType } from './lexer.js';
import { createQuery, toOperator, Operator, QueryType, type JoinType, type Query } from './ast.js';
import { describeStep, type Step } from './steps.js';
import { validateQuery } from './validator.js';

const log = createLogger('parser');
const stepLog = log.extend('step');
const errorLog = log.extend('error');

const JOIN_TYPES: readonly string[] = ['JOIN', 'LEFT JOIN', 'RIGHT JOIN', 'INNER JOIN'];

function isJoinType(value: string): value is JoinType {
	return JOIN_TYPES.includes(value);
}

/**
 * Single-pass state machine over one normalized statement.
 *
 * Each iteration peeks one token, checks it against the current step, then either
 * consumes it and moves on or stops with a `ParseError`. There is no backtracking.
 */
export class Parser {
	private sql = '';
	private position = 0;
	private step: Step = { kind: 'statementType' };
	private query: Query = createQuery();

	/**
	 * Parse a normalized statement and validate the resulting AST.
	 * @throws ParseError at the first token that does not fit the grammar
	 * @throws ValidationError when the statement is structurally incomplete
	 */
	parse(sql: string): Query {
		this.sql = sql;
		this.position = 0;
		this.step = { kind: 'statementType' };
		this.query = createQuery();

		log('Parsing statement: %s', sql);

		while (this.position < this.sql.length) {
			if (!this.advance()) {
				log('Stopped early at offset %d', this.position);
				break;
			}
		}

		const error = validateQuery(this.query, { step: this.step, sql: this.sql });
		if (error) {
			throw error;
		}
		return this.query;
	}

	/**
	 * Runs the current step once.
	 * @returns false when parsing should stop before the end of the input
	 */
	private advance(): boolean {
		const step = this.step;
		const token = this.peek();
		stepLog('%s at %d: %o', step.kind, this.position, token.value);

		switch (step.kind) {
			case 'statementType':
				switch (this.reserved(token)) {
					case 'SELECT':
						this.query.type = QueryType.Select;
						this.pop();
						this.step = this.reserved(this.peek()) === 'TOP' ? { kind: 'top' } : { kind: 'selectField' };
						break;
					case 'INSERT INTO':
						this.query.type = QueryType.Insert;
						this.pop();
						this.step = { kind: 'insertTable' };
						break;
					case 'UPDATE':
						this.query.type = QueryType.Update;
						this.pop();
						this.step = { kind: 'updateTable' };
						break;
					case 'DELETE FROM':
						this.query.type = QueryType.Delete;
						this.pop();
						this.step = { kind: 'deleteTable' };
						break;
					default:
						throw this.error(StatusCode.UNSUPPORTED);
				}
				break;

			case 'top':
				this.expectReserved(token, 'TOP');
				this.pop();
				this.step = { kind: 'topCount' };
				break;

			case 'topCount': {
				if (token.type !== TokenType.IDENTIFIER || !/^\d+$/.test(token.value)) {
					throw this.error();
				}
				const count = Number(token.value);
				if (!Number.isSafeInteger(count)) {
					throw this.error();
				}
				this.query.maxRows = count;
				this.pop();
				this.step = { kind: 'selectField' };
				break;
			}

			case 'selectField':
				if (token.type !== TokenType.IDENTIFIER || !isIdentifierOrWildcard(token.value)) {
					throw this.error();
				}
				this.query.fields.push(token.value);
				this.pop();
				this.step = this.reserved(this.peek()) === 'FROM' ? { kind: 'selectFrom' } : { kind: 'selectComma' };
				break;

			case 'selectComma':
				this.expectReserved(token, ',');
				this.pop();
				this.step = { kind: 'selectField' };
				break;

			case 'selectFrom':
				this.expectReserved(token, 'FROM');
				this.pop();
				this.step = { kind: 'selectTable' };
				break;

			case 'selectTable':
				this.setTable(this.expectTableName(token));
				this.pop();
				this.step = { kind: 'selectClauses' };
				break;

			case 'selectClauses':
				this.nextClause(token, true);
				break;

			case 'insertTable':
				this.setTable(this.expectTableName(token));
				this.pop();
				this.step = { kind: 'insertFieldsOpen' };
				break;

			case 'insertFieldsOpen':
				this.expectReserved(token, '(');
				this.pop();
				this.step = { kind: 'insertField' };
				break;

			case 'insertField':
				this.query.fields.push(this.expectField(token));
				this.pop();
				this.step = { kind: 'insertFieldCommaOrClose' };
				break;

			case 'insertFieldCommaOrClose':
				switch (this.reserved(token)) {
					case ',':
						this.pop();
						this.step = { kind: 'insertField' };
						break;
					case ')':
						this.pop();
						this.step = { kind: 'insertValuesKeyword' };
						break;
					default:
						throw this.error();
				}
				break;

			case 'insertValuesKeyword':
				this.expectReserved(token, 'VALUES');
				this.pop();
				this.step = { kind: 'insertValuesOpen' };
				break;

			case 'insertValuesOpen':
				this.expectReserved(token, '(');
				this.query.inserts.push([]);
				this.pop();
				this.step = { kind: 'insertValue' };
				break;

			case 'insertValue':
				this.currentRow().push(this.expectValue(token));
				this.pop();
				this.step = { kind: 'insertValueCommaOrClose' };
				break;

			case 'insertValueCommaOrClose':
				switch (this.reserved(token)) {
					case ',':
						this.pop();
						this.step = { kind: 'insertValue' };
						break;
					case ')':
						if (this.currentRow().length !== this.query.fields.length) {
							throw this.error(StatusCode.SYNTAX, "value count doesn't match field count");
						}
						this.pop();
						this.step = { kind: 'insertRowSeparator' };
						break;
					default:
						throw this.error();
				}
				break;

			case 'insertRowSeparator':
				switch (this.reserved(token)) {
					case ',':
						this.pop();
						this.step = { kind: 'insertValuesOpen' };
						break;
					case 'ON DUPLICATE KEY UPDATE':
						// Not supported: the statement is treated as ending here
						log('Ignoring ON DUPLICATE KEY UPDATE and the rest of the statement');
						return false;
					default:
						throw this.error();
				}
				break;

			case 'updateTable':
				this.setTable(this.expectTableName(token));
				this.pop();
				this.step = { kind: 'updateSet' };
				break;

			case 'updateSet':
				this.expectReserved(token, 'SET');
				this.pop();
				this.step = { kind: 'updateField' };
				break;

			case 'updateField': {
				const field = this.expectField(token);
				this.pop();
				this.step = { kind: 'updateEquals', field };
				break;
			}

			case 'updateEquals':
				this.expectReserved(token, '=');
				this.pop();
				this.step = { kind: 'updateValue', field: step.field };
				break;

			case 'updateValue':
				this.query.updates.set(step.field, this.expectValue(token));
				this.pop();
				this.step = { kind: 'updateCommaOrWhere' };
				break;

			case 'updateCommaOrWhere':
				switch (this.reserved(token)) {
					case ',':
						this.pop();
						this.step = { kind: 'updateField' };
						break;
					case 'WHERE':
						this.step = { kind: 'where' };
						break;
					default:
						throw this.error();
				}
				break;

			case 'deleteTable':
				this.setTable(this.expectTableName(token));
				this.pop();
				this.step = { kind: 'where' };
				break;

			case 'where':
				this.expectReserved(token, 'WHERE');
				this.pop();
				this.step = { kind: 'whereField' };
				break;

			case 'whereField':
				this.query.conditions.push({
					operand1: this.expectField(token),
					operand1IsField: true,
					operator: Operator.Unknown,
					operand2IsField: false,
				});
				this.pop();
				this.step = { kind: 'whereOperator' };
				break;

			case 'whereOperator':
				this.currentCondition().operator = this.expectOperator(token);
				this.pop();
				this.step = { kind: 'whereValue' };
				break;

			case 'whereValue': {
				const condition = this.currentCondition();
				condition.operand2 = this.expectValue(token);
				condition.operand2IsField = token.type === TokenType.IDENTIFIER && isIdentifier(token.value);
				this.pop();
				this.step = { kind: 'whereAndOrOrder' };
				break;
			}

			case 'whereAndOrOrder':
				if (this.isAnd(token)) {
					this.pop();
					this.step = { kind: 'whereField' };
				} else if (this.reserved(token) === 'ORDER BY') {
					this.step = { kind: 'order' };
				} else {
					throw this.error();
				}
				break;

			case 'order':
				this.expectReserved(token, 'ORDER BY');
				this.pop();
				this.step = { kind: 'orderField' };
				break;

			case 'orderField':
				this.query.orderFields.push(this.expectField(token));
				this.query.orderDirs.push('ASC');
				this.pop();
				this.step = { kind: 'orderDirectionOrComma' };
				break;

			case 'orderDirectionOrComma': {
				const word = this.reserved(token);
				if (word === 'ASC' || word === 'DESC') {
					this.query.orderDirs[this.query.orderDirs.length - 1] = word;
					this.pop();
					this.step = { kind: 'orderComma' };
				} else if (word === ',') {
					this.pop();
					this.step = { kind: 'orderField' };
				} else {
					throw this.error();
				}
				break;
			}

			case 'orderComma':
				this.expectReserved(token, ',');
				this.pop();
				this.step = { kind: 'orderField' };
				break;

			case 'join': {
				const type = this.reserved(token);
				if (type === undefined || !isJoinType(type)) {
					throw this.error();
				}
				this.query.joins.push({ type, table: '', conditions: [] });
				this.pop();
				this.step = { kind: 'joinTable' };
				break;
			}

			case 'joinTable':
				this.currentJoin().table = this.expectTableName(token);
				this.pop();
				this.step = { kind: 'joinOnOrClause' };
				break;

			case 'joinOnOrClause':
				if (this.reserved(token) === 'ON') {
					this.pop();
					this.step = { kind: 'joinLeft' };
				} else {
					this.nextClause(token, true);
				}
				break;

			case 'joinLeft': {
				const [table1, operand1] = this.expectQualifiedField(token);
				this.pop();
				this.step = { kind: 'joinOperator', table1, operand1 };
				break;
			}

			case 'joinOperator': {
				const operator = this.expectOperator(token);
				this.pop();
				this.step = { kind: 'joinRight', table1: step.table1, operand1: step.operand1, operator };
				break;
			}

			case 'joinRight': {
				const [table2, operand2] = this.expectQualifiedField(token);
				this.currentJoin().conditions.push({
					table1: step.table1,
					operand1: step.operand1,
					operator: step.operator,
					table2,
					operand2,
				});
				this.pop();
				this.step = { kind: 'joinAndOrClause' };
				break;
			}

			case 'joinAndOrClause':
				if (this.isAnd(token)) {
					this.pop();
					this.step = { kind: 'joinLeft' };
				} else {
					this.nextClause(token, true);
				}
				break;

			default: {
				const unreachable: never = step;
				throw new SqlParserError(`Unhandled parser step ${JSON.stringify(unreachable)}`, StatusCode.INTERNAL);
			}
		}
		return true;
	}

	/** Picks the clause that follows a table reference or a join. */
	private nextClause(token: Token, allowJoin: boolean): void {
		const word = this.reserved(token);
		if (word === 'WHERE') {
			this.step = { kind: 'where' };
		} else if (word === 'ORDER BY') {
			this.step = { kind: 'order' };
		} else if (allowJoin && word !== undefined && isJoinType(word)) {
			this.step = { kind: 'join' };
		} else {
			throw this.error();
		}
	}

	private peek(): Token {
		return scanToken(this.sql, this.position);
	}

	private pop(): Token {
		const token = this.peek();
		this.position = skipSpaces(this.sql, this.position + token.length);
		return token;
	}

	/** The canonical text of a reserved token, undefined for anything else. */
	private reserved(token: Token): string | undefined {
		return token.type === TokenType.RESERVED ? token.value : undefined;
	}

	// AND is not in the catalogue; it arrives as an identifier in any case
	private isAnd(token: Token): boolean {
		return token.type === TokenType.IDENTIFIER && token.value.toUpperCase() === 'AND';
	}

	private expectReserved(token: Token, word: string): void {
		if (this.reserved(token) !== word) {
			throw this.error();
		}
	}

	private expectField(token: Token): string {
		if (token.type !== TokenType.IDENTIFIER || !isIdentifier(token.value)) {
			throw this.error();
		}
		return token.value;
	}

	private expectTableName(token: Token): string {
		return this.expectField(token);
	}

	private expectQualifiedField(token: Token): [string, string] {
		const parts = this.expectField(token).split('.');
		if (parts.length !== 2) {
			throw this.error();
		}
		return [parts[0], parts[1]];
	}

	private expectOperator(token: Token): Operator {
		const operator = token.type === TokenType.RESERVED ? toOperator(token.value) : Operator.Unknown;
		if (operator === Operator.Unknown) {
			throw this.error();
		}
		return operator;
	}

	/** Quoted literals, or bare words and numbers. */
	private expectValue(token: Token): string {
		if (token.length === 0 || (token.type !== TokenType.STRING && token.type !== TokenType.IDENTIFIER)) {
			throw this.error();
		}
		return token.value;
	}

	/** Splits `database.table` on the first dot. */
	private setTable(name: string): void {
		const dot = name.indexOf('.');
		if (dot === -1) {
			this.query.table = name;
			return;
		}
		this.query.database = name.slice(0, dot);
		this.query.table = name.slice(dot + 1);
	}

	private currentRow(): string[] {
		return this.query.inserts[this.query.inserts.length - 1];
	}

	private currentCondition() {
		return this.query.conditions[this.query.conditions.length - 1];
	}

	private currentJoin() {
		return this.query.joins[this.query.joins.length - 1];
	}

	private error(code: StatusCode = StatusCode.SYNTAX, expectation?: string): ParseError {
		const described = describeStep(this.step);
		const err = new ParseError(described.clause, expectation ?? described.expectation, this.position, this.query, code);
		errorLog('%s', err.message);
		return err;
	}
}
