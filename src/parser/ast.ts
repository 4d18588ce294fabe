/**
 * Query AST definitions.
 * One `Query` is produced per parsed statement; the parser fills it in a single pass.
 */

export enum QueryType {
	Unknown = 'unknown',
	Select = 'select',
	Insert = 'insert',
	Update = 'update',
	Delete = 'delete',
}

/** Comparison operators; the value is the operator's source text. */
export enum Operator {
	Unknown = '',
	Eq = '=',
	Gt = '>',
	Gte = '>=',
	Lt = '<',
	Lte = '<=',
	Ne = '!=',
}

export type SortDirection = 'ASC' | 'DESC';

export type JoinType = 'JOIN' | 'LEFT JOIN' | 'RIGHT JOIN' | 'INNER JOIN';

// WHERE condition; the left side is always a field reference
export interface Condition {
	operand1: string;
	operand1IsField: boolean;
	operator: Operator;
	/** Absent until the right-hand side has been read */
	operand2?: string;
	operand2IsField: boolean;
}

// ON condition between two qualified fields: table1.operand1 <op> table2.operand2
export interface JoinCondition {
	table1: string;
	operand1: string;
	operator: Operator;
	table2: string;
	operand2: string;
}

export interface Join {
	type: JoinType;
	table: string;
	conditions: JoinCondition[];
}

export interface Query {
	type: QueryType;
	/** Set only when the table reference was written as `database.table` */
	database?: string;
	table: string;
	/** Selected columns for SELECT, target columns for INSERT */
	fields: string[];
	/** SELECT TOP n; absent means unbounded */
	maxRows?: number;
	/** ANDed left to right */
	conditions: Condition[];
	/** UPDATE ... SET pairs, last write wins */
	updates: Map<string, string>;
	/** INSERT rows, each aligned positionally with `fields` */
	inserts: string[][];
	orderFields: string[];
	/** Parallel to `orderFields` */
	orderDirs: SortDirection[];
	joins: Join[];
}

/** Creates the empty AST a parse starts from. */
export function createQuery(): Query {
	return {
		type: QueryType.Unknown,
		table: '',
		fields: [],
		conditions: [],
		updates: new Map(),
		inserts: [],
		orderFields: [],
		orderDirs: [],
		joins: [],
	};
}

const OPERATORS: Record<string, Operator> = {
	'=': Operator.Eq,
	'>': Operator.Gt,
	'>=': Operator.Gte,
	'<': Operator.Lt,
	'<=': Operator.Lte,
	'!=': Operator.Ne,
};

/** Maps an operator token to its enum member, or `Operator.Unknown`. */
export function toOperator(text: string): Operator {
	return Object.hasOwn(OPERATORS, text) ? OPERATORS[text] : Operator.Unknown;
}
