/**
 * Functions to convert query ASTs back into statement text.
 *
 * Formatting Notes:
 * - Emits upper-case keywords, single spaces, no trailing semicolon.
 * - Literal values are single-quoted. The dialect has no escape for a quote
 *   inside a literal, so such values cannot be written back faithfully.
 * - Field operands (WHERE right-hand sides that were bare identifiers) stay bare.
 * - Omits `ASC`, the default ORDER BY direction.
 */
import { QueryType, type Condition, type Join, type Query } from '../parser/ast.js';
import { MisuseError } from '../common/errors.js';

function quoteLiteral(value: string): string {
	return `'${value}'`;
}

function tableReference(query: Query): string {
	return query.database !== undefined ? `${query.database}.${query.table}` : query.table;
}

function conditionToString(c: Condition): string {
	const right = c.operand2 ?? '';
	return `${c.operand1} ${c.operator} ${c.operand2IsField ? right : quoteLiteral(right)}`;
}

function joinToString(join: Join): string {
	let str = `${join.type} ${join.table}`;
	if (join.conditions.length > 0) {
		const conditions = join.conditions.map(c =>
			`${c.table1}.${c.operand1} ${c.operator} ${c.table2}.${c.operand2}`
		);
		str += ` ON ${conditions.join(' AND ')}`;
	}
	return str;
}

function whereToString(query: Query): string | undefined {
	if (query.conditions.length === 0) return undefined;
	return `WHERE ${query.conditions.map(conditionToString).join(' AND ')}`;
}

function orderByToString(query: Query): string | undefined {
	if (query.orderFields.length === 0) return undefined;
	const terms = query.orderFields.map((field, i) =>
		query.orderDirs[i] === 'DESC' ? `${field} DESC` : field
	);
	return `ORDER BY ${terms.join(', ')}`;
}

export function selectToString(query: Query): string {
	const parts: string[] = ['SELECT'];

	if (query.maxRows !== undefined) {
		parts.push('TOP', String(query.maxRows));
	}

	parts.push(query.fields.join(', '), 'FROM', tableReference(query));

	for (const join of query.joins) {
		parts.push(joinToString(join));
	}

	const where = whereToString(query);
	if (where) parts.push(where);

	const orderBy = orderByToString(query);
	if (orderBy) parts.push(orderBy);

	return parts.join(' ');
}

export function insertToString(query: Query): string {
	const rows = query.inserts.map(row => `(${row.map(quoteLiteral).join(', ')})`);
	return `INSERT INTO ${tableReference(query)} (${query.fields.join(', ')}) VALUES ${rows.join(', ')}`;
}

export function updateToString(query: Query): string {
	const assignments = [...query.updates].map(([field, value]) => `${field} = ${quoteLiteral(value)}`);
	const parts = ['UPDATE', tableReference(query), 'SET', assignments.join(', ')];

	const where = whereToString(query);
	if (where) parts.push(where);

	const orderBy = orderByToString(query);
	if (orderBy) parts.push(orderBy);

	return parts.join(' ');
}

export function deleteToString(query: Query): string {
	const parts = ['DELETE FROM', tableReference(query)];

	const where = whereToString(query);
	if (where) parts.push(where);

	const orderBy = orderByToString(query);
	if (orderBy) parts.push(orderBy);

	return parts.join(' ');
}

// Main function to convert a query AST to statement text
export function queryToString(query: Query): string {
	switch (query.type) {
		case QueryType.Select:
			return selectToString(query);
		case QueryType.Insert:
			return insertToString(query);
		case QueryType.Update:
			return updateToString(query);
		case QueryType.Delete:
			return deleteToString(query);
		case QueryType.Unknown:
			throw new MisuseError('Cannot stringify a query without a statement type');
	}
}
