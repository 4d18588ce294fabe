/**
 * Prepares raw statement text for the scanner: drops backtick quoting,
 * collapses every whitespace run to a single space and trims both ends.
 * Applying it twice gives the same result as applying it once.
 */
export function normalizeSql(sql: string): string {
	return sql.replace(/`/g, '').replace(/\s+/g, ' ').trim();
}
