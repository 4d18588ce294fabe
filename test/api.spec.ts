import { expect } from 'chai';
import {
	parse,
	tryParse,
	parseMany,
	tryParseMany,
	normalizeSql,
	createQuery,
	formatErrorLocation,
	SqlParserError,
	ParseError,
	ValidationError,
	BatchError,
	MisuseError,
	StatusCode,
} from '../src/index.js';

describe('Public API', () => {

	describe('normalizeSql()', () => {
		it('should drop backticks and collapse whitespace', () => {
			expect(normalizeSql('  SELECT\t`a`,\n `b`   FROM  `t`  ')).to.equal('SELECT a, b FROM t');
		});

		it('should be idempotent', () => {
			const inputs = ['', '   ', 'a\n\n b', ' `x`\t`y` ', "WHERE a = '  b  '"];
			for (const input of inputs) {
				const once = normalizeSql(input);
				expect(normalizeSql(once)).to.equal(once);
			}
		});
	});

	describe('tryParse()', () => {
		it('should return the query on success', () => {
			const result = tryParse('SELECT a FROM t');
			expect(result.ok).to.equal(true);
			expect(result.query.table).to.equal('t');
		});

		it('should return an empty query and the error on failure', () => {
			const result = tryParse('SELECT a b FROM t');
			expect(result.ok).to.equal(false);
			expect(result.query).to.deep.equal(createQuery());
			if (!result.ok) {
				expect(result.error).to.be.instanceOf(ParseError);
				expect(result.error.position).to.equal(9);
			}
		});

		it('should keep the partial AST on the error', () => {
			const result = tryParse('DELETE FROM t');
			if (result.ok) throw new Error('Expected failure');
			expect(result.error).to.be.instanceOf(ValidationError);
			if (result.error instanceof ValidationError) {
				expect(result.error.partial?.table).to.equal('t');
			}
		});

		it('should still throw on misuse', () => {
			const notText: string = JSON.parse('42');
			expect(() => tryParse(notText)).to.throw(MisuseError, 'Expected SQL text, got number');
		});
	});

	describe('parse()', () => {
		it('should reject null input as misuse', () => {
			const nothing: string = JSON.parse('null');
			try {
				parse(nothing);
				expect.fail('Expected MisuseError');
			} catch (e) {
				expect(e).to.be.instanceOf(MisuseError);
				if (e instanceof MisuseError) {
					expect(e.message).to.equal('Expected SQL text, got null');
					expect(e.code).to.equal(StatusCode.MISUSE);
				}
			}
		});

		it('should return independent queries for the same text', () => {
			const a = parse('SELECT a FROM t');
			const b = parse('SELECT a FROM t');
			a.fields.push('b');
			expect(b.fields).to.deep.equal(['a']);
		});
	});

	describe('Batches', () => {
		it('should parse every statement in order', () => {
			const queries = parseMany(['SELECT a FROM t', "DELETE FROM u WHERE a = '1'"]);
			expect(queries.map(q => q.table)).to.deep.equal(['t', 'u']);
		});

		it('should accept an empty batch', () => {
			expect(parseMany([])).to.deep.equal([]);
			expect(tryParseMany([])).to.deep.equal({ queries: [] });
		});

		it('should stop at the first failing statement', () => {
			const result = tryParseMany(['SELECT a FROM t', 'DELETE FROM t', 'SELECT a b FROM t']);
			expect(result.failedIndex).to.equal(1);
			expect(result.queries).to.have.length(1);
			expect(result.error).to.be.instanceOf(ValidationError);
		});

		it('should wrap the failure in a BatchError', () => {
			try {
				parseMany(['SELECT a FROM t', 'DELETE FROM t', 'SELECT b FROM u']);
				expect.fail('Expected BatchError');
			} catch (e) {
				expect(e).to.be.instanceOf(BatchError);
				if (e instanceof BatchError) {
					expect(e.index).to.equal(1);
					expect(e.queries.map(q => q.table)).to.deep.equal(['t']);
					expect(e.message).to.equal('statement 2: at WHERE: WHERE clause is mandatory for UPDATE & DELETE');
					expect(e.code).to.equal(StatusCode.CONSTRAINT);
					expect(e.cause).to.be.instanceOf(ValidationError);
				}
			}
		});

		it('should reject a batch that is not an array', () => {
			const single: string[] = JSON.parse('"SELECT a FROM t"');
			expect(() => parseMany(single)).to.throw(MisuseError, 'Expected an array of SQL statements');
		});
	});

	describe('Errors', () => {
		it('should default to the generic error code', () => {
			const err = new SqlParserError('boom');
			expect(err.code).to.equal(StatusCode.ERROR);
			expect(err.position).to.equal(undefined);
			expect(err.message).to.equal('boom');
		});

		it('should use the documented status codes', () => {
			expect(StatusCode.SYNTAX).to.equal(29);
			expect(StatusCode.CONSTRAINT).to.equal(19);
			expect(StatusCode.MISUSE).to.equal(21);
			expect(StatusCode.INTERNAL).to.equal(2);
			expect(Object.keys(StatusCode)).to.not.include('OK');
			expect(new MisuseError().message).to.equal('API misuse');
		});

		it('should point at the failing position', () => {
			const sql = 'SELECT a FROM t WHERE = 1';
			const result = tryParse(sql);
			if (result.ok) throw new Error('Expected failure');
			expect(formatErrorLocation(sql, result.error)).to.equal(
				`${sql}\n${' '.repeat(22)}^\nat WHERE: expected field (at position 22)`
			);
		});

		it('should place the caret in the normalized text of raw input', () => {
			const raw = 'SELECT   `a`   b FROM t';
			const result = tryParse(raw);
			if (result.ok) throw new Error('Expected failure');
			expect(formatErrorLocation(raw, result.error)).to.equal(
				`SELECT a b FROM t\n${' '.repeat(9)}^\nat SELECT: expected comma or FROM (at position 9)`
			);
		});

		it('should render positionless errors as the message alone', () => {
			const result = tryParse('DELETE FROM t');
			if (result.ok) throw new Error('Expected failure');
			expect(formatErrorLocation('DELETE FROM t', result.error))
				.to.equal('at WHERE: WHERE clause is mandatory for UPDATE & DELETE');
		});
	});
});
