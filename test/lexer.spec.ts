import { expect } from 'chai';
import {
	scanToken,
	skipSpaces,
	isReservedWord,
	isIdentifier,
	isIdentifierOrWildcard,
	RESERVED_WORDS,
	RESERVED_WORDS_ONLY,
	TokenType,
} from '../src/parser/lexer.js';

describe('Lexer', () => {

	describe('Reserved words', () => {
		it('should match keywords case-insensitively and return the canonical text', () => {
			expect(scanToken('select a', 0)).to.deep.equal({ type: TokenType.RESERVED, value: 'SELECT', offset: 0, length: 6 });
			expect(scanToken('a FrOm t', 2)).to.deep.equal({ type: TokenType.RESERVED, value: 'FROM', offset: 2, length: 4 });
		});

		it('should prefer two-character operators over their prefixes', () => {
			expect(scanToken('a >= b', 2).value).to.equal('>=');
			expect(scanToken('a <= b', 2).value).to.equal('<=');
			expect(scanToken('a != b', 2).value).to.equal('!=');
			expect(scanToken('a > b', 2).value).to.equal('>');
		});

		it('should read multi-word entries as one token', () => {
			expect(scanToken('ORDER BY x', 0)).to.include({ value: 'ORDER BY', length: 8 });
			expect(scanToken('insert into t', 0)).to.include({ value: 'INSERT INTO', length: 11 });
			expect(scanToken('left join t', 0)).to.include({ value: 'LEFT JOIN', length: 9 });
			expect(scanToken('ON DUPLICATE KEY UPDATE a = 1', 0)).to.include({ value: 'ON DUPLICATE KEY UPDATE', length: 23 });
		});

		it('should not split a longer word that starts with a keyword', () => {
			expect(scanToken('description', 0)).to.deep.equal({ type: TokenType.IDENTIFIER, value: 'description', offset: 0, length: 11 });
			expect(scanToken('ONE', 0).type).to.equal(TokenType.IDENTIFIER);
			expect(scanToken('settings', 0).value).to.equal('settings');
		});

		it('should accept a keyword followed by punctuation', () => {
			expect(scanToken('DESC,', 0)).to.include({ type: TokenType.RESERVED, value: 'DESC' });
			expect(scanToken('on x', 0)).to.include({ type: TokenType.RESERVED, value: 'ON' });
		});

		it('should keep the declared catalogue order', () => {
			expect(RESERVED_WORDS.slice(0, 9)).to.deep.equal(['(', ')', '>=', '<=', '!=', ',', '=', '>', '<']);
			expect(RESERVED_WORDS).to.have.length(27);
			expect(RESERVED_WORDS.indexOf('ON DUPLICATE KEY UPDATE')).to.be.lessThan(RESERVED_WORDS.indexOf('ON'));
			expect(RESERVED_WORDS.indexOf('LEFT JOIN')).to.be.lessThan(RESERVED_WORDS.indexOf('JOIN'));
		});

		it('should expose a word-only catalogue', () => {
			expect(RESERVED_WORDS_ONLY).to.have.length(18);
			expect(RESERVED_WORDS_ONLY[0]).to.equal('SELECT');
			expect(RESERVED_WORDS_ONLY).to.not.include(',');
		});

		it('should freeze both catalogues', () => {
			expect(Object.isFrozen(RESERVED_WORDS)).to.equal(true);
			expect(Object.isFrozen(RESERVED_WORDS_ONLY)).to.equal(true);
		});
	});

	describe('Quoted strings', () => {
		it('should return the inner text and count both quotes', () => {
			expect(scanToken("'hello world' x", 0)).to.deep.equal({ type: TokenType.STRING, value: 'hello world', offset: 0, length: 13 });
		});

		it('should read an empty literal', () => {
			expect(scanToken("''", 0)).to.deep.equal({ type: TokenType.STRING, value: '', offset: 0, length: 2 });
		});

		it('should yield a zero-length token for an unterminated literal', () => {
			expect(scanToken("'oops", 0)).to.deep.equal({ type: TokenType.STRING, value: '', offset: 0, length: 0 });
		});
	});

	describe('Identifiers', () => {
		it('should read qualified names and wildcards', () => {
			expect(scanToken('db.table_1 WHERE', 0)).to.deep.equal({ type: TokenType.IDENTIFIER, value: 'db.table_1', offset: 0, length: 10 });
			expect(scanToken('t.* FROM', 0).value).to.equal('t.*');
			expect(scanToken('-12.5)', 0).value).to.equal('-12.5');
		});

		it('should stop at punctuation', () => {
			expect(scanToken('a,b', 0)).to.include({ value: 'a', length: 1 });
		});

		it('should yield a zero-length identifier for an unknown character', () => {
			expect(scanToken(';', 0)).to.deep.equal({ type: TokenType.IDENTIFIER, value: '', offset: 0, length: 0 });
		});
	});

	it('should report end of input', () => {
		expect(scanToken('x', 1)).to.deep.equal({ type: TokenType.EOF, value: '', offset: 1, length: 0 });
	});

	it('should skip plain spaces only', () => {
		expect(skipSpaces('a   b', 1)).to.equal(4);
		expect(skipSpaces('ab', 1)).to.equal(1);
		expect(skipSpaces('a  ', 1)).to.equal(3);
	});

	describe('Classification helpers', () => {
		it('isReservedWord should only consider words', () => {
			expect(isReservedWord('order by')).to.equal(true);
			expect(isReservedWord('Select')).to.equal(true);
			expect(isReservedWord('(')).to.equal(false);
			expect(isReservedWord('name')).to.equal(false);
		});

		it('isIdentifier should accept plain and qualified names', () => {
			expect(isIdentifier('name')).to.equal(true);
			expect(isIdentifier('db.table')).to.equal(true);
			expect(isIdentifier('my-field')).to.equal(true);
			expect(isIdentifier('_private')).to.equal(true);
		});

		it('isIdentifier should reject keywords, numbers and deeper paths', () => {
			expect(isIdentifier('SELECT')).to.equal(false);
			expect(isIdentifier('where')).to.equal(false);
			expect(isIdentifier('123')).to.equal(false);
			expect(isIdentifier('a.b.c')).to.equal(false);
			expect(isIdentifier('*')).to.equal(false);
			expect(isIdentifier('')).to.equal(false);
		});

		it('isIdentifierOrWildcard should accept * and table.*', () => {
			expect(isIdentifierOrWildcard('*')).to.equal(true);
			expect(isIdentifierOrWildcard('t.*')).to.equal(true);
			expect(isIdentifierOrWildcard('col')).to.equal(true);
			expect(isIdentifierOrWildcard('*.*')).to.equal(false);
		});
	});
});
