/**
 * sql-subset-parser - parses single statements of a small SQL dialect
 * (SELECT, INSERT, UPDATE, DELETE) into a typed query AST.
 */

// Parsing entry points
export { parse, tryParse, parseMany, tryParseMany } from './parser/index.js';
export type { ParseResult, BatchResult } from './parser/index.js';
export { Parser } from './parser/parser.js';
export { normalizeSql } from './parser/normalize.js';
export { validateQuery } from './parser/validator.js';
export type { ParserState } from './parser/validator.js';

// Query AST
export { QueryType, Operator, createQuery } from './parser/ast.js';
export type { Query, Condition, Join, JoinCondition, JoinType, SortDirection } from './parser/ast.js';

// Scanner
export {
	TokenType,
	RESERVED_WORDS,
	RESERVED_WORDS_ONLY,
	scanToken,
	skipSpaces,
	isReservedWord,
	isIdentifier,
	isIdentifierOrWildcard,
} from './parser/lexer.js';
export type { Token } from './parser/lexer.js';

// Errors and status codes
export { StatusCode } from './common/types.js';
export {
	SqlParserError,
	ParseError,
	ValidationError,
	BatchError,
	MisuseError,
	formatErrorLocation,
} from './common/errors.js';
export type { Clause } from './common/errors.js';

// Logging
export { createLogger, enableLogging, disableLogging, isLoggingEnabled } from './common/logger.js';

// Utilities
export { queryToString } from './util/ast-stringify.js';
