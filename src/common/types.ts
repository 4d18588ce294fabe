/**
 * Status codes attached to every error raised by the parser.
 * Numbering follows SQLite's result codes.
 */
export enum StatusCode {
	ERROR = 1,
	INTERNAL = 2,
	CONSTRAINT = 19,
	MISUSE = 21,
	SYNTAX = 29,
	UNSUPPORTED = 30,
}
