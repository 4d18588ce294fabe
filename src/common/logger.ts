import debug from 'debug';

const BASE_NAMESPACE = 'sql-subset-parser';

/**
 * Returns a `debug` logger under `sql-subset-parser:<subNamespace>`.
 *
 * The parser logs under `parser`, its per-token trace under `parser:step`,
 * grammar failures under `parser:error`, batch results under `parser:api`
 * and structural checks under `validator`.
 */
export function createLogger(subNamespace: string): debug.Debugger {
	return debug(`${BASE_NAMESPACE}:${subNamespace}`);
}

/**
 * Turns logging on from code instead of through `DEBUG`.
 *
 * @param pattern `debug` namespace pattern; `'sql-subset-parser:*,-sql-subset-parser:parser:step'`
 *   logs everything except the per-token trace
 * @param logFn Receives each record in place of debug's stderr writer
 *
 * @example
 * enableLogging('sql-subset-parser:validator', (...args) => records.push(args));
 * parse('DELETE FROM t'); // records the failed WHERE check
 */
export function enableLogging(
	pattern: string = `${BASE_NAMESPACE}:*`,
	logFn?: (...args: unknown[]) => void
): void {
	if (logFn) {
		debug.log = logFn;
	}
	debug.enable(pattern);
}

export function disableLogging(): void {
	debug.disable();
}

/** `namespace` is relative to `sql-subset-parser:`, e.g. `'parser:error'`. */
export function isLoggingEnabled(namespace: string): boolean {
	return debug.enabled(`${BASE_NAMESPACE}:${namespace}`);
}
