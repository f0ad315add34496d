/**
 * Logger injected into each component.
 * @module logger
 */
import createDebug from 'debug';

/** printf-style log sink, compatible with a `debug` instance. */
export type Logger = (formatter: string, ...args: unknown[]) => void;

const NAMESPACE = 'samsung-iapp-remote';

/**
 * Namespaced `debug` logger; silent unless enabled via `DEBUG=samsung-iapp-remote:*`.
 */
export const createLogger = (component: string): Logger => createDebug(`${NAMESPACE}:${component}`);

export const noopLogger: Logger = () => undefined;
