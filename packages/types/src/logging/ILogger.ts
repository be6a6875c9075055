/**
 * Structured logging contract shared by the orchestrator and plugins.
 *
 * Plugins log through this surface without importing a logging library.
 * The backend implementation is a pino logger, and `child()` attaches scoping
 * such as `{ module }` or `{ pluginId }` to every entry.
 *
 * Call shape follows pino: an optional object of context first, then the message.
 *
 * @example
 * ```typescript
 * logger.warn({ pluginId, failures }, 'Health check failed');
 * ```
 */
export interface ILogger {
    fatal(...args: readonly unknown[]): void;
    error(...args: readonly unknown[]): void;
    warn(...args: readonly unknown[]): void;
    info(...args: readonly unknown[]): void;
    debug(...args: readonly unknown[]): void;
    trace(...args: readonly unknown[]): void;

    /**
     * Create a scoped child logger.
     *
     * @param bindings - Key-value pairs merged into every entry of the child
     */
    child(bindings: Record<string, unknown>): ILogger;
}
