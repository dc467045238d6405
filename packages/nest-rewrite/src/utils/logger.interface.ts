/**
 * Sink for rule-loading and per-request rewrite events. Pass one as `logger` to
 * `RewriteModule.forRoot` to route them into the host's logging; otherwise a
 * console `RewriteLogger` is used.
 */
export interface LoggerPort {
  /** Rewrites applied to a request. */
  debug(message: string, meta?: Record<string, unknown>): void;
  /** Rules loaded, redirects and forbidden requests. */
  info(message: string, meta?: Record<string, unknown>): void;
  /** Request URIs the engine refused to evaluate. */
  warn(message: string, meta?: Record<string, unknown>): void;
  /** Rule files that cannot be read or parsed. */
  error(message: string, meta?: Record<string, unknown>): void;
}
