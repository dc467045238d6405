import type { RewriteRuntime } from './runtime';

let runtime: RewriteRuntime | null = null;

/**
 * Publishes the runtime built by `RewriteModule`. `createRewriteMiddleware()` is usually
 * mounted with `app.use` before the container hands anything out, so it looks the
 * runtime up here on each request.
 */
export function setRewriteRuntime(next: RewriteRuntime): void {
  runtime = next;
}

/** The runtime whose rules the default middleware applies, or `null` before bootstrap. */
export function getRewriteRuntime(): RewriteRuntime | null {
  return runtime;
}

/** Called on module destroy; the middleware then passes requests through untouched. */
export function clearRewriteRuntime(): void {
  runtime = null;
}
