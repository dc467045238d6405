import type { RewriteRuntime } from '../module/runtime';
import { getRewriteRuntime } from '../module/runtime.registry';
import { applyHeaders, type ResponseLike } from './headers';
import type { RequestLike } from './request';

export type NextFunction = (err?: unknown) => void;

/**
 * Creates HTTP middleware that rewrites, redirects or blocks requests before routing.
 * Mount it with `app.use(createRewriteMiddleware())` so it runs ahead of the router.
 * Without an explicit runtime it uses the one registered by `RewriteModule`, and passes
 * every request through while none is registered.
 */
export function createRewriteMiddleware(runtime?: RewriteRuntime) {
  return (req: RequestLike, res: ResponseLike, next: NextFunction): void => {
    const active = runtime ?? getRewriteRuntime();
    if (!active) {
      next();
      return;
    }

    try {
      const decision = active.handle(req);
      switch (decision.action) {
        case 'continue':
          next();
          return;
        case 'redirect':
          writeRedirect(res, decision.status, decision.location);
          return;
        case 'forbid':
        case 'reject':
          writeErrorResponse(res, decision.status, decision.message);
          return;
      }
    } catch (error) {
      next(error);
    }
  };
}

function writeRedirect(res: ResponseLike, status: number, location: string): void {
  applyHeaders(res, { location });
  writeStatus(res, status);
  res.end?.();
}

function writeErrorResponse(res: ResponseLike, status: number, message: string): void {
  const response = {
    statusCode: status,
    message,
  };

  if (typeof res.status === 'function') {
    const chain = res.status(status);
    if (hasJson(chain)) {
      chain.json(response);
      return;
    }
  }

  applyHeaders(res, { 'content-type': 'application/json' });
  writeStatus(res, status);
  res.end?.(JSON.stringify(response));
}

function writeStatus(res: ResponseLike, status: number): void {
  if (typeof res.writeHead === 'function') {
    res.writeHead(status);
    return;
  }
  res.statusCode = status;
}

function hasJson(value: unknown): value is { json: (body: unknown) => unknown } {
  return typeof value === 'object' && value !== null && 'json' in value && typeof value.json === 'function';
}
