import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { ResponseLike } from '../src/http/headers';
import { createRewriteMiddleware } from '../src/http/rewrite.middleware';
import type { RequestLike } from '../src/http/request';
import { RewriteRuntime } from '../src/module/runtime';
import { clearRewriteRuntime, setRewriteRuntime } from '../src/module/runtime.registry';

const RULES = `
Rewrite ^/old/(.*)$  /new/$1  [R=301]
Rewrite ^/secret     -        [F]
Rewrite ^/app/(.*)$  /index/$1
`;

function rawResponse() {
  return {
    setHeader: vi.fn<(name: string, value: string) => void>(),
    writeHead: vi.fn<(code: number) => void>(),
    end: vi.fn<(chunk?: string) => void>(),
  };
}

function expressResponse() {
  const json = vi.fn<(body: unknown) => void>();
  const res = {
    setHeader: vi.fn<(name: string, value: string) => void>(),
    status: vi.fn<(code: number) => { json: typeof json }>(() => ({ json })),
    end: vi.fn<(chunk?: string) => void>(),
  };
  return { res, json };
}

describe('createRewriteMiddleware', () => {
  const runtime = new RewriteRuntime({ rules: RULES, logging: false });

  beforeEach(() => {
    clearRewriteRuntime();
  });

  it('rewrites the request and continues', () => {
    const middleware = createRewriteMiddleware(runtime);
    const req: RequestLike = { url: '/app/settings' };
    const next = vi.fn();

    middleware(req, rawResponse(), next);

    expect(req.url).toBe('/index/settings');
    expect(next).toHaveBeenCalledWith();
  });

  it('continues untouched when nothing matches', () => {
    const middleware = createRewriteMiddleware(runtime);
    const res = rawResponse();
    const next = vi.fn();

    middleware({ url: '/home' }, res, next);

    expect(next).toHaveBeenCalledTimes(1);
    expect(res.writeHead).not.toHaveBeenCalled();
  });

  it('answers redirects with Location and the status', () => {
    const middleware = createRewriteMiddleware(runtime);
    const res = rawResponse();
    const next = vi.fn();

    middleware({ url: '/old/page?x=1' }, res, next);

    expect(res.setHeader).toHaveBeenCalledWith('location', '/new/page?x=1');
    expect(res.writeHead).toHaveBeenCalledWith(301);
    expect(res.end).toHaveBeenCalledTimes(1);
    expect(next).not.toHaveBeenCalled();
  });

  it('sets statusCode when the response has no writeHead', () => {
    const middleware = createRewriteMiddleware(runtime);
    const res: ResponseLike & { setHeader: (name: string, value: string) => void } = { setHeader: vi.fn() };

    middleware({ url: '/old/a' }, res, vi.fn());

    expect(res.statusCode).toBe(301);
  });

  it('answers forbidden requests with a JSON body through res.status().json()', () => {
    const middleware = createRewriteMiddleware(runtime);
    const { res, json } = expressResponse();
    const next = vi.fn();

    middleware({ url: '/secret/keys' }, res, next);

    expect(res.status).toHaveBeenCalledWith(403);
    expect(json).toHaveBeenCalledWith({ statusCode: 403, message: 'Forbidden' });
    expect(next).not.toHaveBeenCalled();
  });

  it('writes the JSON body directly on raw responses', () => {
    const middleware = createRewriteMiddleware(runtime);
    const res = rawResponse();

    middleware({ url: '' }, res, vi.fn());

    expect(res.setHeader).toHaveBeenCalledWith('content-type', 'application/json');
    expect(res.writeHead).toHaveBeenCalledWith(400);
    expect(res.end).toHaveBeenCalledWith('{"statusCode":400,"message":"URI is empty"}');
  });

  it('uses the registered runtime when none is passed', () => {
    setRewriteRuntime(runtime);
    const middleware = createRewriteMiddleware();
    const req: RequestLike = { url: '/app/x' };
    const next = vi.fn();

    middleware(req, rawResponse(), next);

    expect(req.url).toBe('/index/x');
    expect(next).toHaveBeenCalledWith();
  });

  it('passes everything through while no runtime is registered', () => {
    const middleware = createRewriteMiddleware();
    const req: RequestLike = { url: '/secret' };
    const next = vi.fn();

    middleware(req, rawResponse(), next);

    expect(next).toHaveBeenCalledWith();
    expect(req.url).toBe('/secret');
  });

  it('forwards unexpected errors to next', () => {
    const failure = new Error('logger down');
    const throwing = new RewriteRuntime({
      rules: RULES,
      logger: {
        debug: () => {
          throw failure;
        },
        info: () => undefined,
        warn: () => undefined,
        error: () => undefined,
      },
    });
    const next = vi.fn();

    createRewriteMiddleware(throwing)({ url: '/app/x' }, rawResponse(), next);

    expect(next).toHaveBeenCalledWith(failure);
  });
});
