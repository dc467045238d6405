/** Subset of Express/Fastify/raw Node request objects the middleware touches. */
export interface RequestLike {
  headers?: Record<string, string | string[] | undefined>;
  method?: string;
  url?: string;
  originalUrl?: string;
}

export interface SplitUrl {
  path: string;
  /** Query string including its leading `?`, or `''`. */
  query: string;
}

export function getHeader(req: RequestLike, name: string): string | undefined {
  const headers = req.headers ?? {};
  const key = Object.keys(headers).find((k) => k.toLowerCase() === name.toLowerCase());
  if (!key) {
    return undefined;
  }
  const value = headers[key];
  if (Array.isArray(value)) {
    return value[0];
  }
  return value;
}

export function extractMethod(req: RequestLike): string {
  return (req.method ?? 'GET').toUpperCase();
}

/** `req.url` is what routers dispatch on, so it wins over `originalUrl`. */
export function extractUrl(req: RequestLike): string {
  return req.url ?? req.originalUrl ?? '/';
}

export function splitQuery(url: string): SplitUrl {
  const index = url.indexOf('?');
  if (index === -1) {
    return { path: url, query: '' };
  }
  return { path: url.slice(0, index), query: url.slice(index) };
}

/** Re-attaches the original query unless the rewritten target already carries one. */
export function appendQuery(target: string, query: string): string {
  if (!query || target.includes('?')) {
    return target;
  }
  return `${target}${query}`;
}
