/** Response surface shared by Express, Fastify's raw reply and `http.ServerResponse`. */
export interface ResponseLike {
  statusCode?: number;
  setHeader?: (name: string, value: string) => unknown;
  header?: (name: string, value: string) => unknown;
  set?: (name: string, value: string) => unknown;
  status?: (code: number) => unknown;
  writeHead?: (code: number, headers?: Record<string, string>) => unknown;
  end?: (chunk?: string) => unknown;
}

/** Applies response headers across common response adapters (`setHeader`, `header`, `set`). */
export function applyHeaders(res: ResponseLike, headers: Record<string, string>): void {
  for (const [key, value] of Object.entries(headers)) {
    if (typeof res.setHeader === 'function') {
      res.setHeader(key, value);
      continue;
    }

    if (typeof res.header === 'function') {
      res.header(key, value);
      continue;
    }

    if (typeof res.set === 'function') {
      res.set(key, value);
    }
  }
}
