import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { RewriteEngine } from '../engine/rewrite.engine';
import { appendQuery, extractMethod, extractUrl, getHeader, type RequestLike, splitQuery } from '../http/request';
import { RewriteLogger } from '../utils/logger';
import type { LoggerPort } from '../utils/logger.interface';
import { type RewriteModuleOptions, type RewriteResolvedOptions, resolveRewriteOptions } from './options';

/** Middleware-facing decision for one request. */
export type RuntimeDecision =
  | { action: 'continue'; url?: string }
  | { action: 'redirect'; status: number; location: string }
  | { action: 'forbid'; status: 403; message: string }
  | { action: 'reject'; status: 400; message: string };

/** Owns the engine built from configured rules and maps its results onto requests. */
export class RewriteRuntime {
  private readonly logger: LoggerPort;
  private readonly options: RewriteResolvedOptions;
  private readonly engine: RewriteEngine;

  /**
   * Resolves options, loads rule text and builds the engine.
   * Throws when the rules cannot be read or parsed, so application bootstrap fails.
   */
  constructor(input: RewriteModuleOptions = {}) {
    this.options = resolveRewriteOptions(input);
    this.logger = this.options.logger ?? new RewriteLogger('nest-rewrite', this.options.logLevel);
    this.engine = this.buildEngine();
  }

  /** Returns normalized runtime options (useful for diagnostics and tests). */
  getOptions(): RewriteResolvedOptions {
    return this.options;
  }

  getEngine(): RewriteEngine {
    return this.engine;
  }

  /**
   * Evaluates the request URL. A rewrite is written back to `req.url` so that routing
   * downstream sees the new target.
   */
  handle(req: RequestLike): RuntimeDecision {
    const url = extractUrl(req);
    const { path, query } = this.options.matchTarget === 'path' ? splitQuery(url) : { path: url, query: '' };

    const result = this.engine.rewrite(path);
    if (!result.ok) {
      this.log('warn', 'Invalid request URI', req, { url, reason: result.error.reason });
      if (this.options.invalidInput === 'pass') {
        return { action: 'continue' };
      }
      return { action: 'reject', status: 400, message: result.error.message };
    }

    const outcome = result.value;
    switch (outcome.kind) {
      case 'unchanged':
        return { action: 'continue' };
      case 'rewritten': {
        const next = appendQuery(outcome.uri, query);
        req.url = next;
        this.log('debug', 'Request rewritten', req, { from: url, to: next });
        return { action: 'continue', url: next };
      }
      case 'redirected': {
        const location = appendQuery(outcome.location, query);
        this.log('info', 'Request redirected', req, { from: url, location, status: outcome.status });
        return { action: 'redirect', status: outcome.status, location };
      }
      case 'forbidden':
        this.log('info', 'Request forbidden', req, { url });
        return { action: 'forbid', status: 403, message: this.options.forbiddenMessage };
    }
  }

  private buildEngine(): RewriteEngine {
    const text = this.loadRuleText();
    const built = RewriteEngine.fromRules(text, { maxInputLength: this.options.maxUriLength });
    if (!built.ok) {
      this.logger.error('Invalid rewrite rules', {
        kind: built.error.kind,
        line: built.error.line,
        text: built.error.text,
        error: built.error.message,
      });
      throw built.error;
    }

    const rules = built.value.getRules();
    if (this.options.logging) {
      this.logger.info('Rewrite rules loaded', {
        rules: rules.length,
        enabled: rules.filter((rule) => rule.enabled).length,
        source: this.options.rules.loadFrom ?? 'inline',
      });
    }
    return built.value;
  }

  private loadRuleText(): string {
    const { loadFrom, text } = this.options.rules;
    const parts: string[] = [];

    if (loadFrom) {
      parts.push(this.loadRulesFromFile(loadFrom));
    }
    if (text) {
      parts.push(text);
    }

    return parts.join('\n');
  }

  private loadRulesFromFile(pathLike: string): string {
    const resolved = resolve(process.cwd(), pathLike);
    try {
      return readFileSync(resolved, 'utf-8');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error('Failed to load rules file', { path: resolved, error: message });
      throw new Error(`[nest-rewrite] Failed to load rules file ${resolved}: ${message}`);
    }
  }

  private log(
    level: 'debug' | 'info' | 'warn',
    message: string,
    req: RequestLike,
    meta: Record<string, unknown>,
  ): void {
    if (!this.options.logging) {
      return;
    }

    const payload: Record<string, unknown> = { method: extractMethod(req), ...meta };
    const requestId = getHeader(req, 'x-request-id');
    if (requestId) {
      payload.requestId = requestId;
    }
    this.logger[level](message, payload);
  }
}
