import { DEFAULT_MAX_INPUT_LENGTH } from '../engine/input';
import type { LogLevel } from '../utils/logger';
import type { LoggerPort } from '../utils/logger.interface';

/** Part of the request URL the rules are matched against. */
export type MatchTarget = 'path' | 'url';
/** Middleware behaviour for URIs the engine refuses to evaluate. */
export type InvalidInputMode = 'pass' | 'reject';

/** Rule sources (file path and/or inline text). */
export interface RewriteRulesOptions {
  /** Rule file, resolved against `process.cwd()`. Its rules come first. */
  loadFrom?: string;
  /** Inline rule text appended after the file's rules. */
  text?: string;
}

/** Top-level Nest rewrite module configuration. */
export interface RewriteModuleOptions {
  rules?: string | RewriteRulesOptions;
  /**
   * `path` (default) matches the path only and carries the original query string over;
   * `url` matches path and query together.
   */
  matchTarget?: MatchTarget;
  /** `reject` (default) answers 400, `pass` lets the request through untouched. */
  invalidInput?: InvalidInputMode;
  maxUriLength?: number;
  forbiddenMessage?: string;
  logging?: boolean;
  /** Threshold for the built-in console logger. Ignored when `logger` is given. */
  logLevel?: LogLevel;
  logger?: LoggerPort;
}

/** Fully normalized runtime options resolved from `RewriteModuleOptions`. */
export interface RewriteResolvedOptions {
  rules: RewriteRulesOptions;
  matchTarget: MatchTarget;
  invalidInput: InvalidInputMode;
  maxUriLength: number;
  forbiddenMessage: string;
  logging: boolean;
  logLevel: LogLevel;
  logger?: LoggerPort;
}

const MATCH_TARGETS: readonly MatchTarget[] = ['path', 'url'];
const INVALID_INPUT_MODES: readonly InvalidInputMode[] = ['pass', 'reject'];

/** Validates and normalizes user config into runtime-ready options. */
export function resolveRewriteOptions(input: RewriteModuleOptions = {}): RewriteResolvedOptions {
  const matchTarget = input.matchTarget ?? 'path';
  if (!MATCH_TARGETS.includes(matchTarget)) {
    throw new Error(`[nest-rewrite] matchTarget must be one of ${MATCH_TARGETS.join(', ')}`);
  }

  const invalidInput = input.invalidInput ?? 'reject';
  if (!INVALID_INPUT_MODES.includes(invalidInput)) {
    throw new Error(`[nest-rewrite] invalidInput must be one of ${INVALID_INPUT_MODES.join(', ')}`);
  }

  const maxUriLength = input.maxUriLength ?? DEFAULT_MAX_INPUT_LENGTH;
  if (!Number.isInteger(maxUriLength) || maxUriLength <= 0) {
    throw new Error('[nest-rewrite] maxUriLength must be a positive integer');
  }

  return {
    rules: normalizeRules(input.rules),
    matchTarget,
    invalidInput,
    maxUriLength,
    forbiddenMessage: input.forbiddenMessage?.trim() || 'Forbidden',
    logging: input.logging ?? true,
    logLevel: input.logLevel ?? 'info',
    logger: input.logger,
  };
}

function normalizeRules(rules: string | RewriteRulesOptions | undefined): RewriteRulesOptions {
  if (rules === undefined) {
    return {};
  }
  if (typeof rules === 'string') {
    return { text: rules };
  }

  const loadFrom = rules.loadFrom?.trim();
  return {
    loadFrom: loadFrom || undefined,
    text: rules.text,
  };
}
