import 'reflect-metadata';

export { RewriteEngine } from './engine/rewrite.engine';
export type { RewriteEngineOptions, RewriteResult } from './engine/rewrite.engine';
export { parseRules } from './engine/rule.parser';
export type { Rule } from './engine/rule.parser';
export { compilePattern } from './engine/pattern';
export type { Captures, CompiledPattern } from './engine/pattern';
export { NO_SUBSTITUTION, NO_SUBSTITUTION_TOKEN, expandReplacement, parseReplacement } from './engine/template';
export type { NoSubstitution, Replacement, ReplacementTemplate, TemplateSegment } from './engine/template';
export { DEFAULT_REDIRECT_STATUS, describeFlags, parseFlagList } from './engine/flags';
export type { FlagError, FlagSet } from './engine/flags';
export { DEFAULT_MAX_INPUT_LENGTH, checkInput } from './engine/input';
export { RewriteInputError, RuleParseError, fail, ok } from './engine/errors';
export type { InvalidInputReason, Result, RuleParseErrorKind } from './engine/errors';

export { RewriteModule } from './module/rewrite.module';
export { REWRITE_OPTIONS } from './module/rewrite.tokens';
export { RewriteRuntime } from './module/runtime';
export type { RuntimeDecision } from './module/runtime';
export { clearRewriteRuntime, getRewriteRuntime, setRewriteRuntime } from './module/runtime.registry';
export { resolveRewriteOptions } from './module/options';
export type {
  InvalidInputMode,
  MatchTarget,
  RewriteModuleOptions,
  RewriteResolvedOptions,
  RewriteRulesOptions,
} from './module/options';

export { createRewriteMiddleware } from './http/rewrite.middleware';
export type { NextFunction } from './http/rewrite.middleware';
export type { ResponseLike } from './http/headers';
export type { RequestLike } from './http/request';

export { RewriteLogger } from './utils/logger';
export type { LogLevel } from './utils/logger';
export type { LoggerPort } from './utils/logger.interface';
