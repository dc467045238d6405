/** DI token carrying the raw `RewriteModuleOptions` passed to `forRoot`. */
export const REWRITE_OPTIONS = Symbol.for('nest-rewrite:options');
