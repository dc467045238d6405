import 'reflect-metadata';
import { DynamicModule, Global, Inject, Module, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { REWRITE_OPTIONS } from './rewrite.tokens';
import type { RewriteModuleOptions } from './options';
import { clearRewriteRuntime, setRewriteRuntime } from './runtime.registry';
import { RewriteRuntime } from './runtime';

@Global()
@Module({})
/** Global Nest module that builds the rewrite engine once and shares it through `RewriteRuntime`. */
export class RewriteModule implements OnModuleInit, OnModuleDestroy {
  constructor(@Inject(RewriteRuntime) private readonly runtime: RewriteRuntime) {}

  /** Creates a globally-available rewrite module. Invalid rules make application bootstrap fail. */
  static forRoot(options: RewriteModuleOptions = {}): DynamicModule {
    return {
      module: RewriteModule,
      providers: [
        {
          provide: REWRITE_OPTIONS,
          useValue: options,
        },
        {
          provide: RewriteRuntime,
          useFactory: (input: RewriteModuleOptions) => new RewriteRuntime(input),
          inject: [REWRITE_OPTIONS],
        },
      ],
      exports: [RewriteRuntime],
      global: true,
    };
  }

  /** Exposes the runtime through the registry for `createRewriteMiddleware()`. */
  onModuleInit(): void {
    setRewriteRuntime(this.runtime);
  }

  onModuleDestroy(): void {
    clearRewriteRuntime();
  }
}
