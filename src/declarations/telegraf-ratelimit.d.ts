declare module 'telegraf-ratelimit' {
  import type { Context, MiddlewareFn } from 'telegraf';

  interface RateLimitConfig {
    window?: number;
    limit?: number;
    keyGenerator?: (ctx: Context) => string | number | undefined;
    onLimitExceeded?: (ctx: Context, next: () => Promise<void>) => unknown;
  }

  function rateLimit(config?: RateLimitConfig): MiddlewareFn<Context>;
  export = rateLimit;
}
