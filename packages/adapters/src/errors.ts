export { ConfigError, RateLimitError, TimeoutError } from '@promptctx/shared';
