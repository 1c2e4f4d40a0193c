export { logger, createChildLogger } from './logger.js';
export { RateLimiter, RateLimiterRegistry } from './rate-limiter.js';
export { HttpClient, DEFAULT_USER_AGENT, type HttpClientOptions } from './http.js';
export { ScoutError, ConfigError, AdapterError, ExportError, errorMessage } from './errors.js';
