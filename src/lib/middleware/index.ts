/**
 * Middleware Barrel Export
 */

export { authValidatorMiddleware, extractBearerToken, tokensMatch } from './auth-validator.js';
export { requestLoggerMiddleware } from './request-logger.js';
