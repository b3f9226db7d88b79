/**
 * Middleware Exports
 */

export * from './request-context.js';
export * from './error-handler.js';
