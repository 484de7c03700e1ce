/**
 * Cotação Agro - Middleware exports
 */

export { createAuthMiddleware, type AuthMiddleware } from './auth';
export { createApiLimiter, createReportLimiter, createAdminLimiter } from './rate-limit';
