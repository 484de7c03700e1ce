/**
 * Cotação Agro - Rate Limiting Middleware
 *
 * Created per app instance so every server (and every test app) has its own counters.
 */

import rateLimit from 'express-rate-limit';

/**
 * General API rate limiter (more permissive)
 */
export function createApiLimiter() {
  return rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutos
    max: 300,
    message: {
      success: false,
      error: 'Muitas requisições. Tente novamente em 15 minutos.',
      code: 'RATE_LIMIT_EXCEEDED'
    },
    standardHeaders: true,
    legacyHeaders: false,
  });
}

/**
 * Reports load every prescription and its quotes
 */
export function createReportLimiter() {
  return rateLimit({
    windowMs: 1 * 60 * 1000, // 1 minuto
    max: 20,
    message: {
      success: false,
      error: 'Muitos relatórios solicitados. Tente novamente em um minuto.',
      code: 'REPORT_RATE_LIMIT_EXCEEDED'
    },
    standardHeaders: true,
    legacyHeaders: false,
  });
}

/**
 * Write operations (prevent brute force on the admin password)
 */
export function createAdminLimiter() {
  return rateLimit({
    windowMs: 15 * 60 * 1000,
    max: 60,
    message: {
      success: false,
      error: 'Muitas requisições administrativas. Tente novamente mais tarde.',
      code: 'ADMIN_RATE_LIMIT_EXCEEDED'
    },
    standardHeaders: true,
    legacyHeaders: false,
    skip: (req) => req.method === 'GET',
  });
}
