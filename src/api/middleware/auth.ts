/**
 * Cotação Agro - Authentication Middleware
 * Admin password and API key verification
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { AppConfig } from '../../config';
import log from '../../utils/logger';

export interface AuthMiddleware {
  requireAdminPassword: RequestHandler;
  requireApiKey: RequestHandler;
}

export function createAuthMiddleware(config: Pick<AppConfig, 'adminPassword' | 'apiKeys'>): AuthMiddleware {
  const apiKeys = new Set(config.apiKeys);

  /**
   * Validates X-Admin-Password header
   */
  function requireAdminPassword(req: Request, res: Response, next: NextFunction) {
    const password = req.headers['x-admin-password'];

    if (!password) {
      return res.status(401).json({
        success: false,
        error: 'Senha de administrador ausente',
      });
    }

    if (password !== config.adminPassword) {
      log.security('Senha de administrador incorreta', { path: req.path, ip: req.ip });
      return res.status(403).json({
        success: false,
        error: 'Senha de administrador incorreta',
      });
    }

    next();
  }

  /**
   * Checks X-API-Key header against configured keys.
   * If no keys are configured, access is open (development).
   */
  function requireApiKey(req: Request, res: Response, next: NextFunction) {
    if (apiKeys.size === 0) {
      return next();
    }

    const apiKey = req.headers['x-api-key'];

    if (!apiKey) {
      return res.status(401).json({
        success: false,
        error: 'Chave de API ausente. Adicione o header: X-API-Key',
        code: 'MISSING_API_KEY'
      });
    }

    if (typeof apiKey !== 'string' || !apiKeys.has(apiKey)) {
      log.security('Chave de API inválida', { path: req.path, ip: req.ip });
      return res.status(403).json({
        success: false,
        error: 'Chave de API inválida',
        code: 'INVALID_API_KEY'
      });
    }

    next();
  }

  return { requireAdminPassword, requireApiKey };
}
