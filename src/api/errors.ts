/**
 * Cotação Agro - Error responses
 */

import type { Response } from 'express';
import { RepositoryError, getErrorMessage } from '../data/repository';
import log from '../utils/logger';

const STATUS_BY_KIND = {
  conflict: 409,
  reference: 409,
  not_found: 404,
  storage: 500,
} as const;

/**
 * Logs the error and answers { success: false, error, details }
 */
export function sendError(res: Response, error: unknown, message: string) {
  if (error instanceof RepositoryError) {
    const status = STATUS_BY_KIND[error.kind];
    if (status >= 500) {
      log.error(message, error);
    } else {
      log.warn(message, { kind: error.kind, details: error.message });
    }
    return res.status(status).json({
      success: false,
      error: message,
      code: error.kind.toUpperCase(),
      details: error.message,
    });
  }

  log.error(message, error);
  return res.status(500).json({
    success: false,
    error: message,
    details: getErrorMessage(error),
  });
}
