/**
 * Cotação Agro - Sistema de Cotação de Produto Agrícola
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * Logger centralizado com Winston
 * 
 * - Logs estruturados em JSON em produção
 * - Logs coloridos e legíveis em desenvolvimento
 * - Níveis error, warn, info, debug (LOG_LEVEL)
 */

import winston from 'winston';

const { combine, timestamp, printf, colorize, json } = winston.format;

type LogMeta = Record<string, unknown>;

const isProduction = process.env.NODE_ENV === 'production';

// Formato legível para desenvolvimento
const devFormat = printf(({ level, message, timestamp, ...metadata }) => {
  let msg = `${timestamp} [${level}]: ${message}`;
  
  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }
  
  return msg;
});

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : 'debug'),
  format: combine(
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    isProduction ? json() : combine(colorize(), devFormat)
  ),
  defaultMeta: { service: 'cotacao-agro-api' },
  transports: [
    new winston.transports.Console(),
  ],
});

export const log = {
  info: (message: string, meta?: LogMeta) => {
    logger.info(message, meta);
  },

  warn: (message: string, meta?: LogMeta) => {
    logger.warn(message, meta);
  },

  /**
   * Erros; aceita um Error ou qualquer valor lançado
   */
  error: (message: string, error?: unknown, meta?: LogMeta) => {
    const errorMeta = error instanceof Error 
      ? { error: error.message, stack: error.stack, ...meta }
      : { error: String(error), ...meta };
    logger.error(message, errorMeta);
  },

  /**
   * Só aparece com LOG_LEVEL=debug
   */
  debug: (message: string, meta?: LogMeta) => {
    logger.debug(message, meta);
  },

  startup: (message: string) => {
    logger.info(`🚀 ${message}`);
  },

  request: (method: string, path: string, meta?: LogMeta) => {
    logger.info(`📥 ${method} ${path}`, { type: 'request', ...meta });
  },

  response: (method: string, path: string, statusCode: number, durationMs: number) => {
    const level = statusCode >= 500 ? 'error' : statusCode >= 400 ? 'warn' : 'info';
    logger[level](`📤 ${method} ${path} ${statusCode}`, { 
      type: 'response', 
      statusCode, 
      durationMs 
    });
  },

  /**
   * Geração de relatórios de cotação
   */
  report: (message: string, meta?: LogMeta) => {
    logger.info(`📊 ${message}`, { type: 'report', ...meta });
  },

  db: (message: string, meta?: LogMeta) => {
    logger.debug(`🗄️ ${message}`, { type: 'database', ...meta });
  },

  security: (message: string, meta?: LogMeta) => {
    logger.warn(`🔐 ${message}`, { type: 'security', ...meta });
  },
};

export { logger };

export default log;
