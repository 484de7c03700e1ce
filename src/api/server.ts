/**
 * Cotação Agro - Sistema de Cotação de Produto Agrícola
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

import type { Express, NextFunction, Request, Response } from 'express';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import path from 'path';
import fs from 'fs';
import swaggerUi from 'swagger-ui-express';
import YAML from 'yaml';
import type { AppConfig } from '../config';
import type { CatalogRepository } from '../data/repository';
import { getUnitPolicy } from '../engine/units';
import log from '../utils/logger';

// Middleware
import {
  createAuthMiddleware,
  createApiLimiter,
  createReportLimiter,
  createAdminLimiter,
} from './middleware';

// Routes
import {
  createCatalogRouters,
  createHealthRouter,
  createReportRouter,
} from './routes';

export interface AppDependencies {
  config: AppConfig;
  repository: CatalogRepository;
  /** Default: openapi.yaml at the project root */
  openapiPath?: string;
}

export function createApp({ config, repository, openapiPath }: AppDependencies): Express {
  const app = express();
  const auth = createAuthMiddleware(config);

  // ===========================================================================
  // GLOBAL MIDDLEWARE
  // ===========================================================================

  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'self'", "'unsafe-eval'"], // unsafe-eval needed for Swagger UI
        scriptSrcAttr: ["'none'"],
        styleSrc: ["'self'", "'unsafe-inline'"], // Swagger UI inline styles
        imgSrc: ["'self'", "data:", "https:"],
        connectSrc: ["'self'"],
      },
    },
    crossOriginEmbedderPolicy: false,
  }));

  // CORS - lista de origens permitidas
  const allowedOrigins = config.corsAllowedOrigins;

  const corsOptions: cors.CorsOptions = {
    origin: (origin, callback) => {
      // Sem origin: same-origin, server-to-server, curl
      if (!origin) {
        return callback(null, true);
      }
      if (allowedOrigins.includes(origin) || allowedOrigins.includes('*')) {
        return callback(null, true);
      }
      // Fora de produção, qualquer localhost
      if (config.env !== 'production' && (origin.startsWith('http://localhost') || origin.startsWith('http://127.0.0.1'))) {
        return callback(null, true);
      }
      log.warn('CORS bloqueado para origin', { origin, allowedOrigins });
      return callback(new Error('Not allowed by CORS'));
    },
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Admin-Password', 'X-API-Key'],
  };

  app.use(cors(corsOptions));

  app.use(express.json());

  app.use('/api/', createApiLimiter());
  app.use('/api/reports', createReportLimiter());
  app.use('/api/', createAdminLimiter());

  // ===========================================================================
  // SWAGGER UI - API DOCUMENTATION
  // ===========================================================================

  const specPath = openapiPath ?? path.join(__dirname, '../../openapi.yaml');
  try {
    if (fs.existsSync(specPath)) {
      const swaggerDocument: unknown = YAML.parse(fs.readFileSync(specPath, 'utf8'));
      if (typeof swaggerDocument === 'object' && swaggerDocument !== null) {
        const swaggerOptions = {
          customCss: '.swagger-ui .topbar { display: none }',
          customSiteTitle: 'Cotação Agro API',
          swaggerOptions: {
            docExpansion: 'list'
          }
        };
        app.use('/api-docs', swaggerUi.serveFiles(swaggerDocument, swaggerOptions), swaggerUi.setup(swaggerDocument, swaggerOptions));
        log.debug('Swagger UI available at /api-docs');
      }
    }
  } catch (err) {
    log.warn('Could not load OpenAPI spec for Swagger UI', { error: String(err) });
  }

  // ===========================================================================
  // API ROUTES
  // ===========================================================================

  const catalog = createCatalogRouters(repository, auth);

  app.use('/health', createHealthRouter(repository));
  app.use('/api/reports', createReportRouter({
    source: repository,
    unitPolicy: getUnitPolicy(config.unitPolicy),
    auth,
  }));
  app.use('/api/products', catalog.products);
  app.use('/api/stores', catalog.stores);
  app.use('/api/quotes', catalog.quotes);
  app.use('/api/prescriptions', catalog.prescriptions);

  app.use('/api', (req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: `Rota não encontrada: ${req.method} ${req.originalUrl}`,
    });
  });

  // Malformed JSON bodies and CORS rejections end up here
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      return res.status(400).json({ success: false, error: 'JSON inválido' });
    }
    if (err.message === 'Not allowed by CORS') {
      return res.status(403).json({ success: false, error: 'Origem não permitida' });
    }
    log.error('Unhandled error', err, { path: req.path });
    return res.status(500).json({ success: false, error: 'Erro interno do servidor' });
  });

  return app;
}
