/**
 * Cotação Agro - Health Check Route
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import type { CatalogRepository } from '../../data/repository';

export function createHealthRouter(repository: Pick<CatalogRepository, 'kind'>): Router {
  const router = Router();

  /**
   * GET /health
   */
  router.get('/', (req: Request, res: Response) => {
    res.json({
      success: true,
      status: 'OK',
      storage: repository.kind,
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
