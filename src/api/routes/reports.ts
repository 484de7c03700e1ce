/**
 * Cotação Agro - Report Routes
 * Winner report and full ranked report for a date
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import type { ReportSource } from '../../data/repository';
import type { ReportMode } from '../../engine/report';
import { buildReport } from '../../engine/report';
import type { UnitPolicy } from '../../engine/units';
import log from '../../utils/logger';
import type { AuthMiddleware } from '../middleware';
import { sendError } from '../errors';
import { ReportQuerySchema, validateQuery, type ReportQuery } from '../validation';

export interface ReportRouteOptions {
  source: ReportSource;
  unitPolicy: UnitPolicy;
  auth: AuthMiddleware;
}

export function createReportRouter({ source, unitPolicy, auth }: ReportRouteOptions): Router {
  const router = Router();

  const handle = (mode: ReportMode) => async (req: Request, res: Response) => {
    const { date }: ReportQuery = res.locals.query;
    log.request('GET', req.originalUrl, { mode, date });
    const started = Date.now();

    try {
      const report = await buildReport(source, date, mode, { unitPolicy });
      // sem prescrições não há relatório; o texto ainda descreve a falha
      const status = report.prescriptionsLoaded ? 200 : 503;
      res.status(status).json({
        success: report.prescriptionsLoaded,
        mode,
        date,
        unitPolicy: unitPolicy.name,
        sections: report.sections,
        report: report.text,
      });
      log.response('GET', req.originalUrl, status, Date.now() - started);
    } catch (error) {
      sendError(res, error, 'Erro ao gerar relatório');
    }
  };

  /**
   * GET /api/reports/winners?date=YYYY-MM-DD
   * Lowest-cost store per prescription
   */
  router.get('/winners', auth.requireApiKey, validateQuery(ReportQuerySchema), handle('winner'));

  /**
   * GET /api/reports/full?date=YYYY-MM-DD
   * Every quote ranked, winner first
   */
  router.get('/full', auth.requireApiKey, validateQuery(ReportQuerySchema), handle('full'));

  return router;
}
