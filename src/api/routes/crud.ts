/**
 * Cotação Agro - CRUD routes
 * List/read need an API key, writes need the admin password
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import type { z } from 'zod';
import type { EntityStore } from '../../data/repository';
import type { AuthMiddleware } from '../middleware';
import { sendError } from '../errors';
import { parseId, validateBody, validateQuery } from '../validation';

export interface CrudRouteOptions<TEntity, TInput, TFilter> {
  /** "produto", "loja", ... (mensagens) */
  label: string;
  /** JSON keys: { products: [...] } and { product: {...} } */
  plural: string;
  singular: string;
  store: EntityStore<TEntity, TInput, TFilter>;
  schema: z.ZodType<TInput, z.ZodTypeDef, unknown>;
  listQuery?: z.ZodType<TFilter, z.ZodTypeDef, unknown>;
  auth: AuthMiddleware;
}

export function createCrudRouter<TEntity, TInput, TFilter = undefined>(
  options: CrudRouteOptions<TEntity, TInput, TFilter>
): Router {
  const { label, plural, singular, store, schema, listQuery, auth } = options;
  const router = Router();

  function invalidId(res: Response, raw: string) {
    return res.status(400).json({
      success: false,
      error: `Id inválido: '${raw}'`,
    });
  }

  function notFound(res: Response, id: number) {
    return res.status(404).json({
      success: false,
      error: `${label} com id ${id} não encontrado(a)`,
    });
  }

  const listHandlers = listQuery ? [auth.requireApiKey, validateQuery(listQuery)] : [auth.requireApiKey];

  /**
   * GET /
   */
  router.get('/', ...listHandlers, async (req: Request, res: Response) => {
    try {
      const filter: TFilter | undefined = listQuery ? res.locals.query : undefined;
      const items = await store.list(filter);
      res.json({
        success: true,
        count: items.length,
        [plural]: items,
      });
    } catch (error) {
      sendError(res, error, `Falha ao listar ${plural}`);
    }
  });

  /**
   * GET /:id
   */
  router.get('/:id', auth.requireApiKey, async (req: Request, res: Response) => {
    const id = parseId(req.params.id);
    if (id === null) return invalidId(res, req.params.id);

    try {
      const item = await store.get(id);
      if (item === null) return notFound(res, id);
      res.json({ success: true, [singular]: item });
    } catch (error) {
      sendError(res, error, `Falha ao buscar ${label} ${id}`);
    }
  });

  /**
   * POST /
   */
  router.post('/', auth.requireAdminPassword, validateBody(schema), async (req: Request, res: Response) => {
    const input: TInput = req.body;

    try {
      const created = await store.create(input);
      res.status(201).json({ success: true, [singular]: created });
    } catch (error) {
      sendError(res, error, `Falha ao criar ${label}`);
    }
  });

  /**
   * PUT /:id
   */
  router.put('/:id', auth.requireAdminPassword, validateBody(schema), async (req: Request, res: Response) => {
    const id = parseId(req.params.id);
    if (id === null) return invalidId(res, req.params.id);

    const input: TInput = req.body;

    try {
      const updated = await store.update(id, input);
      if (updated === null) return notFound(res, id);
      res.json({ success: true, [singular]: updated });
    } catch (error) {
      sendError(res, error, `Falha ao atualizar ${label} ${id}`);
    }
  });

  /**
   * DELETE /:id
   * Products and stores still referenced are kept (409)
   */
  router.delete('/:id', auth.requireAdminPassword, async (req: Request, res: Response) => {
    const id = parseId(req.params.id);
    if (id === null) return invalidId(res, req.params.id);

    try {
      const removed = await store.remove(id);
      if (!removed) return notFound(res, id);
      res.json({ success: true, id });
    } catch (error) {
      sendError(res, error, `Falha ao excluir ${label} ${id}`);
    }
  });

  return router;
}
