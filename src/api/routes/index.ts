/**
 * Cotação Agro - Routes Index
 */

import type { Router } from 'express';
import type { CatalogRepository } from '../../data/repository';
import type { AuthMiddleware } from '../middleware';
import {
  PrescriptionSchema,
  ProductSchema,
  QuoteListQuerySchema,
  QuoteSchema,
  StoreSchema,
} from '../validation';
import { createCrudRouter } from './crud';

export { createHealthRouter } from './health';
export { createReportRouter } from './reports';

export interface CatalogRouters {
  products: Router;
  stores: Router;
  quotes: Router;
  prescriptions: Router;
}

export function createCatalogRouters(repository: CatalogRepository, auth: AuthMiddleware): CatalogRouters {
  return {
    products: createCrudRouter({
      label: 'Produto',
      plural: 'products',
      singular: 'product',
      store: repository.products,
      schema: ProductSchema,
      auth,
    }),
    stores: createCrudRouter({
      label: 'Loja',
      plural: 'stores',
      singular: 'store',
      store: repository.stores,
      schema: StoreSchema,
      auth,
    }),
    quotes: createCrudRouter({
      label: 'Cotação',
      plural: 'quotes',
      singular: 'quote',
      store: repository.quotes,
      schema: QuoteSchema,
      listQuery: QuoteListQuerySchema,
      auth,
    }),
    prescriptions: createCrudRouter({
      label: 'Prescrição',
      plural: 'prescriptions',
      singular: 'prescription',
      store: repository.prescriptions,
      schema: PrescriptionSchema,
      auth,
    }),
  };
}
