import type { Product, ProductInput } from '../models/Product';
import type { Store, StoreInput } from '../models/Store';
import type { CalendarDate, QuoteFilter, QuoteInput, QuoteWithStore } from '../models/Quote';
import type { PrescriptionInput, PrescriptionWithProduct } from '../models/Prescription';

/**
 * Consultas de leitura usadas pelo gerador de relatórios
 */
export interface ReportSource {
  findAllPrescriptions(): Promise<PrescriptionWithProduct[]>;
  findQuotes(productId: number, date: CalendarDate): Promise<QuoteWithStore[]>;
}

/**
 * CRUD de uma entidade. `update` e `remove` sinalizam id inexistente com null/false.
 */
export interface EntityStore<TEntity, TInput, TFilter = undefined> {
  list(filter?: TFilter): Promise<TEntity[]>;
  get(id: number): Promise<TEntity | null>;
  create(input: TInput): Promise<TEntity>;
  update(id: number, input: TInput): Promise<TEntity | null>;
  remove(id: number): Promise<boolean>;
}

export interface CatalogRepository extends ReportSource {
  readonly kind: 'supabase' | 'memory';
  products: EntityStore<Product, ProductInput>;
  stores: EntityStore<Store, StoreInput>;
  quotes: EntityStore<QuoteWithStore, QuoteInput, QuoteFilter>;
  prescriptions: EntityStore<PrescriptionWithProduct, PrescriptionInput>;
}

/**
 * conflict  - violação de unicidade (23505)
 * reference - referência inexistente ou registro ainda referenciado (23503)
 */
export type RepositoryErrorKind = 'conflict' | 'reference' | 'not_found' | 'storage';

export class RepositoryError extends Error {
  constructor(
    public readonly kind: RepositoryErrorKind,
    message: string,
    public readonly original?: unknown,
  ) {
    super(message);
    this.name = 'RepositoryError';
  }
}

/** Helper to extract error message from unknown error */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
