/**
 * Repositório em memória
 *
 * Mesmas regras da base Supabase: nomes únicos, referências obrigatórias e
 * exclusão restrita de produtos e lojas ainda referenciados. Usado em
 * desenvolvimento sem credenciais e nos testes.
 */

import type { Product, ProductInput } from '../models/Product';
import type { Store, StoreInput } from '../models/Store';
import type { CalendarDate, Quote, QuoteFilter, QuoteInput, QuoteWithStore } from '../models/Quote';
import type { Prescription, PrescriptionInput, PrescriptionWithProduct } from '../models/Prescription';
import type { CatalogRepository, EntityStore } from './repository';
import { RepositoryError } from './repository';

interface Identified {
  id: number;
}

interface CollectionRules<T extends Identified, TInput> {
  label: string;
  /** Campos únicos; valores null não conflitam */
  unique?: Array<keyof TInput & keyof T>;
  /** Lança RepositoryError('reference') se a entrada aponta para algo inexistente */
  checkReferences?: (input: TInput) => void;
  /** Lança RepositoryError('reference') se o registro ainda é referenciado */
  checkRemoval?: (id: number) => void;
}

/**
 * Coleção de registros brutos com id sequencial
 */
class MemoryCollection<T extends Identified, TInput> {
  private readonly rows = new Map<number, T>();
  private nextId = 1;

  constructor(
    private readonly rules: CollectionRules<T, TInput>,
    private readonly build: (id: number, input: TInput) => T,
  ) {}

  all(): T[] {
    return [...this.rows.values()];
  }

  find(id: number): T | null {
    return this.rows.get(id) ?? null;
  }

  insert(input: TInput): T {
    this.rules.checkReferences?.(input);
    this.checkUnique(input);
    const row = this.build(this.nextId++, input);
    this.rows.set(row.id, row);
    return row;
  }

  replace(id: number, input: TInput): T | null {
    if (!this.rows.has(id)) {
      return null;
    }
    this.rules.checkReferences?.(input);
    this.checkUnique(input, id);
    const row = this.build(id, input);
    this.rows.set(id, row);
    return row;
  }

  delete(id: number): boolean {
    if (!this.rows.has(id)) {
      return false;
    }
    this.rules.checkRemoval?.(id);
    return this.rows.delete(id);
  }

  private checkUnique(input: TInput, ignoreId?: number): void {
    for (const field of this.rules.unique ?? []) {
      const value = input[field];
      if (value === null || value === undefined) continue;

      const clash = this.all().some((row) => {
        const existing: unknown = row[field];
        return row.id !== ignoreId && existing === value;
      });
      if (clash) {
        throw new RepositoryError('conflict', `${this.rules.label}: ${String(field)} '${String(value)}' já existe`);
      }
    }
  }
}

export interface MemorySeed {
  products?: ProductInput[];
  stores?: StoreInput[];
  quotes?: QuoteInput[];
  prescriptions?: PrescriptionInput[];
}

export class InMemoryCatalogRepository implements CatalogRepository {
  readonly kind = 'memory';

  private readonly productRows: MemoryCollection<Product, ProductInput>;
  private readonly storeRows: MemoryCollection<Store, StoreInput>;
  private readonly quoteRows: MemoryCollection<Quote, QuoteInput>;
  private readonly prescriptionRows: MemoryCollection<Prescription, PrescriptionInput>;

  readonly products: EntityStore<Product, ProductInput>;
  readonly stores: EntityStore<Store, StoreInput>;
  readonly quotes: EntityStore<QuoteWithStore, QuoteInput, QuoteFilter>;
  readonly prescriptions: EntityStore<PrescriptionWithProduct, PrescriptionInput>;

  constructor(seed: MemorySeed = {}) {
    this.productRows = new MemoryCollection<Product, ProductInput>(
      {
        label: 'Produto',
        unique: ['name'],
        checkRemoval: (id) => {
          const inUse = this.quoteRows.all().some((q) => q.productId === id) ||
            this.prescriptionRows.all().some((p) => p.productId === id);
          if (inUse) {
            throw new RepositoryError('reference', `Produto ${id} possui cotações ou prescrições`);
          }
        },
      },
      (id, input) => ({ id, name: input.name, standardUnit: input.standardUnit })
    );

    this.storeRows = new MemoryCollection<Store, StoreInput>(
      {
        label: 'Loja',
        unique: ['name', 'address', 'phone'],
        checkRemoval: (id) => {
          if (this.quoteRows.all().some((q) => q.storeId === id)) {
            throw new RepositoryError('reference', `Loja ${id} possui cotações`);
          }
        },
      },
      (id, input) => ({ id, name: input.name, address: input.address, phone: input.phone })
    );

    this.quoteRows = new MemoryCollection<Quote, QuoteInput>(
      {
        label: 'Cotação',
        checkReferences: (input) => {
          this.requireProduct(input.productId);
          if (this.storeRows.find(input.storeId) === null) {
            throw new RepositoryError('reference', `Loja ${input.storeId} não existe`);
          }
        },
      },
      (id, input) => ({ id, ...input })
    );

    this.prescriptionRows = new MemoryCollection<Prescription, PrescriptionInput>(
      {
        label: 'Prescrição',
        checkReferences: (input) => this.requireProduct(input.productId),
      },
      (id, input) => ({ id, ...input })
    );

    this.products = this.view(this.productRows, (row) => ({ ...row }));
    this.stores = this.view(this.storeRows, (row) => ({ ...row }));
    this.quotes = this.view<Quote, QuoteInput, QuoteWithStore, QuoteFilter>(
      this.quoteRows,
      (row) => this.withStore(row),
      (rows, filter) => rows.filter((q) =>
        (filter.productId === undefined || q.productId === filter.productId) &&
        (filter.date === undefined || q.date === filter.date))
    );
    this.prescriptions = this.view(this.prescriptionRows, (row) => this.withProduct(row));

    seed.products?.forEach((p) => this.productRows.insert(p));
    seed.stores?.forEach((s) => this.storeRows.insert(s));
    seed.quotes?.forEach((q) => this.quoteRows.insert(q));
    seed.prescriptions?.forEach((p) => this.prescriptionRows.insert(p));
  }

  async findAllPrescriptions(): Promise<PrescriptionWithProduct[]> {
    return this.prescriptionRows.all().map((row) => this.withProduct(row));
  }

  async findQuotes(productId: number, date: CalendarDate): Promise<QuoteWithStore[]> {
    return this.quotes.list({ productId, date });
  }

  private requireProduct(productId: number): void {
    if (this.productRows.find(productId) === null) {
      throw new RepositoryError('reference', `Produto ${productId} não existe`);
    }
  }

  private withStore(row: Quote): QuoteWithStore {
    const store = this.storeRows.find(row.storeId);
    if (store === null) {
      throw new RepositoryError('reference', `Cotação ${row.id} aponta para loja inexistente ${row.storeId}`);
    }
    return { ...row, store: { ...store } };
  }

  private withProduct(row: Prescription): PrescriptionWithProduct {
    const product = this.productRows.find(row.productId);
    return { ...row, product: product === null ? null : { ...product } };
  }

  private view<T extends Identified, TInput, TView, TFilter = undefined>(
    rows: MemoryCollection<T, TInput>,
    resolve: (row: T) => TView,
    applyFilter?: (rows: T[], filter: TFilter) => T[],
  ): EntityStore<TView, TInput, TFilter> {
    return {
      list: async (filter) => {
        const all = rows.all();
        const filtered = filter !== undefined && applyFilter ? applyFilter(all, filter) : all;
        return filtered.map(resolve);
      },
      get: async (id) => {
        const row = rows.find(id);
        return row === null ? null : resolve(row);
      },
      create: async (input) => resolve(rows.insert(input)),
      update: async (id, input) => {
        const row = rows.replace(id, input);
        return row === null ? null : resolve(row);
      },
      remove: async (id) => rows.delete(id),
    };
  }
}
