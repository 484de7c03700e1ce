/**
 * Cotação Agro - Sistema de Cotação de Produto Agrícola
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

import type { PostgrestError, SupabaseClient } from '@supabase/supabase-js';
import { createClient } from '@supabase/supabase-js';
import type { SupabaseSettings } from '../config';
import type { CatalogRepository, EntityStore } from '../data/repository';
import { RepositoryError } from '../data/repository';
import type { Product, ProductInput } from '../models/Product';
import type { Store, StoreInput } from '../models/Store';
import type { CalendarDate, QuoteFilter, QuoteInput, QuoteWithStore } from '../models/Quote';
import type { PrescriptionInput, PrescriptionWithProduct } from '../models/Prescription';
import log from '../utils/logger';

// Tabelas no Supabase (DDL em supabase/schema.sql)
export const PRODUCTS_TABLE = 'products';
export const STORES_TABLE = 'stores';
export const QUOTES_TABLE = 'quotes';
export const PRESCRIPTIONS_TABLE = 'prescriptions';

const QUOTE_SELECT = '*, store:stores(*)';
const PRESCRIPTION_SELECT = '*, product:products(*)';

// PostgREST pode devolver colunas numeric como string
type DBNumber = number | string;

export interface DBProduct {
  id: number;
  name: string;
  standard_unit: string;
  created_at?: string;
}

export interface DBStore {
  id: number;
  name: string;
  address: string;
  phone: string | null;
  created_at?: string;
}

export interface DBQuote {
  id: number;
  product_id: number;
  store_id: number;
  price: DBNumber;
  packaging_size: DBNumber;
  packaging_unit: string;
  conversion_factor: DBNumber;
  date: string;
  store?: DBStore | null;
  created_at?: string;
}

export interface DBPrescription {
  id: number;
  product_id: number;
  required_quantity: DBNumber;
  required_unit: string;
  product?: DBProduct | null;
  created_at?: string;
}

function toNumber(value: DBNumber): number {
  return typeof value === 'number' ? value : parseFloat(value.replace(',', '.'));
}

// =============================================================================
// TRANSFORMAÇÕES DB <-> APP
// =============================================================================

export function dbProductToProduct(row: DBProduct): Product {
  return { id: row.id, name: row.name, standardUnit: row.standard_unit };
}

export function productToDBProduct(input: ProductInput): Omit<DBProduct, 'id'> {
  return { name: input.name, standard_unit: input.standardUnit };
}

export function dbStoreToStore(row: DBStore): Store {
  return { id: row.id, name: row.name, address: row.address, phone: row.phone ?? null };
}

export function storeToDBStore(input: StoreInput): Omit<DBStore, 'id'> {
  return { name: input.name, address: input.address, phone: input.phone };
}

export function dbQuoteToQuote(row: DBQuote): QuoteWithStore {
  if (!row.store) {
    throw new RepositoryError('reference', `Cotação ${row.id} sem loja ${row.store_id}`);
  }
  return {
    id: row.id,
    productId: row.product_id,
    storeId: row.store_id,
    price: toNumber(row.price),
    packagingSize: toNumber(row.packaging_size),
    packagingUnit: row.packaging_unit,
    conversionFactor: toNumber(row.conversion_factor),
    // colunas date chegam como YYYY-MM-DD; timestamps são cortados
    date: row.date.slice(0, 10),
    store: dbStoreToStore(row.store),
  };
}

export function quoteToDBQuote(input: QuoteInput): Omit<DBQuote, 'id'> {
  return {
    product_id: input.productId,
    store_id: input.storeId,
    price: input.price,
    packaging_size: input.packagingSize,
    packaging_unit: input.packagingUnit,
    conversion_factor: input.conversionFactor,
    date: input.date,
  };
}

export function dbPrescriptionToPrescription(row: DBPrescription): PrescriptionWithProduct {
  return {
    id: row.id,
    productId: row.product_id,
    requiredQuantity: toNumber(row.required_quantity),
    requiredUnit: row.required_unit,
    product: row.product ? dbProductToProduct(row.product) : null,
  };
}

export function prescriptionToDBPrescription(input: PrescriptionInput): Omit<DBPrescription, 'id'> {
  return {
    product_id: input.productId,
    required_quantity: input.requiredQuantity,
    required_unit: input.requiredUnit,
  };
}

/**
 * Mapeia erros do PostgREST/PostgreSQL para RepositoryError
 */
export function toRepositoryError(error: PostgrestError, context: string): RepositoryError {
  switch (error.code) {
    case '23505':
      return new RepositoryError('conflict', `${context}: registro duplicado (${error.details || error.message})`, error);
    case '23503':
      return new RepositoryError('reference', `${context}: referência inválida ou em uso (${error.details || error.message})`, error);
    default:
      return new RepositoryError('storage', `${context}: ${error.message}`, error);
  }
}

// =============================================================================
// CLIENTES
// =============================================================================

export interface SupabaseClients {
  /** Leitura (anon key, com RLS) */
  reader: SupabaseClient;
  /** Escrita (service role, ignora RLS); cai para o reader sem service key */
  writer: SupabaseClient;
}

export function createSupabaseClients(settings: SupabaseSettings): SupabaseClients {
  const reader = createClient(settings.url, settings.key);

  if (!settings.serviceKey) {
    log.warn('No SUPABASE_SERVICE_KEY found - admin writes may fail due to RLS');
    return { reader, writer: reader };
  }

  const writer = createClient(settings.url, settings.serviceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
  log.startup('Admin client configured with service role key');
  return { reader, writer };
}

// =============================================================================
// REPOSITÓRIO
// =============================================================================

interface TableMapping<TRow, TEntity, TInput> {
  table: string;
  label: string;
  select: string;
  orderBy: string;
  toEntity: (row: TRow) => TEntity;
  toRow: (input: TInput) => Partial<TRow>;
}

/**
 * CRUD genérico sobre uma tabela do Supabase
 */
class SupabaseTable<TRow, TEntity, TInput> implements EntityStore<TEntity, TInput> {
  constructor(
    protected readonly clients: SupabaseClients,
    protected readonly mapping: TableMapping<TRow, TEntity, TInput>,
  ) {}

  async list(): Promise<TEntity[]> {
    const { data, error } = await this.clients.reader
      .from(this.mapping.table)
      .select(this.mapping.select)
      .order(this.mapping.orderBy, { ascending: true })
      .returns<TRow[]>();

    if (error) throw toRepositoryError(error, `Falha ao listar ${this.mapping.label}`);

    const rows = data ?? [];
    log.db(`Buscou ${rows.length} registros de ${this.mapping.table}`);
    return rows.map(this.mapping.toEntity);
  }

  async get(id: number): Promise<TEntity | null> {
    const { data, error } = await this.clients.reader
      .from(this.mapping.table)
      .select(this.mapping.select)
      .eq('id', id)
      .maybeSingle<TRow>();

    if (error) throw toRepositoryError(error, `Falha ao buscar ${this.mapping.label} ${id}`);
    return data ? this.mapping.toEntity(data) : null;
  }

  async create(input: TInput): Promise<TEntity> {
    const { data, error } = await this.clients.writer
      .from(this.mapping.table)
      .insert([this.mapping.toRow(input)])
      .select(this.mapping.select)
      .single<TRow>();

    if (error) throw toRepositoryError(error, `Falha ao criar ${this.mapping.label}`);
    return this.mapping.toEntity(data);
  }

  async update(id: number, input: TInput): Promise<TEntity | null> {
    const { data, error } = await this.clients.writer
      .from(this.mapping.table)
      .update(this.mapping.toRow(input))
      .eq('id', id)
      .select(this.mapping.select)
      .maybeSingle<TRow>();

    if (error) throw toRepositoryError(error, `Falha ao atualizar ${this.mapping.label} ${id}`);
    return data ? this.mapping.toEntity(data) : null;
  }

  async remove(id: number): Promise<boolean> {
    const { data, error } = await this.clients.writer
      .from(this.mapping.table)
      .delete()
      .eq('id', id)
      .select('id')
      .returns<Array<{ id: number }>>();

    if (error) throw toRepositoryError(error, `Falha ao excluir ${this.mapping.label} ${id}`);
    return (data ?? []).length > 0;
  }
}

class SupabaseQuoteTable
  extends SupabaseTable<DBQuote, QuoteWithStore, QuoteInput>
  implements EntityStore<QuoteWithStore, QuoteInput, QuoteFilter>
{
  /**
   * Cotações com a loja resolvida, filtradas por produto e/ou data
   */
  async list(filter: QuoteFilter = {}): Promise<QuoteWithStore[]> {
    let query = this.clients.reader
      .from(QUOTES_TABLE)
      .select(QUOTE_SELECT);

    if (filter.productId !== undefined) {
      query = query.eq('product_id', filter.productId);
    }
    if (filter.date !== undefined) {
      query = query.eq('date', filter.date);
    }

    // Ordem estável por id: desempate dos relatórios segue a ordem de cadastro
    const { data, error } = await query
      .order('id', { ascending: true })
      .returns<DBQuote[]>();

    if (error) throw toRepositoryError(error, 'Falha ao buscar cotações');

    const rows = data ?? [];
    log.db(`Buscou ${rows.length} cotações`, { ...filter });
    return rows.map(dbQuoteToQuote);
  }
}

export class SupabaseCatalogRepository implements CatalogRepository {
  readonly kind = 'supabase';

  readonly products: EntityStore<Product, ProductInput>;
  readonly stores: EntityStore<Store, StoreInput>;
  readonly quotes: EntityStore<QuoteWithStore, QuoteInput, QuoteFilter>;
  readonly prescriptions: EntityStore<PrescriptionWithProduct, PrescriptionInput>;

  constructor(clients: SupabaseClients) {
    this.products = new SupabaseTable<DBProduct, Product, ProductInput>(clients, {
      table: PRODUCTS_TABLE,
      label: 'produto',
      select: '*',
      orderBy: 'name',
      toEntity: dbProductToProduct,
      toRow: productToDBProduct,
    });
    this.stores = new SupabaseTable<DBStore, Store, StoreInput>(clients, {
      table: STORES_TABLE,
      label: 'loja',
      select: '*',
      orderBy: 'name',
      toEntity: dbStoreToStore,
      toRow: storeToDBStore,
    });
    this.quotes = new SupabaseQuoteTable(clients, {
      table: QUOTES_TABLE,
      label: 'cotação',
      select: QUOTE_SELECT,
      orderBy: 'id',
      toEntity: dbQuoteToQuote,
      toRow: quoteToDBQuote,
    });
    this.prescriptions = new SupabaseTable<DBPrescription, PrescriptionWithProduct, PrescriptionInput>(clients, {
      table: PRESCRIPTIONS_TABLE,
      label: 'prescrição',
      select: PRESCRIPTION_SELECT,
      orderBy: 'id',
      toEntity: dbPrescriptionToPrescription,
      toRow: prescriptionToDBPrescription,
    });
  }

  findAllPrescriptions(): Promise<PrescriptionWithProduct[]> {
    return this.prescriptions.list();
  }

  findQuotes(productId: number, date: CalendarDate): Promise<QuoteWithStore[]> {
    return this.quotes.list({ productId, date });
  }
}
