/**
 * Dados de teste compartilhados
 */

import type { ReportSource } from '../../data/repository';
import type { Product } from '../../models/Product';
import type { Store } from '../../models/Store';
import type { QuoteWithStore } from '../../models/Quote';
import type { PrescriptionWithProduct } from '../../models/Prescription';

export const DATE = '2024-05-10';

export const soybean: Product = { id: 1, name: 'Soja', standardUnit: 'KG' };
export const corn: Product = { id: 2, name: 'Milho', standardUnit: 'KG' };

export const farm1: Store = { id: 1, name: 'Farm1', address: 'Rua A, 1', phone: null };
export const farm2: Store = { id: 2, name: 'Farm2', address: 'Rua B, 2', phone: '11 4000-0002' };
export const farm3: Store = { id: 3, name: 'Farm3', address: 'Rua C, 3', phone: null };

export function makeQuote(
  fields: Pick<QuoteWithStore, 'id' | 'price' | 'packagingSize'> & Partial<QuoteWithStore>
): QuoteWithStore {
  const store = fields.store ?? farm1;
  return {
    productId: soybean.id,
    storeId: store.id,
    packagingUnit: 'SC',
    conversionFactor: 1,
    date: DATE,
    ...fields,
    store,
  };
}

export function makePrescription(
  fields: Partial<PrescriptionWithProduct> = {}
): PrescriptionWithProduct {
  const product = fields.product === undefined ? soybean : fields.product;
  return {
    id: 1,
    productId: product?.id ?? 99,
    requiredQuantity: 100,
    requiredUnit: 'KG',
    ...fields,
    product,
  };
}

/** Exemplo: Farm1 vende 25 kg por R$ 50,00; Farm2 vende 50 kg por R$ 90,00 */
export const farm1Quote = makeQuote({ id: 1, price: 50, packagingSize: 25, store: farm1 });
export const farm2Quote = makeQuote({ id: 2, price: 90, packagingSize: 50, store: farm2 });

/**
 * ReportSource sobre arrays; findQuotes filtra por produto e data como a consulta real
 */
export function staticSource(
  prescriptions: PrescriptionWithProduct[],
  quotes: QuoteWithStore[]
): ReportSource {
  return {
    findAllPrescriptions: async () => prescriptions,
    findQuotes: async (productId, date) =>
      quotes.filter((q) => q.productId === productId && q.date === date),
  };
}
