import type { Store } from './Store';

/**
 * Data de calendário no formato ISO (YYYY-MM-DD), sem hora
 */
export type CalendarDate = string;

/**
 * "Esta loja vendeu este produto, numa embalagem deste tamanho, por este preço, nesta data."
 */
export interface Quote {
  id: number;
  productId: number;
  storeId: number;
  price: number;            // R$ por embalagem
  packagingSize: number;
  packagingUnit: string;    // apenas informativo
  conversionFactor: number; // multiplicador manual, padrão 1.0
  date: CalendarDate;
}

/**
 * Cotação com a loja resolvida
 */
export interface QuoteWithStore extends Quote {
  store: Store;
}

export type QuoteInput = Omit<Quote, 'id'>;

export interface QuoteFilter {
  productId?: number;
  date?: CalendarDate;
}
