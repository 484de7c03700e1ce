import type { Quote, QuoteWithStore } from '../models/Quote';

/**
 * Cotação cujo denominador (tamanho da embalagem × fator de conversão)
 * não permite calcular um custo por unidade padrão
 */
export class DegenerateQuoteError extends Error {
  constructor(
    public readonly quoteId: number,
    public readonly reason: string,
  ) {
    super(`Cotação #${quoteId}: ${reason}`);
    this.name = 'DegenerateQuoteError';
  }
}

export type CostInput = Pick<Quote, 'id' | 'price' | 'packagingSize' | 'conversionFactor'>;

export interface CostedQuote {
  quote: QuoteWithStore;
  unitCost: number;
  totalCost: number;
}

export interface RejectedQuote {
  quote: QuoteWithStore;
  reason: string;
}

export interface CostingResult {
  costed: CostedQuote[];   // mesma ordem da entrada
  rejected: RejectedQuote[];
}

/**
 * Custo por unidade padrão: preço / (tamanho da embalagem × fator de conversão)
 */
export function unitCost(quote: CostInput): number {
  const standardQuantity = quote.packagingSize * quote.conversionFactor;

  if (!Number.isFinite(standardQuantity) || standardQuantity <= 0) {
    throw new DegenerateQuoteError(
      quote.id,
      'tamanho da embalagem × fator de conversão deve ser maior que zero'
    );
  }

  const cost = quote.price / standardQuantity;
  if (!Number.isFinite(cost)) {
    throw new DegenerateQuoteError(quote.id, 'custo unitário não é um número finito');
  }

  return cost;
}

/**
 * Custo total para atender a quantidade requerida
 */
export function totalCost(quote: CostInput, requiredQuantity: number): number {
  return unitCost(quote) * requiredQuantity;
}

/**
 * Calcula o custo de todas as cotações candidatas.
 * Cotações degeneradas são separadas com o motivo em vez de interromper o cálculo.
 */
export function costQuotes(quotes: QuoteWithStore[], requiredQuantity: number): CostingResult {
  const costed: CostedQuote[] = [];
  const rejected: RejectedQuote[] = [];

  for (const quote of quotes) {
    try {
      const perUnit = unitCost(quote);
      costed.push({ quote, unitCost: perUnit, totalCost: perUnit * requiredQuantity });
    } catch (error) {
      if (!(error instanceof DegenerateQuoteError)) {
        throw error;
      }
      rejected.push({ quote, reason: error.reason });
    }
  }

  return { costed, rejected };
}
