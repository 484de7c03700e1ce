/**
 * Cotação Agro - Sistema de Cotação de Produto Agrícola
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * Gerador de relatórios de cotação
 *
 * Para cada prescrição cadastrada, verifica o produto e a unidade, busca as
 * cotações da data e escolhe a loja de menor custo total (relatório de
 * vencedores) ou ordena todas as lojas (relatório completo).
 *
 * Falhas de um produto viram uma linha no relatório; nenhuma exceção sai daqui.
 */

import type { Product } from '../models/Product';
import type { CalendarDate, QuoteWithStore } from '../models/Quote';
import type { PrescriptionWithProduct } from '../models/Prescription';
import type { ReportSource } from '../data/repository';
import { getErrorMessage } from '../data/repository';
import log from '../utils/logger';
import type { CostedQuote, RejectedQuote } from './costs';
import { costQuotes } from './costs';
import { selectWinner } from './winner';
import type { RankedQuote } from './ranking';
import { rankQuotes } from './ranking';
import type { UnitPolicy } from './units';
import { strictUnitPolicy } from './units';

export type ReportMode = 'winner' | 'full';

export interface ReportOptions {
  /** Padrão: igualdade exata de strings */
  unitPolicy?: UnitPolicy;
}

interface OutcomeBase {
  prescription: PrescriptionWithProduct;
}

interface ResolvedOutcomeBase extends OutcomeBase {
  product: Product;
}

export type ProductOutcome =
  | (OutcomeBase & { kind: 'product-not-found' })
  | (ResolvedOutcomeBase & { kind: 'unit-mismatch' })
  | (ResolvedOutcomeBase & { kind: 'fetch-failed'; error: string })
  | (ResolvedOutcomeBase & { kind: 'no-quotes' })
  | (ResolvedOutcomeBase & { kind: 'no-valid-quotes'; rejected: RejectedQuote[] })
  | (ResolvedOutcomeBase & { kind: 'winner'; winner: CostedQuote; rejected: RejectedQuote[] })
  | (ResolvedOutcomeBase & { kind: 'ranked'; ranking: RankedQuote[]; rejected: RejectedQuote[] });

export interface Report {
  mode: ReportMode;
  date: CalendarDate;
  /** false quando a lista de prescrições não pôde ser carregada */
  prescriptionsLoaded: boolean;
  sections: ProductOutcome[];
  text: string;
}

type Screening =
  | { ok: true; product: Product }
  | { ok: false; outcome: ProductOutcome };

const HEADERS: Record<ReportMode, (date: CalendarDate) => string> = {
  winner: (date) => `Relatório de Cotações Vencedoras para ${date}:`,
  full: (date) => `Relatório Completo de Cotações (Vencedores e Perdedores) para ${date}:`,
};

// =============================================================================
// AVALIAÇÃO POR PRESCRIÇÃO
// =============================================================================

/**
 * Condições que dispensam a busca de cotações: produto inexistente ou unidade incompatível
 */
export function screenPrescription(
  prescription: PrescriptionWithProduct,
  unitPolicy: UnitPolicy = strictUnitPolicy
): Screening {
  const { product } = prescription;

  if (product === null) {
    return { ok: false, outcome: { kind: 'product-not-found', prescription } };
  }

  if (!unitPolicy.isCompatible(prescription.requiredUnit, product.standardUnit)) {
    return { ok: false, outcome: { kind: 'unit-mismatch', prescription, product } };
  }

  return { ok: true, product };
}

function evaluateQuotes(
  prescription: PrescriptionWithProduct,
  product: Product,
  quotes: QuoteWithStore[],
  mode: ReportMode
): ProductOutcome {
  if (quotes.length === 0) {
    return { kind: 'no-quotes', prescription, product };
  }

  const { costed, rejected } = costQuotes(quotes, prescription.requiredQuantity);

  if (costed.length === 0) {
    return { kind: 'no-valid-quotes', prescription, product, rejected };
  }

  if (mode === 'full') {
    return { kind: 'ranked', prescription, product, ranking: rankQuotes(costed), rejected };
  }

  const winner = selectWinner(costed);
  if (winner === null) {
    return { kind: 'no-valid-quotes', prescription, product, rejected };
  }
  return { kind: 'winner', prescription, product, winner, rejected };
}

/**
 * Avalia uma prescrição contra as cotações de uma data (função pura)
 */
export function evaluatePrescription(
  prescription: PrescriptionWithProduct,
  quotes: QuoteWithStore[],
  mode: ReportMode,
  unitPolicy: UnitPolicy = strictUnitPolicy
): ProductOutcome {
  const screening = screenPrescription(prescription, unitPolicy);
  if (!screening.ok) {
    return screening.outcome;
  }
  return evaluateQuotes(prescription, screening.product, quotes, mode);
}

// =============================================================================
// FORMATAÇÃO
// =============================================================================

function money(value: number): string {
  return value.toFixed(2);
}

function storeLine(label: string, entry: CostedQuote): string {
  const { store } = entry.quote;
  return `${label}: Loja '${store.name}' (${store.address}) - Custo Total: R$ ${money(entry.totalCost)}`;
}

function detailsLine(quote: QuoteWithStore): string {
  return `Detalhes: Preço R$ ${money(quote.price)} por ${money(quote.packagingSize)} ${quote.packagingUnit}` +
    ` (Conv: ${money(quote.conversionFactor)}) em ${quote.date}`;
}

function rejectedLines(rejected: RejectedQuote[]): string[] {
  return rejected.map(({ quote, reason }) => `  Cotação #${quote.id} ignorada: ${reason}`);
}

function sectionTitle(prescription: PrescriptionWithProduct, product: Product): string {
  return `Para '${product.name}' (${money(prescription.requiredQuantity)} ${prescription.requiredUnit}):`;
}

/**
 * Linhas de texto de um produto no relatório
 */
export function formatOutcome(outcome: ProductOutcome, date: CalendarDate): string[] {
  const { prescription } = outcome;

  switch (outcome.kind) {
    case 'product-not-found':
      return [`Produto com ID ${prescription.productId} não encontrado.`];

    case 'unit-mismatch':
      return [
        `Unidade requerida '${prescription.requiredUnit}' não combina com padrão ` +
        `'${outcome.product.standardUnit}' para '${outcome.product.name}'.`,
      ];

    case 'fetch-failed':
      return [`Falha ao buscar cotações para '${outcome.product.name}' na data ${date}.`];

    case 'no-quotes':
      return [`Nenhuma cotação para '${outcome.product.name}' na data ${date}.`];

    case 'no-valid-quotes':
      return [
        `Nenhuma cotação válida para '${outcome.product.name}' na data ${date}.`,
        ...rejectedLines(outcome.rejected),
      ];

    case 'winner':
      return [
        sectionTitle(prescription, outcome.product),
        `  ${storeLine('Vencedor', outcome.winner)}`,
        `  ${detailsLine(outcome.winner.quote)}`,
        ...rejectedLines(outcome.rejected),
      ];

    case 'ranked':
      return [
        sectionTitle(prescription, outcome.product),
        ...outcome.ranking.flatMap((entry) => [
          `  ${storeLine(`#${entry.rank} ${entry.status === 'winner' ? 'Vencedor' : 'Perdedor'}`, entry)}`,
          `    ${detailsLine(entry.quote)}`,
        ]),
        ...rejectedLines(outcome.rejected),
      ];
  }
}

/**
 * Cabeçalho, linha em branco e seções separadas por linhas em branco
 */
export function formatReport(
  mode: ReportMode,
  date: CalendarDate,
  sections: ProductOutcome[],
  prescriptionsLoaded = true
): string {
  let body: string[][];
  if (!prescriptionsLoaded) {
    body = [['Falha ao carregar prescrições.']];
  } else if (sections.length === 0) {
    body = [['Nenhuma prescrição cadastrada.']];
  } else {
    body = sections.map((section) => formatOutcome(section, date));
  }

  return `${HEADERS[mode](date)}\n\n${body.map((lines) => lines.join('\n')).join('\n\n')}\n`;
}

// =============================================================================
// GERAÇÃO
// =============================================================================

/**
 * Carrega um snapshot novo (prescrições e cotações da data) e monta o relatório
 */
export async function buildReport(
  source: ReportSource,
  date: CalendarDate,
  mode: ReportMode,
  options: ReportOptions = {}
): Promise<Report> {
  const unitPolicy = options.unitPolicy ?? strictUnitPolicy;
  const start = Date.now();

  let prescriptions: PrescriptionWithProduct[];
  try {
    prescriptions = await source.findAllPrescriptions();
  } catch (error) {
    log.error('Falha ao carregar prescrições para o relatório', error, { date, mode });
    return {
      mode,
      date,
      prescriptionsLoaded: false,
      sections: [],
      text: formatReport(mode, date, [], false),
    };
  }

  const sections: ProductOutcome[] = [];

  for (const prescription of prescriptions) {
    const screening = screenPrescription(prescription, unitPolicy);
    if (!screening.ok) {
      sections.push(screening.outcome);
      continue;
    }

    let quotes: QuoteWithStore[];
    try {
      quotes = await source.findQuotes(prescription.productId, date);
    } catch (error) {
      log.error('Falha ao buscar cotações', error, { productId: prescription.productId, date });
      sections.push({
        kind: 'fetch-failed',
        prescription,
        product: screening.product,
        error: getErrorMessage(error),
      });
      continue;
    }

    const outcome = evaluateQuotes(prescription, screening.product, quotes, mode);
    if ('rejected' in outcome && outcome.rejected.length > 0) {
      log.warn('Cotações degeneradas ignoradas', {
        productId: prescription.productId,
        quoteIds: outcome.rejected.map((r) => r.quote.id),
      });
    }
    sections.push(outcome);
  }

  log.report(`Relatório ${mode} para ${date}: ${sections.length} prescrições`, {
    unitPolicy: unitPolicy.name,
    durationMs: Date.now() - start,
  });

  return {
    mode,
    date,
    prescriptionsLoaded: true,
    sections,
    text: formatReport(mode, date, sections),
  };
}

export async function generateWinnerReport(
  source: ReportSource,
  date: CalendarDate,
  options?: ReportOptions
): Promise<string> {
  return (await buildReport(source, date, 'winner', options)).text;
}

export async function generateFullReport(
  source: ReportSource,
  date: CalendarDate,
  options?: ReportOptions
): Promise<string> {
  return (await buildReport(source, date, 'full', options)).text;
}
