import type { CostedQuote } from './costs';

/**
 * Seleciona a cotação de menor custo total.
 *
 * Comparação estrita: em caso de empate vence a primeira na ordem de entrada.
 */
export function selectWinner(candidates: CostedQuote[]): CostedQuote | null {
  let best: CostedQuote | null = null;

  for (const candidate of candidates) {
    if (best === null || candidate.totalCost < best.totalCost) {
      best = candidate;
    }
  }

  return best;
}
