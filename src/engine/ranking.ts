import type { CostedQuote } from './costs';

export type RankStatus = 'winner' | 'loser';

export interface RankedQuote extends CostedQuote {
  rank: number; // 1 = vencedor
  status: RankStatus;
}

/**
 * Ordena as cotações por custo total crescente.
 * Array.prototype.sort é estável, então empates mantêm a ordem da consulta.
 */
export function rankQuotes(candidates: CostedQuote[]): RankedQuote[] {
  return [...candidates]
    .sort((a, b) => a.totalCost - b.totalCost)
    .map((candidate, index): RankedQuote => ({
      ...candidate,
      rank: index + 1,
      status: index === 0 ? 'winner' : 'loser',
    }));
}
