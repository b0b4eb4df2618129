import { OddsApiClient } from '../clients/oddsApiClient';
import { CalibrationRow } from '../types/markets';
import { OddsApiScore } from '../types/oddsApi';
import { errorMessage } from '../lib/errors';
import { MarketDataStore } from './marketDataStore';

// Only the full-game moneyline is decided by the winner alone
const LABELLED_MARKETS = new Set(['h2h']);

export class SettlementService {
  constructor(
    private readonly client: OddsApiClient,
    private readonly store: MarketDataStore
  ) {}

  async updateResults(sportKey: string, daysBack = 3): Promise<number> {
    console.log(`[SETTLE] Checking results for ${sportKey} (last ${daysBack} days)...`);
    const scores = await this.client.getScores(sportKey, daysBack);
    const updates = this.applyScores(scores);
    console.log(`[SETTLE] Settled ${updates} events for ${sportKey}.`);
    return updates;
  }

  async updateAll(sports: readonly string[], daysBack = 3): Promise<number> {
    let total = 0;
    for (const sport of sports) {
      try {
        total += await this.updateResults(sport, daysBack);
      } catch (error: unknown) {
        console.error(`[SETTLE] Failed to settle ${sport}: ${errorMessage(error)}`);
      }
    }
    return total;
  }

  /**
   * Mark completed games we know about. Unknown, unfinished or already settled
   * games are ignored, as are games whose score lines do not name both teams.
   */
  applyScores(scores: readonly OddsApiScore[]): number {
    let updates = 0;

    for (const game of scores) {
      if (!game.completed) continue;

      const event = this.store.getEvent(game.id);
      if (!event || event.completed) continue;

      let homeScore: number | undefined;
      let awayScore: number | undefined;
      for (const line of game.scores ?? []) {
        const value = parseInt(line.score, 10);
        if (isNaN(value)) continue;
        if (line.name === event.homeTeam) homeScore = value;
        else if (line.name === event.awayTeam) awayScore = value;
      }

      if (homeScore === undefined || awayScore === undefined) continue;

      this.store.settleEvent(event.id, homeScore, awayScore);
      updates++;
    }

    return updates;
  }
}

/**
 * Label archived moneyline features with settled results: 1 when the selection
 * is the winner, 0 when it is the other team. Anything else stays unlabelled.
 */
export function buildTrainingRows(store: MarketDataStore): CalibrationRow[] {
  const rows: CalibrationRow[] = [];

  for (const feature of store.archivedFeatures()) {
    if (!LABELLED_MARKETS.has(feature.marketKey)) continue;

    const event = store.getEvent(feature.eventId);
    if (!event || !event.completed || event.winner === undefined) continue;

    const loser = event.winner === event.homeTeam ? event.awayTeam : event.homeTeam;
    let outcome: 0 | 1;
    if (feature.selection === event.winner) outcome = 1;
    else if (feature.selection === loser) outcome = 0;
    else continue;

    rows.push({
      sportKey: feature.sportKey,
      marketFamily: feature.marketFamily,
      rawProbability: feature.pFairConsensus,
      outcome,
    });
  }

  return rows;
}
