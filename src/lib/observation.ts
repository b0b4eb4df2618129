import { MarketFamily, PricedObservation, RawOddsRow } from '../types/markets';
import { InvalidObservationError } from './errors';
import { impliedProbabilityFromDecimal } from './odds';

/**
 * Map a raw market key onto its market family.
 * Rules are checked in order; anything unmatched is a main market.
 */
export function classifyMarket(marketKey: string): MarketFamily {
  if (marketKey.includes('player')) return 'PROP';
  if (marketKey.includes('period') || marketKey.includes('q1')) return 'PERIOD';
  if (marketKey.includes('futures')) return 'FUTURE';
  return 'MAIN';
}

function parseTimestamp(value: Date | string): Date {
  const ts = value instanceof Date ? new Date(value.getTime()) : new Date(value);
  if (isNaN(ts.getTime())) {
    throw new InvalidObservationError(`Invalid timestamp: ${String(value)}`);
  }
  return ts;
}

/**
 * Validate a raw odds row and freeze it into a priced observation.
 * Throws InvalidObservationError for rows the pipeline has to skip.
 */
export function createObservation(row: RawOddsRow): PricedObservation {
  if (!row.eventId || !row.marketKey || !row.selection || !row.bookmaker) {
    throw new InvalidObservationError(
      `Missing identity fields (event=${row.eventId}, market=${row.marketKey}, selection=${row.selection}, book=${row.bookmaker})`,
      row
    );
  }
  if (!Number.isFinite(row.oddsDecimal) || row.oddsDecimal <= 1.0) {
    throw new InvalidObservationError(`Odds must be > 1.0, got ${row.oddsDecimal}`, row);
  }

  const marketFamily = classifyMarket(row.marketKey);
  const isPlayerProp = marketFamily === 'PROP';
  const handicap = row.handicap === undefined || row.handicap === null ? null : row.handicap;

  return Object.freeze({
    eventId: row.eventId,
    sportKey: row.sportKey || 'unknown',
    marketKey: row.marketKey,
    marketFamily,
    selection: row.selection,
    handicap,
    bookmaker: row.bookmaker,
    oddsDecimal: row.oddsDecimal,
    timestamp: parseTimestamp(row.timestamp),
    isPlayerProp,
    playerName: row.playerName ?? (isPlayerProp ? row.selection : null),
    impliedProb: impliedProbabilityFromDecimal(row.oddsDecimal),
  });
}
