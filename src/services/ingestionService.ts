import { OddsApiClient } from '../clients/oddsApiClient';
import { MarketSnapshot, RawOddsRow } from '../types/markets';
import { OddsApiEvent, OddsApiOutcome } from '../types/oddsApi';
import { classifyMarket } from '../lib/observation';
import { errorMessage } from '../lib/errors';
import { MarketDataStore, StoredSnapshot } from './marketDataStore';

export interface IngestSummary {
  sportKey: string;
  events: number;
  saved: number;
  duplicates: number;
}

/**
 * Player markets carry the player in `description` and Over/Under in `name`;
 * both go into the selection so each player line is its own instrument.
 */
function selectionFor(marketKey: string, outcome: OddsApiOutcome): { selection: string; playerName: string | null } {
  if (classifyMarket(marketKey) === 'PROP' && outcome.description) {
    return { selection: `${outcome.description} ${outcome.name}`, playerName: outcome.description };
  }
  return { selection: outcome.name, playerName: null };
}

export class IngestionService {
  constructor(
    private readonly client: OddsApiClient,
    private readonly store: MarketDataStore,
    private readonly bookmakers: readonly string[] = []
  ) {}

  /**
   * Fetch odds for every sport. A failing sport is logged and does not stop the others.
   */
  async runIngest(sports: readonly string[], now: Date = new Date()): Promise<IngestSummary[]> {
    console.log('[INGEST] Starting ingestion cycle...');
    const summaries: IngestSummary[] = [];

    for (const sport of sports) {
      try {
        summaries.push(await this.ingestSport(sport, now));
      } catch (error: unknown) {
        console.error(`[INGEST] Failed to ingest ${sport}: ${errorMessage(error)}`);
      }
    }

    console.log('[INGEST] Ingestion cycle complete.');
    return summaries;
  }

  async ingestSport(sportKey: string, now: Date = new Date()): Promise<IngestSummary> {
    const events = await this.client.getUpcomingOdds(sportKey);
    const summary: IngestSummary = { sportKey, events: events.length, saved: 0, duplicates: 0 };

    for (const event of events) {
      const { saved, duplicates } = this.ingestEvent(event, sportKey, now);
      summary.saved += saved;
      summary.duplicates += duplicates;
    }

    console.log(`[INGEST] Saved ${summary.saved} new snapshots for ${sportKey} (${summary.duplicates} unchanged)`);
    return summary;
  }

  ingestEvent(event: OddsApiEvent, sportKey: string, now: Date): { saved: number; duplicates: number } {
    this.store.upsertEvent({
      id: event.id,
      sportKey,
      commenceTime: new Date(event.commence_time).toISOString(),
      homeTeam: event.home_team,
      awayTeam: event.away_team,
    });

    let saved = 0;
    let duplicates = 0;
    const timestamp = now.toISOString();

    for (const book of event.bookmakers) {
      if (this.bookmakers.length > 0 && !this.bookmakers.includes(book.key)) continue;

      for (const market of book.markets) {
        for (const outcome of market.outcomes) {
          const { selection, playerName } = selectionFor(market.key, outcome);
          const snapshot: StoredSnapshot = {
            eventId: event.id,
            sportKey,
            marketKey: market.key,
            selection,
            handicap: outcome.point ?? null,
            bookmaker: book.key,
            oddsDecimal: outcome.price,
            timestamp,
            playerName,
          };

          if (this.store.saveSnapshot(snapshot)) saved++;
          else duplicates++;
        }
      }
    }

    return { saved, duplicates };
  }
}

// Market whose price stands for a book in the event-level snapshot
const LIVE_ODDS_MARKET = 'h2h';

/**
 * Latest odds per bookmaker for each event, from rows at or after `since`.
 * Rows are expected oldest first; later rows overwrite earlier ones.
 *
 * The snapshot is one price per book for the whole event, so it cannot tell
 * selections or markets apart. A book's moneyline price, once seen, is not
 * overwritten by its other markets; selections within the moneyline still share
 * the slot.
 */
export function buildLiveOdds(rows: readonly RawOddsRow[], since: Date): Record<string, MarketSnapshot> {
  const liveOdds: Record<string, MarketSnapshot> = {};
  const fromMoneyline = new Set<string>();
  const cutoff = since.getTime();

  for (const row of rows) {
    if (new Date(row.timestamp).getTime() < cutoff) continue;

    const slot = JSON.stringify([row.eventId, row.bookmaker]);
    const isMoneyline = row.marketKey === LIVE_ODDS_MARKET;
    if (!isMoneyline && fromMoneyline.has(slot)) continue;
    if (isMoneyline) fromMoneyline.add(slot);

    const snapshot = liveOdds[row.eventId] ?? (liveOdds[row.eventId] = {});
    snapshot[row.bookmaker] = row.oddsDecimal;
  }

  return liveOdds;
}
