import { OddsApiClient, toApiTimestamp } from '../clients/oddsApiClient';
import { OddsApiError, errorMessage } from '../lib/errors';
import { IngestionService } from './ingestionService';

const MS_PER_HOUR = 3600 * 1000;
const MS_PER_DAY = 24 * MS_PER_HOUR;

export interface BackfillOptions {
  pauseMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface BackfillSummary {
  sportKey: string;
  requests: number;
  failed: number;
  saved: number;
  duplicates: number;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * `[start, end]` for a backfill of the last `days` days, with the start rounded
 * down to the hour.
 */
export function backfillWindow(days: number, now: Date = new Date()): { start: Date; end: Date } {
  const start = new Date(now.getTime() - days * MS_PER_DAY);
  start.setUTCMinutes(0, 0, 0);
  return { start, end: now };
}

/**
 * Replays historical odds snapshots into the store so that line history
 * (velocity, projected CLV) exists before live ingestion has built it up.
 */
export class BackfillService {
  private readonly pauseMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly client: OddsApiClient,
    private readonly ingestion: IngestionService,
    options: BackfillOptions = {}
  ) {
    this.pauseMs = options.pauseMs ?? 1500;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Step from `start` to `end` every `intervalHours`, storing each snapshot under
   * the time the API reports for it. A failed step is logged and skipped; an
   * invalid API key stops the run.
   */
  async runBackfill(sportKey: string, start: Date, end: Date, intervalHours = 24): Promise<BackfillSummary> {
    if (!(intervalHours > 0)) {
      throw new Error(`Backfill interval must be positive, got ${intervalHours}`);
    }

    const summary: BackfillSummary = { sportKey, requests: 0, failed: 0, saved: 0, duplicates: 0 };
    const stepMs = intervalHours * MS_PER_HOUR;

    for (let t = start.getTime(); t <= end.getTime(); t += stepMs) {
      if (summary.requests > 0) {
        await this.sleep(this.pauseMs);
      }

      const at = new Date(t);
      summary.requests++;
      console.log(`[BACKFILL] Fetching history for ${sportKey} at ${toApiTimestamp(at)}...`);

      try {
        const snapshot = await this.client.getHistoricalOdds(sportKey, at);
        if (!snapshot) {
          summary.failed++;
          continue;
        }

        const snapshotTime = new Date(snapshot.timestamp);
        let saved = 0;
        for (const event of snapshot.events) {
          const result = this.ingestion.ingestEvent(event, sportKey, snapshotTime);
          saved += result.saved;
          summary.duplicates += result.duplicates;
        }
        summary.saved += saved;
        console.log(`[BACKFILL] Saved ${saved} snapshots.`);
      } catch (error: unknown) {
        if (error instanceof OddsApiError && error.status === 401) {
          throw error;
        }
        summary.failed++;
        console.error(`[BACKFILL] Failed to fetch ${toApiTimestamp(at)} for ${sportKey}: ${errorMessage(error)}`);
      }
    }

    console.log(
      `[BACKFILL] Complete for ${sportKey}: ${summary.saved} saved over ${summary.requests} requests (${summary.failed} failed)`
    );
    return summary;
  }
}
