import {
  BatchResult,
  EventContext,
  FeatureRecord,
  PipelineContext,
  PricedObservation,
  RawOddsRow,
} from '../types/markets';
import { HistoryBuffer, instrumentKeyOf, DEFAULT_HISTORY_CAPACITY } from '../lib/historyBuffer';
import { createObservation } from '../lib/observation';
import { errorMessage, InvalidObservationError } from '../lib/errors';
import { createPluginRegistry, PluginRegistry } from './pricingPlugins';

export interface FeatureEngineOptions {
  historyBufferSize?: number;
  plugins?: PluginRegistry;
}

export class FeatureEngine {
  private readonly buffer: HistoryBuffer;
  private readonly plugins: PluginRegistry;

  constructor(options: FeatureEngineOptions = {}) {
    this.buffer = new HistoryBuffer(options.historyBufferSize ?? DEFAULT_HISTORY_CAPACITY);
    this.plugins = options.plugins ?? createPluginRegistry();
  }

  get history(): HistoryBuffer {
    return this.buffer;
  }

  /**
   * Turn an ordered (ascending timestamp) sequence of observations into feature records.
   * History for each instrument is read before the current observation is appended,
   * so a plugin never sees the price it is evaluating in its own history.
   */
  process(observations: readonly PricedObservation[], context: PipelineContext = {}): BatchResult<FeatureRecord> {
    const items: FeatureRecord[] = [];
    let skipped = 0;

    for (const obs of observations) {
      try {
        items.push(this.processOne(obs, context));
      } catch (error: unknown) {
        skipped++;
        console.warn(`[FEATURES] Skipping ${obs.eventId}/${obs.marketKey}/${obs.selection}@${obs.bookmaker}: ${errorMessage(error)}`);
      }
    }

    return { items, processed: items.length, skipped };
  }

  /**
   * Same as process(), for raw rows straight from ingestion: sorts by timestamp and
   * drops rows that do not validate.
   */
  processRows(rows: readonly RawOddsRow[], context: PipelineContext = {}): BatchResult<FeatureRecord> {
    const observations: PricedObservation[] = [];
    let invalid = 0;

    for (const row of rows) {
      try {
        observations.push(createObservation(row));
      } catch (error: unknown) {
        invalid++;
        console.warn(`[FEATURES] Invalid row for event ${row.eventId}: ${errorMessage(error)}`);
      }
    }

    observations.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
    const result = this.process(observations, context);
    return { ...result, skipped: result.skipped + invalid };
  }

  private processOne(obs: PricedObservation, context: PipelineContext): FeatureRecord {
    if (!(obs.oddsDecimal > 1.0) || isNaN(obs.timestamp.getTime())) {
      throw new InvalidObservationError(`Unusable price ${obs.oddsDecimal} at ${obs.timestamp.toString()}`);
    }

    const key = instrumentKeyOf(obs);
    const history = this.buffer.history(key);
    const plugin = this.plugins[obs.marketFamily];

    const eventContext: EventContext = {
      marketSnapshot: context.liveOdds?.[obs.eventId] ?? {},
      injuries: context.injuries?.[obs.eventId] ?? {},
    };

    const feats = plugin.calculateFeatures(obs, history, eventContext);
    this.buffer.append(obs);

    return {
      eventId: obs.eventId,
      sportKey: obs.sportKey,
      marketKey: obs.marketKey,
      marketFamily: obs.marketFamily,
      selection: obs.selection,
      book: obs.bookmaker,
      timestamp: obs.timestamp,
      pImplied: obs.impliedProb,
      pFairConsensus: feats.pFairConsensus,
      velocity: feats.velocity,
      contextUncertainty: feats.contextUncertaintyPenalty,
      clvProjected: feats.clvProjected,
      playerAvailability: feats.playerAvailabilityScore,
    };
  }
}
