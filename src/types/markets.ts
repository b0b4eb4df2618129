export type MarketFamily = 'MAIN' | 'PERIOD' | 'PROP' | 'FUTURE';

export const MARKET_FAMILIES: readonly MarketFamily[] = ['MAIN', 'PERIOD', 'PROP', 'FUTURE'];

/**
 * One bookmaker price for one selection at one point in time.
 * Built through createObservation(); never mutated afterwards.
 */
export interface PricedObservation {
  readonly eventId: string;
  readonly sportKey: string;
  readonly marketKey: string;
  readonly marketFamily: MarketFamily;
  readonly selection: string;
  readonly handicap: number | null;
  readonly bookmaker: string;
  readonly oddsDecimal: number; // > 1.0
  readonly timestamp: Date;
  readonly isPlayerProp: boolean;
  readonly playerName: string | null;
  readonly impliedProb: number;
}

/**
 * Raw odds row as handed over by the ingestion side.
 */
export interface RawOddsRow {
  eventId: string;
  sportKey?: string;
  marketKey: string;
  selection: string;
  handicap?: number | null;
  bookmaker: string;
  oddsDecimal: number;
  timestamp: Date | string;
  playerName?: string | null;
}

export interface InstrumentKey {
  readonly eventId: string;
  readonly marketKey: string;
  readonly selection: string;
  readonly handicap: number | null;
}

/** bookmaker -> current decimal odds, for one event */
export type MarketSnapshot = Record<string, number>;

export type InjuryStatus = 'Healthy' | 'Questionable' | 'Doubtful' | 'Limited Practice' | 'Out' | string;

export interface InjuryEntry {
  status: InjuryStatus;
  reliability?: number; // 0-1
  source?: string;
}

/** player name -> injury entry, for one event */
export type InjuryRecord = Record<string, InjuryEntry>;

export interface PipelineContext {
  liveOdds?: Record<string, MarketSnapshot>;
  injuries?: Record<string, InjuryRecord>;
}

export interface EventContext {
  marketSnapshot: MarketSnapshot;
  injuries: InjuryRecord;
}

export interface PluginFeatures {
  pFairConsensus: number;
  velocity: number;
  clvProjected: number;
  playerAvailabilityScore: number;
  contextUncertaintyPenalty: number;
}

export interface FeatureRecord {
  eventId: string;
  sportKey: string;
  marketKey: string;
  marketFamily: MarketFamily;
  selection: string;
  book: string;
  timestamp: Date;
  pImplied: number;
  pFairConsensus: number;
  velocity: number;
  contextUncertainty: number;
  clvProjected: number;
  playerAvailability: number;
}

export interface BatchResult<T> {
  items: T[];
  processed: number;
  skipped: number;
}

export interface CalibrationRow {
  sportKey: string;
  marketFamily: MarketFamily | string;
  rawProbability: number;
  outcome: 0 | 1;
}

export type CalibrationQuery = Omit<CalibrationRow, 'outcome'>;

export interface BetCandidate {
  eventId: string;
  selection: string;
  modelProb: number;
  dkPrice: number; // decimal odds at the execution book
  pImplied: number;
  velocity: number;
  clvProjected: number;
  contextUncertaintyPenalty: number;
}

export interface CandidateBet {
  eventId: string;
  selection: string;
  modelProb: number;
  dkPrice: number;
  evPercent: number;
  kellyFraction: number;
  stake: number;
}
