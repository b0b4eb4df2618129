import {
  BetCandidate,
  CandidateBet,
  FeatureRecord,
  PipelineContext,
  RawOddsRow,
} from '../types/markets';
import { decimalOddsFromProbability } from '../lib/odds';
import { CalibrationModel } from './calibrator';
import { DecisionEngine } from './decisionEngine';
import { FeatureEngine } from './featureEngine';

export interface SignalReport {
  features: FeatureRecord[];
  candidates: BetCandidate[];
  bets: CandidateBet[];
  processed: number;
  skipped: number;
}

/**
 * Calibrate each feature record into a decision candidate.
 * The execution price is recovered from the record's implied probability.
 */
export function scoreFeatures(features: readonly FeatureRecord[], model: CalibrationModel): BetCandidate[] {
  const candidates: BetCandidate[] = [];

  for (const f of features) {
    if (!(f.pImplied > 0)) continue;

    candidates.push({
      eventId: f.eventId,
      selection: f.selection,
      modelProb: model.predict({
        sportKey: f.sportKey,
        marketFamily: f.marketFamily,
        rawProbability: f.pFairConsensus,
      }),
      dkPrice: decimalOddsFromProbability(f.pImplied),
      pImplied: f.pImplied,
      velocity: f.velocity,
      clvProjected: f.clvProjected,
      contextUncertaintyPenalty: f.contextUncertainty,
    });
  }

  return candidates;
}

/**
 * Features -> calibration -> decisions, one pass, each stage finished before the next starts.
 */
export function runSignalPipeline(
  rows: readonly RawOddsRow[],
  context: PipelineContext,
  engine: FeatureEngine,
  model: CalibrationModel,
  decisions: DecisionEngine
): SignalReport {
  const featureBatch = engine.processRows(rows, context);
  const candidates = scoreFeatures(featureBatch.items, model);
  const decisionBatch = decisions.evaluate(candidates);

  return {
    features: featureBatch.items,
    candidates,
    bets: decisionBatch.items,
    processed: featureBatch.processed,
    skipped: featureBatch.skipped + decisionBatch.skipped,
  };
}
