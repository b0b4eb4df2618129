import { BetCandidate, CandidateBet, BatchResult } from '../types/markets';
import { calculateKellyFraction, expectedValue } from '../lib/odds';

export interface DecisionEngineOptions {
  bankroll: number;
  maxDailyStakePercent?: number;
  fractionalKelly?: number;
  uncertaintyPenaltyThreshold?: number;
  uncertainEdgeThreshold?: number;
}

export interface GateResult {
  allowed: boolean;
  reason?: string;
}

export class DecisionEngine {
  readonly bankroll: number;
  readonly maxStake: number;
  private readonly fractionalKelly: number;
  private readonly uncertaintyPenaltyThreshold: number;
  private readonly uncertainEdgeThreshold: number;

  constructor(options: DecisionEngineOptions) {
    this.bankroll = options.bankroll;
    this.maxStake = options.bankroll * (options.maxDailyStakePercent ?? 0.05);
    this.fractionalKelly = options.fractionalKelly ?? 0.25;
    this.uncertaintyPenaltyThreshold = options.uncertaintyPenaltyThreshold ?? 0.5;
    this.uncertainEdgeThreshold = options.uncertainEdgeThreshold ?? 0.1;
  }

  /**
   * Run every candidate through the gates and size the survivors.
   * Returns passing bets ranked by EV, best first.
   */
  evaluate(candidates: readonly BetCandidate[]): BatchResult<CandidateBet> {
    const items: CandidateBet[] = [];
    let skipped = 0;

    for (const candidate of candidates) {
      if (!this.isUsable(candidate)) {
        skipped++;
        console.warn(`[DECISION] Skipping ${candidate.eventId}/${candidate.selection}: unusable probability or price`);
        continue;
      }

      const evPercent = expectedValue(candidate.modelProb, candidate.dkPrice);
      const gate = this.checkGates(candidate, evPercent);
      if (!gate.allowed) continue;

      items.push(this.size(candidate, evPercent));
    }

    items.sort((a, b) => b.evPercent - a.evPercent);
    return { items, processed: candidates.length - skipped, skipped };
  }

  selectBestBet(candidates: readonly BetCandidate[]): CandidateBet | null {
    const { items } = this.evaluate(candidates);
    return items.length > 0 ? items[0] : null;
  }

  /**
   * Gate 1: positive EV.
   * Gate 2: projected price must not have moved past our own estimate (stale edge).
   * Gate 3: high context uncertainty demands a larger edge.
   */
  checkGates(candidate: BetCandidate, evPercent: number): GateResult {
    if (evPercent <= 0) {
      return { allowed: false, reason: `Non-positive EV (${(evPercent * 100).toFixed(2)}%)` };
    }

    const baseline = Math.max(candidate.pImplied, candidate.modelProb);
    if (candidate.clvProjected < baseline) {
      return {
        allowed: false,
        reason: `Projected price ${candidate.clvProjected.toFixed(4)} below baseline ${baseline.toFixed(4)}`,
      };
    }

    if (candidate.contextUncertaintyPenalty > this.uncertaintyPenaltyThreshold && evPercent < this.uncertainEdgeThreshold) {
      return {
        allowed: false,
        reason: `Uncertainty ${candidate.contextUncertaintyPenalty.toFixed(2)} needs EV >= ${(this.uncertainEdgeThreshold * 100).toFixed(0)}%`,
      };
    }

    return { allowed: true };
  }

  private size(candidate: BetCandidate, evPercent: number): CandidateBet {
    const kellyFraction = calculateKellyFraction(candidate.modelProb, candidate.dkPrice, this.fractionalKelly);
    const stake = Math.min(this.bankroll * kellyFraction, this.maxStake);

    return {
      eventId: candidate.eventId,
      selection: candidate.selection,
      modelProb: candidate.modelProb,
      dkPrice: candidate.dkPrice,
      evPercent,
      kellyFraction,
      stake,
    };
  }

  private isUsable(candidate: BetCandidate): boolean {
    return (
      Number.isFinite(candidate.modelProb) &&
      Number.isFinite(candidate.dkPrice) &&
      candidate.dkPrice > 1 &&
      Number.isFinite(candidate.pImplied) &&
      Number.isFinite(candidate.clvProjected) &&
      Number.isFinite(candidate.contextUncertaintyPenalty)
    );
  }
}
