const PROB_FLOOR = 0.001;
const PROB_CEIL = 0.999;

/**
 * Convert decimal odds to implied probability
 * @param odds - Decimal odds (e.g., 2.5)
 * @returns Implied probability as a decimal (0-1), or 0 for non-positive odds
 */
export function impliedProbabilityFromDecimal(odds: number): number {
  return odds > 0 ? 1 / odds : 0;
}

/**
 * Convert implied probability to decimal odds
 */
export function decimalOddsFromProbability(probability: number): number {
  return probability > 0 ? 1 / probability : Number.POSITIVE_INFINITY;
}

/**
 * Convert implied probability to American odds
 * @param probability - Implied probability as a decimal (0-1)
 * @returns American odds
 */
export function americanOddsFromProbability(probability: number): number {
  if (probability >= 0.5) {
    return Math.round(-100 * probability / (1 - probability));
  } else {
    return Math.round(100 * (1 - probability) / probability);
  }
}

export function clampProbability(p: number): number {
  return Math.min(PROB_CEIL, Math.max(PROB_FLOOR, p));
}

/**
 * Log-odds of a probability, clipped to [0.001, 0.999] first so the result stays finite
 */
export function toLogit(p: number): number {
  const clipped = clampProbability(p);
  return Math.log(clipped / (1 - clipped));
}

export function toProb(logit: number): number {
  return 1 / (1 + Math.exp(-logit));
}

/**
 * Expected value per unit staked at the given decimal odds
 */
export function expectedValue(probability: number, decimalOdds: number): number {
  return probability * decimalOdds - 1;
}

/**
 * Full Kelly fraction scaled by `fractionalKelly`. Never negative.
 */
export function calculateKellyFraction(prob: number, decimalOdds: number, fractionalKelly = 0.25): number {
  if (decimalOdds <= 1) return 0;
  const b = decimalOdds - 1;
  const q = 1 - prob;
  const fStar = (b * prob - q) / b;
  return Math.max(0, fStar) * fractionalKelly;
}
