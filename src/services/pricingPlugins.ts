import { EventContext, MarketFamily, PluginFeatures, PricedObservation } from '../types/markets';
import { toLogit, toProb, impliedProbabilityFromDecimal } from '../lib/odds';

/**
 * Relative pricing sharpness per bookmaker. Execution venues are softer.
 */
export const BOOK_SHARPNESS: Readonly<Record<string, number>> = {
  pinnacle: 1.0,
  circa: 0.9,
  betonlineag: 0.8,
  draftkings: 0.6,
  fanduel: 0.6,
  mgm: 0.5,
};

export const DEFAULT_BOOK_SHARPNESS = 0.5;

const MS_PER_HOUR = 3600 * 1000;

// Hours ahead the current drift is projected
const CLV_HORIZON_HOURS = 1.0;

export function bookSharpness(bookmaker: string): number {
  return BOOK_SHARPNESS[bookmaker] ?? DEFAULT_BOOK_SHARPNESS;
}

export interface PricingPlugin {
  readonly name: string;
  calculateFeatures(
    observation: PricedObservation,
    history: readonly PricedObservation[],
    context: EventContext
  ): PluginFeatures;
}

/**
 * Cross-book consensus for main, period and futures markets.
 * Quotes are blended in logit space, weighted by book sharpness.
 */
export class MainMarketPlugin implements PricingPlugin {
  readonly name = 'main-market-consensus';

  calculateFeatures(
    observation: PricedObservation,
    history: readonly PricedObservation[],
    context: EventContext
  ): PluginFeatures {
    const ownWeight = bookSharpness(observation.bookmaker);
    let weightedLogitSum = ownWeight * toLogit(observation.impliedProb);
    let totalWeight = ownWeight;

    for (const [book, odds] of Object.entries(context.marketSnapshot)) {
      if (book === observation.bookmaker) continue;
      if (!(odds > 1.0)) continue;

      const w = bookSharpness(book);
      weightedLogitSum += w * toLogit(impliedProbabilityFromDecimal(odds));
      totalWeight += w;
    }

    const avgLogit = totalWeight > 0 ? weightedLogitSum / totalWeight : toLogit(observation.impliedProb);
    const velocity = this.calculateVelocity(observation, history);

    return {
      pFairConsensus: toProb(avgLogit),
      velocity,
      clvProjected: toProb(avgLogit + velocity * CLV_HORIZON_HOURS),
      playerAvailabilityScore: 1.0,
      contextUncertaintyPenalty: 0.0,
    };
  }

  /**
   * Logit-per-hour drift between the current price and the second most recent one in history.
   */
  private calculateVelocity(observation: PricedObservation, history: readonly PricedObservation[]): number {
    if (history.length < 2) return 0;

    const reference = history[history.length - 2];
    const dtHours = (observation.timestamp.getTime() - reference.timestamp.getTime()) / MS_PER_HOUR;
    if (dtHours <= 0) return 0;

    return (toLogit(observation.impliedProb) - toLogit(reference.impliedProb)) / dtHours;
  }
}

// Prior logit of a listed player taking the floor (~95%)
const AVAILABILITY_PRIOR_LOGIT = 3.0;
const DEFAULT_SOURCE_RELIABILITY = 0.5;

const STATUS_LOGIT_SHIFT: Readonly<Record<string, number>> = {
  Questionable: -2.5,
  Doubtful: -4.0,
  'Limited Practice': -0.5,
};

// Statuses that shrink an Over towards reduced production
const SHRINK_STATUSES = new Set(['Questionable', 'Limited Practice']);

/**
 * Player props: Bayesian availability update from the injury report.
 */
export class PropMarketPlugin implements PricingPlugin {
  readonly name = 'prop-bayesian-availability';

  calculateFeatures(
    observation: PricedObservation,
    _history: readonly PricedObservation[],
    context: EventContext
  ): PluginFeatures {
    const player = observation.playerName ?? observation.selection;
    const entry = context.injuries[player];
    const status = entry?.status ?? 'Healthy';
    const reliability = entry?.reliability ?? DEFAULT_SOURCE_RELIABILITY;

    const availabilityLogit = AVAILABILITY_PRIOR_LOGIT + (STATUS_LOGIT_SHIFT[status] ?? 0);
    const pAvailability = toProb(availabilityLogit);

    let pAdjusted = observation.impliedProb;
    if (observation.selection.includes('Over') && SHRINK_STATUSES.has(status)) {
      pAdjusted = observation.impliedProb * (0.8 + 0.2 * pAvailability);
    }

    return {
      pFairConsensus: pAdjusted,
      velocity: 0.0, // props are too sparse for a drift estimate
      clvProjected: pAdjusted,
      playerAvailabilityScore: pAvailability,
      contextUncertaintyPenalty: (1.0 - pAvailability) * reliability,
    };
  }
}

export type PluginRegistry = Readonly<Record<MarketFamily, PricingPlugin>>;

/**
 * Family -> plugin. PERIOD and FUTURE share the main-market strategy for now.
 */
export function createPluginRegistry(): PluginRegistry {
  const main = new MainMarketPlugin();
  return {
    MAIN: main,
    PERIOD: main,
    FUTURE: main,
    PROP: new PropMarketPlugin(),
  };
}
