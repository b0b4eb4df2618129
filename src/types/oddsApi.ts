// Response shapes of The Odds API v4 (decimal odds format)

export interface OddsApiOutcome {
  name: string;
  price: number;
  point?: number;
  description?: string; // player name on player markets
}

export interface OddsApiMarket {
  key: string;
  last_update?: string;
  outcomes: OddsApiOutcome[];
}

export interface OddsApiBookmaker {
  key: string;
  title?: string;
  last_update?: string;
  markets: OddsApiMarket[];
}

export interface OddsApiEvent {
  id: string;
  sport_key: string;
  commence_time: string;
  home_team: string;
  away_team: string;
  bookmakers: OddsApiBookmaker[];
}

// One snapshot of the odds-history endpoint
export interface OddsApiHistoricalOdds {
  timestamp: string;
  previous_timestamp: string | null;
  next_timestamp: string | null;
  events: OddsApiEvent[];
}

export interface OddsApiScoreLine {
  name: string;
  score: string;
}

export interface OddsApiScore {
  id: string;
  sport_key: string;
  commence_time: string;
  completed: boolean;
  home_team: string;
  away_team: string;
  scores: OddsApiScoreLine[] | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOutcome(value: unknown): value is OddsApiOutcome {
  return isRecord(value) && typeof value.name === 'string' && typeof value.price === 'number';
}

function isMarket(value: unknown): value is OddsApiMarket {
  return isRecord(value) && typeof value.key === 'string' && Array.isArray(value.outcomes);
}

function isBookmaker(value: unknown): value is OddsApiBookmaker {
  return isRecord(value) && typeof value.key === 'string' && Array.isArray(value.markets);
}

/**
 * Keep the parts of an odds payload we can use; malformed bookmakers, markets and
 * outcomes are dropped rather than failing the whole event. Events without an id or
 * a parseable start time are dropped.
 */
export function parseOddsEvent(value: unknown): OddsApiEvent | null {
  if (!isRecord(value)) return null;
  const { id, sport_key, commence_time, home_team, away_team, bookmakers } = value;
  if (typeof id !== 'string' || typeof commence_time !== 'string') return null;
  if (isNaN(Date.parse(commence_time))) return null;

  return {
    id,
    sport_key: typeof sport_key === 'string' ? sport_key : 'unknown',
    commence_time,
    home_team: typeof home_team === 'string' ? home_team : '',
    away_team: typeof away_team === 'string' ? away_team : '',
    bookmakers: (Array.isArray(bookmakers) ? bookmakers : []).filter(isBookmaker).map((book) => ({
      ...book,
      markets: book.markets.filter(isMarket).map((market) => ({
        ...market,
        outcomes: market.outcomes.filter(isOutcome),
      })),
    })),
  };
}

export function parseHistoricalOdds(value: unknown): OddsApiHistoricalOdds | null {
  if (!isRecord(value)) return null;
  const { timestamp, previous_timestamp, next_timestamp, data } = value;
  if (typeof timestamp !== 'string' || isNaN(Date.parse(timestamp)) || !Array.isArray(data)) return null;

  return {
    timestamp,
    previous_timestamp: typeof previous_timestamp === 'string' ? previous_timestamp : null,
    next_timestamp: typeof next_timestamp === 'string' ? next_timestamp : null,
    events: data.map(parseOddsEvent).filter((e): e is OddsApiEvent => e !== null),
  };
}

export function parseScore(value: unknown): OddsApiScore | null {
  if (!isRecord(value)) return null;
  const { id, sport_key, commence_time, completed, home_team, away_team, scores } = value;
  if (typeof id !== 'string' || typeof home_team !== 'string' || typeof away_team !== 'string') return null;

  const lines = Array.isArray(scores)
    ? scores.filter(
        (s): s is OddsApiScoreLine => isRecord(s) && typeof s.name === 'string' && typeof s.score === 'string'
      )
    : null;

  return {
    id,
    sport_key: typeof sport_key === 'string' ? sport_key : 'unknown',
    commence_time: typeof commence_time === 'string' ? commence_time : '',
    completed: completed === true,
    home_team,
    away_team,
    scores: lines,
  };
}
