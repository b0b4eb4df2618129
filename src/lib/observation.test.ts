import { classifyMarket, createObservation } from './observation';
import { InvalidObservationError } from './errors';

describe('classifyMarket', () => {
  it('should classify player markets as props', () => {
    expect(classifyMarket('player_points')).toBe('PROP');
    expect(classifyMarket('player_rebounds_q1')).toBe('PROP');
  });

  it('should classify period and first-quarter markets', () => {
    expect(classifyMarket('totals_1st_period')).toBe('PERIOD');
    expect(classifyMarket('h2h_q1')).toBe('PERIOD');
  });

  it('should classify futures', () => {
    expect(classifyMarket('outrights_futures')).toBe('FUTURE');
  });

  it('should default everything else to main markets', () => {
    expect(classifyMarket('h2h')).toBe('MAIN');
    expect(classifyMarket('spreads')).toBe('MAIN');
    expect(classifyMarket('')).toBe('MAIN');
  });
});

describe('createObservation', () => {
  const base = {
    eventId: 'evt-1',
    sportKey: 'basketball_nba',
    marketKey: 'h2h',
    selection: 'Home Team',
    bookmaker: 'draftkings',
    oddsDecimal: 2.0,
    timestamp: '2026-01-10T18:00:00.000Z',
  };

  it('should derive family, implied probability and defaults', () => {
    const obs = createObservation(base);
    expect(obs.marketFamily).toBe('MAIN');
    expect(obs.impliedProb).toBe(0.5);
    expect(obs.handicap).toBeNull();
    expect(obs.isPlayerProp).toBe(false);
    expect(obs.playerName).toBeNull();
    expect(obs.timestamp.toISOString()).toBe('2026-01-10T18:00:00.000Z');
  });

  it('should freeze the observation', () => {
    expect(Object.isFrozen(createObservation(base))).toBe(true);
  });

  it('should default the sport key to unknown', () => {
    const obs = createObservation({ ...base, sportKey: undefined });
    expect(obs.sportKey).toBe('unknown');
  });

  it('should use the selection as player name on props unless one is given', () => {
    const prop = createObservation({ ...base, marketKey: 'player_points', selection: 'Jane Doe' });
    expect(prop.isPlayerProp).toBe(true);
    expect(prop.playerName).toBe('Jane Doe');

    const named = createObservation({
      ...base,
      marketKey: 'player_points',
      selection: 'Jane Doe Over',
      playerName: 'Jane Doe',
    });
    expect(named.playerName).toBe('Jane Doe');
  });

  it('should reject odds at or below 1.0', () => {
    expect(() => createObservation({ ...base, oddsDecimal: 1.0 })).toThrow(InvalidObservationError);
    expect(() => createObservation({ ...base, oddsDecimal: 0 })).toThrow('Odds must be > 1.0, got 0');
    expect(() => createObservation({ ...base, oddsDecimal: NaN })).toThrow(InvalidObservationError);
  });

  it('should reject unparseable timestamps', () => {
    expect(() => createObservation({ ...base, timestamp: 'not-a-date' })).toThrow('Invalid timestamp: not-a-date');
  });

  it('should reject rows without identity', () => {
    expect(() => createObservation({ ...base, eventId: '' })).toThrow(InvalidObservationError);
  });
});
