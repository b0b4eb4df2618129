import { OddsApiClient, HttpClient, HttpResponse } from '../clients/oddsApiClient';
import { SettlementService, buildTrainingRows } from './settlementService';
import { MarketDataStore } from './marketDataStore';
import { FeatureRecord } from '../types/markets';
import { OddsApiScore } from '../types/oddsApi';

const event = {
  id: 'evt-1',
  sportKey: 'basketball_nba',
  commenceTime: '2026-01-10T19:00:00.000Z',
  homeTeam: 'Boston Celtics',
  awayTeam: 'New York Knicks',
};

function score(overrides: Partial<OddsApiScore> = {}): OddsApiScore {
  return {
    id: 'evt-1',
    sport_key: 'basketball_nba',
    commence_time: '2026-01-10T19:00:00Z',
    completed: true,
    home_team: 'Boston Celtics',
    away_team: 'New York Knicks',
    scores: [
      { name: 'Boston Celtics', score: '98' },
      { name: 'New York Knicks', score: '104' },
    ],
    ...overrides,
  };
}

function feature(selection: string, overrides: Partial<FeatureRecord> = {}): FeatureRecord {
  return {
    eventId: 'evt-1',
    sportKey: 'basketball_nba',
    marketKey: 'h2h',
    marketFamily: 'MAIN',
    selection,
    book: 'draftkings',
    timestamp: new Date('2026-01-10T12:00:00.000Z'),
    pImplied: 0.5,
    pFairConsensus: 0.52,
    velocity: 0,
    contextUncertainty: 0,
    clvProjected: 0.52,
    playerAvailability: 1,
    ...overrides,
  };
}

describe('SettlementService', () => {
  let get: jest.Mock<Promise<HttpResponse>, Parameters<HttpClient['get']>>;
  let store: MarketDataStore;
  let service: SettlementService;

  beforeEach(() => {
    get = jest.fn<Promise<HttpResponse>, Parameters<HttpClient['get']>>();
    store = new MarketDataStore();
    store.upsertEvent(event);
    service = new SettlementService(new OddsApiClient({ apiKey: 'test-key', http: { get } }), store);
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should settle completed games with both scores', () => {
    expect(service.applyScores([score()])).toBe(1);
    expect(store.getEvent('evt-1')).toMatchObject({
      completed: true,
      homeScore: 98,
      awayScore: 104,
      winner: 'New York Knicks',
    });
  });

  it('should ignore unfinished, unknown, unscored and already settled games', () => {
    expect(service.applyScores([score({ completed: false })])).toBe(0);
    expect(service.applyScores([score({ id: 'evt-unknown' })])).toBe(0);
    expect(service.applyScores([score({ scores: null })])).toBe(0);
    expect(service.applyScores([score({ scores: [{ name: 'Boston Celtics', score: '98' }] })])).toBe(0);
    expect(service.applyScores([score()])).toBe(1);
    expect(service.applyScores([score()])).toBe(0);
  });

  it('should fetch scores and settle each sport, skipping failures', async () => {
    get
      .mockRejectedValueOnce(new Error('offline'))
      .mockResolvedValueOnce({ data: [score()], status: 200, headers: {} });

    const settled = await service.updateAll(['icehockey_nhl', 'basketball_nba'], 2);

    expect(settled).toBe(1);
    expect(get).toHaveBeenLastCalledWith('/v4/sports/basketball_nba/scores', {
      params: { apiKey: 'test-key', daysFrom: 2 },
    });
  });
});

describe('buildTrainingRows', () => {
  it('should label moneyline features of settled games', () => {
    const store = new MarketDataStore();
    store.upsertEvent(event);
    store.upsertEvent({ ...event, id: 'evt-open' });
    store.settleEvent('evt-1', 110, 100);
    store.archiveFeatures([
      feature('Boston Celtics', { pFairConsensus: 0.61 }),
      feature('New York Knicks', { pFairConsensus: 0.41 }),
      feature('Draw'),
      feature('Boston Celtics', { marketKey: 'spreads' }),
      feature('Boston Celtics', { eventId: 'evt-open' }),
      feature('Boston Celtics', { eventId: 'evt-missing' }),
    ]);

    expect(buildTrainingRows(store)).toEqual([
      { sportKey: 'basketball_nba', marketFamily: 'MAIN', rawProbability: 0.61, outcome: 1 },
      { sportKey: 'basketball_nba', marketFamily: 'MAIN', rawProbability: 0.41, outcome: 0 },
    ]);
  });
});
