import { OddsApiClient, HttpClient, HttpResponse } from '../clients/oddsApiClient';
import { IngestionService, buildLiveOdds } from './ingestionService';
import { MarketDataStore } from './marketDataStore';
import { RawOddsRow } from '../types/markets';

const NOW = new Date('2026-01-10T12:00:00.000Z');

function oddsEvent(homePrice = 1.8) {
  return {
    id: 'evt-1',
    sport_key: 'basketball_nba',
    commence_time: '2026-01-10T19:00:00Z',
    home_team: 'Boston Celtics',
    away_team: 'New York Knicks',
    bookmakers: [
      {
        key: 'draftkings',
        markets: [
          {
            key: 'h2h',
            outcomes: [
              { name: 'Boston Celtics', price: homePrice },
              { name: 'New York Knicks', price: 2.05 },
            ],
          },
          { key: 'spreads', outcomes: [{ name: 'Boston Celtics', price: 1.91, point: -3.5 }] },
          { key: 'player_points', outcomes: [{ name: 'Over', description: 'Jane Doe', price: 1.87, point: 20.5 }] },
        ],
      },
      {
        key: 'otherbook',
        markets: [{ key: 'h2h', outcomes: [{ name: 'Boston Celtics', price: 1.75 }] }],
      },
    ],
  };
}

describe('IngestionService', () => {
  let get: jest.Mock<Promise<HttpResponse>, Parameters<HttpClient['get']>>;
  let store: MarketDataStore;
  let service: IngestionService;

  beforeEach(() => {
    get = jest.fn<Promise<HttpResponse>, Parameters<HttpClient['get']>>();
    const client = new OddsApiClient({
      apiKey: 'test-key',
      regions: ['us'],
      markets: ['h2h', 'spreads', 'player_points'],
      http: { get },
      sleep: () => Promise.resolve(),
    });
    store = new MarketDataStore();
    service = new IngestionService(client, store, ['draftkings']);
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should store the event and one snapshot per outcome from wanted books', async () => {
    get.mockResolvedValueOnce({ data: [oddsEvent()], status: 200, headers: {} });

    const summary = await service.ingestSport('basketball_nba', NOW);

    expect(summary).toEqual({ sportKey: 'basketball_nba', events: 1, saved: 4, duplicates: 0 });
    expect(store.getEvent('evt-1')).toEqual({
      id: 'evt-1',
      sportKey: 'basketball_nba',
      commenceTime: '2026-01-10T19:00:00.000Z',
      homeTeam: 'Boston Celtics',
      awayTeam: 'New York Knicks',
      completed: false,
    });

    const rows = store.snapshotsForEvents(['evt-1']);
    expect(rows.every((r) => r.bookmaker === 'draftkings')).toBe(true);
    expect(rows.find((r) => r.marketKey === 'spreads')).toMatchObject({ handicap: -3.5, playerName: null });
    expect(rows.find((r) => r.marketKey === 'player_points')).toMatchObject({
      selection: 'Jane Doe Over',
      playerName: 'Jane Doe',
      handicap: 20.5,
      oddsDecimal: 1.87,
      timestamp: '2026-01-10T12:00:00.000Z',
    });
  });

  it('should still store the good events when one has an unreadable start time', async () => {
    get.mockResolvedValueOnce({
      data: [{ ...oddsEvent(), id: 'evt-bad', commence_time: 'TBD' }, oddsEvent()],
      status: 200,
      headers: {},
    });

    const summaries = await service.runIngest(['basketball_nba'], NOW);

    expect(summaries).toEqual([{ sportKey: 'basketball_nba', events: 1, saved: 4, duplicates: 0 }]);
    expect(store.getEvent('evt-1')).toBeDefined();
    expect(store.getEvent('evt-bad')).toBeUndefined();
    expect(console.error).not.toHaveBeenCalled();
  });

  it('should count unchanged prices as duplicates', async () => {
    get
      .mockResolvedValueOnce({ data: [oddsEvent()], status: 200, headers: {} })
      .mockResolvedValueOnce({ data: [oddsEvent(1.7)], status: 200, headers: {} });

    await service.ingestSport('basketball_nba', NOW);
    const second = await service.ingestSport('basketball_nba', new Date('2026-01-10T12:30:00.000Z'));

    expect(second.saved).toBe(1);
    expect(second.duplicates).toBe(3);
  });

  it('should keep every book when no filter is given', async () => {
    const client = new OddsApiClient({ apiKey: 'test-key', http: { get } });
    const unfiltered = new IngestionService(client, store);
    get.mockResolvedValueOnce({ data: [oddsEvent()], status: 200, headers: {} });

    const summary = await unfiltered.ingestSport('basketball_nba', NOW);
    expect(summary.saved).toBe(5);
  });

  it('should carry on when one sport fails', async () => {
    get
      .mockRejectedValueOnce(new Error('boom'))
      .mockResolvedValueOnce({ data: [oddsEvent()], status: 200, headers: {} });

    const summaries = await service.runIngest(['icehockey_nhl', 'basketball_nba'], NOW);

    expect(summaries.map((s) => s.sportKey)).toEqual(['basketball_nba']);
    expect(console.error).toHaveBeenCalledWith(
      '[INGEST] Failed to ingest icehockey_nhl: Request to /v4/sports/icehockey_nhl/odds failed: boom'
    );
  });
});

describe('buildLiveOdds', () => {
  function row(bookmaker: string, oddsDecimal: number, timestamp: string, eventId = 'evt-1', marketKey = 'h2h'): RawOddsRow {
    return { eventId, marketKey, selection: 'Boston Celtics', bookmaker, oddsDecimal, timestamp };
  }

  it('should keep the latest price per book for each event since the cutoff', () => {
    const liveOdds = buildLiveOdds(
      [
        row('pinnacle', 1.6, '2026-01-09T06:00:00.000Z'),
        row('draftkings', 1.8, '2026-01-10T10:00:00.000Z'),
        row('draftkings', 1.75, '2026-01-10T11:00:00.000Z'),
        row('pinnacle', 2.2, '2026-01-10T11:00:00.000Z', 'evt-2'),
      ],
      new Date('2026-01-10T00:00:00.000Z')
    );

    expect(liveOdds).toEqual({
      'evt-1': { draftkings: 1.75 },
      'evt-2': { pinnacle: 2.2 },
    });
  });

  it('should not let other markets replace a book moneyline price', () => {
    const liveOdds = buildLiveOdds(
      [
        row('draftkings', 1.95, '2026-01-10T09:00:00.000Z', 'evt-1', 'player_points'),
        row('draftkings', 1.8, '2026-01-10T10:00:00.000Z'),
        row('draftkings', 1.87, '2026-01-10T11:00:00.000Z', 'evt-1', 'player_points'),
        row('pinnacle', 1.91, '2026-01-10T11:00:00.000Z', 'evt-1', 'totals'),
      ],
      new Date('2026-01-10T00:00:00.000Z')
    );

    expect(liveOdds).toEqual({ 'evt-1': { draftkings: 1.8, pinnacle: 1.91 } });
  });
});
