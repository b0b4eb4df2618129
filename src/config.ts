import dotenv from 'dotenv';
import * as path from 'path';

// Load .env file from project root
dotenv.config({ path: path.resolve(__dirname, '..', '.env') });

interface Config {
  oddsApi: {
    host: string;
    apiKey?: string;
    sports: string[];
    markets: string[];
    regions: string[];
    bookmakers: string[];
  };
  strategy: {
    bankroll: number;
    maxDailyStakePercent: number;
    kellyFraction: number;
    uncertaintyPenaltyThreshold: number;
    injuryEdgeThreshold: number;
  };
  model: {
    historyBufferSize: number;
    minSamplesForSplit: number;
  };
  cycle: {
    lookaheadHours: number;
    liveOddsLookbackHours: number;
    settlementDaysBack: number;
  };
  backfill: {
    days: number;
    intervalHours: number;
    pauseMs: number;
  };
  storage: {
    dataDir: string;
  };
  twilio?: {
    accountSid: string;
    authToken: string;
    fromNumber: string;
    alertToNumber: string;
  };
  bot: {
    runScheduleCron?: string;
    ingestScheduleCron?: string;
    backfillScheduleCron?: string;
  };
}

function requireEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Required environment variable ${key} is not set`);
  }
  return value;
}

function getOptionalEnv(key: string, defaultValue?: string): string | undefined {
  return process.env[key] || defaultValue;
}

function getNumberEnv(key: string, defaultValue: number): number {
  const raw = getOptionalEnv(key);
  if (raw === undefined) return defaultValue;
  const parsed = parseFloat(raw);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be numeric, got "${raw}"`);
  }
  return parsed;
}

// Comma-separated env lists ("a, b,c") -> ['a', 'b', 'c']
export function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

export const config: Config = {
  oddsApi: {
    host: getOptionalEnv('ODDS_API_HOST', 'https://api.the-odds-api.com') || '',
    apiKey: getOptionalEnv('ODDS_API_KEY'),
    sports: parseList(getOptionalEnv('TARGET_SPORTS', 'basketball_nba,americanfootball_nfl,icehockey_nhl')),
    markets: parseList(getOptionalEnv('TARGET_MARKETS', 'h2h,spreads,totals,player_points')),
    regions: parseList(getOptionalEnv('TARGET_REGIONS', 'us,us2')),
    bookmakers: parseList(getOptionalEnv('TARGET_BOOKMAKERS', 'draftkings,pinnacle,fanduel,betmgm')),
  },
  strategy: {
    bankroll: getNumberEnv('BANKROLL', 10000),
    maxDailyStakePercent: getNumberEnv('MAX_DAILY_STAKE_PERCENT', 0.05),
    kellyFraction: getNumberEnv('KELLY_FRACTION', 0.25),
    uncertaintyPenaltyThreshold: getNumberEnv('UNCERTAINTY_PENALTY_THRESHOLD', 0.5),
    injuryEdgeThreshold: getNumberEnv('INJURY_EDGE_THRESHOLD', 0.1),
  },
  model: {
    historyBufferSize: getNumberEnv('FEATURE_HISTORY_BUFFER_SIZE', 5),
    minSamplesForSplit: getNumberEnv('MIN_SAMPLES_FOR_SPLIT', 50),
  },
  cycle: {
    lookaheadHours: getNumberEnv('LOOKAHEAD_HOURS', 30),
    liveOddsLookbackHours: getNumberEnv('LIVE_ODDS_LOOKBACK_HOURS', 24),
    settlementDaysBack: getNumberEnv('SETTLEMENT_DAYS_BACK', 3),
  },
  backfill: {
    days: getNumberEnv('BACKFILL_DAYS', 30),
    intervalHours: getNumberEnv('BACKFILL_INTERVAL_HOURS', 24),
    pauseMs: getNumberEnv('BACKFILL_PAUSE_MS', 1500),
  },
  storage: {
    dataDir: path.resolve(getOptionalEnv('DATA_DIR', path.resolve(__dirname, '..', 'data')) || 'data'),
  },
  twilio: getOptionalEnv('TWILIO_ACCOUNT_SID') ? {
    accountSid: requireEnv('TWILIO_ACCOUNT_SID'),
    authToken: requireEnv('TWILIO_AUTH_TOKEN'),
    fromNumber: requireEnv('TWILIO_FROM_NUMBER'),
    alertToNumber: requireEnv('ALERT_TO_NUMBER'),
  } : undefined,
  bot: {
    runScheduleCron: getOptionalEnv('RUN_SCHEDULE_CRON'),
    ingestScheduleCron: getOptionalEnv('INGEST_SCHEDULE_CRON'),
    backfillScheduleCron: getOptionalEnv('BACKFILL_SCHEDULE_CRON'),
  },
};

// Log config status (without sensitive data) for debugging
if (process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test') {
  console.log('Config loaded successfully:');
  console.log(`  Odds API Host: ${config.oddsApi.host}`);
  console.log(`  Odds API Key: ${config.oddsApi.apiKey ? `${config.oddsApi.apiKey.substring(0, 4)}...` : 'NOT SET'}`);
  console.log(`  Sports: ${config.oddsApi.sports.join(', ')}`);
  console.log(`  Bankroll: $${config.strategy.bankroll.toFixed(2)} (max ${config.strategy.maxDailyStakePercent * 100}% per day)`);
  console.log(`  Data Dir: ${config.storage.dataDir}`);
}
