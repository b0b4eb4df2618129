import cron from 'node-cron';
import { OddsApiClient } from './clients/oddsApiClient';
import { MarketDataStore } from './services/marketDataStore';
import { IngestionService, IngestSummary, buildLiveOdds } from './services/ingestionService';
import { BackfillService, BackfillSummary, backfillWindow } from './services/backfillService';
import { SettlementService, buildTrainingRows } from './services/settlementService';
import { HierarchicalCalibrator, ModelHolder } from './services/calibrator';
import { FeatureEngine } from './services/featureEngine';
import { DecisionEngine } from './services/decisionEngine';
import { runSignalPipeline } from './services/signalPipeline';
import { NotificationService } from './services/notificationService';
import { appendLedgerEntry } from './services/betLedger';
import { CandidateBet, InjuryRecord } from './types/markets';
import { colors } from './lib/colors';
import { errorMessage } from './lib/errors';
import { config, parseList } from './config';

const MS_PER_HOUR = 3600 * 1000;

export interface CycleOptions {
  now?: Date;
  bankroll?: number;
  sports?: string[];
  store?: MarketDataStore;
  client?: OddsApiClient;
  injuries?: Record<string, InjuryRecord>;
  notifier?: NotificationService;
  models?: ModelHolder;
}

export interface CycleReport {
  settled: number;
  trainingRows: number;
  upcomingEvents: number;
  processed: number;
  skipped: number;
  candidates: number;
  bets: CandidateBet[];
  bestBet: CandidateBet | null;
}

function emptyReport(settled: number, trainingRows: number): CycleReport {
  return { settled, trainingRows, upcomingEvents: 0, processed: 0, skipped: 0, candidates: 0, bets: [], bestBet: null };
}

function printBestBet(bet: CandidateBet | null): void {
  if (!bet) {
    console.log(`\n${colors.gray}🚫 No bets found meeting Edge/Kelly criteria today.${colors.reset}`);
    return;
  }
  const rule = '='.repeat(40);
  console.log(`\n${rule}`);
  console.log(`${colors.bright}${colors.green}🏆 BET OF THE DAY: ${bet.selection}${colors.reset}`);
  console.log(`${colors.gray}Event ID:${colors.reset} ${bet.eventId}`);
  console.log(`${colors.gray}Odds:${colors.reset}     ${colors.cyan}${bet.dkPrice.toFixed(2)}${colors.reset}`);
  console.log(`${colors.gray}Edge:${colors.reset}     ${colors.yellow}${(bet.evPercent * 100).toFixed(2)}%${colors.reset}`);
  console.log(`${colors.gray}Stake:${colors.reset}    ${colors.green}$${bet.stake.toFixed(2)}${colors.reset}`);
  console.log(`${rule}\n`);
}

/**
 * One decision cycle: settle results, retrain the calibrator, ingest odds,
 * build features for upcoming events, calibrate, decide and log the best bet.
 */
export async function runDecisionCycle(options: CycleOptions = {}): Promise<CycleReport> {
  const now = options.now ?? new Date();
  const sports = options.sports ?? config.oddsApi.sports;
  const bankroll = options.bankroll ?? config.strategy.bankroll;
  const store = options.store ?? new MarketDataStore(config.storage.dataDir);
  const client = options.client ?? new OddsApiClient();
  const models = options.models ?? new ModelHolder();

  console.log(`\n${colors.bright}${colors.cyan}--- STARTING DECISION ENGINE: ${now.toISOString()} ---${colors.reset}`);

  // 1. Settle recent results so they can label training rows
  const settlement = new SettlementService(client, store);
  const settled = await settlement.updateAll(sports, config.cycle.settlementDaysBack);

  // 2. Retrain and swap in the new calibration model
  const trainingRows = buildTrainingRows(store);
  const calibrator = new HierarchicalCalibrator({ minSamplesForSplit: config.model.minSamplesForSplit });
  models.swap(calibrator.fit(trainingRows));

  // 3. Fresh odds
  const ingestion = new IngestionService(client, store, config.oddsApi.bookmakers);
  await ingestion.runIngest(sports, now);

  // 4. Upcoming events in the lookahead window
  const lookahead = new Date(now.getTime() + config.cycle.lookaheadHours * MS_PER_HOUR);
  const upcoming = store.upcomingEvents(now, lookahead);
  if (upcoming.length === 0) {
    console.log('[CYCLE] No upcoming events; stopping.');
    return emptyReport(settled, trainingRows.length);
  }

  const rows = store.snapshotsForEvents(upcoming.map((e) => e.id));
  if (rows.length === 0) {
    console.warn('[CYCLE] No snapshot rows to process.');
    return { ...emptyReport(settled, trainingRows.length), upcomingEvents: upcoming.length };
  }

  const since = new Date(now.getTime() - config.cycle.liveOddsLookbackHours * MS_PER_HOUR);
  const context = {
    liveOdds: buildLiveOdds(rows, since),
    injuries: options.injuries ?? {},
  };

  // 5. Features -> calibration -> decisions
  const engine = new FeatureEngine({ historyBufferSize: config.model.historyBufferSize });
  const decisions = new DecisionEngine({
    bankroll,
    maxDailyStakePercent: config.strategy.maxDailyStakePercent,
    fractionalKelly: config.strategy.kellyFraction,
    uncertaintyPenaltyThreshold: config.strategy.uncertaintyPenaltyThreshold,
    uncertainEdgeThreshold: config.strategy.injuryEdgeThreshold,
  });
  const report = runSignalPipeline(rows, context, engine, models.current, decisions);
  console.log(
    `[CYCLE] ${report.processed} rows processed, ${report.skipped} skipped, ` +
    `${report.candidates.length} candidates, ${report.bets.length} passing bets`
  );

  // Records already archived by an earlier cycle are skipped by the store
  const archived = store.archiveFeatures(report.features);
  console.log(`[CYCLE] Archived ${archived} new feature records.`);

  const bestBet = report.bets.length > 0 ? report.bets[0] : null;
  printBestBet(bestBet);

  if (bestBet) {
    await appendLedgerEntry(bestBet, `EV ${(bestBet.evPercent * 100).toFixed(2)}% at ${bestBet.dkPrice.toFixed(2)}`, now);
    console.log('[CYCLE] Bet logged successfully.');

    const notifier = options.notifier ?? (config.twilio ? new NotificationService(config.twilio) : undefined);
    if (notifier) {
      try {
        await notifier.sendBetAlert(report.bets);
      } catch (error: unknown) {
        console.error(`[CYCLE] ${errorMessage(error)}`);
      }
    } else {
      console.log('[CYCLE] SMS alerts not configured; skipping.');
    }
  }

  return {
    settled,
    trainingRows: trainingRows.length,
    upcomingEvents: upcoming.length,
    processed: report.processed,
    skipped: report.skipped,
    candidates: report.candidates.length,
    bets: report.bets,
    bestBet,
  };
}

export interface IngestRunOptions {
  now?: Date;
  sports?: string[];
  store?: MarketDataStore;
  client?: OddsApiClient;
}

/**
 * Ingest-only run. Frequent runs between decision cycles give the feature
 * engine line history to measure drift from.
 */
export async function runIngestCycle(options: IngestRunOptions = {}): Promise<IngestSummary[]> {
  const store = options.store ?? new MarketDataStore(config.storage.dataDir);
  const client = options.client ?? new OddsApiClient();
  const ingestion = new IngestionService(client, store, config.oddsApi.bookmakers);
  return ingestion.runIngest(options.sports ?? config.oddsApi.sports, options.now ?? new Date());
}

export interface BackfillRunOptions extends IngestRunOptions {
  days?: number;
  intervalHours?: number;
  pauseMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export async function runBackfill(options: BackfillRunOptions = {}): Promise<BackfillSummary[]> {
  const store = options.store ?? new MarketDataStore(config.storage.dataDir);
  const client = options.client ?? new OddsApiClient();
  const days = options.days ?? config.backfill.days;
  const intervalHours = options.intervalHours ?? config.backfill.intervalHours;
  const { start, end } = backfillWindow(days, options.now ?? new Date());

  const backfill = new BackfillService(client, new IngestionService(client, store, config.oddsApi.bookmakers), {
    pauseMs: options.pauseMs ?? config.backfill.pauseMs,
    sleep: options.sleep,
  });

  console.log(`\n${colors.bright}${colors.cyan}--- STARTING BACKFILL: ${start.toISOString()} -> ${end.toISOString()} (every ${intervalHours}h) ---${colors.reset}`);
  const summaries: BackfillSummary[] = [];
  for (const sport of options.sports ?? config.oddsApi.sports) {
    summaries.push(await backfill.runBackfill(sport, start, end, intervalHours));
  }
  return summaries;
}

export type CliCommand = 'decide' | 'ingest' | 'backfill';

export interface CliArgs {
  command: CliCommand;
  sports?: string[];
  days?: number;
  intervalHours?: number;
}

function isCliCommand(value: string): value is CliCommand {
  return value === 'decide' || value === 'ingest' || value === 'backfill';
}

function parsePositive(flag: string, raw: string | undefined): number {
  const value = raw === undefined ? NaN : parseFloat(raw);
  if (!(value > 0)) {
    throw new Error(`${flag} needs a positive number, got "${raw ?? ''}"`);
  }
  return value;
}

/**
 * `[decide|ingest|backfill] [--sport a,b] [--days n] [--interval hours]`
 */
export function parseCliArgs(args: readonly string[]): CliArgs {
  const parsed: CliArgs = { command: 'decide' };
  let i = 0;

  const first = args.length > 0 ? args[0] : '';
  if (first && !first.startsWith('--')) {
    if (!isCliCommand(first)) {
      throw new Error(`Unknown command "${first}" (expected decide, ingest or backfill)`);
    }
    parsed.command = first;
    i = 1;
  }

  for (; i < args.length; i++) {
    const flag = args[i];
    if (flag === '--sport') {
      parsed.sports = [...(parsed.sports ?? []), ...parseList(args[++i])];
    } else if (flag === '--days') {
      parsed.days = parsePositive(flag, args[++i]);
    } else if (flag === '--interval') {
      parsed.intervalHours = parsePositive(flag, args[++i]);
    } else {
      throw new Error(`Unknown option "${flag}"`);
    }
  }

  return parsed;
}

async function runSafely(label: string, task: () => Promise<unknown>): Promise<void> {
  try {
    await task();
  } catch (error: unknown) {
    console.error(`${colors.red}Critical error in ${label}: ${errorMessage(error)}${colors.reset}`);
  }
}

// Main execution for CLI usage only
async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  const models = new ModelHolder();

  const modes: Record<CliCommand, { task: () => Promise<unknown>; cronExpression?: string }> = {
    decide: {
      task: () => runDecisionCycle({ models, sports: args.sports }),
      cronExpression: config.bot.runScheduleCron,
    },
    ingest: {
      task: () => runIngestCycle({ sports: args.sports }),
      cronExpression: config.bot.ingestScheduleCron,
    },
    backfill: {
      task: () => runBackfill({ sports: args.sports, days: args.days, intervalHours: args.intervalHours }),
      cronExpression: config.bot.backfillScheduleCron,
    },
  };
  const mode = modes[args.command];
  const label = `${args.command} run`;

  // Run once immediately
  await runSafely(label, mode.task);

  // Schedule recurring runs if cron expression is provided
  if (mode.cronExpression) {
    cron.schedule(mode.cronExpression, async () => {
      await runSafely(label, mode.task);
    });
  } else {
    process.exit(0);
  }
}

// Only attach process handlers and start when this file
// is executed directly (e.g. "node dist/index.js"), not when imported.
if (require.main === module) {
  process.on('unhandledRejection', (error: unknown) => {
    console.error('Unhandled rejection:', error);
    process.exit(1);
  });

  process.on('SIGINT', () => {
    process.exit(0);
  });

  main().catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
