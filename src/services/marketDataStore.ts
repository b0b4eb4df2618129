import * as fs from 'fs';
import * as path from 'path';
import { FeatureRecord, MarketFamily, MARKET_FAMILIES, RawOddsRow } from '../types/markets';
import { errorMessage } from '../lib/errors';

export interface StoredEvent {
  id: string;
  sportKey: string;
  commenceTime: string; // ISO
  homeTeam: string;
  awayTeam: string;
  completed: boolean;
  homeScore?: number;
  awayScore?: number;
  winner?: string; // winning team name
}

export interface StoredSnapshot {
  eventId: string;
  sportKey: string;
  marketKey: string;
  selection: string;
  handicap: number | null;
  bookmaker: string;
  oddsDecimal: number;
  timestamp: string; // ISO
  playerName: string | null;
}

export type StoredFeature = Omit<FeatureRecord, 'timestamp'> & { timestamp: string };

export type SnapshotIdentity = Pick<StoredSnapshot, 'eventId' | 'bookmaker' | 'marketKey' | 'selection' | 'handicap'>;

const EVENTS_FILE = 'events.jsonl';
const SNAPSHOTS_FILE = 'snapshots.jsonl';
const FEATURES_FILE = 'features.jsonl';

function identityKey(s: SnapshotIdentity): string {
  return JSON.stringify([s.eventId, s.bookmaker, s.marketKey, s.selection, s.handicap]);
}

function featureKey(f: Pick<StoredFeature, 'eventId' | 'marketKey' | 'selection' | 'book' | 'timestamp'>): string {
  return JSON.stringify([f.eventId, f.marketKey, f.selection, f.book, f.timestamp]);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStoredEvent(value: unknown): value is StoredEvent {
  return (
    isRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.sportKey === 'string' &&
    typeof value.commenceTime === 'string' &&
    typeof value.homeTeam === 'string' &&
    typeof value.awayTeam === 'string' &&
    typeof value.completed === 'boolean'
  );
}

function isStoredSnapshot(value: unknown): value is StoredSnapshot {
  return (
    isRecord(value) &&
    typeof value.eventId === 'string' &&
    typeof value.sportKey === 'string' &&
    typeof value.marketKey === 'string' &&
    typeof value.selection === 'string' &&
    typeof value.bookmaker === 'string' &&
    (value.playerName === null || typeof value.playerName === 'string') &&
    typeof value.oddsDecimal === 'number' &&
    typeof value.timestamp === 'string' &&
    (value.handicap === null || typeof value.handicap === 'number')
  );
}

function isMarketFamily(value: unknown): value is MarketFamily {
  return typeof value === 'string' && MARKET_FAMILIES.some((f) => f === value);
}

function isStoredFeature(value: unknown): value is StoredFeature {
  return (
    isRecord(value) &&
    typeof value.eventId === 'string' &&
    typeof value.sportKey === 'string' &&
    typeof value.selection === 'string' &&
    typeof value.marketKey === 'string' &&
    typeof value.book === 'string' &&
    isMarketFamily(value.marketFamily) &&
    typeof value.timestamp === 'string' &&
    ['pImplied', 'pFairConsensus', 'velocity', 'contextUncertainty', 'clvProjected', 'playerAvailability'].every(
      (field) => typeof value[field] === 'number'
    )
  );
}

/**
 * Events, odds snapshots and archived features. Held in memory; when a data
 * directory is given every write is also appended to a JSONL file there and
 * reloaded on construction.
 */
export class MarketDataStore {
  private readonly events = new Map<string, StoredEvent>();
  private readonly snapshots: StoredSnapshot[] = [];
  private readonly lastByIdentity = new Map<string, StoredSnapshot>();
  private readonly featureArchive: StoredFeature[] = [];
  private readonly archivedKeys = new Set<string>();

  constructor(private readonly dataDir?: string) {
    if (dataDir) {
      this.load();
    }
  }

  /**
   * Add an event, or move an existing one's start time. Settled state is kept and
   * nothing is written when the start time has not changed.
   */
  upsertEvent(event: Omit<StoredEvent, 'completed'>): StoredEvent {
    const existing = this.events.get(event.id);
    if (existing && existing.commenceTime === event.commenceTime) {
      return existing;
    }
    const next: StoredEvent = existing
      ? { ...existing, commenceTime: event.commenceTime }
      : { ...event, completed: false };
    this.events.set(next.id, next);
    this.append(EVENTS_FILE, next);
    return next;
  }

  getEvent(id: string): StoredEvent | undefined {
    return this.events.get(id);
  }

  /**
   * Record the final score. Home wins on a strictly higher score, otherwise away.
   */
  settleEvent(id: string, homeScore: number, awayScore: number): StoredEvent | undefined {
    const existing = this.events.get(id);
    if (!existing) return undefined;

    const next: StoredEvent = {
      ...existing,
      completed: true,
      homeScore,
      awayScore,
      winner: homeScore > awayScore ? existing.homeTeam : existing.awayTeam,
    };
    this.events.set(id, next);
    this.append(EVENTS_FILE, next);
    return next;
  }

  upcomingEvents(from: Date, to: Date): StoredEvent[] {
    const lo = from.getTime();
    const hi = to.getTime();
    return Array.from(this.events.values()).filter((e) => {
      const t = new Date(e.commenceTime).getTime();
      return t >= lo && t <= hi;
    });
  }

  completedEvents(): StoredEvent[] {
    return Array.from(this.events.values()).filter((e) => e.completed);
  }

  lastSnapshot(identity: SnapshotIdentity): StoredSnapshot | undefined {
    return this.lastByIdentity.get(identityKey(identity));
  }

  /**
   * Store a snapshot unless its odds equal the last stored value for the same
   * book/market/selection/handicap. Returns whether it was stored.
   */
  saveSnapshot(snapshot: StoredSnapshot): boolean {
    const last = this.lastSnapshot(snapshot);
    if (last && last.oddsDecimal === snapshot.oddsDecimal) {
      return false;
    }
    this.addSnapshot(snapshot);
    this.append(SNAPSHOTS_FILE, snapshot);
    return true;
  }

  /**
   * Snapshot rows for the given events, oldest first.
   */
  snapshotsForEvents(eventIds: readonly string[]): RawOddsRow[] {
    const wanted = new Set(eventIds);
    return this.snapshots
      .filter((s) => wanted.has(s.eventId))
      .map((s) => ({ ...s }))
      .sort((a, b) => new Date(a.timestamp).getTime() - new Date(b.timestamp).getTime());
  }

  /**
   * Archive feature records not archived before (same event, market, selection,
   * book and time). Returns how many were added.
   */
  archiveFeatures(features: readonly FeatureRecord[]): number {
    let added = 0;
    for (const f of features) {
      const stored: StoredFeature = { ...f, timestamp: f.timestamp.toISOString() };
      if (!this.addFeature(stored)) continue;
      this.append(FEATURES_FILE, stored);
      added++;
    }
    return added;
  }

  archivedFeatures(): readonly StoredFeature[] {
    return this.featureArchive;
  }

  private addFeature(feature: StoredFeature): boolean {
    const key = featureKey(feature);
    if (this.archivedKeys.has(key)) return false;
    this.archivedKeys.add(key);
    this.featureArchive.push(feature);
    return true;
  }

  private addSnapshot(snapshot: StoredSnapshot): void {
    this.snapshots.push(snapshot);
    this.lastByIdentity.set(identityKey(snapshot), snapshot);
  }

  private append(file: string, record: object): void {
    if (!this.dataDir) return;
    try {
      fs.mkdirSync(this.dataDir, { recursive: true });
      fs.appendFileSync(path.join(this.dataDir, file), JSON.stringify(record) + '\n', 'utf8');
    } catch (error: unknown) {
      console.error(`[STORE] Failed to write ${file}: ${errorMessage(error)}`);
    }
  }

  private load(): void {
    for (const value of this.readLines(EVENTS_FILE)) {
      if (isStoredEvent(value)) this.events.set(value.id, value);
    }
    for (const value of this.readLines(SNAPSHOTS_FILE)) {
      if (isStoredSnapshot(value)) this.addSnapshot(value);
    }
    for (const value of this.readLines(FEATURES_FILE)) {
      if (isStoredFeature(value)) this.addFeature(value);
    }
    console.log(
      `[STORE] Loaded ${this.events.size} events, ${this.snapshots.length} snapshots, ${this.featureArchive.length} features`
    );
  }

  private readLines(file: string): unknown[] {
    if (!this.dataDir) return [];
    const filePath = path.join(this.dataDir, file);
    if (!fs.existsSync(filePath)) return [];

    const values: unknown[] = [];
    const lines = fs.readFileSync(filePath, 'utf8').split('\n');
    for (const line of lines) {
      if (!line.trim()) continue;
      try {
        const parsed: unknown = JSON.parse(line);
        values.push(parsed);
      } catch (error: unknown) {
        console.warn(`[STORE] Skipping corrupt line in ${file}: ${errorMessage(error)}`);
      }
    }
    return values;
  }
}
