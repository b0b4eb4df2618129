import fs from 'fs';
import path from 'path';
import { CandidateBet } from '../types/markets';
import { errorMessage } from '../lib/errors';

export interface LedgerEntry extends CandidateBet {
  created_at: string;
  rationale: string;
  result: 'win' | 'loss' | null;
}

let ledgerPath = path.resolve(process.cwd(), 'bet_ledger.jsonl');

const inMemoryByEventId = new Map<string, LedgerEntry[]>();

export function setLedgerPath(filePath: string): void {
  ledgerPath = filePath;
}

export async function appendLedgerEntry(bet: CandidateBet, rationale: string, now: Date = new Date()): Promise<LedgerEntry> {
  const entry: LedgerEntry = {
    ...bet,
    created_at: now.toISOString(),
    rationale,
    result: null,
  };
  const line = JSON.stringify(entry) + '\n';

  try {
    await fs.promises.appendFile(ledgerPath, line, { encoding: 'utf8' });
  } catch (error: unknown) {
    // Best-effort only; a failed write must not stop the cycle.
    console.error(`[LEDGER] Failed to write bet log: ${errorMessage(error)}`);
  }

  const existing = inMemoryByEventId.get(entry.eventId) ?? [];
  existing.push(entry);
  inMemoryByEventId.set(entry.eventId, existing);
  return entry;
}

export function getLedgerEntriesByEventId(eventId: string): LedgerEntry[] {
  return inMemoryByEventId.get(eventId) ?? [];
}
