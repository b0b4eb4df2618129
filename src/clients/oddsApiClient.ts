import axios, { AxiosRequestConfig } from 'axios';
import { config } from '../config';
import { OddsApiError, errorMessage } from '../lib/errors';
import {
  OddsApiEvent,
  OddsApiHistoricalOdds,
  OddsApiScore,
  parseHistoricalOdds,
  parseOddsEvent,
  parseScore,
} from '../types/oddsApi';

export interface HttpResponse {
  data: unknown;
  status: number;
  headers: unknown;
}

export interface HttpClient {
  get(url: string, requestConfig?: AxiosRequestConfig): Promise<HttpResponse>;
}

export interface OddsApiClientOptions {
  host?: string;
  apiKey?: string;
  regions?: string[];
  markets?: string[];
  http?: HttpClient;
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

const LOW_QUOTA_WARNING = 50;

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// The history endpoint takes second precision: 2026-01-10T12:00:00Z
export function toApiTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

function readHeader(headers: unknown, name: string): string | undefined {
  if (typeof headers !== 'object' || headers === null) return undefined;
  const value: unknown = Reflect.get(headers, name);
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

/**
 * Wrapper for The Odds API v4. Retries network failures, timeouts and HTTP 429 with
 * exponential backoff; HTTP 401 is fatal.
 */
export class OddsApiClient {
  private readonly client: HttpClient;
  private readonly apiKey: string;
  private readonly regions: string[];
  private readonly markets: string[];
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: OddsApiClientOptions = {}) {
    const apiKey = options.apiKey ?? config.oddsApi.apiKey;
    if (!apiKey) {
      throw new Error('ODDS_API_KEY must be set to use the Odds API client');
    }
    this.apiKey = apiKey;
    this.regions = options.regions ?? config.oddsApi.regions;
    this.markets = options.markets ?? config.oddsApi.markets;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.baseDelayMs = options.baseDelayMs ?? 2000;
    this.maxDelayMs = options.maxDelayMs ?? 10000;
    this.sleep = options.sleep ?? defaultSleep;

    this.client = options.http ?? axios.create({
      baseURL: (options.host ?? config.oddsApi.host).replace(/\/$/, ''),
      timeout: 10000,
    });
  }

  /**
   * Fetch live/upcoming odds for a sport
   */
  async getUpcomingOdds(sportKey: string): Promise<OddsApiEvent[]> {
    const data = await this.get(`/v4/sports/${sportKey}/odds`, {
      regions: this.regions.join(','),
      markets: this.markets.join(','),
      oddsFormat: 'decimal',
    });
    const events = (Array.isArray(data) ? data : [])
      .map(parseOddsEvent)
      .filter((e): e is OddsApiEvent => e !== null);
    console.log(`[ODDS API] Fetched ${events.length} events for ${sportKey}`);
    return events;
  }

  /**
   * Fetch the odds snapshot closest to (at or before) `date`.
   * Returns null when the payload has no usable snapshot.
   */
  async getHistoricalOdds(sportKey: string, date: Date): Promise<OddsApiHistoricalOdds | null> {
    const data = await this.get(`/v4/sports/${sportKey}/odds-history`, {
      regions: this.regions.join(','),
      markets: this.markets.join(','),
      oddsFormat: 'decimal',
      date: toApiTimestamp(date),
    });
    const snapshot = parseHistoricalOdds(data);
    if (!snapshot) {
      console.warn(`[ODDS API] No historical snapshot for ${sportKey} at ${toApiTimestamp(date)}`);
    }
    return snapshot;
  }

  /**
   * Fetch recent scores (the API serves up to 3 days back)
   */
  async getScores(sportKey: string, daysFrom = 3): Promise<OddsApiScore[]> {
    const data = await this.get(`/v4/sports/${sportKey}/scores`, { daysFrom });
    return (Array.isArray(data) ? data : [])
      .map(parseScore)
      .filter((s): s is OddsApiScore => s !== null);
  }

  private async get(endpoint: string, params: Record<string, string | number>): Promise<unknown> {
    let lastError: OddsApiError | undefined;

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      try {
        const response = await this.client.get(endpoint, {
          params: { apiKey: this.apiKey, ...params },
        });
        this.checkQuota(response.headers);
        return response.data;
      } catch (error: unknown) {
        lastError = this.toOddsApiError(error, endpoint);
        if (!lastError.retryable) {
          throw lastError;
        }
        if (attempt < this.maxAttempts - 1) {
          const delay = this.getBackoffDelay(attempt);
          console.warn(`[ODDS API] ${lastError.message}; retrying in ${delay}ms (attempt ${attempt + 1}/${this.maxAttempts})`);
          await this.sleep(delay);
        }
      }
    }

    throw lastError ?? new OddsApiError(`Request to ${endpoint} failed`);
  }

  getBackoffDelay(attempt: number): number {
    return Math.min(this.maxDelayMs, this.baseDelayMs * Math.pow(2, attempt));
  }

  private checkQuota(headers: unknown): void {
    const remaining = readHeader(headers, 'x-requests-remaining');
    if (remaining === undefined) return;
    const parsed = parseInt(remaining, 10);
    if (!isNaN(parsed) && parsed < LOW_QUOTA_WARNING) {
      console.warn(`[ODDS API] Low API quota remaining: ${parsed}`);
    }
  }

  private toOddsApiError(error: unknown, endpoint: string): OddsApiError {
    if (error instanceof OddsApiError) return error;

    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      if (status === undefined) {
        // No response: connection refused, DNS, timeout
        return new OddsApiError(`Network error on ${endpoint}: ${error.message}`, undefined, true);
      }
      if (status === 401) {
        console.error('[ODDS API] Invalid API key.');
        return new OddsApiError(`Unauthorized (401) on ${endpoint}`, status, false);
      }
      if (status === 429) {
        console.error('[ODDS API] Rate limit exceeded.');
        return new OddsApiError(`Rate limited (429) on ${endpoint}`, status, true);
      }
      return new OddsApiError(`HTTP ${status} on ${endpoint}: ${error.message}`, status, false);
    }

    return new OddsApiError(`Request to ${endpoint} failed: ${errorMessage(error)}`);
  }
}
