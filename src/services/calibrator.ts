import { CalibrationQuery, CalibrationRow } from '../types/markets';
import { IsotonicRegression } from '../lib/isotonic';

export const DEFAULT_MIN_SAMPLES_FOR_SPLIT = 50;

export interface BucketInfo {
  sportKey: string;
  marketFamily: string;
  samples: number;
}

/**
 * Read-only probability correction. Built once per training pass;
 * retraining produces a new model instead of mutating this one.
 */
export interface CalibrationModel {
  readonly trained: boolean;
  readonly trainingSamples: number;
  buckets(): BucketInfo[];
  hasBucket(sportKey: string, marketFamily: string): boolean;
  predict(row: CalibrationQuery): number;
}

function bucketKey(sportKey: string, marketFamily: string): string {
  return JSON.stringify([sportKey, marketFamily]);
}

/**
 * Returned before any training data exists. Predictions pass the raw probability through.
 */
export class UncalibratedModel implements CalibrationModel {
  readonly trained = false;
  readonly trainingSamples = 0;
  private warned = false;

  buckets(): BucketInfo[] {
    return [];
  }

  hasBucket(): boolean {
    return false;
  }

  predict(row: CalibrationQuery): number {
    if (!this.warned) {
      console.warn('[CALIBRATOR] Model is uncalibrated; returning raw probabilities');
      this.warned = true;
    }
    return row.rawProbability;
  }
}

class TrainedCalibration implements CalibrationModel {
  readonly trained = true;

  constructor(
    readonly trainingSamples: number,
    private readonly globalMapping: IsotonicRegression,
    private readonly bucketMappings: ReadonlyMap<string, { info: BucketInfo; mapping: IsotonicRegression }>
  ) {}

  buckets(): BucketInfo[] {
    return Array.from(this.bucketMappings.values(), (b) => ({ ...b.info }));
  }

  hasBucket(sportKey: string, marketFamily: string): boolean {
    return this.bucketMappings.has(bucketKey(sportKey, marketFamily));
  }

  /**
   * Most specific mapping available: the (sport, family) bucket, else global.
   */
  predict(row: CalibrationQuery): number {
    const bucket = this.bucketMappings.get(bucketKey(row.sportKey, row.marketFamily));
    const mapping = bucket ? bucket.mapping : this.globalMapping;
    return mapping.predict(row.rawProbability);
  }
}

export interface HierarchicalCalibratorOptions {
  minSamplesForSplit?: number;
}

/**
 * Pools small (sport, market family) groups into one global isotonic fit and gives
 * well-observed groups their own correction curve.
 */
export class HierarchicalCalibrator {
  private readonly minSamplesForSplit: number;

  constructor(options: HierarchicalCalibratorOptions = {}) {
    this.minSamplesForSplit = options.minSamplesForSplit ?? DEFAULT_MIN_SAMPLES_FOR_SPLIT;
  }

  fit(rows: readonly CalibrationRow[]): CalibrationModel {
    const usable = rows.filter(
      (r) => Number.isFinite(r.rawProbability) && (r.outcome === 0 || r.outcome === 1)
    );
    if (usable.length < rows.length) {
      console.warn(`[CALIBRATOR] Dropped ${rows.length - usable.length} unusable training rows`);
    }
    if (usable.length === 0) {
      console.warn('[CALIBRATOR] No training rows; model remains uncalibrated');
      return new UncalibratedModel();
    }

    const globalMapping = this.fitMapping(usable);

    const groups = new Map<string, { sportKey: string; marketFamily: string; rows: CalibrationRow[] }>();
    for (const row of usable) {
      const key = bucketKey(row.sportKey, row.marketFamily);
      let group = groups.get(key);
      if (!group) {
        group = { sportKey: row.sportKey, marketFamily: row.marketFamily, rows: [] };
        groups.set(key, group);
      }
      group.rows.push(row);
    }

    const bucketMappings = new Map<string, { info: BucketInfo; mapping: IsotonicRegression }>();
    for (const [key, group] of groups) {
      const label = `${group.sportKey}_${group.marketFamily}`;
      if (group.rows.length > this.minSamplesForSplit) {
        bucketMappings.set(key, {
          info: { sportKey: group.sportKey, marketFamily: group.marketFamily, samples: group.rows.length },
          mapping: this.fitMapping(group.rows),
        });
        console.log(`[CALIBRATOR] Calibrated bucket: ${label} (n=${group.rows.length})`);
      } else {
        console.log(`[CALIBRATOR] Skipping bucket ${label} (n=${group.rows.length}), using global`);
      }
    }

    console.log(`[CALIBRATOR] Trained on ${usable.length} rows, ${bucketMappings.size} dedicated buckets`);
    return new TrainedCalibration(usable.length, globalMapping, bucketMappings);
  }

  private fitMapping(rows: readonly CalibrationRow[]): IsotonicRegression {
    return IsotonicRegression.fit(
      rows.map((r) => r.rawProbability),
      rows.map((r) => r.outcome),
      { yMin: 0, yMax: 1 }
    );
  }
}

/**
 * Holds the model currently serving predictions. Retraining swaps in a whole new model.
 */
export class ModelHolder {
  private model: CalibrationModel;

  constructor(initial: CalibrationModel = new UncalibratedModel()) {
    this.model = initial;
  }

  get current(): CalibrationModel {
    return this.model;
  }

  swap(next: CalibrationModel): CalibrationModel {
    const previous = this.model;
    this.model = next;
    return previous;
  }

  predict(row: CalibrationQuery): number {
    return this.model.predict(row);
  }
}
