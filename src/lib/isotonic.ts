export interface IsotonicOptions {
  yMin?: number;
  yMax?: number;
}

// Pooled run of points[start..end]
interface Block {
  sumWY: number;
  sumW: number;
  start: number;
  end: number;
}

/**
 * Non-decreasing step fit (pool adjacent violators) with linear interpolation
 * between fitted knots. Inputs outside the training range clip to the end knots.
 */
export class IsotonicRegression {
  private constructor(
    readonly xKnots: readonly number[],
    readonly yKnots: readonly number[]
  ) {}

  static fit(xs: readonly number[], ys: readonly number[], options: IsotonicOptions = {}): IsotonicRegression {
    if (xs.length !== ys.length) {
      throw new Error(`Isotonic fit needs equal-length inputs (${xs.length} vs ${ys.length})`);
    }
    if (xs.length === 0) {
      throw new Error('Isotonic fit needs at least one sample');
    }

    const yMin = options.yMin ?? Number.NEGATIVE_INFINITY;
    const yMax = options.yMax ?? Number.POSITIVE_INFINITY;

    // Collapse duplicate x values into one weighted point each
    const order = xs.map((_, i) => i).sort((a, b) => xs[a] - xs[b]);
    const points: Array<{ x: number; sumY: number; w: number }> = [];
    for (const i of order) {
      const last = points[points.length - 1];
      if (last && last.x === xs[i]) {
        last.sumY += ys[i];
        last.w += 1;
      } else {
        points.push({ x: xs[i], sumY: ys[i], w: 1 });
      }
    }

    const blocks: Block[] = [];
    points.forEach((p, i) => {
      blocks.push({ sumWY: p.sumY, sumW: p.w, start: i, end: i });
      while (blocks.length > 1) {
        const b = blocks[blocks.length - 1];
        const a = blocks[blocks.length - 2];
        if (a.sumWY / a.sumW <= b.sumWY / b.sumW) break;
        blocks.pop();
        a.sumWY += b.sumWY;
        a.sumW += b.sumW;
        a.end = b.end;
      }
    });

    const xKnots: number[] = [];
    const yKnots: number[] = [];
    for (const block of blocks) {
      const value = Math.min(yMax, Math.max(yMin, block.sumWY / block.sumW));
      for (let i = block.start; i <= block.end; i++) {
        xKnots.push(points[i].x);
        yKnots.push(value);
      }
    }

    return new IsotonicRegression(xKnots, yKnots);
  }

  predict(x: number): number {
    const xk = this.xKnots;
    const yk = this.yKnots;
    const last = xk.length - 1;

    if (isNaN(x)) return yk[0];
    if (x <= xk[0]) return yk[0];
    if (x >= xk[last]) return yk[last];

    // first knot strictly greater than x
    let lo = 0;
    let hi = last;
    while (hi - lo > 1) {
      const mid = (lo + hi) >> 1;
      if (xk[mid] <= x) lo = mid;
      else hi = mid;
    }

    const t = (x - xk[lo]) / (xk[hi] - xk[lo]);
    return yk[lo] + t * (yk[hi] - yk[lo]);
  }
}
