/**
 * Statistics - small pure helpers shared by the engine components
 */

export class Statistics {
  static mean(values: readonly number[]): number {
    if (values.length === 0) return NaN;
    let sum = 0;
    for (const v of values) sum += v;
    return sum / values.length;
  }

  /**
   * Median of the values (mean of the middle pair for even lengths)
   */
  static median(values: readonly number[]): number {
    if (values.length === 0) return NaN;
    const sorted = [...values].sort((a, b) => a - b);
    const mid = Math.floor(sorted.length / 2);
    return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
  }

  /**
   * Fraction of history values at or below the given value
   */
  static percentileRank(value: number, history: readonly number[]): number {
    const finite = history.filter((h) => Number.isFinite(h));
    if (finite.length === 0 || !Number.isFinite(value)) return 0;
    let count = 0;
    for (const h of finite) {
      if (h <= value) count++;
    }
    return count / finite.length;
  }

  /**
   * Pearson correlation; 0 when either side has zero variance
   */
  static pearson(xs: readonly number[], ys: readonly number[]): number {
    const n = Math.min(xs.length, ys.length);
    if (n < 2) return 0;
    const x = xs.slice(xs.length - n);
    const y = ys.slice(ys.length - n);
    const mx = Statistics.mean(x);
    const my = Statistics.mean(y);
    let cov = 0;
    let vx = 0;
    let vy = 0;
    for (let i = 0; i < n; i++) {
      const dx = x[i] - mx;
      const dy = y[i] - my;
      cov += dx * dy;
      vx += dx * dx;
      vy += dy * dy;
    }
    if (vx === 0 || vy === 0) return 0;
    const r = cov / Math.sqrt(vx * vy);
    return Math.max(-1, Math.min(1, r));
  }

  static clamp(value: number, min: number, max: number): number {
    return Math.max(min, Math.min(max, value));
  }

  static clamp01(value: number): number {
    if (Number.isNaN(value)) return 0;
    return Statistics.clamp(value, 0, 1);
  }

  /**
   * Simple returns c[i]/c[i-1] - 1 for the whole series
   */
  static returns(closes: readonly number[]): number[] {
    const out: number[] = [];
    for (let i = 1; i < closes.length; i++) {
      out.push(closes[i] / closes[i - 1] - 1);
    }
    return out;
  }
}
