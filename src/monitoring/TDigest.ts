/**
 * TDigest for Percentile Calculation
 *
 * Streaming percentile approximation for P50, P95, P99 latency estimation
 * without storing every sample. Values are buffered as unit centroids and
 * merged once `compression` of them have accumulated; centroids near the
 * tails stay small so extreme percentiles keep their accuracy.
 *
 * Based on Ted Dunning's merging TDigest.
 */

interface Centroid {
  mean: number;
  weight: number;
}

export class TDigest {
  private centroids: Centroid[] = [];
  private readonly compression: number;
  private count = 0;
  private unmerged = 0;
  private sum = 0;
  private min = Number.POSITIVE_INFINITY;
  private max = Number.NEGATIVE_INFINITY;

  constructor(compression = 100) {
    if (!Number.isFinite(compression) || compression < 10) {
      throw new RangeError(`compression must be at least 10, got ${compression}`);
    }
    this.compression = compression;
  }

  /**
   * Add a value to the digest. Non-finite values are ignored.
   */
  public add(value: number, weight = 1): void {
    if (!Number.isFinite(value) || !(weight > 0)) {
      return;
    }

    this.count += weight;
    this.sum += value * weight;
    this.min = Math.min(this.min, value);
    this.max = Math.max(this.max, value);

    this.centroids.push({ mean: value, weight });
    this.unmerged += 1;

    if (this.unmerged >= this.compression) {
      this.compress();
    }
  }

  /**
   * Get percentile (0.0 to 1.0). Does not modify the digest.
   *
   * While every centroid still holds a single sample this is the
   * nearest-rank value at index floor(q * count).
   */
  public percentile(q: number): number {
    if (this.count === 0) {
      return NaN;
    }

    if (q <= 0) {
      return this.min;
    }

    if (q >= 1) {
      return this.max;
    }

    const sorted = [...this.centroids].sort((a, b) => a.mean - b.mean);
    const target = q * this.count;
    let weightSoFar = 0;

    for (const centroid of sorted) {
      weightSoFar += centroid.weight;
      if (weightSoFar > target) {
        return Math.min(this.max, Math.max(this.min, centroid.mean));
      }
    }

    return this.max;
  }

  public getMin(): number {
    return this.count === 0 ? NaN : this.min;
  }

  public getMax(): number {
    return this.count === 0 ? NaN : this.max;
  }

  public getCount(): number {
    return this.count;
  }

  /**
   * Exact mean of all values added
   */
  public getMean(): number {
    return this.count === 0 ? NaN : this.sum / this.count;
  }

  /**
   * Number of centroids currently held
   */
  public size(): number {
    return this.centroids.length;
  }

  public reset(): void {
    this.centroids = [];
    this.count = 0;
    this.unmerged = 0;
    this.sum = 0;
    this.min = Number.POSITIVE_INFINITY;
    this.max = Number.NEGATIVE_INFINITY;
  }

  /**
   * Merge adjacent centroids while they stay under the size bound
   * 4 * count * q * (1 - q) / compression.
   */
  private compress(): void {
    const sorted = [...this.centroids].sort((a, b) => a.mean - b.mean);
    const merged: Centroid[] = [];
    let current = { ...sorted[0] };
    let weightSoFar = 0;

    for (let i = 1; i < sorted.length; i++) {
      const next = sorted[i];
      const q = (weightSoFar + current.weight + next.weight / 2) / this.count;
      const limit = Math.max(1, Math.floor((4 * this.count * q * (1 - q)) / this.compression));

      if (current.weight + next.weight <= limit) {
        const weight = current.weight + next.weight;
        current = {
          mean: (current.mean * current.weight + next.mean * next.weight) / weight,
          weight,
        };
      } else {
        merged.push(current);
        weightSoFar += current.weight;
        current = { ...next };
      }
    }

    merged.push(current);
    this.centroids = merged;
    this.unmerged = 0;
  }
}
