/**
 * Metrics tracking per collection
 */

const MAX_SAMPLES = 100;

export interface CollectionMetrics {
  reads: number;
  hits: number;
  writes: number;
  deletes: number;
  batches: number;
  scans: number;
  readTimeMs: number[];
  writeTimeMs: number[];
  scanTimeMs: number[];
}

/**
 * Summary of one collection's metrics
 */
export interface MetricsSnapshot {
  reads: number;
  hits: number;
  writes: number;
  deletes: number;
  batches: number;
  scans: number;
  p95ReadMs: number;
  p95WriteMs: number;
  p95ScanMs: number;
}

function pushSample(samples: number[], ms: number): void {
  samples.push(ms);

  // Keep only the most recent samples
  if (samples.length > MAX_SAMPLES) {
    samples.shift();
  }
}

class MetricsCollector {
  #metrics = new Map<string, CollectionMetrics>();

  /**
   * Get or create metrics for a collection
   */
  #getMetrics(collection: string): CollectionMetrics {
    let metrics = this.#metrics.get(collection);
    if (!metrics) {
      metrics = {
        reads: 0,
        hits: 0,
        writes: 0,
        deletes: 0,
        batches: 0,
        scans: 0,
        readTimeMs: [],
        writeTimeMs: [],
        scanTimeMs: [],
      };
      this.#metrics.set(collection, metrics);
    }
    return metrics;
  }

  /**
   * Record a point read and whether it found a value
   */
  recordRead(collection: string, hit: boolean, ms: number): void {
    const metrics = this.#getMetrics(collection);
    metrics.reads++;
    if (hit) metrics.hits++;
    pushSample(metrics.readTimeMs, ms);
  }

  /**
   * Record the operations one batch applied to a collection
   */
  recordBatch(collection: string, puts: number, deletes: number, ms: number): void {
    const metrics = this.#getMetrics(collection);
    metrics.batches++;
    metrics.writes += puts;
    metrics.deletes += deletes;
    pushSample(metrics.writeTimeMs, ms);
  }

  /**
   * Record a completed or abandoned scan
   */
  recordScan(collection: string, ms: number): void {
    const metrics = this.#getMetrics(collection);
    metrics.scans++;
    pushSample(metrics.scanTimeMs, ms);
  }

  /**
   * Get raw metrics for a collection
   */
  getMetrics(collection: string): CollectionMetrics | undefined {
    return this.#metrics.get(collection);
  }

  /**
   * Summarize a collection's metrics
   */
  snapshot(collection: string): MetricsSnapshot {
    const metrics = this.#getMetrics(collection);
    return {
      reads: metrics.reads,
      hits: metrics.hits,
      writes: metrics.writes,
      deletes: metrics.deletes,
      batches: metrics.batches,
      scans: metrics.scans,
      p95ReadMs: this.getP95(metrics.readTimeMs),
      p95WriteMs: this.getP95(metrics.writeTimeMs),
      p95ScanMs: this.getP95(metrics.scanTimeMs),
    };
  }

  /**
   * Names of collections with recorded metrics
   */
  collections(): string[] {
    return [...this.#metrics.keys()].sort();
  }

  /**
   * Calculate p95 for a metric
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)]!;
  }

  /**
   * Reset metrics for one collection, or all of them
   */
  reset(collection?: string): void {
    if (collection !== undefined) {
      this.#metrics.delete(collection);
    } else {
      this.#metrics.clear();
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
