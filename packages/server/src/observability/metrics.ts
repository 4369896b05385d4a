/**
 * In-process metrics for monitoring tool performance
 * Tracks call counts, errors, and latency histograms
 */

export type Labels = Record<string, string>;

export interface HistogramSummary {
  count: number;
  sum: number;
  p50: number;
  p95: number;
  p99: number;
}

interface Histogram {
  values: number[];
  sum: number;
}

/** Samples kept per histogram */
const MAX_SAMPLES = 1000;

function makeKey(name: string, labels: Labels): string {
  const labelStr = Object.entries(labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}="${v}"`)
    .join(",");
  return labelStr ? `${name}{${labelStr}}` : name;
}

function summarize(histogram: Histogram): HistogramSummary | null {
  if (histogram.values.length === 0) {
    return null;
  }

  const sorted = [...histogram.values].sort((a, b) => a - b);
  const percentile = (p: number): number => {
    const index = Math.ceil((p / 100) * sorted.length) - 1;
    return sorted[Math.max(0, index)] ?? 0;
  };

  return {
    count: sorted.length,
    sum: histogram.sum,
    p50: percentile(50),
    p95: percentile(95),
    p99: percentile(99),
  };
}

export class MetricsRegistry {
  #counters = new Map<string, number>();
  #histograms = new Map<string, Histogram>();

  inc(name: string, labels: Labels = {}): void {
    const key = makeKey(name, labels);
    this.#counters.set(key, (this.#counters.get(key) ?? 0) + 1);
  }

  observe(name: string, value: number, labels: Labels = {}): void {
    const key = makeKey(name, labels);
    const histogram = this.#histograms.get(key) ?? { values: [], sum: 0 };
    histogram.values.push(value);
    histogram.sum += value;

    if (histogram.values.length > MAX_SAMPLES) {
      histogram.sum -= histogram.values.shift() ?? 0;
    }

    this.#histograms.set(key, histogram);
  }

  getCounter(name: string, labels: Labels = {}): number {
    return this.#counters.get(makeKey(name, labels)) ?? 0;
  }

  getHistogram(name: string, labels: Labels = {}): HistogramSummary | null {
    const histogram = this.#histograms.get(makeKey(name, labels));
    return histogram ? summarize(histogram) : null;
  }

  // Snapshot keyed by `name{label="value"}`, for debugging
  getAllMetrics(): {
    counters: Record<string, number>;
    histograms: Record<string, HistogramSummary | null>;
  } {
    const counters = Object.fromEntries(this.#counters);
    const histograms: Record<string, HistogramSummary | null> = {};
    for (const [key, histogram] of this.#histograms) {
      histograms[key] = summarize(histogram);
    }
    return { counters, histograms };
  }
}

export function recordToolExecution(
  metrics: MetricsRegistry,
  tool: string,
  duration_ms: number,
  success: boolean,
  errCode?: string
): void {
  metrics.inc("userstore.tool.calls_total", { tool });

  if (!success) {
    metrics.inc("userstore.tool.errors_total", { tool, err_code: errCode ?? "UNKNOWN" });
  }

  metrics.observe("userstore.tool.latency_ms", duration_ms, { tool });
}
