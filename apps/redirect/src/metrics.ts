/**
 * Metrics Module
 *
 * In-process redirect counters and a latency histogram, rendered in the
 * Prometheus text format. One instance per app.
 */

/**
 * Histogram buckets for latency measurements (in milliseconds)
 */
const LATENCY_BUCKETS = [1, 2, 5, 10, 20, 50, 100, 200, 500, 1000] as const;

export const REDIRECT_OUTCOMES = [301, 404, 410, 429, 500] as const;
export type RedirectOutcome = (typeof REDIRECT_OUTCOMES)[number];

export interface MetricsSummary {
  totalRequests: number;
  successRate: number;
  avgLatencyMs: number;
}

export class RedirectMetrics {
  private readonly outcomes = new Map<RedirectOutcome, number>();
  private readonly buckets: number[] = new Array<number>(LATENCY_BUCKETS.length + 1).fill(0);
  private latencySum = 0;
  private latencyCount = 0;

  /**
   * Record one redirect request and its latency.
   */
  recordRedirect(status: RedirectOutcome, latencyMs: number): void {
    this.outcomes.set(status, this.count(status) + 1);

    this.latencySum += latencyMs;
    this.latencyCount++;

    const index = LATENCY_BUCKETS.findIndex((bound) => latencyMs <= bound);
    // Past the last bound lands in +Inf
    const slot = index === -1 ? LATENCY_BUCKETS.length : index;
    this.buckets[slot] = (this.buckets[slot] ?? 0) + 1;
  }

  count(status: RedirectOutcome): number {
    return this.outcomes.get(status) ?? 0;
  }

  summary(): MetricsSummary {
    const totalRequests = REDIRECT_OUTCOMES.reduce((sum, status) => sum + this.count(status), 0);
    return {
      totalRequests,
      successRate: totalRequests > 0 ? this.count(301) / totalRequests : 0,
      avgLatencyMs: this.latencyCount > 0 ? this.latencySum / this.latencyCount : 0,
    };
  }

  /**
   * Current metrics in Prometheus text format.
   */
  render(): string {
    const lines: string[] = [];

    lines.push("# HELP tinyhop_redirect_total Redirect requests by response status");
    lines.push("# TYPE tinyhop_redirect_total counter");
    for (const status of REDIRECT_OUTCOMES) {
      lines.push(`tinyhop_redirect_total{status="${status}"} ${this.count(status)}`);
    }

    lines.push("# HELP tinyhop_redirect_latency_ms Redirect latency in milliseconds");
    lines.push("# TYPE tinyhop_redirect_latency_ms histogram");

    let cumulative = 0;
    LATENCY_BUCKETS.forEach((bound, i) => {
      cumulative += this.buckets[i] ?? 0;
      lines.push(`tinyhop_redirect_latency_ms_bucket{le="${bound}"} ${cumulative}`);
    });
    cumulative += this.buckets[LATENCY_BUCKETS.length] ?? 0;
    lines.push(`tinyhop_redirect_latency_ms_bucket{le="+Inf"} ${cumulative}`);
    lines.push(`tinyhop_redirect_latency_ms_sum ${this.latencySum}`);
    lines.push(`tinyhop_redirect_latency_ms_count ${this.latencyCount}`);

    return lines.join("\n") + "\n";
  }
}
