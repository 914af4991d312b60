import type { Verdict } from "../domain/types.js";

type LabelSet = Record<string, string>;

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/\n/g, "\\n").replace(/"/g, '\\"');
}

function formatLabels(labels: LabelSet): string {
  const entries = Object.entries(labels);
  if (entries.length === 0) {
    return "";
  }
  const inner = entries.map(([name, value]) => `${name}="${escapeLabelValue(value)}"`).join(",");
  return `{${inner}}`;
}

class LabeledCounter {
  private readonly series = new Map<string, { labels: LabelSet; value: number }>();

  constructor(
    private readonly name: string,
    private readonly help: string,
  ) {}

  inc(labels: LabelSet, value = 1): void {
    const key = JSON.stringify(labels);
    const current = this.series.get(key) ?? { labels, value: 0 };
    current.value += value;
    this.series.set(key, current);
  }

  value(labels: LabelSet): number {
    return this.series.get(JSON.stringify(labels))?.value ?? 0;
  }

  render(): string[] {
    const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} counter`];
    for (const { labels, value } of this.series.values()) {
      lines.push(`${this.name}${formatLabels(labels)} ${value}`);
    }
    return lines;
  }
}

class LatencyHistogram {
  private readonly counts: number[];
  private count = 0;
  private sum = 0;

  constructor(
    private readonly name: string,
    private readonly help: string,
    private readonly buckets: number[],
  ) {
    this.counts = buckets.map(() => 0);
  }

  observe(value: number): void {
    this.count += 1;
    this.sum += value;
    this.buckets.forEach((bucket, index) => {
      if (value <= bucket) {
        this.counts[index] = (this.counts[index] ?? 0) + 1;
      }
    });
  }

  render(): string[] {
    const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} histogram`];
    this.buckets.forEach((bucket, index) => {
      lines.push(`${this.name}_bucket${formatLabels({ le: String(bucket) })} ${this.counts[index] ?? 0}`);
    });
    lines.push(`${this.name}_bucket${formatLabels({ le: "+Inf" })} ${this.count}`);
    lines.push(`${this.name}_sum ${this.sum}`);
    lines.push(`${this.name}_count ${this.count}`);
    return lines;
  }
}

export class ScoringMetricsRegistry {
  private readonly httpRequests = new LabeledCounter(
    "hfs_http_requests_total",
    "Total number of HTTP requests handled by route, method, and status code.",
  );
  private readonly verdicts = new LabeledCounter(
    "hfs_verdicts_total",
    "Total number of scored transactions by verdict.",
  );
  private readonly ruleTriggers = new LabeledCounter(
    "hfs_rule_triggers_total",
    "Total number of domain rule triggers by rule.",
  );
  private readonly degradedHistory = new LabeledCounter(
    "hfs_history_degraded_total",
    "Total number of history store failures that degraded a score, by operation.",
  );
  private readonly scoringDuration = new LatencyHistogram(
    "hfs_scoring_duration_seconds",
    "End-to-end scoring duration in seconds, lock wait included.",
    [0.001, 0.0025, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1],
  );

  recordHttpRequest(method: string, route: string, statusCode: number): void {
    this.httpRequests.inc({ method: method.toUpperCase(), route, status_code: String(statusCode) });
  }

  recordScore(verdict: Verdict, triggeredRules: readonly string[], durationSeconds: number): void {
    this.verdicts.inc({ verdict });
    for (const rule of triggeredRules) {
      this.ruleTriggers.inc({ rule });
    }
    this.scoringDuration.observe(durationSeconds);
  }

  recordHistoryDegraded(operation: "snapshot" | "append"): void {
    this.degradedHistory.inc({ operation });
  }

  verdictCount(verdict: Verdict): number {
    return this.verdicts.value({ verdict });
  }

  renderPrometheus(): string {
    const lines = [
      ...this.httpRequests.render(),
      ...this.verdicts.render(),
      ...this.ruleTriggers.render(),
      ...this.degradedHistory.render(),
      ...this.scoringDuration.render(),
    ];
    return `${lines.join("\n")}\n`;
  }
}
