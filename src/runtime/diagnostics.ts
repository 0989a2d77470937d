/**
 * In-process counters for conditions the viewer skips over: unknown
 * instructions, dropped escape sequences, unmapped keys and the like.
 */

type MetricTags = Record<string, string | number | boolean | undefined>;

function metricKey(name: string, tags?: MetricTags): string {
  if (!tags) return name;
  const tagText = Object.entries(tags)
    .filter(([, value]) => value !== undefined)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([key, value]) => `${key}=${String(value)}`)
    .join(',');
  return tagText.length === 0 ? name : `${name}|${tagText}`;
}

export class DiagnosticCounters {
  private counters = new Map<string, number>();

  inc(name: string, tags?: MetricTags): void {
    const key = metricKey(name, tags);
    this.counters.set(key, (this.counters.get(key) ?? 0) + 1);
  }

  get(name: string, tags?: MetricTags): number {
    return this.counters.get(metricKey(name, tags)) ?? 0;
  }

  snapshot(): Record<string, number> {
    return Object.fromEntries(this.counters.entries());
  }

  clear(): void {
    this.counters.clear();
  }
}

const shared = new DiagnosticCounters();

export function incRuntimeMetric(name: string, tags?: MetricTags): void {
  shared.inc(name, tags);
}

export function getRuntimeMetric(name: string, tags?: MetricTags): number {
  return shared.get(name, tags);
}

export function getRuntimeMetricSnapshot(): Record<string, number> {
  return shared.snapshot();
}

export function resetRuntimeMetrics(): void {
  shared.clear();
}
