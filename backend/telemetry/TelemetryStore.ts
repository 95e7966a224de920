export type TelemetryTagValue = string | number | boolean | null | undefined;

export type TelemetryEvent = {
  ts: string;
  name: string;
  durationMs?: number;
  tags?: Record<string, TelemetryTagValue>;
  metrics?: Record<string, number | null | undefined>;
  message?: string;
};

type Aggregate = {
  count: number;
  sum: number;
  max: number;
};

export type TelemetrySnapshot = {
  generatedAt: string;
  durationsByName: Array<{
    name: string;
    count: number;
    avgMs: number;
    maxMs: number;
  }>;
  metricsByName: Array<{
    name: string;
    metric: string;
    count: number;
    avg: number;
    max: number;
  }>;
  recentEvents: readonly TelemetryEvent[];
};

const compareStrings = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

const finiteOrNull = (value: unknown): number | null =>
  typeof value === 'number' && Number.isFinite(value) ? value : null;

const accumulate = (map: Map<string, Aggregate>, key: string, value: number) => {
  const agg = map.get(key) ?? { count: 0, sum: 0, max: 0 };
  agg.count += 1;
  agg.sum += value;
  if (value > agg.max) agg.max = value;
  map.set(key, agg);
};

const average = (agg: Aggregate) => (agg.count > 0 ? agg.sum / agg.count : 0);

/**
 * Bounded ring of recent events plus running aggregates per event name
 * (durations) and per event name + metric.
 */
export class TelemetryStore {
  private readonly maxEvents: number;
  private readonly events: TelemetryEvent[] = [];
  private readonly durations = new Map<string, Aggregate>();
  private readonly metrics = new Map<string, Map<string, Aggregate>>();

  constructor(args?: { maxEvents?: number }) {
    this.maxEvents = Math.max(100, Math.trunc(args?.maxEvents ?? 2000));
  }

  reset(): void {
    this.events.length = 0;
    this.durations.clear();
    this.metrics.clear();
  }

  record(event: Omit<TelemetryEvent, 'ts'> & { ts?: string }): TelemetryEvent {
    const stored: TelemetryEvent = {
      ...event,
      ts: event.ts ?? new Date().toISOString(),
    };

    this.events.push(stored);
    if (this.events.length > this.maxEvents)
      this.events.splice(0, this.events.length - this.maxEvents);

    const durationMs = finiteOrNull(stored.durationMs);
    if (durationMs !== null) accumulate(this.durations, stored.name, durationMs);

    for (const [metric, raw] of Object.entries(stored.metrics ?? {})) {
      const value = finiteOrNull(raw);
      if (value === null) continue;
      const byMetric = this.metrics.get(stored.name) ?? new Map<string, Aggregate>();
      accumulate(byMetric, metric, value);
      this.metrics.set(stored.name, byMetric);
    }

    return stored;
  }

  listRecent(limit = 200): readonly TelemetryEvent[] {
    const n = Math.max(0, Math.trunc(limit));
    if (n === 0) return [];
    return this.events.slice(Math.max(0, this.events.length - n));
  }

  snapshot(): TelemetrySnapshot {
    const durationsByName = Array.from(this.durations.entries())
      .map(([name, agg]) => ({
        name,
        count: agg.count,
        avgMs: average(agg),
        maxMs: agg.max,
      }))
      .sort((a, b) => compareStrings(a.name, b.name));

    const metricsByName = Array.from(this.metrics.entries())
      .flatMap(([name, byMetric]) =>
        Array.from(byMetric.entries()).map(([metric, agg]) => ({
          name,
          metric,
          count: agg.count,
          avg: average(agg),
          max: agg.max,
        })),
      )
      .sort(
        (a, b) =>
          compareStrings(a.name, b.name) || compareStrings(a.metric, b.metric),
      );

    return {
      generatedAt: new Date().toISOString(),
      durationsByName,
      metricsByName,
      recentEvents: this.listRecent(200),
    };
  }
}

// Singleton for the running process.
export const telemetryStore = new TelemetryStore();
