// Narrow metrics sink consumed by the metrics interceptor, plus an in-memory
// implementation for tests and embedding hosts without a metrics backend.

export type MetricTags = Record<string, string>;

export interface MetricsSink {
  increment(name: string, tags?: MetricTags, by?: number): void;
  observe(name: string, value: number, tags?: MetricTags): void;
  gauge(name: string, value: number, tags?: MetricTags): void;
}

export interface DurationSummary { count: number; sum: number; min: number; max: number }

export interface MetricsSnapshot {
  counters: Record<string, number>;
  durations: Record<string, DurationSummary>;
  gauges: Record<string, number>;
}

/** `name{k=v,...}` with tags in key order, so equal tag sets share one series. */
export function seriesKey(name: string, tags?: MetricTags): string {
  if(!tags) return name;
  const keys = Object.keys(tags).sort();
  if(!keys.length) return name;
  return `${name}{${keys.map(k => `${k}=${tags[k]}`).join(',')}}`;
}

export class InMemoryMetrics implements MetricsSink {
  private counters: Record<string, number> = {};
  private durations: Record<string, DurationSummary> = {};
  private gauges: Record<string, number> = {};

  increment(name: string, tags?: MetricTags, by = 1){
    const key = seriesKey(name, tags);
    this.counters[key] = (this.counters[key] || 0) + by;
  }

  observe(name: string, value: number, tags?: MetricTags){
    const key = seriesKey(name, tags);
    const cur = this.durations[key];
    if(!cur){ this.durations[key] = { count: 1, sum: value, min: value, max: value }; return; }
    cur.count++; cur.sum += value;
    if(value < cur.min) cur.min = value;
    if(value > cur.max) cur.max = value;
  }

  gauge(name: string, value: number, tags?: MetricTags){
    this.gauges[seriesKey(name, tags)] = value;
  }

  counter(name: string, tags?: MetricTags): number {
    return this.counters[seriesKey(name, tags)] || 0;
  }

  snapshot(): MetricsSnapshot {
    const durations: Record<string, DurationSummary> = {};
    for(const [k, v] of Object.entries(this.durations)) durations[k] = { ...v };
    return { counters: { ...this.counters }, durations, gauges: { ...this.gauges } };
  }

  reset(){
    this.counters = {};
    this.durations = {};
    this.gauges = {};
  }
}
