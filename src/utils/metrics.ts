import { createChildLogger } from './logger.js';

const logger = createChildLogger('metrics');

export interface MetricStats {
  count: number;
  sum: number;
  min: number;
  max: number;
  avg: number;
}

class Counter {
  private value = 0;

  constructor(
    private readonly name: string,
    private readonly labels: Record<string, string> = {}
  ) {}

  inc(delta = 1): void {
    this.value += delta;
  }

  get(): number {
    return this.value;
  }

  reset(): void {
    this.value = 0;
  }

  toJSON(): { name: string; type: 'counter'; value: number; labels: Record<string, string> } {
    return { name: this.name, type: 'counter', value: this.value, labels: this.labels };
  }
}

class Histogram {
  private values: number[] = [];

  constructor(
    private readonly name: string,
    private readonly maxSamples = 1000
  ) {}

  observe(value: number): void {
    this.values.push(value);
    if (this.values.length > this.maxSamples) {
      this.values.shift();
    }
  }

  getStats(): MetricStats {
    if (this.values.length === 0) {
      return { count: 0, sum: 0, min: 0, max: 0, avg: 0 };
    }
    const sum = this.values.reduce((a, b) => a + b, 0);
    return {
      count: this.values.length,
      sum,
      min: Math.min(...this.values),
      max: Math.max(...this.values),
      avg: sum / this.values.length,
    };
  }

  reset(): void {
    this.values = [];
  }

  toJSON(): { name: string; type: 'histogram'; stats: MetricStats } {
    return { name: this.name, type: 'histogram', stats: this.getStats() };
  }
}

export interface AnalysisRunSample {
  lines: number;
  parsed: number;
  analyzed: number;
  excluded: Record<string, number>;
  durationMs: number;
}

class AnalyzerMetrics {
  private labeled = new Map<string, Counter>();

  readonly runs = new Counter('analyzer_runs_total');
  readonly linesScanned = new Counter('analyzer_lines_scanned_total');
  readonly interfacesParsed = new Counter('analyzer_interfaces_parsed_total');
  readonly interfacesAnalyzed = new Counter('analyzer_interfaces_analyzed_total');
  readonly sourceFailures = new Counter('analyzer_source_failures_total');
  readonly duration = new Histogram('analyzer_run_duration_ms');

  labeledCounter(name: string, labels: Record<string, string>): Counter {
    const key = `${name}:${JSON.stringify(labels)}`;
    let counter = this.labeled.get(key);
    if (!counter) {
      counter = new Counter(name, labels);
      this.labeled.set(key, counter);
    }
    return counter;
  }

  recordRun(sample: AnalysisRunSample): void {
    this.runs.inc();
    this.linesScanned.inc(sample.lines);
    this.interfacesParsed.inc(sample.parsed);
    this.interfacesAnalyzed.inc(sample.analyzed);
    this.duration.observe(sample.durationMs);
    for (const [reason, count] of Object.entries(sample.excluded)) {
      this.labeledCounter('analyzer_interfaces_excluded_total', { reason }).inc(count);
    }
  }

  recordSourceFailure(kind: 'unavailable' | 'unreadable'): void {
    this.sourceFailures.inc();
    this.labeledCounter('analyzer_source_failures_by_kind', { kind }).inc();
  }

  getAll(): {
    counters: Array<ReturnType<Counter['toJSON']>>;
    histograms: Array<ReturnType<Histogram['toJSON']>>;
  } {
    return {
      counters: [
        this.runs,
        this.linesScanned,
        this.interfacesParsed,
        this.interfacesAnalyzed,
        this.sourceFailures,
        ...this.labeled.values(),
      ].map(c => c.toJSON()),
      histograms: [this.duration.toJSON()],
    };
  }

  logSummary(): void {
    logger.debug(this.getAll(), 'Analyzer metrics summary');
  }

  reset(): void {
    this.runs.reset();
    this.linesScanned.reset();
    this.interfacesParsed.reset();
    this.interfacesAnalyzed.reset();
    this.sourceFailures.reset();
    this.labeled.clear();
    this.duration.reset();
  }
}

export const metrics = new AnalyzerMetrics();
