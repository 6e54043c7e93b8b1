/**
 * Metric families rendered in the Prometheus text exposition format.
 *
 * A family has a fixed list of label names; each distinct tuple of label
 * values is one series. Callers decide the label values, so keeping them
 * to a closed set (route patterns, enum outcomes) is up to them.
 */

export const DEFAULT_DURATION_BUCKETS: readonly number[] = [
  0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10,
];

export type Labels<N extends string> = Readonly<Record<N, string>>;

/**
 * Escape a label value: backslash, double quote and line feed.
 */
export function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}

function renderLabels(pairs: ReadonlyArray<readonly [string, string]>): string {
  if (pairs.length === 0) {
    return "";
  }
  return `{${pairs.map(([name, value]) => `${name}="${escapeLabelValue(value)}"`).join(",")}}`;
}

abstract class MetricFamily<N extends string, S> {
  readonly name: string;
  readonly help: string;
  private readonly labelNames: readonly N[];
  private readonly series = new Map<string, { readonly values: readonly string[]; state: S }>();

  constructor(name: string, help: string, labelNames: readonly N[]) {
    this.name = name;
    this.help = help;
    this.labelNames = labelNames;
  }

  protected abstract readonly type: "counter" | "histogram";
  protected abstract initial(): S;
  protected abstract renderSeries(
    pairs: ReadonlyArray<readonly [string, string]>,
    state: S,
  ): string[];

  protected update(labels: Labels<N>, next: (state: S) => S): void {
    const values = this.labelNames.map((name) => labels[name]);
    const key = JSON.stringify(values);
    const entry = this.series.get(key);
    if (entry === undefined) {
      this.series.set(key, { values, state: next(this.initial()) });
    } else {
      entry.state = next(entry.state);
    }
  }

  /** Number of distinct label tuples seen */
  get size(): number {
    return this.series.size;
  }

  render(): string[] {
    const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} ${this.type}`];
    for (const { values, state } of this.series.values()) {
      const pairs = this.labelNames.map((name, i) => [name, values[i] ?? ""] as const);
      lines.push(...this.renderSeries(pairs, state));
    }
    return lines;
  }

  clear(): void {
    this.series.clear();
  }
}

export class CounterFamily<N extends string> extends MetricFamily<N, number> {
  protected readonly type = "counter";

  protected initial(): number {
    return 0;
  }

  inc(labels: Labels<N>, by = 1): void {
    this.update(labels, (count) => count + by);
  }

  protected renderSeries(pairs: ReadonlyArray<readonly [string, string]>, count: number): string[] {
    return [`${this.name}${renderLabels(pairs)} ${count}`];
  }
}

interface HistogramState {
  readonly sum: number;
  readonly count: number;
  /** Cumulative count per bucket, aligned with the family's bounds */
  readonly buckets: readonly number[];
}

export class HistogramFamily<N extends string> extends MetricFamily<N, HistogramState> {
  protected readonly type = "histogram";
  private readonly bounds: readonly number[];

  constructor(
    name: string,
    help: string,
    labelNames: readonly N[],
    bounds: readonly number[] = DEFAULT_DURATION_BUCKETS,
  ) {
    super(name, help, labelNames);
    this.bounds = bounds;
  }

  protected initial(): HistogramState {
    return { sum: 0, count: 0, buckets: this.bounds.map(() => 0) };
  }

  observe(labels: Labels<N>, value: number): void {
    this.update(labels, (state) => ({
      sum: state.sum + value,
      count: state.count + 1,
      buckets: state.buckets.map((n, i) => (value <= (this.bounds[i] ?? Infinity) ? n + 1 : n)),
    }));
  }

  protected renderSeries(
    pairs: ReadonlyArray<readonly [string, string]>,
    state: HistogramState,
  ): string[] {
    const lines = this.bounds.map(
      (le, i) =>
        `${this.name}_bucket${renderLabels([...pairs, ["le", String(le)]])} ${state.buckets[i] ?? 0}`,
    );
    lines.push(
      `${this.name}_bucket${renderLabels([...pairs, ["le", "+Inf"]])} ${state.count}`,
      `${this.name}_sum${renderLabels(pairs)} ${state.sum}`,
      `${this.name}_count${renderLabels(pairs)} ${state.count}`,
    );
    return lines;
  }
}
