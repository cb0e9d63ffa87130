import { performance } from 'node:perf_hooks';

export const METRIC_PHASES = {
  VALIDATE: 'validateMs',
  BUILD: 'buildMs',
  DERIVE: 'deriveMs',
  EXPLAIN: 'explainMs',
} as const;

export type MetricPhase = keyof typeof METRIC_PHASES;
export type MetricsVerbosity = 'runtime' | 'ci';

type MetricsPhaseKey = (typeof METRIC_PHASES)[MetricPhase];

export interface MetricsSnapshot {
  validateMs: number;
  buildMs: number;
  deriveMs: number;
  explainMs: number;
  stepCount: number;
  rowsEmitted: number;
  rowsHidden: number;
  maxDepthReached: number;
  /** Nodes recorded per operation; ci verbosity only */
  opCounts?: Record<string, number>;
}

interface IdleTimerState {
  total: number;
  startedAt?: undefined;
}

interface ActiveTimerState {
  total: number;
  startedAt: number;
}

type TimerState = IdleTimerState | ActiveTimerState;

const DEFAULT_COUNTERS: MetricsSnapshot = {
  validateMs: 0,
  buildMs: 0,
  deriveMs: 0,
  explainMs: 0,
  stepCount: 0,
  rowsEmitted: 0,
  rowsHidden: 0,
  maxDepthReached: 0,
};

export interface MetricsCollectorOptions {
  now?: () => number;
  verbosity?: MetricsVerbosity;
  enabled?: boolean;
}

export class MetricsCollector {
  private readonly now: () => number;
  private readonly enabled: boolean;
  private readonly timers: Record<MetricsPhaseKey, TimerState>;
  private snapshot: MetricsSnapshot;
  private readonly verbosity: MetricsVerbosity;

  constructor(options: MetricsCollectorOptions = {}) {
    this.now = options.now ?? (() => performance.now());
    this.enabled = options.enabled ?? true;
    this.verbosity = options.verbosity ?? 'runtime';
    this.snapshot = { ...DEFAULT_COUNTERS };
    this.timers = {
      validateMs: { total: 0 },
      buildMs: { total: 0 },
      deriveMs: { total: 0 },
      explainMs: { total: 0 },
    };
  }

  public isEnabled(): boolean {
    return this.enabled;
  }

  public begin(phase: MetricPhase): void {
    if (!this.enabled) {
      return;
    }
    const key = METRIC_PHASES[phase];
    const current = this.timers[key];
    if (isActiveTimerState(current)) {
      throw new Error(`Metrics timer for ${phase} already started`);
    }

    this.timers[key] = { total: current.total, startedAt: this.now() };
  }

  public end(phase: MetricPhase): void {
    if (!this.enabled) {
      return;
    }
    const key = METRIC_PHASES[phase];
    const current = this.timers[key];
    if (!isActiveTimerState(current)) {
      throw new Error(`Metrics timer for ${phase} was not started`);
    }

    this.accumulateDuration(key, this.now() - current.startedAt);
    this.timers[key] = { total: this.snapshot[key] };
  }

  /**
   * Run `fn` inside a begin/end pair. The timer is closed even when `fn`
   * throws, and the error is rethrown.
   */
  public measure<T>(phase: MetricPhase, fn: () => T): T {
    this.begin(phase);
    try {
      return fn();
    } finally {
      this.end(phase);
    }
  }

  public addSteps(count: number): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.stepCount += count;
  }

  public addOperation(op: string): void {
    if (!this.enabled) {
      return;
    }
    const counts = (this.snapshot.opCounts ??= {});
    counts[op] = (counts[op] ?? 0) + 1;
  }

  public recordRows(emitted: number, hidden: number): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.rowsEmitted += emitted;
    this.snapshot.rowsHidden += hidden;
  }

  public observeDepth(depth: number): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.maxDepthReached = Math.max(
      this.snapshot.maxDepthReached,
      depth
    );
  }

  public snapshotMetrics(
    options: { verbosity?: MetricsVerbosity } = {}
  ): MetricsSnapshot {
    const mode = options.verbosity ?? this.verbosity;
    const basic: MetricsSnapshot = { ...this.snapshot };

    if (mode === 'runtime') {
      delete basic.opCounts;
    } else if (basic.opCounts) {
      basic.opCounts = { ...basic.opCounts };
    }

    return basic;
  }

  private accumulateDuration(key: MetricsPhaseKey, durationMs: number): void {
    const safeDuration = Number.isFinite(durationMs)
      ? Math.max(0, durationMs)
      : 0;
    this.snapshot[key] += safeDuration;
  }
}

function isActiveTimerState(state: TimerState): state is ActiveTimerState {
  return typeof state.startedAt === 'number';
}
