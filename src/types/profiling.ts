/**
 * Point-in-time reading of a container's resource counters.
 * CPU values are cumulative nanosecond counters; memory is a gauge.
 */
export interface RawStatsSnapshot {
  /** Cumulative CPU time consumed by the container (ns) */
  readonly containerCpuNs: number;
  /** Cumulative CPU time consumed by the whole host (ns) */
  readonly systemCpuNs: number;
  /** Online CPU count as reported by the runtime, 0 or null when missing */
  readonly onlineCpus: number | null;
  /** Per-CPU usage counters, used to infer the CPU count when onlineCpus is missing */
  readonly perCpuUsage: readonly number[] | null;
  /** Current resident memory usage (bytes) */
  readonly memoryBytes: number;
  /** Epoch ms at which the snapshot was captured */
  readonly readAt: number;
}

/** One collected sample. cpuPercent is null for warm-up and invalid-delta samples. */
export interface Sample {
  readonly cpuPercent: number | null;
  readonly memoryMb: number;
  readonly at: number;
}

/** Immutable copy of a run's history, safe to hand to concurrent readers */
export interface SampleHistorySnapshot {
  readonly samples: readonly Sample[];
  readonly sampleCount: number;
  readonly startedAt: number;
}

export interface AggregateStats {
  cpuAvg: number;
  cpuPeak: number;
  memAvg: number;
  memPeak: number;
  sampleCount: number;
  durationSeconds: number;
}

export type CloudProvider = 'aws' | 'gcp' | 'azure';

export type InstanceNames = Record<CloudProvider, string>;

export interface SizingRecommendation {
  vcpu: number;
  ramGB: number;
  instanceNames: InstanceNames;
}

/** Command passed to the container; a string is split with shell-like quoting */
export type LaunchCommand = string | readonly string[];

export interface PortMapping {
  hostPort: number;
  containerPort: number;
}

export type RunState =
  | 'idle'
  | 'resolving'
  | 'starting'
  | 'collecting'
  | 'stopping'
  | 'finalizing'
  | 'completed'
  | 'failed';

export const TERMINAL_RUN_STATES: ReadonlySet<RunState> = new Set(['completed', 'failed']);

export interface RunResult {
  stats: AggregateStats;
  recommendation: SizingRecommendation;
}
