import type { AggregateStats, SampleHistorySnapshot } from '@/types/profiling';
import { EmptyHistoryError } from './errors';

export type AggregateResult =
  | { ok: true; stats: AggregateStats }
  | { ok: false; error: EmptyHistoryError };

function mean(values: readonly number[]): number {
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

function peak(values: readonly number[]): number {
  let max = -Infinity;
  for (const v of values) {
    if (v > max) max = v;
  }
  return max;
}

/**
 * Reduce a history to average/peak pairs for CPU and memory.
 *
 * CPU and memory are separate series: warm-up and invalid-delta samples
 * contribute memory but no CPU. Either series being empty is a failure,
 * never an all-zero result.
 *
 * Duration runs from the history start to the last sample.
 */
export function aggregate(history: SampleHistorySnapshot): AggregateResult {
  const cpu: number[] = [];
  const memory: number[] = [];

  for (const sample of history.samples) {
    if (sample.cpuPercent !== null) cpu.push(sample.cpuPercent);
    memory.push(sample.memoryMb);
  }

  if (cpu.length === 0 || memory.length === 0) {
    return { ok: false, error: new EmptyHistoryError(cpu.length, memory.length) };
  }

  const lastAt = history.samples[history.samples.length - 1]?.at ?? history.startedAt;

  return {
    ok: true,
    stats: {
      cpuAvg: mean(cpu),
      cpuPeak: peak(cpu),
      memAvg: mean(memory),
      memPeak: peak(memory),
      sampleCount: history.sampleCount,
      durationSeconds: Math.max(0, lastAt - history.startedAt) / 1000,
    },
  };
}
