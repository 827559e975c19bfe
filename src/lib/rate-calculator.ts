import type { RawStatsSnapshot } from '@/types/profiling';

const BYTES_PER_MB = 1024 * 1024;

/**
 * Resolve the CPU count used to scale a CPU percentage.
 * Order: explicit online CPU field (when nonzero), then the length of the
 * per-CPU usage array (when present and non-empty), then 1.
 */
export function resolveOnlineCpus(snapshot: RawStatsSnapshot): number {
  if (snapshot.onlineCpus) {
    return snapshot.onlineCpus;
  }
  if (snapshot.perCpuUsage && snapshot.perCpuUsage.length > 0) {
    return snapshot.perCpuUsage.length;
  }
  return 1;
}

/**
 * Calculates CPU utilization between two consecutive snapshots
 * (matching Docker CLI logic). May exceed 100 on multi-core containers.
 *
 * @returns the percentage, or null when the pair yields no valid delta
 * (system counter did not advance, or container counter went backwards).
 * A null sample must be skipped, never recorded as zero.
 */
export function cpuPercent(prev: RawStatsSnapshot, curr: RawStatsSnapshot): number | null {
  const cpuDelta = curr.containerCpuNs - prev.containerCpuNs;
  const systemDelta = curr.systemCpuNs - prev.systemCpuNs;

  if (systemDelta > 0 && cpuDelta >= 0) {
    return (cpuDelta / systemDelta) * resolveOnlineCpus(curr) * 100.0;
  }
  return null;
}

/** Memory is a gauge: no delta, just bytes → MB */
export function memoryMb(snapshot: RawStatsSnapshot): number {
  return snapshot.memoryBytes / BYTES_PER_MB;
}
