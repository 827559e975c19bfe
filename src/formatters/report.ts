import { writeFile } from 'fs/promises';
import type { AggregateStats, InstanceNames, SizingRecommendation } from '@/types/profiling';
import type { RunFailureKind } from '@/lib/errors';
import { RunNotFinishedError } from '@/lib/errors';
import type { ProfilingRun } from '@/worker/run-controller';

/** Persisted per-image result; field names are part of the report format */
export interface ResultRecord {
  image: string;
  duration_sec: number;
  cpu_avg: number;
  cpu_peak: number;
  mem_avg_mb: number;
  mem_peak_mb: number;
  recommendation: {
    vcpu: number;
    ram_gb: number;
  };
}

export interface ExtendedResultRecord extends ResultRecord {
  samples: number;
  instances: InstanceNames;
  description?: string;
  category?: string;
}

export interface FailureRecord {
  image: string;
  error: string;
  error_kind: RunFailureKind;
  description?: string;
  category?: string;
}

export type ReportEntry = ExtendedResultRecord | FailureRecord;

export function isFailureRecord(entry: ReportEntry): entry is FailureRecord {
  return 'error' in entry;
}

/**
 * Convert a finished run to its report entry.
 * Bounded runs report the requested duration; live runs the observed one.
 *
 * @throws {RunNotFinishedError} If the run has not reached a terminal state
 */
export function toReportEntry(run: ProfilingRun): ReportEntry {
  if (run.result) {
    const { stats, recommendation } = run.result;
    return {
      image: run.target,
      duration_sec: run.durationSec ?? Math.round(stats.durationSeconds),
      cpu_avg: stats.cpuAvg,
      cpu_peak: stats.cpuPeak,
      mem_avg_mb: stats.memAvg,
      mem_peak_mb: stats.memPeak,
      recommendation: {
        vcpu: recommendation.vcpu,
        ram_gb: recommendation.ramGB,
      },
      samples: stats.sampleCount,
      instances: { ...recommendation.instanceNames },
    };
  }
  if (run.error) {
    return { image: run.target, error: run.error.message, error_kind: run.error.kind };
  }
  throw new RunNotFinishedError(run.id, run.state);
}

/** Narrow an extended entry to the base report format */
export function toResultRecord(entry: ExtendedResultRecord): ResultRecord {
  return {
    image: entry.image,
    duration_sec: entry.duration_sec,
    cpu_avg: entry.cpu_avg,
    cpu_peak: entry.cpu_peak,
    mem_avg_mb: entry.mem_avg_mb,
    mem_peak_mb: entry.mem_peak_mb,
    recommendation: { ...entry.recommendation },
  };
}

export async function writeReport(path: string, data: unknown): Promise<void> {
  await writeFile(path, JSON.stringify(data, null, 4), 'utf-8');
}

/**
 * Formats megabytes, switching to KB below 1 MB
 * @returns e.g. "512.00 MB" or "768.00 KB"
 */
export function formatMemory(mb: number): string {
  return mb >= 1 ? `${mb.toFixed(2)} MB` : `${(mb * 1024).toFixed(2)} KB`;
}

export function formatInstances(instances: InstanceNames): string {
  return `AWS: ${instances.aws} / GCP: ${instances.gcp} / Azure: ${instances.azure}`;
}

/** Human-readable summary printed at the end of a run */
export function formatSummary(stats: AggregateStats, recommendation: SizingRecommendation): string {
  return [
    '=== Resource Summary ===',
    `Average CPU: ${stats.cpuAvg.toFixed(2)}%`,
    `Peak CPU: ${stats.cpuPeak.toFixed(2)}%`,
    `Average Memory: ${stats.memAvg.toFixed(2)} MB`,
    `Peak Memory: ${stats.memPeak.toFixed(2)} MB`,
    `Samples: ${stats.sampleCount} over ${stats.durationSeconds.toFixed(1)}s`,
    '',
    '=== Cloud Estimate ===',
    `Suggested: ${recommendation.vcpu} vCPU(s), ${recommendation.ramGB} GB RAM`,
    `Recommended instances: ${formatInstances(recommendation.instanceNames)}`,
  ].join('\n');
}
