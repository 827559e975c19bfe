import { z } from 'zod';
import type { RawStatsSnapshot } from '@/types/profiling';

/**
 * Subset of the Docker Engine stats payload the profiler reads.
 *
 * A stopped container still answers with a payload but drops
 * system_cpu_usage and memory usage, so those default to 0
 * (which later yields a skipped CPU delta rather than a bogus value).
 */
export const dockerStatsSchema = z.object({
  read: z.string().optional(),
  cpu_stats: z.object({
    cpu_usage: z.object({
      total_usage: z.number().nonnegative(),
      percpu_usage: z.array(z.number()).nullish(),
    }),
    system_cpu_usage: z.number().nonnegative().default(0),
    online_cpus: z.number().int().nonnegative().nullish(),
  }),
  memory_stats: z
    .object({
      usage: z.number().nonnegative().default(0),
    })
    .default({}),
});

export type DockerStatsPayload = z.infer<typeof dockerStatsSchema>;

/** Convert a validated payload into the runtime-neutral snapshot */
export function toRawStatsSnapshot(payload: DockerStatsPayload, readAt: number): RawStatsSnapshot {
  return {
    containerCpuNs: payload.cpu_stats.cpu_usage.total_usage,
    systemCpuNs: payload.cpu_stats.system_cpu_usage,
    onlineCpus: payload.cpu_stats.online_cpus ?? null,
    perCpuUsage: payload.cpu_stats.cpu_usage.percpu_usage ?? null,
    memoryBytes: payload.memory_stats.usage,
    readAt,
  };
}
