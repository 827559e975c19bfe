import { z } from 'zod';

const ProfilerConfigSchema = z.object({
  sampling: z.object({
    intervalMs: z.number().int().min(100).max(60000),
  }),
  run: z.object({
    defaultDurationSec: z.number().int().min(1).max(86400),
    keepAliveCommand: z.string().min(1),
    startupDelayMs: z.number().int().min(0).max(600000),
  }),
  bulk: z.object({
    pauseMs: z.number().int().min(0).max(60000),
  }),
  debugLogging: z.boolean(),
});

export type ProfilerConfig = z.infer<typeof ProfilerConfigSchema>;

/**
 * Load profiler configuration from environment variables
 * Validates all fields and provides defaults
 *
 * @returns Validated profiler configuration
 * @throws {z.ZodError} If configuration is invalid
 */
export function loadProfilerConfig(): ProfilerConfig {
  const config = {
    sampling: {
      intervalMs: parseInt(process.env.PROFILER_SAMPLE_INTERVAL_MS || '1000', 10),
    },
    run: {
      defaultDurationSec: parseInt(process.env.PROFILER_DEFAULT_DURATION_SEC || '30', 10),
      keepAliveCommand: process.env.PROFILER_KEEP_ALIVE_COMMAND || 'tail -f /dev/null',
      startupDelayMs: parseInt(process.env.PROFILER_STARTUP_DELAY_MS || '0', 10),
    },
    bulk: {
      pauseMs: parseInt(process.env.PROFILER_BULK_PAUSE_MS || '1000', 10),
    },
    debugLogging: process.env.PROFILER_DEBUG_LOGGING === 'true',
  };

  return ProfilerConfigSchema.parse(config);
}
