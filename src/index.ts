export * from './types/profiling';
export * from './lib/errors';
export { cpuPercent, memoryMb, resolveOnlineCpus } from './lib/rate-calculator';
export { SampleHistory } from './lib/sample-history';
export { aggregate, type AggregateResult } from './lib/statistics';
export { recommend, selectInstances, INSTANCE_TIERS } from './lib/sizing-recommender';
export { parsePortMapping, splitCommand } from './lib/parsers/command-parser';
export type { ContainerHandle, ContainerRuntime, ContainerStatus } from './lib/runtime/container-runtime';
export { DockerRuntime } from './lib/runtime/docker-runtime';
export { loadDockerConfig, type DockerConnectionConfig } from './lib/config/docker-config';
export { loadProfilerConfig, type ProfilerConfig } from './lib/config/profiler-config';
export { SampleCollector, type CollectionOutcome } from './worker/collectors/sample-collector';
export { buildLaunchPlan, launchWithFallbacks, type LaunchStrategy } from './worker/launch-strategies';
export {
  RunController,
  runControllerOptionsFromConfig,
  type ProfilingRun,
  type RunPoll,
  type StartRunRequest,
} from './worker/run-controller';
export { RunRegistry } from './worker/run-registry';
export { BulkRunner, loadBulkTargets, summarizeBulk, type BulkProgress, type BulkTarget } from './worker/bulk-runner';
export {
  toReportEntry,
  toResultRecord,
  writeReport,
  formatSummary,
  type ResultRecord,
  type ReportEntry,
} from './formatters/report';
