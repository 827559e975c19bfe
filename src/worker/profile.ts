import { connectDocker, createDockerode } from '@/lib/clients/docker-client';
import { loadDockerConfig } from '@/lib/config/docker-config';
import { loadProfilerConfig, type ProfilerConfig } from '@/lib/config/profiler-config';
import { errorMessage } from '@/lib/errors';
import { parsePortMapping } from '@/lib/parsers/command-parser';
import { DockerRuntime } from '@/lib/runtime/docker-runtime';
import { createAbortError } from '@/lib/utils/abortable-sleep';
import {
  formatInstances,
  formatMemory,
  formatSummary,
  isFailureRecord,
  toReportEntry,
  toResultRecord,
  writeReport,
} from '@/formatters/report';
import { BulkRunner, loadBulkTargets, summarizeBulk } from './bulk-runner';
import { parseArgs, USAGE, type CliArgs } from './cli-args';
import { RunController, runControllerOptionsFromConfig } from './run-controller';

const LIVE_REPORT_EVERY_SAMPLES = 5;

async function runSingle(
  controller: RunController,
  args: CliArgs,
  config: ProfilerConfig,
  signal: AbortSignal,
): Promise<number> {
  if (!args.image) {
    throw new Error('No image given. Pass --image <name> or use --bulk');
  }

  const runId = controller.startRun({
    target: args.image,
    durationSec: args.live ? null : args.durationSec ?? config.run.defaultDurationSec,
    command: args.command ?? null,
    ports: args.ports ? parsePortMapping(args.ports) : null,
  });

  const onAbort = () => {
    controller.stopRun(runId).catch((err: unknown) => {
      console.error(`[Profiler] Failed to stop run: ${errorMessage(err)}`);
    });
  };
  signal.addEventListener('abort', onAbort, { once: true });

  // Periodic live readout
  const liveTimer = setInterval(() => {
    const poll = controller.pollRun(runId);
    if (poll.state !== 'collecting' || !poll.aggregateSoFar) return;
    const { aggregateSoFar: agg } = poll;
    console.log(
      `[Profiler] ${poll.samples} samples, ${poll.runtimeSec.toFixed(0)}s:` +
      ` cpu avg=${agg.cpuAvg.toFixed(2)}% peak=${agg.cpuPeak.toFixed(2)}%` +
      ` mem avg=${formatMemory(agg.memAvg)} peak=${formatMemory(agg.memPeak)}`
    );
  }, config.sampling.intervalMs * LIVE_REPORT_EVERY_SAMPLES);

  try {
    const run = await controller.awaitRun(runId);
    const entry = toReportEntry(run);

    if (isFailureRecord(entry)) {
      console.error(`[Profiler] ${entry.image} failed (${entry.error_kind}): ${entry.error}`);
      return 1;
    }

    if (run.result) {
      console.log(`\n${formatSummary(run.result.stats, run.result.recommendation)}\n`);
    }
    await writeReport(args.output, toResultRecord(entry));
    console.log(`[Profiler] Report saved as ${args.output}`);
    return 0;
  } finally {
    clearInterval(liveTimer);
    signal.removeEventListener('abort', onAbort);
  }
}

async function runBulk(
  controller: RunController,
  args: CliArgs,
  config: ProfilerConfig,
  signal: AbortSignal,
): Promise<number> {
  const allTargets = loadBulkTargets();
  const targets = args.quick ? allTargets.filter(t => t.quick) : allTargets;
  const durationSec = args.durationSec ?? config.run.defaultDurationSec;

  const runner = new BulkRunner(controller, { durationSec, pauseMs: config.bulk.pauseMs });
  const entries = await runner.run(targets, signal);
  const summary = summarizeBulk(entries);

  console.log(`\n=== Bulk Results: ${summary.successful}/${summary.total} succeeded (${summary.successRate}%) ===`);
  for (const [category, results] of summary.byCategory) {
    console.log(`\n${category}`);
    for (const r of results) {
      console.log(
        `  ${r.image.padEnd(20)} cpu peak=${r.cpu_peak.toFixed(2)}% mem peak=${formatMemory(r.mem_peak_mb)}` +
        ` → ${r.recommendation.vcpu} vCPU, ${r.recommendation.ram_gb} GB (${formatInstances(r.instances)})`
      );
    }
  }
  for (const entry of entries) {
    if (isFailureRecord(entry)) {
      console.log(`  ${entry.image.padEnd(20)} FAILED (${entry.error_kind}): ${entry.error}`);
    }
  }

  await writeReport(args.output, {
    test_date: new Date().toISOString(),
    duration_sec: durationSec,
    total_images: summary.total,
    successful: summary.successful,
    success_rate: summary.successRate,
    failures_by_kind: summary.failuresByKind,
    results: entries,
  });
  console.log(`\n[Profiler] Report saved as ${args.output}`);

  return summary.successful > 0 ? 0 : 1;
}

/**
 * CLI entry point: profile one image (bounded or live) or a bulk image list
 */
async function main() {
  try {
    const args = parseArgs(process.argv.slice(2));
    if (args.help) {
      console.log(USAGE);
      return;
    }

    const profilerConfig = loadProfilerConfig();
    const dockerConfig = loadDockerConfig();

    const docker = await connectDocker(dockerConfig, createDockerode, profilerConfig.debugLogging);
    const runtime = new DockerRuntime(docker);
    runtime.debugLogging = profilerConfig.debugLogging;

    const controller = new RunController(runtime, runControllerOptionsFromConfig(profilerConfig));

    // Ctrl+C stops the active run; cleanup still runs before exit
    const shutdownController = new AbortController();
    const shutdown = () => {
      console.log('[Profiler] Shutdown signal received, stopping...');
      shutdownController.abort(createAbortError('Shutdown'));
    };
    process.on('SIGTERM', shutdown);
    process.on('SIGINT', shutdown);

    const exitCode = args.bulk || args.quick
      ? await runBulk(controller, args, profilerConfig, shutdownController.signal)
      : await runSingle(controller, args, profilerConfig, shutdownController.signal);

    await controller.stopAll();
    process.exitCode = exitCode;
  } catch (err) {
    console.error('[Profiler] Fatal error:', err);
    process.exit(1);
  }
}

process.on('unhandledRejection', (reason, promise) => {
  console.error('[Profiler] Unhandled rejection at:', promise, 'reason:', reason);
  process.exit(1);
});

main();
