import { randomUUID } from 'crypto';
import type {
  AggregateStats,
  LaunchCommand,
  PortMapping,
  RunResult,
  RunState,
  Sample,
  SampleHistorySnapshot,
} from '@/types/profiling';
import { TERMINAL_RUN_STATES } from '@/types/profiling';
import type { ProfilerConfig } from '@/lib/config/profiler-config';
import {
  CleanupError,
  CollectionError,
  ImagePullError,
  RunNotFinishedError,
  errorMessage,
  isRunFailure,
  type RunFailure,
} from '@/lib/errors';
import type { ContainerHandle, ContainerRuntime } from '@/lib/runtime/container-runtime';
import { SampleHistory } from '@/lib/sample-history';
import { recommend } from '@/lib/sizing-recommender';
import { aggregate } from '@/lib/statistics';
import { abortableSleep, createAbortError, isAbortError } from '@/lib/utils/abortable-sleep';
import { DEFAULT_SAMPLE_INTERVAL_MS, SampleCollector } from './collectors/sample-collector';
import { buildLaunchPlan, launchWithFallbacks } from './launch-strategies';
import { RunRegistry } from './run-registry';

const DEFAULT_KEEP_ALIVE_COMMAND = 'tail -f /dev/null';
const DEFAULT_LOG_TAIL_LINES = 500;

export interface StartRunRequest {
  target: string;
  /** Collection window in seconds; null monitors until stopRun */
  durationSec: number | null;
  command?: LaunchCommand | null;
  ports?: PortMapping | null;
  /** Wait before the first sample, e.g. for a database to initialize; defaults to the controller's */
  startupDelayMs?: number;
}

/** Read-only view of a run handed to callers */
export interface ProfilingRun {
  id: string;
  target: string;
  command: LaunchCommand | null;
  ports: PortMapping | null;
  durationSec: number | null;
  state: RunState;
  containerId: string | null;
  /** Label of the launch strategy that started the container */
  launchedWith: string | null;
  history: SampleHistorySnapshot;
  result: RunResult | null;
  error: RunFailure | null;
  cleanupError: CleanupError | null;
  stopRequested: boolean;
  createdAt: number;
  finishedAt: number | null;
}

export interface RunPoll {
  state: RunState;
  lastSample: Sample | null;
  aggregateSoFar: AggregateStats | null;
  samples: number;
  runtimeSec: number;
}

export interface RunEntry {
  readonly id: string;
  readonly request: StartRunRequest;
  readonly history: SampleHistory;
  readonly abortController: AbortController;
  readonly createdAt: number;
  state: RunState;
  handle: ContainerHandle | null;
  launchedWith: string | null;
  result: RunResult | null;
  error: RunFailure | null;
  cleanupError: CleanupError | null;
  stopRequested: boolean;
  finishedAt: number | null;
  task: Promise<void>;
}

export interface RunControllerOptions {
  intervalMs?: number;
  keepAliveCommand?: LaunchCommand;
  startupDelayMs?: number;
  debugLogging?: boolean;
  registry?: RunRegistry<RunEntry>;
}

export function runControllerOptionsFromConfig(config: ProfilerConfig): RunControllerOptions {
  return {
    intervalMs: config.sampling.intervalMs,
    keepAliveCommand: config.run.keepAliveCommand,
    startupDelayMs: config.run.startupDelayMs,
    debugLogging: config.debugLogging,
  };
}

function isTerminal(state: RunState): boolean {
  return TERMINAL_RUN_STATES.has(state);
}

/**
 * Owns every profiling run: starts each on its own task, tracks it in the
 * registry, and guarantees the container is torn down however the run ends.
 *
 * Lifecycle: idle → resolving → starting → collecting [→ stopping] → finalizing → completed | failed
 */
export class RunController {
  private readonly registry: RunRegistry<RunEntry>;
  private readonly intervalMs: number;
  private readonly keepAliveCommand: LaunchCommand;
  private readonly startupDelayMs: number;
  private readonly debugLogging: boolean;

  constructor(private readonly runtime: ContainerRuntime, options: RunControllerOptions = {}) {
    this.registry = options.registry ?? new RunRegistry<RunEntry>();
    this.intervalMs = options.intervalMs ?? DEFAULT_SAMPLE_INTERVAL_MS;
    this.keepAliveCommand = options.keepAliveCommand ?? DEFAULT_KEEP_ALIVE_COMMAND;
    this.startupDelayMs = options.startupDelayMs ?? 0;
    this.debugLogging = options.debugLogging ?? false;
  }

  private debugLog(message: string): void {
    if (this.debugLogging) {
      console.log(message);
    }
  }

  /**
   * Start a run in the background and return its id immediately.
   * Use awaitRun/stopRun to join it.
   */
  startRun(request: StartRunRequest): string {
    if (request.durationSec !== null && !(request.durationSec > 0)) {
      throw new RangeError(`durationSec must be positive or null, got ${request.durationSec}`);
    }

    const id = randomUUID();
    const entry: RunEntry = {
      id,
      request,
      history: new SampleHistory(),
      abortController: new AbortController(),
      createdAt: Date.now(),
      state: 'idle',
      handle: null,
      launchedWith: null,
      result: null,
      error: null,
      cleanupError: null,
      stopRequested: false,
      finishedAt: null,
      task: Promise.resolve(),
    };
    this.registry.register(id, entry);

    console.log(
      `[RunController] Run ${id} started for ${request.target}` +
      (request.durationSec === null ? ' (live)' : ` (${request.durationSec}s)`)
    );

    entry.task = this.execute(entry).catch((err: unknown) => {
      console.error(`[RunController] Run ${id} crashed: ${errorMessage(err)}`);
      entry.error = new CollectionError(`Run crashed: ${errorMessage(err)}`, err);
      entry.state = 'failed';
      entry.finishedAt = Date.now();
    });

    return id;
  }

  /** Live view of a run in any state */
  pollRun(runId: string): RunPoll {
    const entry = this.registry.require(runId);
    const snapshot = entry.history.snapshot();
    const soFar = aggregate(snapshot);

    return {
      state: entry.state,
      lastSample: snapshot.samples[snapshot.samples.length - 1] ?? null,
      aggregateSoFar: soFar.ok ? soFar.stats : null,
      samples: snapshot.sampleCount,
      runtimeSec: ((entry.finishedAt ?? Date.now()) - entry.createdAt) / 1000,
    };
  }

  /**
   * Request a manual stop and wait for the run to finish finalizing.
   * Stopping a terminal run returns the stored outcome untouched.
   */
  async stopRun(runId: string): Promise<ProfilingRun> {
    const entry = this.registry.require(runId);
    if (isTerminal(entry.state)) {
      return this.toView(entry);
    }

    if (!entry.stopRequested) {
      entry.stopRequested = true;
      if (entry.state === 'collecting') {
        this.transition(entry, 'stopping');
      }
      console.log(`[RunController] Stop requested for run ${runId}`);
      entry.abortController.abort(createAbortError('Run stopped'));
    }

    await entry.task;
    return this.toView(entry);
  }

  /** Wait for a run to reach a terminal state */
  async awaitRun(runId: string): Promise<ProfilingRun> {
    const entry = this.registry.require(runId);
    await entry.task;
    return this.toView(entry);
  }

  /**
   * @throws {RunNotFinishedError} While the run is still active
   */
  getResult(runId: string): ProfilingRun {
    const entry = this.registry.require(runId);
    if (!isTerminal(entry.state)) {
      throw new RunNotFinishedError(runId, entry.state);
    }
    return this.toView(entry);
  }

  /** Log tail for a live view; empty until a container exists */
  async getRunLogs(runId: string, tailLines = DEFAULT_LOG_TAIL_LINES): Promise<string> {
    const entry = this.registry.require(runId);
    if (!entry.handle) return '';
    return this.runtime.getLogs(entry.handle, tailLines);
  }

  listRuns(): ProfilingRun[] {
    return this.registry.values().map(entry => this.toView(entry));
  }

  /** Drop a finished run from the registry */
  releaseRun(runId: string): boolean {
    return this.registry.deleteIf(runId, entry => isTerminal(entry.state));
  }

  /** Stop every active run, e.g. on process shutdown */
  async stopAll(): Promise<void> {
    const active = this.registry.values().filter(entry => !isTerminal(entry.state));
    await Promise.all(active.map(entry => this.stopRun(entry.id)));
  }

  private transition(entry: RunEntry, state: RunState): void {
    this.debugLog(`[RunController] Run ${entry.id}: ${entry.state} → ${state}`);
    entry.state = state;
  }

  private async execute(entry: RunEntry): Promise<void> {
    const { request } = entry;
    const signal = entry.abortController.signal;
    let failure: RunFailure | null = null;

    try {
      this.transition(entry, 'resolving');
      try {
        await this.runtime.resolveImage(request.target);
      } catch (err) {
        throw err instanceof ImagePullError ? err : new ImagePullError(request.target, err);
      }

      if (!signal.aborted) {
        this.transition(entry, 'starting');
        const plan = buildLaunchPlan(request.command ?? null, this.keepAliveCommand);
        const launched = await launchWithFallbacks(this.runtime, request.target, plan, request.ports ?? undefined);
        entry.handle = launched.handle;
        entry.launchedWith = launched.strategy.label;

        const startupDelayMs = request.startupDelayMs ?? this.startupDelayMs;
        if (startupDelayMs > 0) {
          await abortableSleep(startupDelayMs, signal);
        }
      }

      if (!signal.aborted && entry.handle) {
        this.transition(entry, 'collecting');
        const collector = new SampleCollector(this.runtime, entry.handle, entry.history, {
          intervalMs: this.intervalMs,
          debugLogging: this.debugLogging,
        });
        const durationMs = request.durationSec === null ? null : request.durationSec * 1000;
        const outcome = await collector.collect(durationMs, signal);

        // Interruptions only fail the run when nothing was collected
        if (outcome.reason === 'interrupted' && entry.history.sampleCount === 0) {
          failure = new CollectionError(outcome.error.message, outcome.error);
        }
      }
    } catch (err) {
      if (!isAbortError(err)) {
        failure = isRunFailure(err)
          ? err
          : new CollectionError(`Collection failed: ${errorMessage(err)}`, err);
      }
    } finally {
      this.transition(entry, 'finalizing');
      await this.cleanup(entry);
    }

    this.settle(entry, failure);
  }

  /** Best-effort teardown; never replaces the run's own outcome */
  private async cleanup(entry: RunEntry): Promise<void> {
    const handle = entry.handle;
    if (!handle) return;

    try {
      await this.runtime.stopAndRemove(handle);
      console.log(`[RunController] Container ${handle.id.substring(0, 12)} stopped and removed`);
    } catch (err) {
      entry.cleanupError = new CleanupError(handle.id, err);
      console.error(`[RunController] ${entry.cleanupError.message}`);
    }
  }

  private settle(entry: RunEntry, failure: RunFailure | null): void {
    entry.finishedAt = Date.now();

    if (failure) {
      entry.error = failure;
      this.transition(entry, 'failed');
      console.error(`[RunController] Run ${entry.id} failed (${failure.kind}): ${failure.message}`);
      return;
    }

    const aggregated = aggregate(entry.history.snapshot());
    if (!aggregated.ok) {
      entry.error = aggregated.error;
      this.transition(entry, 'failed');
      console.error(`[RunController] Run ${entry.id} failed (${aggregated.error.kind}): ${aggregated.error.message}`);
      return;
    }

    const { stats } = aggregated;
    entry.result = { stats, recommendation: recommend(stats.cpuPeak, stats.memPeak) };
    this.transition(entry, 'completed');
    console.log(
      `[RunController] Run ${entry.id} completed: ${stats.sampleCount} samples,` +
      ` peak cpu=${stats.cpuPeak.toFixed(2)}% mem=${stats.memPeak.toFixed(2)}MB`
    );
  }

  private toView(entry: RunEntry): ProfilingRun {
    return {
      id: entry.id,
      target: entry.request.target,
      command: entry.request.command ?? null,
      ports: entry.request.ports ?? null,
      durationSec: entry.request.durationSec,
      state: entry.state,
      containerId: entry.handle?.id ?? null,
      launchedWith: entry.launchedWith,
      history: entry.history.snapshot(),
      result: entry.result,
      error: entry.error,
      cleanupError: entry.cleanupError,
      stopRequested: entry.stopRequested,
      createdAt: entry.createdAt,
      finishedAt: entry.finishedAt,
    };
  }
}
