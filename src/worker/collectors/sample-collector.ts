import type { RawStatsSnapshot } from '@/types/profiling';
import {
  CollectionInterruptedError,
  EndOfStreamError,
  MalformedStatsError,
  errorCode,
  errorMessage,
  type InterruptReason,
} from '@/lib/errors';
import { cpuPercent, memoryMb } from '@/lib/rate-calculator';
import type { ContainerHandle, ContainerRuntime, ContainerStatus } from '@/lib/runtime/container-runtime';
import type { SampleHistory } from '@/lib/sample-history';
import { abortableSleep, isAbortError } from '@/lib/utils/abortable-sleep';

export const DEFAULT_SAMPLE_INTERVAL_MS = 1_000;

export type CollectionOutcome =
  | { reason: 'duration-elapsed' }
  | { reason: 'container-exited'; status: ContainerStatus }
  | { reason: 'cancelled' }
  | { reason: 'interrupted'; error: CollectionInterruptedError };

export interface SampleCollectorOptions {
  intervalMs?: number;
  debugLogging?: boolean;
}

function interruptReason(err: unknown): InterruptReason {
  if (err instanceof EndOfStreamError) return 'end-of-stream';
  if (err instanceof MalformedStatsError) return 'malformed-payload';
  return 'runtime-error';
}

/**
 * Polls one container's stats on a fixed cadence and appends samples
 * to the run's history until the duration elapses, the container stops
 * running, the stats source gives out, or the signal is aborted.
 *
 * Nothing here is fatal: every exit path returns an outcome and the
 * samples already in history stay valid.
 */
export class SampleCollector {
  readonly name: string;
  private readonly intervalMs: number;
  private readonly debugLogging: boolean;

  constructor(
    private readonly runtime: ContainerRuntime,
    private readonly handle: ContainerHandle,
    private readonly history: SampleHistory,
    options: SampleCollectorOptions = {},
  ) {
    this.name = `SampleCollector[${handle.id.substring(0, 12)}]`;
    this.intervalMs = options.intervalMs ?? DEFAULT_SAMPLE_INTERVAL_MS;
    this.debugLogging = options.debugLogging ?? false;
  }

  private debugLog(message: string): void {
    if (this.debugLogging) {
      console.log(message);
    }
  }

  /**
   * @param durationMs - wall-clock budget, or null to run until the signal aborts
   */
  async collect(durationMs: number | null, signal: AbortSignal): Promise<CollectionOutcome> {
    const deadline = durationMs === null ? null : Date.now() + durationMs;
    let previous: RawStatsSnapshot | null = null;

    console.log(
      `[${this.name}] Collecting every ${this.intervalMs}ms` +
      (durationMs === null ? ' until stopped' : ` for ${(durationMs / 1000).toFixed(0)}s`)
    );

    const finish = (outcome: CollectionOutcome): CollectionOutcome => {
      console.log(`[${this.name}] Stopped (${outcome.reason}) after ${this.history.sampleCount} samples`);
      return outcome;
    };

    while (true) {
      if (signal.aborted) return finish({ reason: 'cancelled' });
      if (deadline !== null && Date.now() >= deadline) return finish({ reason: 'duration-elapsed' });

      let snapshot: RawStatsSnapshot;
      try {
        const status = await this.runtime.getStatus(this.handle);
        if (status !== 'running') {
          console.log(`[${this.name}] Container is ${status}; image may need a custom command to stay running`);
          return finish({ reason: 'container-exited', status });
        }
        snapshot = await this.runtime.getStats(this.handle);
      } catch (err) {
        const reason = interruptReason(err);
        console.error(`[${this.name}] Stats read failed (${reason}): code=${errorCode(err)} message=${errorMessage(err)}`);
        return finish({
          reason: 'interrupted',
          error: new CollectionInterruptedError(reason, this.history.sampleCount, err),
        });
      }

      // First snapshot is warm-up: memory only, no CPU point
      const cpu = previous ? cpuPercent(previous, snapshot) : null;
      const mem = memoryMb(snapshot);
      this.history.append({ cpuPercent: cpu, memoryMb: mem, at: snapshot.readAt });
      previous = snapshot;

      this.debugLog(
        `[${this.name}] #${this.history.sampleCount} cpu=${cpu === null ? 'skip' : cpu.toFixed(2) + '%'}` +
        ` mem=${mem.toFixed(2)}MB`
      );

      try {
        await abortableSleep(this.intervalMs, signal);
      } catch (err) {
        if (isAbortError(err) || signal.aborted) return finish({ reason: 'cancelled' });
        throw err;
      }
    }
  }
}
