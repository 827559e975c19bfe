import { readFileSync } from 'fs';
import { z } from 'zod';
import type { RunFailureKind } from '@/lib/errors';
import { errorMessage } from '@/lib/errors';
import { abortableSleep, isAbortError } from '@/lib/utils/abortable-sleep';
import {
  isFailureRecord,
  toReportEntry,
  type ExtendedResultRecord,
  type ReportEntry,
} from '@/formatters/report';
import type { RunController } from './run-controller';

const BulkTargetSchema = z.object({
  name: z.string().min(1),
  command: z.string().min(1).nullable(),
  description: z.string(),
  category: z.string(),
  startupDelaySec: z.number().nonnegative().optional(),
  quick: z.boolean().optional(),
});

export type BulkTarget = z.infer<typeof BulkTargetSchema>;

const DEFAULT_TARGETS_URL = new URL('../data/default-images.json', import.meta.url);

/**
 * Load the bulk target list (defaults to the bundled image list)
 *
 * @throws {z.ZodError} If the file does not match the target schema
 */
export function loadBulkTargets(source: URL | string = DEFAULT_TARGETS_URL): BulkTarget[] {
  const raw: unknown = JSON.parse(readFileSync(source, 'utf-8'));
  return z.array(BulkTargetSchema).parse(raw);
}

export type BulkStatus = 'idle' | 'running' | 'complete';

export interface BulkProgress {
  status: BulkStatus;
  current: number;
  total: number;
  currentImage: string;
  results: readonly ReportEntry[];
}

export interface BulkRunnerOptions {
  durationSec: number;
  /** Pause between targets */
  pauseMs?: number;
}

export interface BulkSummary {
  successful: number;
  total: number;
  successRate: number;
  byCategory: Map<string, ExtendedResultRecord[]>;
  failuresByKind: Partial<Record<RunFailureKind, number>>;
}

/**
 * Profiles a list of images one after another through a RunController.
 *
 * Progress is a single record replaced wholesale on every update, so a
 * reader polling getProgress() never sees index, image and status from
 * different steps.
 */
export class BulkRunner {
  private progress: BulkProgress = { status: 'idle', current: 0, total: 0, currentImage: '', results: [] };
  private readonly durationSec: number;
  private readonly pauseMs: number;

  constructor(private readonly controller: RunController, options: BulkRunnerOptions) {
    if (!(options.durationSec > 0)) {
      throw new RangeError(`durationSec must be positive, got ${options.durationSec}`);
    }
    this.durationSec = options.durationSec;
    this.pauseMs = options.pauseMs ?? 1_000;
  }

  getProgress(): BulkProgress {
    return { ...this.progress, results: [...this.progress.results] };
  }

  async run(targets: readonly BulkTarget[], signal?: AbortSignal): Promise<ReportEntry[]> {
    if (this.progress.status === 'running') {
      throw new Error('Bulk run already in progress');
    }

    this.progress = { status: 'running', current: 0, total: targets.length, currentImage: '', results: [] };
    console.log(`[BulkRunner] Testing ${targets.length} image(s) for ${this.durationSec}s each`);

    for (const [index, target] of targets.entries()) {
      if (signal?.aborted) break;

      this.progress = { ...this.progress, current: index + 1, currentImage: target.name };
      console.log(`[BulkRunner] [${index + 1}/${targets.length}] ${target.name}`);

      const entry = await this.profileTarget(target, signal);
      this.progress = { ...this.progress, results: [...this.progress.results, entry] };

      if (index < targets.length - 1 && this.pauseMs > 0) {
        try {
          await abortableSleep(this.pauseMs, signal);
        } catch (err) {
          if (isAbortError(err)) break;
          throw err;
        }
      }
    }

    this.progress = { ...this.progress, status: 'complete' };
    console.log(`[BulkRunner] Finished ${this.progress.results.length}/${targets.length} image(s)`);
    return [...this.progress.results];
  }

  private async profileTarget(target: BulkTarget, signal?: AbortSignal): Promise<ReportEntry> {
    const runId = this.controller.startRun({
      target: target.name,
      durationSec: this.durationSec,
      command: target.command,
      // Targets without their own delay fall back to the controller default
      startupDelayMs: target.startupDelaySec === undefined ? undefined : target.startupDelaySec * 1000,
    });

    const onAbort = () => {
      this.controller.stopRun(runId).catch((err: unknown) => {
        console.error(`[BulkRunner] Failed to stop run ${runId}: ${errorMessage(err)}`);
      });
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const run = await this.controller.awaitRun(runId);
      return { ...toReportEntry(run), description: target.description, category: target.category };
    } finally {
      signal?.removeEventListener('abort', onAbort);
      this.controller.releaseRun(runId);
    }
  }
}

/** Group successes by category (first-seen order) and count failures by kind */
export function summarizeBulk(entries: readonly ReportEntry[]): BulkSummary {
  const byCategory = new Map<string, ExtendedResultRecord[]>();
  const failuresByKind: Partial<Record<RunFailureKind, number>> = {};
  let successful = 0;

  for (const entry of entries) {
    if (isFailureRecord(entry)) {
      failuresByKind[entry.error_kind] = (failuresByKind[entry.error_kind] ?? 0) + 1;
      continue;
    }
    successful++;
    const category = entry.category ?? 'Other';
    const group = byCategory.get(category);
    if (group) group.push(entry);
    else byCategory.set(category, [entry]);
  }

  const total = entries.length;
  return {
    successful,
    total,
    successRate: total > 0 ? Math.round((successful / total) * 100) : 0,
    byCategory,
    failuresByKind,
  };
}
