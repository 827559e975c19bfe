import type { Sample, SampleHistorySnapshot } from '@/types/profiling';

/**
 * Append-only sample buffer owned by a single profiling run.
 *
 * Only the run's collector appends. Everyone else reads through
 * `snapshot()`, which copies the buffer so a live-view poller never
 * iterates the array while the collector is pushing to it.
 */
export class SampleHistory {
  private readonly samples: Sample[] = [];
  readonly startedAt: number;

  constructor(startedAt: number = Date.now()) {
    this.startedAt = startedAt;
  }

  append(sample: Sample): void {
    this.samples.push(Object.freeze({ ...sample }));
  }

  get sampleCount(): number {
    return this.samples.length;
  }

  last(): Sample | null {
    return this.samples[this.samples.length - 1] ?? null;
  }

  snapshot(): SampleHistorySnapshot {
    return Object.freeze({
      samples: Object.freeze(this.samples.slice()),
      sampleCount: this.samples.length,
      startedAt: this.startedAt,
    });
  }
}
