import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { BulkRunner, loadBulkTargets, summarizeBulk, type BulkTarget } from '../bulk-runner';
import { RunController } from '../run-controller';
import type { RawStatsSnapshot } from '@/types/profiling';
import type { ReportEntry } from '@/formatters/report';
import { FakeRuntime, MB, snapshot } from '@/lib/test/fake-runtime';

/** Every stats read advances both counters, so each delta is 50% */
class SteadyRuntime extends FakeRuntime {
  private tick = 0;

  async resolveImage(name: string): Promise<void> {
    if (name === 'ghost:latest') {
      this.calls.resolveImage.push(name);
      throw new Error('not found');
    }
    return super.resolveImage(name);
  }

  async getStats(): Promise<RawStatsSnapshot> {
    this.calls.getStats++;
    this.tick++;
    return snapshot(this.tick * 50, this.tick * 100, 64 * MB);
  }
}

const targets: BulkTarget[] = [
  { name: 'nginx:latest', command: null, description: 'Nginx Web Server', category: 'Web Servers' },
  { name: 'ghost:latest', command: null, description: 'Missing image', category: 'Other' },
];

describe('BulkRunner', () => {
  let runtime: SteadyRuntime;
  let controller: RunController;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    runtime = new SteadyRuntime();
    controller = new RunController(runtime, { intervalMs: 5 });
  });

  afterEach(async () => {
    await controller.stopAll();
    vi.restoreAllMocks();
  });

  it('should profile each target in order and record successes and failures', async () => {
    const runner = new BulkRunner(controller, { durationSec: 0.05, pauseMs: 0 });

    const entries = await runner.run(targets);

    expect(runtime.calls.resolveImage).toEqual(['nginx:latest', 'ghost:latest']);
    expect(entries).toHaveLength(2);
    expect(entries[0]).toMatchObject({
      image: 'nginx:latest',
      duration_sec: 0.05,
      cpu_avg: 50,
      cpu_peak: 50,
      mem_avg_mb: 64,
      mem_peak_mb: 64,
      recommendation: { vcpu: 1, ram_gb: 0.09 },
      instances: { aws: 't3.micro', gcp: 'e2-micro', azure: 'B1s' },
      description: 'Nginx Web Server',
      category: 'Web Servers',
    });
    expect(entries[1]).toEqual({
      image: 'ghost:latest',
      error: 'Failed to pull image ghost:latest: not found',
      error_kind: 'image-pull',
      description: 'Missing image',
      category: 'Other',
    });
  });

  it('should finish with a complete progress record and release its runs', async () => {
    const runner = new BulkRunner(controller, { durationSec: 0.02, pauseMs: 0 });

    await runner.run(targets);

    const progress = runner.getProgress();
    expect(progress.status).toBe('complete');
    expect(progress.current).toBe(2);
    expect(progress.total).toBe(2);
    expect(progress.currentImage).toBe('ghost:latest');
    expect(progress.results).toHaveLength(2);
    expect(controller.listRuns()).toEqual([]);
  });

  it('should report the current target while running', async () => {
    const runner = new BulkRunner(controller, { durationSec: 0.2, pauseMs: 0 });
    expect(runner.getProgress().status).toBe('idle');

    const pending = runner.run(targets);

    expect(runner.getProgress()).toMatchObject({
      status: 'running',
      current: 1,
      total: 2,
      currentImage: 'nginx:latest',
      results: [],
    });
    await expect(runner.run(targets)).rejects.toThrow('Bulk run already in progress');
    await pending;
  });

  it('should pass the target command and startup delay to the run', async () => {
    const runner = new BulkRunner(controller, { durationSec: 0.02, pauseMs: 0 });

    await runner.run([
      { name: 'redis:latest', command: 'redis-server', description: 'Redis', category: 'Databases', startupDelaySec: 0 },
    ]);

    expect(runtime.calls.startContainer[0]?.command).toBe('redis-server');
  });

  it('should apply the controller startup delay to targets without their own', async () => {
    const delayed = new RunController(runtime, { intervalMs: 5, startupDelayMs: 60_000 });
    const runner = new BulkRunner(delayed, { durationSec: 30, pauseMs: 0 });
    const abort = new AbortController();

    const pending = runner.run([targets[0]], abort.signal);
    await vi.waitFor(() => expect(runtime.calls.startContainer).toHaveLength(1));
    abort.abort();
    await pending;

    expect(runtime.calls.getStats).toBe(0);
    expect(runtime.calls.stopAndRemove).toHaveLength(1);
  });

  it('should let a target delay override the controller default', async () => {
    const delayed = new RunController(runtime, { intervalMs: 5, startupDelayMs: 60_000 });
    const runner = new BulkRunner(delayed, { durationSec: 0.05, pauseMs: 0 });

    const [entry] = await runner.run([{ ...targets[0], startupDelaySec: 0 }]);

    expect(entry).toMatchObject({ image: 'nginx:latest', cpu_peak: 50 });
  });

  it('should stop early when aborted', async () => {
    const runner = new BulkRunner(controller, { durationSec: 30, pauseMs: 0 });
    const abort = new AbortController();

    const pending = runner.run(targets, abort.signal);
    await vi.waitFor(() => expect(runtime.calls.getStats).toBeGreaterThanOrEqual(2));
    abort.abort();
    const entries = await pending;

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ image: 'nginx:latest', cpu_peak: 50 });
    expect(runtime.calls.resolveImage).toEqual(['nginx:latest']);
    expect(runtime.calls.stopAndRemove).toHaveLength(1);
  });

  it('should run nothing when aborted before starting', async () => {
    const runner = new BulkRunner(controller, { durationSec: 1, pauseMs: 0 });
    const abort = new AbortController();
    abort.abort();

    expect(await runner.run(targets, abort.signal)).toEqual([]);
    expect(runtime.calls.resolveImage).toEqual([]);
  });

  it('should reject a non-positive duration', () => {
    expect(() => new BulkRunner(controller, { durationSec: 0 })).toThrow(RangeError);
  });
});

describe('summarizeBulk', () => {
  const success = (image: string, category?: string): ReportEntry => ({
    image,
    duration_sec: 30,
    cpu_avg: 1,
    cpu_peak: 2,
    mem_avg_mb: 10,
    mem_peak_mb: 12,
    recommendation: { vcpu: 1, ram_gb: 0.02 },
    samples: 30,
    instances: { aws: 't3.micro', gcp: 'e2-micro', azure: 'B1s' },
    category,
  });

  it('should group successes by category and count failures by kind', () => {
    const summary = summarizeBulk([
      success('redis', 'Databases'),
      success('nginx', 'Web Servers'),
      { image: 'ghost', error: 'no such image', error_kind: 'image-pull' },
      success('mysql', 'Databases'),
      success('custom'),
      { image: 'hello-world', error: 'no samples', error_kind: 'empty-history' },
      { image: 'other-ghost', error: 'no such image', error_kind: 'image-pull' },
    ]);

    expect(summary.successful).toBe(4);
    expect(summary.total).toBe(7);
    expect(summary.successRate).toBe(57);
    expect([...summary.byCategory.keys()]).toEqual(['Databases', 'Web Servers', 'Other']);
    expect(summary.byCategory.get('Databases')?.map(e => e.image)).toEqual(['redis', 'mysql']);
    expect(summary.failuresByKind).toEqual({ 'image-pull': 2, 'empty-history': 1 });
  });

  it('should report a zero success rate for no entries', () => {
    expect(summarizeBulk([])).toMatchObject({ successful: 0, total: 0, successRate: 0 });
  });
});

describe('loadBulkTargets', () => {
  it('should load the bundled image list', () => {
    const loaded = loadBulkTargets();

    expect(loaded).toHaveLength(10);
    expect(loaded.filter(t => t.quick).map(t => t.name)).toEqual([
      'nginx:latest',
      'redis:latest',
      'python:3.11',
      'alpine:latest',
    ]);
    expect(loaded.find(t => t.name === 'postgres:latest')?.startupDelaySec).toBe(5);
  });
});
