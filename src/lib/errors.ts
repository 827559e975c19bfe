/**
 * Error taxonomy for profiling runs.
 *
 * Every class carries a literal `kind` so callers (bulk summaries, the CLI)
 * can classify failures with a switch instead of matching messages.
 */

/** Extract a readable message from any thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Extract an error code (`code` or `statusCode`) for log lines */
export function errorCode(err: unknown): string {
  if (typeof err === 'object' && err !== null) {
    if ('code' in err && (typeof err.code === 'string' || typeof err.code === 'number')) {
      return String(err.code);
    }
    if ('statusCode' in err && typeof err.statusCode === 'number') {
      return String(err.statusCode);
    }
  }
  return 'unknown';
}

export class ImagePullError extends Error {
  readonly kind = 'image-pull' as const;

  constructor(readonly image: string, cause?: unknown) {
    super(`Failed to pull image ${image}: ${errorMessage(cause)}`, { cause });
    this.name = 'ImagePullError';
  }
}

/** A single failed launch attempt, recorded by the fallback combinator */
export interface LaunchAttempt {
  strategy: string;
  message: string;
}

export class ContainerStartError extends Error {
  readonly kind = 'container-start' as const;

  constructor(readonly image: string, readonly attempts: readonly LaunchAttempt[]) {
    const detail = attempts.map(a => `${a.strategy}: ${a.message}`).join('; ');
    super(`Failed to start container from ${image} (${attempts.length} attempt(s): ${detail})`);
    this.name = 'ContainerStartError';
  }
}

/**
 * Raised by a container runtime when a launch fails.
 * `executableNotFound` marks the class of failure that justifies a fallback command.
 */
export class ContainerLaunchError extends Error {
  readonly kind = 'container-launch' as const;

  constructor(message: string, readonly executableNotFound: boolean, cause?: unknown) {
    super(message, { cause });
    this.name = 'ContainerLaunchError';
  }
}

/** The stats source has nothing more to give (container gone, connection closed) */
export class EndOfStreamError extends Error {
  readonly kind = 'end-of-stream' as const;

  constructor(message = 'Stats stream ended', cause?: unknown) {
    super(message, { cause });
    this.name = 'EndOfStreamError';
  }
}

/** The stats payload could not be turned into a snapshot */
export class MalformedStatsError extends Error {
  readonly kind = 'malformed-payload' as const;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'MalformedStatsError';
  }
}

export type InterruptReason = 'end-of-stream' | 'malformed-payload' | 'runtime-error';

/** Collection stopped early; samples gathered so far stay valid */
export class CollectionInterruptedError extends Error {
  readonly kind = 'collection-interrupted' as const;

  constructor(readonly reason: InterruptReason, readonly samplesCollected: number, cause?: unknown) {
    super(`Collection interrupted (${reason}) after ${samplesCollected} samples: ${errorMessage(cause)}`, { cause });
    this.name = 'CollectionInterruptedError';
  }
}

/** Collection failed before a single sample was recorded */
export class CollectionError extends Error {
  readonly kind = 'collection' as const;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'CollectionError';
  }
}

export class EmptyHistoryError extends Error {
  readonly kind = 'empty-history' as const;

  constructor(readonly cpuSamples: number, readonly memorySamples: number) {
    super(
      `No usable samples (cpu=${cpuSamples}, memory=${memorySamples}). ` +
      'The container may have exited before a CPU delta could be computed.'
    );
    this.name = 'EmptyHistoryError';
  }
}

export class CleanupError extends Error {
  readonly kind = 'cleanup' as const;

  constructor(readonly containerId: string, cause?: unknown) {
    super(`Failed to stop/remove container ${containerId.substring(0, 12)}: ${errorMessage(cause)}`, { cause });
    this.name = 'CleanupError';
  }
}

export class PortMappingError extends Error {
  readonly kind = 'port-mapping' as const;

  constructor(readonly input: string) {
    super(`Invalid port mapping "${input}". Use host_port:container_port`);
    this.name = 'PortMappingError';
  }
}

export class UnknownRunError extends Error {
  readonly kind = 'unknown-run' as const;

  constructor(readonly runId: string) {
    super(`Run not found: ${runId}`);
    this.name = 'UnknownRunError';
  }
}

export class RunNotFinishedError extends Error {
  readonly kind = 'run-not-finished' as const;

  constructor(readonly runId: string, readonly state: string) {
    super(`Run ${runId} has not finished (state=${state})`);
    this.name = 'RunNotFinishedError';
  }
}

/** The only causes a Failed run may carry */
export type RunFailure = ImagePullError | ContainerStartError | EmptyHistoryError | CollectionError;

export type RunFailureKind = RunFailure['kind'];

export function isRunFailure(err: unknown): err is RunFailure {
  return (
    err instanceof ImagePullError ||
    err instanceof ContainerStartError ||
    err instanceof EmptyHistoryError ||
    err instanceof CollectionError
  );
}
