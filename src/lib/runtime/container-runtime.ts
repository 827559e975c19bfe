import type {
  LaunchCommand,
  PortMapping,
  RawStatsSnapshot,
} from '@/types/profiling';

export interface ContainerHandle {
  readonly id: string;
  readonly image: string;
  /** Command the container was launched with, null for the image default */
  readonly command: LaunchCommand | null;
}

export type ContainerStatus = 'running' | 'exited' | 'other';

/**
 * Container runtime operations the profiling engine depends on.
 * Implemented against the Docker Engine API by DockerRuntime;
 * tests substitute an in-process fake.
 */
export interface ContainerRuntime {
  /**
   * Ensure the image is available locally, pulling it when absent.
   * @throws {ImagePullError}
   */
  resolveImage(name: string): Promise<void>;

  /**
   * Create and start a detached container.
   * `command` undefined means the image's own default command.
   * @throws {ContainerLaunchError}
   */
  startContainer(image: string, command?: LaunchCommand, ports?: PortMapping): Promise<ContainerHandle>;

  getStatus(handle: ContainerHandle): Promise<ContainerStatus>;

  /**
   * Read one stats snapshot.
   * @throws {EndOfStreamError} When the container or connection is gone
   * @throws {MalformedStatsError} When the payload cannot be interpreted
   */
  getStats(handle: ContainerHandle): Promise<RawStatsSnapshot>;

  /** Stop and remove the container. Callers treat failures as best-effort. */
  stopAndRemove(handle: ContainerHandle): Promise<void>;

  /** Tail of the container's combined stdout/stderr */
  getLogs(handle: ContainerHandle, tailLines: number): Promise<string>;
}
