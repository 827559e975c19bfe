import type Dockerode from 'dockerode';
import type { LaunchCommand, PortMapping, RawStatsSnapshot } from '@/types/profiling';
import {
  ContainerLaunchError,
  EndOfStreamError,
  ImagePullError,
  MalformedStatsError,
  errorCode,
  errorMessage,
} from '../errors';
import { toArgv } from '../parsers/command-parser';
import { dockerStatsSchema, toRawStatsSnapshot } from '../validation/stats-schemas';
import type { ContainerHandle, ContainerRuntime, ContainerStatus } from './container-runtime';

const EXECUTABLE_NOT_FOUND = /executable file not found/i;

/** Connection-level failures that mean the stats source is gone */
const CONNECTION_CLOSED_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'EPIPE', 'ECONNABORTED']);

interface PullProgressEvent {
  status?: string;
  error?: string;
  errorDetail?: { message?: string };
}

function statusCodeOf(err: unknown): number | null {
  if (typeof err === 'object' && err !== null && 'statusCode' in err && typeof err.statusCode === 'number') {
    return err.statusCode;
  }
  return null;
}

function mapContainerState(status: string | undefined): ContainerStatus {
  switch (status) {
    case 'running':
      return 'running';
    case 'exited':
    case 'dead':
      return 'exited';
    default:
      return 'other';
  }
}

/**
 * ContainerRuntime backed by the Docker Engine API via Dockerode.
 */
export class DockerRuntime implements ContainerRuntime {
  private _debugLogging = false;

  constructor(private readonly docker: Dockerode) {}

  set debugLogging(enabled: boolean) {
    this._debugLogging = enabled;
  }

  private debugLog(message: string): void {
    if (this._debugLogging) {
      console.log(message);
    }
  }

  async resolveImage(name: string): Promise<void> {
    try {
      await this.docker.getImage(name).inspect();
      console.log(`[DockerRuntime] Image ${name} found locally`);
      return;
    } catch (err) {
      if (statusCodeOf(err) !== 404) {
        throw new ImagePullError(name, err);
      }
    }

    console.log(`[DockerRuntime] Image ${name} not found locally, pulling...`);
    const t0 = performance.now();
    try {
      const stream = await this.docker.pull(name);
      const events = await new Promise<PullProgressEvent[]>((resolve, reject) => {
        this.docker.modem.followProgress(
          stream,
          (err: unknown, output: PullProgressEvent[]) => (err ? reject(err) : resolve(output)),
          (event: PullProgressEvent) => {
            if (event.status) this.debugLog(`[DockerRuntime] pull ${name}: ${event.status}`);
          },
        );
      });
      // Registry errors arrive in-band on a 200 response
      const failed = events.find(event => event.error);
      if (failed) {
        throw new Error(failed.errorDetail?.message ?? failed.error);
      }
    } catch (err) {
      throw new ImagePullError(name, err);
    }
    console.log(`[DockerRuntime] Pulled ${name} in ${((performance.now() - t0) / 1000).toFixed(1)}s`);
  }

  async startContainer(image: string, command?: LaunchCommand, ports?: PortMapping): Promise<ContainerHandle> {
    const portKey = ports ? `${ports.containerPort}/tcp` : null;

    let container: Dockerode.Container;
    try {
      container = await this.docker.createContainer({
        Image: image,
        ...(command !== undefined ? { Cmd: toArgv(command) } : {}),
        Tty: true,
        OpenStdin: true,
        ...(portKey ? { ExposedPorts: { [portKey]: {} } } : {}),
        HostConfig: {
          NetworkMode: 'bridge',
          ...(portKey && ports
            ? { PortBindings: { [portKey]: [{ HostIp: '0.0.0.0', HostPort: String(ports.hostPort) }] } }
            : {}),
        },
      });
    } catch (err) {
      throw new ContainerLaunchError(errorMessage(err), EXECUTABLE_NOT_FOUND.test(errorMessage(err)), err);
    }

    try {
      await container.start();
    } catch (err) {
      // Created but never ran; don't leave it behind
      await container.remove({ force: true }).catch((removeErr: unknown) => {
        console.error(
          `[DockerRuntime] Failed to remove unstarted container ${container.id.substring(0, 12)}:` +
          ` ${errorMessage(removeErr)}`
        );
      });
      throw new ContainerLaunchError(errorMessage(err), EXECUTABLE_NOT_FOUND.test(errorMessage(err)), err);
    }

    this.debugLog(`[DockerRuntime] Started ${container.id.substring(0, 12)} from ${image}`);
    return { id: container.id, image, command: command ?? null };
  }

  async getStatus(handle: ContainerHandle): Promise<ContainerStatus> {
    try {
      const info = await this.docker.getContainer(handle.id).inspect();
      return mapContainerState(info.State?.Status);
    } catch (err) {
      if (statusCodeOf(err) === 404) return 'exited';
      throw err;
    }
  }

  async getStats(handle: ContainerHandle): Promise<RawStatsSnapshot> {
    let raw: unknown;
    try {
      raw = await this.docker.getContainer(handle.id).stats({ stream: false });
    } catch (err) {
      const status = statusCodeOf(err);
      if (status === 404 || status === 409 || CONNECTION_CLOSED_CODES.has(errorCode(err))) {
        throw new EndOfStreamError(`Stats unavailable for ${handle.id.substring(0, 12)}`, err);
      }
      throw err;
    }

    const parsed = dockerStatsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new MalformedStatsError(
        `Unexpected stats payload for ${handle.id.substring(0, 12)}: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
        parsed.error
      );
    }
    return toRawStatsSnapshot(parsed.data, Date.now());
  }

  async stopAndRemove(handle: ContainerHandle): Promise<void> {
    const container = this.docker.getContainer(handle.id);
    try {
      await container.stop();
    } catch (err) {
      // 304: already stopped
      if (statusCodeOf(err) !== 304 && statusCodeOf(err) !== 404) throw err;
    }
    try {
      await container.remove({ force: true });
    } catch (err) {
      if (statusCodeOf(err) !== 404) throw err;
    }
  }

  async getLogs(handle: ContainerHandle, tailLines: number): Promise<string> {
    const buffer = await this.docker.getContainer(handle.id).logs({
      stdout: true,
      stderr: true,
      tail: tailLines,
      follow: false,
    });
    // Containers are created with a TTY, so the output is raw, not multiplexed
    return buffer.toString('utf-8');
  }
}
