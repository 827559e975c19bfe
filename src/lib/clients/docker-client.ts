import Dockerode from 'dockerode';
import { describeConnection, type DockerConnectionConfig } from '../config/docker-config';
import { errorCode, errorMessage } from '../errors';

/** The part of Dockerode the connection check needs */
export interface PingableDocker {
  ping(): Promise<unknown>;
}

export function createDockerode(config: DockerConnectionConfig): Dockerode {
  if (config.transport === 'socket') {
    return new Dockerode({ socketPath: config.socketPath });
  }
  return new Dockerode({
    protocol: config.protocol,
    host: config.host,
    port: config.port,
  });
}

/**
 * Ping the daemon once and hand back the client.
 *
 * @throws The ping error, after logging it with the daemon address
 */
export async function connectDocker<T extends PingableDocker>(
  config: DockerConnectionConfig,
  create: (config: DockerConnectionConfig) => T,
  debugLogging = false,
): Promise<T> {
  const address = describeConnection(config);
  const docker = create(config);
  const t0 = performance.now();

  try {
    await docker.ping();
  } catch (err) {
    console.error(
      `[DockerClient] Connection to ${address} failed after ${(performance.now() - t0).toFixed(0)}ms:` +
      ` code=${errorCode(err)} message=${errorMessage(err)}`
    );
    throw err;
  }

  if (debugLogging) {
    console.log(`[DockerClient] Connected to ${address} (ping=${(performance.now() - t0).toFixed(0)}ms)`);
  }
  return docker;
}
