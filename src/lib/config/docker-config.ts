import { z } from 'zod';

const DockerConnectionConfigSchema = z.discriminatedUnion('transport', [
  z.object({
    transport: z.literal('socket'),
    socketPath: z.string().min(1),
  }),
  z.object({
    transport: z.literal('tcp'),
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535),
    protocol: z.enum(['http', 'https']).default('http'),
  }),
]);

export type DockerConnectionConfig = z.infer<typeof DockerConnectionConfigSchema>;

const DEFAULT_SOCKET_PATH = '/var/run/docker.sock';

/**
 * Load the Docker daemon connection from environment variables.
 * DOCKER_HOST (with DOCKER_PORT / DOCKER_PROTOCOL) selects TCP;
 * otherwise DOCKER_SOCKET_PATH or the default local socket is used.
 *
 * @throws {z.ZodError} If configuration is invalid
 */
export function loadDockerConfig(): DockerConnectionConfig {
  const host = process.env.DOCKER_HOST;

  if (host) {
    return DockerConnectionConfigSchema.parse({
      transport: 'tcp',
      host,
      port: parseInt(process.env.DOCKER_PORT || '2375', 10),
      protocol: process.env.DOCKER_PROTOCOL || 'http',
    });
  }

  return DockerConnectionConfigSchema.parse({
    transport: 'socket',
    socketPath: process.env.DOCKER_SOCKET_PATH || DEFAULT_SOCKET_PATH,
  });
}

/** Identifier used for logging and connection reuse */
export function describeConnection(config: DockerConnectionConfig): string {
  return config.transport === 'socket'
    ? `unix://${config.socketPath}`
    : `${config.protocol}://${config.host}:${config.port}`;
}
