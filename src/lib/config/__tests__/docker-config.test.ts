import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { describeConnection, loadDockerConfig } from '../docker-config';

const DOCKER_KEYS = ['DOCKER_HOST', 'DOCKER_PORT', 'DOCKER_PROTOCOL', 'DOCKER_SOCKET_PATH'];

describe('loadDockerConfig', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of DOCKER_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of DOCKER_KEYS) {
      if (saved[key] === undefined) delete process.env[key];
      else process.env[key] = saved[key];
    }
  });

  it('should default to the local Docker socket', () => {
    expect(loadDockerConfig()).toEqual({ transport: 'socket', socketPath: '/var/run/docker.sock' });
  });

  it('should use a custom socket path', () => {
    process.env.DOCKER_SOCKET_PATH = '/run/user/1000/docker.sock';

    expect(loadDockerConfig()).toEqual({ transport: 'socket', socketPath: '/run/user/1000/docker.sock' });
  });

  it('should parse a TCP host with defaults', () => {
    process.env.DOCKER_HOST = '192.168.1.100';

    expect(loadDockerConfig()).toEqual({
      transport: 'tcp',
      host: '192.168.1.100',
      port: 2375,
      protocol: 'http',
    });
  });

  it('should parse custom port and https protocol', () => {
    process.env.DOCKER_HOST = 'docker.internal';
    process.env.DOCKER_PORT = '2376';
    process.env.DOCKER_PROTOCOL = 'https';

    expect(loadDockerConfig()).toEqual({
      transport: 'tcp',
      host: 'docker.internal',
      port: 2376,
      protocol: 'https',
    });
  });

  it('should reject an out-of-range port', () => {
    process.env.DOCKER_HOST = 'docker.internal';
    process.env.DOCKER_PORT = '70000';

    expect(() => loadDockerConfig()).toThrow();
  });

  it('should reject an unknown protocol', () => {
    process.env.DOCKER_HOST = 'docker.internal';
    process.env.DOCKER_PROTOCOL = 'ftp';

    expect(() => loadDockerConfig()).toThrow();
  });
});

describe('describeConnection', () => {
  it('should describe socket and TCP connections', () => {
    expect(describeConnection({ transport: 'socket', socketPath: '/var/run/docker.sock' }))
      .toBe('unix:///var/run/docker.sock');
    expect(describeConnection({ transport: 'tcp', host: 'h', port: 2375, protocol: 'http' }))
      .toBe('http://h:2375');
  });
});
