import type { LaunchCommand, PortMapping } from '@/types/profiling';
import { PortMappingError } from '../errors';

/**
 * Split a command line into argv with POSIX-shell-like quoting.
 * Single quotes are literal, double quotes allow \" and \\ escapes,
 * and a backslash outside quotes escapes the next character.
 *
 * @example splitCommand(`nginx -g 'daemon off;'`) // ['nginx', '-g', 'daemon off;']
 * @throws {Error} On an unterminated quote
 */
export function splitCommand(command: string): string[] {
  const args: string[] = [];
  let current = '';
  let inToken = false;
  let quote: "'" | '"' | null = null;

  for (let i = 0; i < command.length; i++) {
    const ch = command.charAt(i);

    if (quote === "'") {
      if (ch === "'") quote = null;
      else current += ch;
      continue;
    }

    if (quote === '"') {
      if (ch === '"') {
        quote = null;
      } else if (ch === '\\' && (command[i + 1] === '"' || command[i + 1] === '\\')) {
        current += command.charAt(++i);
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === "'" || ch === '"') {
      quote = ch;
      inToken = true;
    } else if (ch === '\\' && i + 1 < command.length) {
      current += command.charAt(++i);
      inToken = true;
    } else if (/\s/.test(ch)) {
      if (inToken) {
        args.push(current);
        current = '';
        inToken = false;
      }
    } else {
      current += ch;
      inToken = true;
    }
  }

  if (quote) {
    throw new Error(`Unterminated ${quote} quote in command: ${command}`);
  }
  if (inToken) args.push(current);

  return args;
}

/** Normalize a launch command to the argv array the runtime expects */
export function toArgv(command: LaunchCommand): string[] {
  return typeof command === 'string' ? splitCommand(command) : [...command];
}

/** Human-readable form of a launch command, for logs */
export function formatCommand(command: LaunchCommand | null | undefined): string {
  if (command === null || command === undefined) return '<image default>';
  return typeof command === 'string' ? command : command.join(' ');
}

function parsePort(raw: string, input: string): number {
  if (!/^\d+$/.test(raw)) throw new PortMappingError(input);
  const port = parseInt(raw, 10);
  if (port < 1 || port > 65535) throw new PortMappingError(input);
  return port;
}

/**
 * Parse a `host_port:container_port` mapping.
 *
 * @throws {PortMappingError} When the format or either port is invalid
 */
export function parsePortMapping(input: string): PortMapping {
  const parts = input.trim().split(':');
  if (parts.length !== 2) {
    throw new PortMappingError(input);
  }
  const [host = '', container = ''] = parts;
  return {
    hostPort: parsePort(host, input),
    containerPort: parsePort(container, input),
  };
}
