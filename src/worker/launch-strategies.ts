import type { LaunchCommand, PortMapping } from '@/types/profiling';
import {
  ContainerLaunchError,
  ContainerStartError,
  errorMessage,
  type LaunchAttempt,
} from '@/lib/errors';
import { formatCommand } from '@/lib/parsers/command-parser';
import type { ContainerHandle, ContainerRuntime } from '@/lib/runtime/container-runtime';

export interface LaunchStrategy {
  label: string;
  /** undefined launches the image's own default command */
  command: LaunchCommand | undefined;
  /** Whether a failure of this strategy moves on to the next one */
  continueOnFailure: (err: unknown) => boolean;
}

export interface LaunchResult {
  handle: ContainerHandle;
  strategy: LaunchStrategy;
}

const isExecutableNotFound = (err: unknown): boolean =>
  err instanceof ContainerLaunchError && err.executableNotFound;

const always = (): boolean => true;

/** Keep-alive fallbacks tried when the default keep-alive binary is missing from the image */
export const KEEP_ALIVE_FALLBACKS: readonly LaunchStrategy[] = [
  { label: 'sleep infinity', command: 'sleep infinity', continueOnFailure: always },
  { label: '/bin/sh -c sleep infinity', command: ['/bin/sh', '-c', 'sleep infinity'], continueOnFailure: always },
  { label: 'image default command', command: undefined, continueOnFailure: always },
];

/**
 * Build the ordered launch plan.
 *
 * A user-supplied command is tried alone. Otherwise the keep-alive command
 * goes first and the fallback chain is only entered when it fails because
 * the executable is missing; any other failure is final.
 */
export function buildLaunchPlan(customCommand: LaunchCommand | null, keepAliveCommand: LaunchCommand): LaunchStrategy[] {
  if (customCommand !== null) {
    return [{ label: formatCommand(customCommand), command: customCommand, continueOnFailure: () => false }];
  }
  return [
    { label: formatCommand(keepAliveCommand), command: keepAliveCommand, continueOnFailure: isExecutableNotFound },
    ...KEEP_ALIVE_FALLBACKS,
  ];
}

/**
 * Try each strategy in order; first success wins.
 *
 * @throws {ContainerStartError} With every attempt's failure once the plan is exhausted
 * or a strategy's failure is not one it continues on
 */
export async function launchWithFallbacks(
  runtime: ContainerRuntime,
  image: string,
  plan: readonly LaunchStrategy[],
  ports?: PortMapping,
): Promise<LaunchResult> {
  const attempts: LaunchAttempt[] = [];

  for (const strategy of plan) {
    try {
      const handle = await runtime.startContainer(image, strategy.command, ports);
      if (attempts.length > 0) {
        console.log(`[Launcher] ${image} started with fallback: ${strategy.label}`);
      }
      return { handle, strategy };
    } catch (err) {
      attempts.push({ strategy: strategy.label, message: errorMessage(err) });
      console.error(`[Launcher] ${image} failed to start with "${strategy.label}": ${errorMessage(err)}`);
      if (!strategy.continueOnFailure(err)) break;
    }
  }

  throw new ContainerStartError(image, attempts);
}
