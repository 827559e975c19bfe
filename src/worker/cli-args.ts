export interface CliArgs {
  image?: string;
  durationSec?: number;
  command?: string;
  ports?: string;
  output: string;
  live: boolean;
  bulk: boolean;
  quick: boolean;
  help: boolean;
}

export const USAGE = `Usage: profile [options] [image]

Options:
  -i, --image <name>        Docker image to profile (e.g. nginx:latest)
  -d, --duration <sec>      Collection window in seconds (default: 30)
  -c, --command <cmd>       Command to run instead of the keep-alive default
  -p, --ports <host:ctr>    Publish a container port
  -o, --output <file>       Report path (default: resource_report.json)
      --live                Monitor until interrupted (Ctrl+C)
      --bulk                Profile the default image list
      --quick               Profile the quick subset of the default list
  -h, --help                Show this help`;

const VALUE_FLAGS: Record<string, 'image' | 'duration' | 'command' | 'ports' | 'output'> = {
  '--image': 'image',
  '-i': 'image',
  '--duration': 'duration',
  '-d': 'duration',
  '--command': 'command',
  '-c': 'command',
  '--ports': 'ports',
  '-p': 'ports',
  '--output': 'output',
  '-o': 'output',
};

function parseDuration(value: string): number {
  if (!/^\d+$/.test(value) || parseInt(value, 10) <= 0) {
    throw new Error(`Invalid duration "${value}": expected a positive number of seconds`);
  }
  return parseInt(value, 10);
}

/**
 * Parse profiler command-line arguments.
 * Value flags accept both `--flag value` and `--flag=value`;
 * the first positional argument is taken as the image.
 *
 * @throws {Error} On a value flag without a value or an invalid duration
 */
export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    output: 'resource_report.json',
    live: false,
    bulk: false,
    quick: false,
    help: false,
  };

  const positionalArgs: string[] = [];
  let i = 0;

  while (i < args.length) {
    const arg = args[i] ?? '';
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq >= 0 ? arg.slice(0, eq) : arg;
    const key = VALUE_FLAGS[flag];

    if (key) {
      const value = eq >= 0 ? arg.slice(eq + 1) : args[i + 1];
      if (value === undefined || value === '') {
        throw new Error(`Missing value for ${flag}`);
      }
      i += eq >= 0 ? 1 : 2;

      if (key === 'duration') result.durationSec = parseDuration(value);
      else result[key] = value;
      continue;
    }

    if (arg === '--live') result.live = true;
    else if (arg === '--bulk') result.bulk = true;
    else if (arg === '--quick') result.quick = true;
    else if (arg === '--help' || arg === '-h') result.help = true;
    else if (!arg.startsWith('-')) positionalArgs.push(arg);
    else throw new Error(`Unknown option: ${arg}`);

    i++;
  }

  if (result.image === undefined && positionalArgs.length > 0) {
    result.image = positionalArgs[0];
  }

  return result;
}
