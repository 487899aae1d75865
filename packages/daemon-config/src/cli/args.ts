/**
 * Argument parsing for `lazypull-config`
 */

export interface RenderArgs {
  image: string;
  snapshotId: string;
  driver?: string;
  template?: string;
  mirrorsDir?: string;
  vpc: boolean;
  labels: Record<string, string>;
  params: Record<string, string>;
  output?: string;
  showConfig: boolean;
}

export const USAGE = `Usage: lazypull-config render --image <ref> [options]

Options:
  --image <ref>          Image reference to supplement for (required)
  --snapshot-id <id>     Snapshot id (default: image reference)
  --driver <driver>      fusedev | fscache  [env: LAZYPULL_FS_DRIVER]
  --template <file>      Daemon config template  [env: LAZYPULL_TEMPLATE]
  --mirrors-dir <dir>    Mirrors config directory  [env: LAZYPULL_MIRRORS_DIR]
  --vpc                  Reach the registry through its VPC host
  --label <key=value>    Snapshot label, repeatable
  --param <key=value>    Supplement parameter, repeatable
  --output <file>        Write the daemon config here instead of stdout
  --show-config          Print the redacted config to stderr
  -h, --help             Show this help`;

function parseKeyValue(flag: string, value: string): [string, string] {
  const separator = value.indexOf('=');
  if (separator <= 0) {
    throw new Error(`${flag} expects key=value, got "${value}"`);
  }
  return [value.slice(0, separator), value.slice(separator + 1)];
}

/**
 * Returns null when help was requested.
 */
export function parseArgs(args: string[]): RenderArgs | null {
  const [command, ...rest] = args;
  if (command === undefined || command === '-h' || command === '--help') {
    return null;
  }
  if (command !== 'render') {
    throw new Error(`Unknown command "${command}"`);
  }

  let image: string | undefined;
  const result: Omit<RenderArgs, 'image' | 'snapshotId'> & { snapshotId?: string } = {
    vpc: false,
    labels: {},
    params: {},
    showConfig: false,
  };

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    const next = (): string => {
      const value = rest[++i];
      if (value === undefined) {
        throw new Error(`${arg} requires a value`);
      }
      return value;
    };

    switch (arg) {
      case '--image':
        image = next();
        break;
      case '--snapshot-id':
        result.snapshotId = next();
        break;
      case '--driver':
        result.driver = next();
        break;
      case '--template':
        result.template = next();
        break;
      case '--mirrors-dir':
        result.mirrorsDir = next();
        break;
      case '--vpc':
        result.vpc = true;
        break;
      case '--label': {
        const [key, value] = parseKeyValue(arg, next());
        result.labels[key] = value;
        break;
      }
      case '--param': {
        const [key, value] = parseKeyValue(arg, next());
        result.params[key] = value;
        break;
      }
      case '--output':
        result.output = next();
        break;
      case '--show-config':
        result.showConfig = true;
        break;
      case '-h':
      case '--help':
        return null;
      default:
        throw new Error(`Unknown option "${arg}"`);
    }
  }

  if (image === undefined) {
    throw new Error('--image is required');
  }

  return { ...result, image, snapshotId: result.snapshotId ?? image };
}
