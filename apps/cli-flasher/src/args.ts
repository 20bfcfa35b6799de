export interface CliOptions {
  image: string;
  disks: string[];
  all: boolean;
  check: boolean;
  unmount: boolean;
  yes: boolean;
  verbose: boolean;
}

export type ParsedArgs = { help: true } | { help: false; options: CliOptions };

type Flag = 'all' | 'check' | 'unmount' | 'yes' | 'verbose' | 'help';

const SHORT_FLAGS: Record<string, Flag> = {
  a: 'all',
  c: 'check',
  u: 'unmount',
  y: 'yes',
  h: 'help',
};

const LONG_FLAGS: Record<string, Flag> = {
  '--all': 'all',
  '--check': 'check',
  '--unmount': 'unmount',
  '--yes': 'yes',
  '--verbose': 'verbose',
  '--help': 'help',
};

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Parse `multiflash <IMAGE> [DISKS...]` with its flags. Short flags may be
 * combined (`-cy`); everything after `--` is positional.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const flags = new Set<Flag>();
  const positional: string[] = [];
  let flagsDone = false;

  for (const arg of argv) {
    if (flagsDone || arg === '-' || !arg.startsWith('-')) {
      positional.push(arg);
    } else if (arg === '--') {
      flagsDone = true;
    } else if (arg.startsWith('--')) {
      const flag = LONG_FLAGS[arg];
      if (!flag) {
        throw new UsageError(`unknown option '${arg}'`);
      }
      flags.add(flag);
    } else {
      for (const letter of arg.slice(1)) {
        const flag = SHORT_FLAGS[letter];
        if (!flag) {
          throw new UsageError(`unknown option '-${letter}'`);
        }
        flags.add(flag);
      }
    }
  }

  if (flags.has('help')) {
    return { help: true };
  }

  const [image, ...disks] = positional;
  if (image === undefined) {
    throw new UsageError('the image path is required');
  }

  return {
    help: false,
    options: {
      image,
      disks,
      all: flags.has('all'),
      check: flags.has('check'),
      unmount: flags.has('unmount'),
      yes: flags.has('yes'),
      verbose: flags.has('verbose'),
    },
  };
}
