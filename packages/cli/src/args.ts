/**
 * Argument parsing
 *
 * `--key value`, `--key=value`, repeatable value options and bare flags.
 * Anything else starting with `-` is a usage error.
 */

export interface ParsedArgs {
  positionals: string[];
  options: Map<string, string[]>;
  flags: Set<string>;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const VALUE_OPTIONS: ReadonlyMap<string, string> = new Map([
  ['-o', 'output'],
  ['--output', 'output'],
  ['--name', 'name'],
  ['--domain', 'domain'],
  ['--scale', 'scale'],
  ['--description', 'description'],
  ['--principle', 'principle'],
  ['--data-dir', 'data-dir'],
  ['--log-level', 'log-level'],
]);

const FLAG_OPTIONS: ReadonlyMap<string, string> = new Map([
  ['-h', 'help'],
  ['--help', 'help'],
  ['-V', 'version'],
  ['--version', 'version'],
  ['--no-validate', 'no-validate'],
]);

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = { positionals: [], options: new Map(), flags: new Set() };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--') {
      parsed.positionals.push(...argv.slice(i + 1));
      break;
    }
    if (!arg.startsWith('-') || arg === '-') {
      parsed.positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq > 0 ? arg.slice(0, eq) : arg;

    const flagName = FLAG_OPTIONS.get(flag);
    if (flagName && eq < 0) {
      parsed.flags.add(flagName);
      continue;
    }

    const optionName = VALUE_OPTIONS.get(flag);
    if (!optionName) {
      throw new UsageError(`Unknown option: ${flag}`);
    }

    let value: string;
    if (eq > 0) {
      value = arg.slice(eq + 1);
    } else if (i + 1 < argv.length) {
      value = argv[++i];
    } else {
      throw new UsageError(`Option ${flag} needs a value`);
    }

    const values = parsed.options.get(optionName) ?? [];
    values.push(value);
    parsed.options.set(optionName, values);
  }

  return parsed;
}

/**
 * Last occurrence wins
 */
export function option(args: ParsedArgs, name: string): string | undefined {
  return args.options.get(name)?.at(-1);
}
