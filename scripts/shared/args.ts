import {BuildError, ErrorCode} from './errors';

export interface ParsedArgs {
  readonly positional: string[];
  readonly flags: Record<string, string>;
}

export interface ParseOptions {
  /** Flags that never take a value, so `--flag dest` keeps `dest` positional. */
  readonly booleans?: readonly string[];
}

export function parseArgs(argv: string[], options: ParseOptions = {}): ParsedArgs {
  const booleans = new Set(options.booleans ?? []);
  const positional: string[] = [];
  const flags: Record<string, string> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--') {
      positional.push(...argv.slice(i + 1));
      break;
    }
    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }

    const body = arg.slice(2);
    const eq = body.indexOf('=');
    if (eq !== -1) {
      flags[body.slice(0, eq)] = body.slice(eq + 1);
      continue;
    }

    if (booleans.has(body)) {
      flags[body] = 'true';
      continue;
    }

    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith('--')) {
      flags[body] = next;
      i++;
    } else {
      flags[body] = 'true';
    }
  }

  return {positional, flags};
}

export function requirePositional(parsed: ParsedArgs, index: number, label: string): string {
  const value = parsed.positional[index];
  if (!value) {
    throw new BuildError(`Missing required argument: <${label}>`, ErrorCode.ERR_INVALID_ARGUMENT);
  }
  return value;
}

export function isFlagSet(flags: Record<string, string>, key: string): boolean {
  return flags[key] === 'true';
}

/**
 * Rejects flags outside `known`, so a typo fails instead of being ignored.
 */
export function assertKnownFlags(flags: Record<string, string>, known: readonly string[]): void {
  const unknown = Object.keys(flags).filter(key => !known.includes(key));
  if (unknown.length > 0) {
    throw new BuildError(
      `Unknown option: ${unknown.map(key => `--${key}`).join(', ')}`,
      ErrorCode.ERR_INVALID_ARGUMENT,
    );
  }
}
