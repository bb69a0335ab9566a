import {spawnSync} from 'node:child_process';
import {BuildError, CommandFailedError, ErrorCode} from './errors';
import {logPrint} from './log';

export interface CommandResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
}

export interface CommandOptions {
  readonly cwd?: string;
  readonly env?: NodeJS.ProcessEnv;
  readonly stdio?: 'inherit' | 'pipe';
}

export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].map(part => (/\s/.test(part) ? JSON.stringify(part) : part)).join(' ');
}

export function runCommand(
  command: string,
  args: string[],
  options: CommandOptions = {},
): CommandResult {
  logPrint(`- Running: ${formatCommand(command, args)}`);
  const result = spawnSync(command, args, {
    cwd: options.cwd,
    env: options.env,
    stdio: options.stdio ?? 'pipe',
    encoding: 'utf8',
    maxBuffer: 64 * 1024 * 1024,
  });

  if (result.error) {
    const code = 'code' in result.error ? result.error.code : undefined;
    if (code === 'ENOENT') {
      throw new BuildError(`Command not found: ${command}`, ErrorCode.ERR_COMMAND_NOT_FOUND, {
        context: {command},
        cause: result.error,
      });
    }
    throw result.error;
  }

  return {
    stdout: typeof result.stdout === 'string' ? result.stdout : '',
    stderr: typeof result.stderr === 'string' ? result.stderr : '',
    exitCode: result.status ?? 1,
  };
}

export function runCommandOrThrow(
  command: string,
  args: string[],
  options: CommandOptions = {},
): CommandResult {
  const result = runCommand(command, args, options);
  if (result.exitCode !== 0) {
    throw new CommandFailedError(command, args, result.exitCode);
  }
  return result;
}
