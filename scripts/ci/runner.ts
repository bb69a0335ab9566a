import {
  runCommand,
  runCommandOrThrow,
  type CommandOptions,
  type CommandResult,
} from '../shared/exec';

/**
 * Seam between build logic and the processes it starts. The default
 * implementation spawns; tests pass a recorder.
 */
export interface CommandRunner {
  readonly run: (command: string, args: string[], options?: CommandOptions) => CommandResult;
  readonly runOrThrow: (command: string, args: string[], options?: CommandOptions) => CommandResult;
}

export const DEFAULT_RUNNER: CommandRunner = {
  run: runCommand,
  runOrThrow: runCommandOrThrow,
};

/**
 * Runs a command with inherited stdio, so long builds stream their output.
 */
export function runStreaming(
  runner: CommandRunner,
  command: string,
  args: string[],
  options: Omit<CommandOptions, 'stdio'> = {},
): void {
  runner.runOrThrow(command, args, {...options, stdio: 'inherit'});
}
