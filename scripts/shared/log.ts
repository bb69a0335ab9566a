import {performance} from 'node:perf_hooks';

const LOG_PREFIX = '[ffmpeg-vendor]';
const GROUP_RESULT_WIDTH = 78;

export type LogWriter = (line: string) => void;

let writeLine: LogWriter = line => {
  process.stdout.write(`${line}\n`);
};

/**
 * Replaces the sink for build output and returns the previous one.
 * Tests use this to capture what a build step printed.
 */
export function setLogWriter(writer: LogWriter): LogWriter {
  const previous = writeLine;
  writeLine = writer;
  return previous;
}

export function logPrint(message: string): void {
  writeLine(message);
}

export function logWarn(message: string): void {
  writeLine(`${LOG_PREFIX} Warning: ${message}`);
}

export function logError(message: string): void {
  console.error(`${LOG_PREFIX} ${message}`);
}

export function logDebug(message: string, env: NodeJS.ProcessEnv = process.env): void {
  if (env.DEBUG) {
    writeLine(`${LOG_PREFIX} [DEBUG] ${message}`);
  }
}

export function formatGroupResult(success: boolean, seconds: number): string {
  const outcome = success ? 'ok' : 'failed';
  const startColor = success ? '\u001b[32m' : '\u001b[31m';
  const endColor = '\u001b[0m';
  return `${startColor}${outcome}${endColor} ${seconds.toFixed(2)}s`.padStart(GROUP_RESULT_WIDTH);
}

/**
 * Runs `fn` inside a GitHub Actions log group and prints how long it took.
 * The group is closed whether `fn` returns or throws.
 */
export function logGroup<T>(title: string, fn: () => T): T {
  const start = performance.now();
  let success = false;
  writeLine(`::group::${title}`);
  try {
    const result = fn();
    success = true;
    return result;
  } finally {
    const seconds = (performance.now() - start) / 1000;
    writeLine('::endgroup::');
    writeLine(formatGroupResult(success, seconds));
  }
}
