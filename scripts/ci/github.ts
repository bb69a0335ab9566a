import {BuildError, ErrorCode} from '../shared/errors';

export function requireEnv(env: NodeJS.ProcessEnv, key: string): string {
  const value = env[key];
  if (!value) {
    throw new BuildError(`Missing required environment variable: ${key}`, ErrorCode.ERR_MISSING_ENV, {
      context: {key},
    });
  }
  return value;
}
