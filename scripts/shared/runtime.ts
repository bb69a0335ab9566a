import {arch, machine, platform} from 'node:os';
import {dirname, resolve} from 'node:path';
import {fileURLToPath} from 'node:url';

/**
 * The machine the build runs on. Injected everywhere so tests can
 * pretend to be Windows or macOS.
 */
export interface Host {
  readonly system: NodeJS.Platform;
  /** uname-style machine name: x86_64, aarch64, arm64, ... */
  readonly machine: string;
  /** Node's architecture name: x64, arm64, ia32, ... */
  readonly arch: string;
}

export function currentHost(): Host {
  return {system: platform(), machine: machine(), arch: arch()};
}

export function isMainModule(importMetaUrl: string): boolean {
  if (!process.argv[1]) {
    return false;
  }
  const entry = resolve(process.argv[1]);
  const current = resolve(fileURLToPath(importMetaUrl));
  return entry === current;
}

export function moduleDir(importMetaUrl: string): string {
  return dirname(fileURLToPath(importMetaUrl));
}
