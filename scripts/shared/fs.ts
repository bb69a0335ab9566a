import {mkdirSync, rmSync, writeFileSync} from 'node:fs';
import {dirname} from 'node:path';

export function ensureDir(pathname: string): void {
  mkdirSync(pathname, {recursive: true});
}

export function removeDir(pathname: string): void {
  rmSync(pathname, {recursive: true, force: true});
}

export function writeFileEnsuringDir(pathname: string, contents: string): void {
  ensureDir(dirname(pathname));
  writeFileSync(pathname, contents);
}
