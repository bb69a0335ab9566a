import {existsSync, readdirSync} from 'node:fs';
import {join} from 'node:path';

/**
 * Walks `rootDir` depth first and returns every file accepted by `matcher`.
 */
export function findFiles(
  rootDir: string,
  matcher: (name: string, pathname: string) => boolean,
): string[] {
  const found: string[] = [];
  const entries = readdirSync(rootDir, {withFileTypes: true});
  for (const entry of entries) {
    const pathname = join(rootDir, entry.name);
    if (entry.isDirectory()) {
      found.push(...findFiles(pathname, matcher));
    } else if (entry.isFile() && matcher(entry.name, pathname)) {
      found.push(pathname);
    }
  }
  return found;
}

/**
 * Files directly inside `dir` whose name ends with `suffix`, sorted.
 * A missing directory yields an empty list.
 */
export function listFilesWithSuffix(dir: string, suffix: string): string[] {
  if (!existsSync(dir)) {
    return [];
  }
  return readdirSync(dir, {withFileTypes: true})
    .filter(entry => entry.isFile() && entry.name.endsWith(suffix))
    .map(entry => join(dir, entry.name))
    .sort();
}
