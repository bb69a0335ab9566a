#!/usr/bin/env tsx
// Build FFmpeg and its libraries into a vendor directory and pack them.
//
// Usage:
//   tsx scripts/build-ffmpeg.ts <destination> [--disable-gpl] [--output-dir DIR] [--catalog FILE]
//
// The tarball output/ffmpeg-<platform-tag>.tar.gz holds bin/, include/ and lib/.
// When it already exists the build is skipped.

import {existsSync} from 'node:fs';
import {join, resolve} from 'node:path';
import {assertKnownFlags, isFlagSet, parseArgs, requirePositional} from './shared/args';
import {BuildError, ErrorCode, errorMessage} from './shared/errors';
import {logError, logGroup, logPrint} from './shared/log';
import {currentHost, isMainModule, type Host} from './shared/runtime';
import {DEFAULT_RUNNER, runStreaming, type CommandRunner} from './ci/runner';
import {
  copyMingwRuntime,
  findSharedLibraries,
  moveWindowsImportLibraries,
  packVendorTarball,
  stripLibraries,
} from './vendor/artifacts';
import {Builder} from './vendor/builder';
import {isBuilderTool, loadCatalog, selectPackages} from './vendor/catalog';
import {platformTag} from './vendor/platform';

const KNOWN_FLAGS = ['disable-gpl', 'output-dir', 'catalog', 'help'];

/** Packages from the manylinux image used in place of building them. */
const MANYLINUX_PACKAGES = ['gperf', 'libuuid-devel', 'libxcb-devel', 'zlib-devel'];

/** Tools printed on Windows so the log shows which MinGW is in use. */
const WINDOWS_DIAGNOSTIC_TOOLS = ['gcc', 'g++', 'curl', 'ld', 'nasm', 'pkg-config'];

const PYTHON_BUILD_TOOLS = ['cmake', 'meson', 'ninja'];

export interface BuildOptions {
  readonly destination: string;
  readonly disableGpl: boolean;
  readonly outputDir?: string;
  readonly catalogPath?: string;
}

export interface BuildContext {
  readonly runner: CommandRunner;
  readonly env: NodeJS.ProcessEnv;
  readonly host: Host;
  readonly cwd: string;
}

function printUsage(): void {
  console.log('Usage: tsx scripts/build-ffmpeg.ts <destination> [--disable-gpl] [--output-dir DIR] [--catalog FILE]');
  console.log('  --disable-gpl   build without GPL libraries (openh264 replaces x264)');
  console.log('  --output-dir    where ffmpeg-<platform>.tar.gz is written');
  console.log('  --catalog       package catalog JSON (default: scripts/vendor/packages.json)');
}

function isCibuildwheelLinux(system: NodeJS.Platform, env: NodeJS.ProcessEnv): boolean {
  return system === 'linux' && env.CIBUILDWHEEL === '1';
}

/**
 * Inside the cibuildwheel Linux container /output is mounted back to the host.
 */
export function resolveOutputDir(system: NodeJS.Platform, env: NodeJS.ProcessEnv, cwd: string): string {
  return isCibuildwheelLinux(system, env) ? '/output' : join(cwd, 'output');
}

/**
 * Installs what the OS provides and returns the build tools that no longer
 * need to be built from source.
 */
export function installSystemPackages(
  runner: CommandRunner,
  system: NodeJS.Platform,
  env: NodeJS.ProcessEnv,
): Set<string> {
  const availableTools = new Set<string>();

  if (isCibuildwheelLinux(system, env)) {
    logGroup('install packages', () => {
      runStreaming(runner, 'yum', ['-y', 'install', ...MANYLINUX_PACKAGES]);
    });
    availableTools.add('gperf');
  } else if (system === 'win32') {
    availableTools.add('gperf');
    availableTools.add('nasm');
    for (const tool of WINDOWS_DIAGNOSTIC_TOOLS) {
      runStreaming(runner, 'where', [tool]);
    }
  }

  return availableTools;
}

/**
 * Runs the whole vendor build and returns the path of the tarball.
 */
export function buildFfmpeg(options: BuildOptions, context: BuildContext): string {
  const {runner, env, host, cwd} = context;
  const system = host.system;

  const outputDir = options.outputDir ? resolve(cwd, options.outputDir) : resolveOutputDir(system, env, cwd);
  const tarball = join(outputDir, `ffmpeg-${platformTag(host, env)}.tar.gz`);
  if (existsSync(tarball)) {
    logPrint(`${tarball} already exists, skipping build`);
    return tarball;
  }

  const catalog = loadCatalog(options.catalogPath ? resolve(cwd, options.catalogPath) : undefined);
  const builder = new Builder({destDir: options.destination, rootDir: cwd, runner, host, env});
  builder.createDirectories();

  const availableTools = installSystemPackages(runner, system, env);
  logGroup('install python packages', () => {
    runStreaming(runner, 'pip', ['install', ...PYTHON_BUILD_TOOLS], {env: builder.baseEnvironment});
  });

  const {packages} = selectPackages(catalog, {system, availableTools, disableGpl: options.disableGpl});
  logPrint(`Packages: ${packages.map(pkg => pkg.name).join(', ')}`);

  for (const pkg of packages) {
    builder.extract(pkg, {forBuilder: isBuilderTool(pkg)});
  }
  for (const pkg of packages) {
    builder.build(pkg, {forBuilder: isBuilderTool(pkg)});
  }

  const destDir = builder.prefix();
  if (system === 'win32') {
    moveWindowsImportLibraries(destDir);
    copyMingwRuntime(runner, destDir);
  }

  stripLibraries(runner, findSharedLibraries(destDir, system), system);
  packVendorTarball(runner, destDir, tarball, pathname => builder.mangle(pathname));
  logPrint(`Wrote ${tarball}`);
  return tarball;
}

export function main(
  args: string[],
  runner: CommandRunner = DEFAULT_RUNNER,
  env: NodeJS.ProcessEnv = process.env,
  host: Host = currentHost(),
  cwd: string = process.cwd(),
): number {
  const parsed = parseArgs(args, {booleans: ['disable-gpl', 'help']});
  if (isFlagSet(parsed.flags, 'help')) {
    printUsage();
    return 0;
  }

  let options: BuildOptions;
  try {
    assertKnownFlags(parsed.flags, KNOWN_FLAGS);
    if (parsed.positional.length > 1) {
      throw new BuildError(
        `Unexpected argument: ${parsed.positional.slice(1).join(' ')}`,
        ErrorCode.ERR_INVALID_ARGUMENT,
      );
    }
    options = {
      destination: requirePositional(parsed, 0, 'destination'),
      disableGpl: isFlagSet(parsed.flags, 'disable-gpl'),
      outputDir: parsed.flags['output-dir'],
      catalogPath: parsed.flags.catalog,
    };
  } catch (error) {
    logError(errorMessage(error));
    printUsage();
    return 1;
  }

  try {
    buildFfmpeg(options, {runner, env, host, cwd});
    return 0;
  } catch (error) {
    logError(errorMessage(error));
    return 1;
  }
}

if (isMainModule(import.meta.url)) {
  process.exit(main(process.argv.slice(2)));
}
