#!/usr/bin/env tsx
// The build-ffmpeg GitHub Actions workflow, kept as data.
//
// Usage:
//   tsx scripts/ci/wheel-workflow.ts render [--out FILE]
//   tsx scripts/ci/wheel-workflow.ts check [--file FILE]

import {readFileSync, writeFileSync} from 'node:fs';
import {join, resolve} from 'node:path';
import {isDeepStrictEqual} from 'node:util';
import {Document, parse} from 'yaml';
import {parseArgs} from '../shared/args';
import {errorMessage} from '../shared/errors';
import {logError, logPrint} from '../shared/log';
import {isMainModule, moduleDir} from '../shared/runtime';

export type RunnerOs = 'ubuntu-latest' | 'windows-latest' | 'macos-latest';

export interface MatrixEntry {
  readonly os: RunnerOs;
  /** Value for CIBW_ARCHS. */
  readonly arch: string;
  /** Shell every `run` step of the job uses. */
  readonly shell: string;
}

export interface WorkflowStep {
  readonly name?: string;
  readonly uses?: string;
  readonly if?: string;
  readonly with?: Record<string, string | number>;
  readonly env?: Record<string, string>;
  readonly run?: string;
}

export const LINUX_VENDOR_DIR = '/tmp/vendor';
export const WINDOWS_VENDOR_DIR = 'C:\\cibw\\vendor';
export const UPLOAD_CONDITION = "startsWith(github.ref, 'refs/tags/')";
export const WORKFLOW_PATH = join('.github', 'workflows', 'build-ffmpeg.yml');

const ROOT_DIR = resolve(moduleDir(import.meta.url), '..', '..');
const NPM_INSTALL = 'npm install --no-audit --no-fund';

export const MATRIX: readonly MatrixEntry[] = [
  {os: 'ubuntu-latest', arch: 'x86_64', shell: 'bash'},
  {os: 'windows-latest', arch: 'AMD64', shell: 'msys2 {0}'},
];

/**
 * Environment steering cibuildwheel. `archs` is a concrete CIBW_ARCHS value
 * or the matrix expression used in the workflow file.
 */
export function cibuildwheelEnvironment(archs: string): Record<string, string> {
  return {
    CIBW_ARCHS: archs,
    CIBW_BEFORE_ALL_LINUX: 'dnf -y module install nodejs:20/common',
    CIBW_BEFORE_BUILD: `${NPM_INSTALL} && npx tsx scripts/build-ffmpeg.ts ${LINUX_VENDOR_DIR}`,
    CIBW_BEFORE_BUILD_WINDOWS: `${NPM_INSTALL} && npx tsx scripts\\build-ffmpeg.ts ${WINDOWS_VENDOR_DIR}`,
    CIBW_BUILD: 'cp312-*',
    CIBW_MANYLINUX_X86_64_IMAGE: 'manylinux_2_28',
    CIBW_REPAIR_WHEEL_COMMAND_LINUX: `LD_LIBRARY_PATH=${LINUX_VENDOR_DIR}/lib:$LD_LIBRARY_PATH auditwheel repair -w {dest_dir} {wheel}`,
    CIBW_REPAIR_WHEEL_COMMAND_WINDOWS: `delvewheel repair --add-path ${WINDOWS_VENDOR_DIR}\\bin -w {dest_dir} {wheel}`,
    CIBW_SKIP: '*musllinux*',
    CIBW_TEST_COMMAND: 'python -c "import dummy"',
  };
}

/** A `${{ matrix.<key> }}` expression. */
export function matrixExpression(key: keyof MatrixEntry): string {
  return `\${{ matrix.${key} }}`;
}

export function workflowSteps(): WorkflowStep[] {
  return [
    {uses: 'actions/checkout@v4'},
    {uses: 'actions/setup-python@v5', with: {'python-version': '3.12'}},
    {uses: 'actions/setup-node@v4', with: {'node-version': 20}},
    {
      name: 'Install packages',
      if: "matrix.os == 'macos-latest'",
      run: [
        'brew update',
        'brew install pkg-config',
        'brew unlink gettext libidn2 libpng libtiff libunistring little-cms2 unbound',
        '',
      ].join('\n'),
    },
    {
      uses: 'msys2/setup-msys2@v2',
      if: "matrix.os == 'windows-latest'",
      with: {
        install: 'base-devel mingw-w64-x86_64-gcc mingw-w64-x86_64-gperf mingw-w64-x86_64-nasm',
        'path-type': 'inherit',
      },
    },
    {
      name: 'Build FFmpeg',
      env: cibuildwheelEnvironment(matrixExpression('arch')),
      run: ['pip install cibuildwheel delvewheel', 'cibuildwheel --output-dir output', 'rm -f output/*.whl', ''].join(
        '\n',
      ),
    },
    {
      name: 'Upload FFmpeg',
      uses: 'softprops/action-gh-release@v1',
      if: UPLOAD_CONDITION,
      with: {files: 'output/*'},
    },
  ];
}

export function buildWorkflow(): Record<string, unknown> {
  return {
    name: 'build-ffmpeg',
    on: ['push', 'pull_request'],
    permissions: {contents: 'write'},
    jobs: {
      build: {
        'runs-on': matrixExpression('os'),
        strategy: {
          matrix: {
            include: MATRIX.map(entry => ({...entry})),
          },
        },
        defaults: {
          run: {shell: matrixExpression('shell')},
        },
        steps: workflowSteps(),
      },
    },
  };
}

export function renderWorkflow(): string {
  const doc = new Document(buildWorkflow());
  doc.commentBefore = ' Generated by scripts/ci/wheel-workflow.ts; run its render command after editing.';
  return doc.toString({lineWidth: 0});
}

/**
 * True when `contents` describes the same workflow as the model,
 * regardless of formatting.
 */
export function isWorkflowInSync(contents: string): boolean {
  return isDeepStrictEqual(parse(contents), buildWorkflow());
}

export function main(args: string[]): number {
  const {positional, flags} = parseArgs(args);
  const command = positional[0];

  try {
    if (command === 'render') {
      const out = resolve(ROOT_DIR, flags.out ?? WORKFLOW_PATH);
      writeFileSync(out, renderWorkflow());
      logPrint(`Wrote ${out}`);
      return 0;
    }

    if (command === 'check') {
      const file = resolve(ROOT_DIR, flags.file ?? WORKFLOW_PATH);
      if (!isWorkflowInSync(readFileSync(file, 'utf8'))) {
        logError(`${file} is out of date; run: tsx scripts/ci/wheel-workflow.ts render`);
        return 1;
      }
      logPrint(`${file} is up to date`);
      return 0;
    }

    logError(`Unknown command: ${command ?? '(none)'}`);
    return 1;
  } catch (error) {
    logError(errorMessage(error));
    return 1;
  }
}

if (isMainModule(import.meta.url)) {
  process.exit(main(process.argv.slice(2)));
}
