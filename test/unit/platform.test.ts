import * as assert from 'node:assert/strict';
import {describe, it} from 'node:test';
import {BuildError, ErrorCode} from '../../scripts/shared/errors';
import type {Host} from '../../scripts/shared/runtime';
import {
  archFromArchFlags,
  isDarwinArm64Cross,
  isEmulatedMachine,
  makeArgs,
  mangleWindowsPath,
  pathSeparatorFor,
  platformTag,
  prependEnv,
} from '../../scripts/vendor/platform';

const LINUX: Host = {system: 'linux', machine: 'x86_64', arch: 'x64'};
const LINUX_ARM: Host = {system: 'linux', machine: 'aarch64', arch: 'arm64'};
const MAC: Host = {system: 'darwin', machine: 'x86_64', arch: 'x64'};
const WINDOWS: Host = {system: 'win32', machine: 'x86_64', arch: 'x64'};

describe('platformTag', () => {
  it('uses manylinux on glibc and musllinux on musl', () => {
    assert.strictEqual(platformTag(LINUX, {}, 'glibc'), 'manylinux_x86_64');
    assert.strictEqual(platformTag(LINUX_ARM, {}, 'musl'), 'musllinux_aarch64');
    assert.strictEqual(platformTag(LINUX, {}, null), 'manylinux_x86_64');
  });

  it('reads the macOS architecture from ARCHFLAGS', () => {
    assert.strictEqual(platformTag(MAC, {ARCHFLAGS: '-arch arm64'}), 'macosx_arm64');
    assert.strictEqual(platformTag(MAC, {ARCHFLAGS: '-arch x86_64'}), 'macosx_x86_64');
  });

  it('fails on macOS without ARCHFLAGS', () => {
    assert.throws(
      () => platformTag(MAC, {}),
      (error: unknown) => error instanceof BuildError && error.code === ErrorCode.ERR_MISSING_ENV,
    );
  });

  it('distinguishes 64-bit and 32-bit Windows', () => {
    assert.strictEqual(platformTag(WINDOWS, {}), 'win_amd64');
    assert.strictEqual(platformTag({system: 'win32', machine: 'i686', arch: 'ia32'}, {}), 'win32');
  });

  it('rejects other systems', () => {
    assert.throws(
      () => platformTag({system: 'freebsd', machine: 'amd64', arch: 'x64'}, {}),
      (error: unknown) =>
        error instanceof BuildError &&
        error.code === ErrorCode.ERR_UNSUPPORTED_PLATFORM &&
        error.message === 'Unsupported system freebsd',
    );
  });
});

describe('archFromArchFlags', () => {
  it('tolerates surrounding whitespace', () => {
    assert.strictEqual(archFromArchFlags({ARCHFLAGS: '  -arch   arm64 '}), 'arm64');
  });
});

describe('makeArgs', () => {
  it('parallelizes native builds only', () => {
    assert.deepStrictEqual(makeArgs(LINUX, {parallel: true}), ['-j']);
    assert.deepStrictEqual(makeArgs(LINUX, {parallel: false}), []);
    assert.deepStrictEqual(makeArgs(LINUX_ARM, {parallel: true}), []);
  });

  it('knows the machines emulated under qemu', () => {
    for (const machine of ['aarch64', 'ppc64le', 's390x']) {
      assert.strictEqual(isEmulatedMachine(machine), true);
    }
    assert.strictEqual(isEmulatedMachine('x86_64'), false);
  });
});

describe('isDarwinArm64Cross', () => {
  const env = {ARCHFLAGS: '-arch arm64'};

  it('is true only for macOS target builds with arm64 ARCHFLAGS', () => {
    assert.strictEqual(isDarwinArm64Cross(MAC, env, false), true);
    assert.strictEqual(isDarwinArm64Cross(MAC, env, true), false);
    assert.strictEqual(isDarwinArm64Cross(MAC, {ARCHFLAGS: '-arch x86_64'}, false), false);
    assert.strictEqual(isDarwinArm64Cross(LINUX, env, false), false);
  });
});

describe('path helpers', () => {
  it('mangleWindowsPath rewrites separators and drive letters', () => {
    assert.strictEqual(mangleWindowsPath('C:\\cibw\\vendor\\lib'), '/c/cibw/vendor/lib');
    assert.strictEqual(mangleWindowsPath('D:\\a\\project'), '/d/a/project');
    assert.strictEqual(mangleWindowsPath('/already/posix'), '/already/posix');
  });

  it('mangleWindowsPath rewrites every drive in a path list', () => {
    assert.strictEqual(mangleWindowsPath('C:\\a;C:\\b;D:\\c;D:\\d'), '/c/a;/c/b;/d/c;/d/d');
  });

  it('pathSeparatorFor follows the host', () => {
    assert.strictEqual(pathSeparatorFor(WINDOWS), ';');
    assert.strictEqual(pathSeparatorFor(LINUX), ':');
  });

  it('prependEnv puts the new value first', () => {
    const env: NodeJS.ProcessEnv = {CFLAGS: '-O2'};
    prependEnv(env, 'CFLAGS', '-arch arm64');
    prependEnv(env, 'PKG_CONFIG_PATH', '/opt/lib/pkgconfig', ':');
    prependEnv(env, 'PKG_CONFIG_PATH', '/vendor/lib/pkgconfig', ':');
    assert.strictEqual(env.CFLAGS, '-arch arm64 -O2');
    assert.strictEqual(env.PKG_CONFIG_PATH, '/vendor/lib/pkgconfig:/opt/lib/pkgconfig');
  });

  it('prependEnv replaces an empty value', () => {
    const env: NodeJS.ProcessEnv = {LDFLAGS: ''};
    prependEnv(env, 'LDFLAGS', '-L/vendor/lib');
    assert.strictEqual(env.LDFLAGS, '-L/vendor/lib');
  });
});
