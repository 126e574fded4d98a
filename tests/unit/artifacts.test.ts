/**
 * Unit tests for artifact listing and checksums
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs-extra';
import path from 'path';
import { dir, type DirectoryResult } from 'tmp-promise';
import * as core from '@actions/core';
import { listArtifacts, sha256File, writeChecksums } from '../../src/shared/artifacts.js';

vi.mock('@actions/core', () => ({
  info: vi.fn(),
  warning: vi.fn()
}));

const ALPHA_SHA = '8ed3f6ad685b959ead7022518e1af76cd816f8e8ec7ccdda1ed4018e8f2223f8';
const BETA_SHA = 'f44e64e75f3948e9f73f8dfa94721c4ce8cbb4f265c4790c702b2d41cfbf2753';

describe('artifacts', () => {
  let tmp: DirectoryResult;

  beforeEach(async () => {
    tmp = await dir({ unsafeCleanup: true });
    await fs.writeFile(path.join(tmp.path, 'b.bin'), 'beta');
    await fs.writeFile(path.join(tmp.path, 'a.txt'), 'alpha');
    await fs.ensureDir(path.join(tmp.path, 'nested'));
    await fs.writeFile(path.join(tmp.path, 'nested', 'c.txt'), 'gamma');
    vi.mocked(core.warning).mockClear();
  });

  afterEach(async () => {
    await tmp.cleanup();
  });

  it('should list top-level files sorted by name', async () => {
    const artifacts = await listArtifacts(tmp.path);
    expect(artifacts).toEqual([
      { name: 'a.txt', path: path.join(tmp.path, 'a.txt') },
      { name: 'b.bin', path: path.join(tmp.path, 'b.bin') }
    ]);
  });

  it('should warn and return nothing for a missing directory', async () => {
    const missing = path.join(tmp.path, 'missing');
    expect(await listArtifacts(missing)).toEqual([]);
    expect(core.warning).toHaveBeenCalledWith(
      `Artifacts directory ${missing} does not exist; publishing without assets`
    );
  });

  it('should hash a file', async () => {
    expect(await sha256File(path.join(tmp.path, 'a.txt'))).toBe(ALPHA_SHA);
  });

  it('should write sha256sum lines for every artifact', async () => {
    const target = await writeChecksums(tmp.path);

    expect(target).toBe(path.join(tmp.path, 'SHA2-256SUMS'));
    expect(await fs.readFile(target, 'utf8')).toBe(`${ALPHA_SHA}  a.txt\n${BETA_SHA}  b.bin\n`);
  });

  it('should not hash the checksum file itself on a rerun', async () => {
    await writeChecksums(tmp.path);
    const target = await writeChecksums(tmp.path);

    expect(await fs.readFile(target, 'utf8')).toBe(`${ALPHA_SHA}  a.txt\n${BETA_SHA}  b.bin\n`);
  });

  it('should not create the directory or a checksum file when it is missing', async () => {
    const missing = path.join(tmp.path, 'missing');

    expect(await writeChecksums(missing)).toBeUndefined();
    expect(await fs.pathExists(missing)).toBe(false);
  });

  it('should drop a stale checksum file when no artifacts remain', async () => {
    const empty = path.join(tmp.path, 'empty');
    await fs.ensureDir(empty);
    await fs.writeFile(path.join(empty, 'SHA2-256SUMS'), `${ALPHA_SHA}  a.txt\n`);

    expect(await writeChecksums(empty)).toBeUndefined();
    expect(await fs.readdir(empty)).toEqual([]);
  });
});
