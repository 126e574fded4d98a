/**
 * Build artifacts attached to a release
 */

import * as core from '@actions/core';
import { createHash } from 'node:crypto';
import fs from 'fs-extra';
import path from 'path';

export const CHECKSUMS_FILE = 'SHA2-256SUMS';

export interface Artifact {
  name: string;
  path: string;
}

/**
 * List the regular files directly inside `dir`, sorted by name
 */
export async function listArtifacts(dir: string): Promise<Artifact[]> {
  if (!(await fs.pathExists(dir))) {
    core.warning(`Artifacts directory ${dir} does not exist; publishing without assets`);
    return [];
  }

  const artifacts: Artifact[] = [];
  for (const name of await fs.readdir(dir)) {
    const full = path.join(dir, name);
    const stat = await fs.stat(full);
    if (stat.isFile()) {
      artifacts.push({ name, path: full });
    }
  }
  return artifacts.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

export function sha256File(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash('sha256');
    fs.createReadStream(filePath)
      .on('error', reject)
      .on('data', chunk => hash.update(chunk))
      .on('end', () => resolve(hash.digest('hex')));
  });
}

/**
 * Write a sha256sum-compatible checksum file covering every artifact
 * @returns Path of the checksum file, or undefined when there is nothing to hash
 */
export async function writeChecksums(dir: string): Promise<string | undefined> {
  const artifacts = (await listArtifacts(dir)).filter(a => a.name !== CHECKSUMS_FILE);
  const target = path.join(dir, CHECKSUMS_FILE);
  if (artifacts.length === 0) {
    await fs.remove(target);
    return undefined;
  }

  const lines: string[] = [];
  for (const artifact of artifacts) {
    lines.push(`${await sha256File(artifact.path)}  ${artifact.name}`);
  }

  await fs.writeFile(target, `${lines.join('\n')}\n`, 'utf8');
  return target;
}
