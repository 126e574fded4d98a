/**
 * Release notes text generation
 */

import fs from 'fs-extra';
import path from 'path';
import type { RepoContext } from './config.js';

export const RELEASE_NOTES_FILE = 'RELEASE_NOTES';
export const PRERELEASE_NOTES_FILE = 'PRERELEASE_NOTES';
export const ARCHIVE_NOTES_FILE = 'ARCHIVE_NOTES';

export const PRERELEASE_BANNER = '**This is an automated nightly pre-release build**';

export type NotesKind = 'release' | 'prerelease' | 'archive';

export interface NotesText {
  release: string;
  prerelease: string;
  archive: string;
}

// Paths of the written notes files, keyed by kind
export type NotesFiles = Record<NotesKind, string>;

const FILE_NAMES: Record<NotesKind, string> = {
  release: RELEASE_NOTES_FILE,
  prerelease: PRERELEASE_NOTES_FILE,
  archive: ARCHIVE_NOTES_FILE
};

function repoUrl(repository: RepoContext): string {
  return `https://github.com/${repository.owner}/${repository.repo}`;
}

export function buildReleaseNotes(params: { repository: RepoContext; changelog: string }): string {
  return [
    `#### A description of the various files are in the [README](${repoUrl(params.repository)}#release-files)`,
    '---',
    '<details><summary><h3>Changelog</h3></summary>',
    params.changelog,
    '</details>',
    ''
  ].join('\n');
}

export function buildPrereleaseNotes(releaseNotes: string): string {
  return `${PRERELEASE_BANNER}\n${releaseNotes}`;
}

export function buildArchiveNotes(
  params: { repository: RepoContext; targetCommitish: string },
  releaseNotes: string
): string {
  return `Generated from: ${repoUrl(params.repository)}/commit/${params.targetCommitish}\n${releaseNotes}`;
}

/**
 * Build all three notes variants from one changelog
 */
export function buildNotes(params: {
  repository: RepoContext;
  targetCommitish: string;
  changelog: string;
}): NotesText {
  const release = buildReleaseNotes(params);
  return {
    release,
    prerelease: buildPrereleaseNotes(release),
    archive: buildArchiveNotes(params, release)
  };
}

/**
 * Write the notes files, replacing any left over from a previous run
 * @returns Absolute paths of the written files
 */
export async function writeNotesFiles(dir: string, notes: NotesText): Promise<NotesFiles> {
  await fs.ensureDir(dir);
  const files: NotesFiles = {
    release: path.resolve(dir, FILE_NAMES.release),
    prerelease: path.resolve(dir, FILE_NAMES.prerelease),
    archive: path.resolve(dir, FILE_NAMES.archive)
  };
  await fs.writeFile(files.release, notes.release, 'utf8');
  await fs.writeFile(files.prerelease, notes.prerelease, 'utf8');
  await fs.writeFile(files.archive, notes.archive, 'utf8');
  return files;
}
