/**
 * Publisher component
 * Runs the publish stage: notes, checksums, archive, prune, publish
 */

import * as core from '@actions/core';
import fs from 'fs-extra';
import { GitHubClient } from '../shared/github.js';
import { GitOperations } from '../shared/git.js';
import { ChangelogGenerator } from '../shared/changelog.js';
import { listArtifacts, writeChecksums } from '../shared/artifacts.js';
import { buildNotes, writeNotesFiles } from '../shared/notes.js';
import { archiveTitle, describeRelease, planFromConfig } from './plan.js';
import { describeError, sleep } from '../utils.js';
import type { ReleaseHost, ReleaseInfo } from '../shared/github.js';
import type { GitOps } from '../shared/git.js';
import type { ChangelogSource } from '../shared/changelog.js';
import type { NotesFiles } from '../shared/notes.js';
import type { PublishConfig } from '../shared/config.js';
import type { StepPlan } from './plan.js';

// Collaborators, replaceable in tests
export interface PublisherDeps {
  github: ReleaseHost;
  archive?: ReleaseHost;
  git: GitOps;
  changelog: ChangelogSource;
  sleep: (ms: number) => Promise<void>;
}

export interface PublishResult {
  plan: StepPlan;
  notes: NotesFiles;
  checksumsFile?: string;
  archived?: ReleaseInfo;
  pruned: boolean;
  published?: ReleaseInfo;
}

/**
 * Wire the real GitHub, git and changelog implementations for a config
 */
export function createDefaultDeps(config: PublishConfig): PublisherDeps {
  const archive =
    config.archiveRepository && config.archiveToken
      ? new GitHubClient(config.archiveToken, config.archiveRepository)
      : undefined;

  return {
    github: new GitHubClient(config.token, config.repository),
    archive,
    git: GitOperations,
    changelog: new ChangelogGenerator(GitOperations, {
      command: config.changelogCommand,
      nightlyTag: config.nightlyTag
    }),
    sleep
  };
}

/**
 * Publisher class - one linear publish job
 */
export class Publisher {
  private config: PublishConfig;
  private deps: PublisherDeps;

  constructor(config: PublishConfig, deps?: PublisherDeps) {
    this.config = config;
    this.deps = deps ?? createDefaultDeps(config);
  }

  async run(): Promise<PublishResult> {
    const plan = planFromConfig(this.config);
    core.info(
      `Publishing ${this.config.projectName} ${this.config.version}` +
        ` (nightly: ${this.config.nightly}, archive: ${plan.archive}, prune: ${plan.prune}, publish: ${plan.publish})`
    );

    if (this.config.nightly && this.config.archiveRepository && !this.config.archiveToken) {
      core.warning(
        'archive-repo is set but archive-token is missing; the nightly build is neither archived nor published'
      );
    }

    const notes = await this.generateNotes();
    const checksumsFile = this.config.checksums
      ? await writeChecksums(this.config.artifactsDir)
      : undefined;

    const result: PublishResult = { plan, notes, checksumsFile, pruned: false };

    if (plan.archive) {
      result.archived = await this.archiveNightly(notes);
    }

    if (plan.prune) {
      await this.pruneNightly();
      result.pruned = true;
    }

    if (plan.publish) {
      result.published = await this.publish(notes);
    }

    return result;
  }

  /**
   * Generate the changelog and write all notes files
   */
  async generateNotes(): Promise<NotesFiles> {
    core.startGroup('Generate release notes');
    try {
      const changelog = await this.deps.changelog.generate(this.config.targetCommitish);
      const text = buildNotes({
        repository: this.config.repository,
        targetCommitish: this.config.targetCommitish,
        changelog
      });
      const files = await writeNotesFiles(this.config.notesDir, text);
      core.info(`Wrote ${files.release}, ${files.prerelease} and ${files.archive}`);
      return files;
    } finally {
      core.endGroup();
    }
  }

  /**
   * Keep the nightly build as a versioned release in the archive repository
   */
  async archiveNightly(notes: NotesFiles): Promise<ReleaseInfo> {
    const archive = this.deps.archive;
    if (!archive) {
      throw new Error('Archive repository client is not configured');
    }

    core.startGroup('Archive nightly release');
    try {
      const release = await archive.createRelease({
        tag: this.config.version,
        title: archiveTitle(this.config),
        body: await fs.readFile(notes.archive, 'utf8'),
        prerelease: false,
        assets: await listArtifacts(this.config.artifactsDir)
      });
      core.info(`Archived ${release.tag} at ${release.url}`);
      return release;
    } finally {
      core.endGroup();
    }
  }

  /**
   * Remove the previous nightly release and tag; nothing here fails the run
   */
  async pruneNightly(): Promise<void> {
    const tag = this.config.nightlyTag;
    core.startGroup(`Prune old ${tag} release`);
    try {
      await this.bestEffort(`delete release ${tag}`, async () => {
        const deleted = await this.deps.github.deleteReleaseByTag(tag);
        core.info(deleted ? `Deleted release ${tag}` : `No release tagged ${tag}`);
      });
      await this.bestEffort(`delete remote tag ${tag}`, async () => {
        const deleted = await this.deps.github.deleteTag(tag);
        core.info(deleted ? `Deleted remote tag ${tag}` : `No remote tag ${tag}`);
      });
      await this.bestEffort(`delete local tag ${tag}`, () => this.deps.git.deleteLocalTag(tag));

      // Release deletion is eventually consistent; recreating the tag too soon races it
      if (this.config.pruneDelayMs > 0) {
        await this.deps.sleep(this.config.pruneDelayMs);
      }
    } finally {
      core.endGroup();
    }
  }

  /**
   * Create the release in the current repository
   */
  async publish(notes: NotesFiles): Promise<ReleaseInfo> {
    const descriptor = describeRelease(this.config);
    core.startGroup(`Publish release ${descriptor.title}`);
    try {
      const release = await this.deps.github.createRelease({
        tag: descriptor.tag,
        title: descriptor.title,
        body: await fs.readFile(notes[descriptor.notes], 'utf8'),
        targetCommitish: this.config.targetCommitish,
        prerelease: descriptor.prerelease,
        assets: await listArtifacts(this.config.artifactsDir)
      });
      core.info(`Published ${release.tag} at ${release.url}`);
      return release;
    } finally {
      core.endGroup();
    }
  }

  private async bestEffort(label: string, action: () => Promise<unknown>): Promise<void> {
    try {
      await action();
    } catch (error) {
      core.warning(`Could not ${label}: ${describeError(error)}`);
    }
  }
}
