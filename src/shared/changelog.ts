/**
 * Changelog text for the release notes
 * Either the output of a user-supplied command or a commit list built from git
 */

import { execa } from 'execa';
import { describeError } from '../utils.js';
import type { CommitSummary, GitOps } from './git.js';

export const EMPTY_CHANGELOG = 'No changes';

export interface ChangelogSource {
  generate(targetCommitish: string): Promise<string>;
}

export interface ChangelogOptions {
  command?: string;
  nightlyTag?: string;
}

export function formatCommits(commits: CommitSummary[]): string {
  if (commits.length === 0) return EMPTY_CHANGELOG;
  return commits.map(c => `- ${c.subject} (${c.sha})`).join('\n');
}

export class ChangelogGenerator implements ChangelogSource {
  constructor(
    private git: GitOps,
    private options: ChangelogOptions = {}
  ) {}

  async generate(targetCommitish: string): Promise<string> {
    if (this.options.command) {
      return this.runCommand(this.options.command);
    }

    const previous = await this.git.previousTag(targetCommitish, this.options.nightlyTag);
    const range = previous ? `${previous}..${targetCommitish}` : targetCommitish;
    return formatCommits(await this.git.log(range));
  }

  private async runCommand(command: string): Promise<string> {
    try {
      const { stdout } = await execa(command, { shell: true });
      return stdout.trim();
    } catch (error) {
      throw new Error(
        `Failed to generate changelog with "${command}": ${describeError(error)}`
      );
    }
  }
}
