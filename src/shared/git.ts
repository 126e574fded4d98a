/**
 * Git operations used while preparing a release
 */

import { execa } from 'execa';
import { describeError } from '../utils.js';

export interface CommitSummary {
  sha: string;
  subject: string;
}

/**
 * Subset of git operations the publisher and changelog depend on
 */
export interface GitOps {
  previousTag(ref: string, exclude?: string): Promise<string | undefined>;
  log(range: string): Promise<CommitSummary[]>;
  deleteLocalTag(tag: string): Promise<void>;
}

/**
 * Git operations utilities
 */
export const GitOperations: GitOps = {
  /**
   * Find the most recent tag reachable from the parent of `ref`
   * @param ref - Commit the release is built from
   * @param exclude - Tag pattern to skip (the rolling nightly tag)
   * @returns Tag name, or undefined when no earlier tag exists
   */
  async previousTag(ref: string, exclude?: string): Promise<string | undefined> {
    const args = ['describe', '--tags', '--abbrev=0'];
    if (exclude) {
      args.push('--exclude', exclude);
    }
    args.push(`${ref}^`);

    const result = await execa('git', args, { reject: false });
    if (result.exitCode !== 0) {
      return undefined;
    }
    return result.stdout.trim() || undefined;
  },

  /**
   * List non-merge commits in a range, newest first
   * @param range - Revision range (e.g. `v1.0..HEAD`) or a single ref
   */
  async log(range: string): Promise<CommitSummary[]> {
    try {
      const { stdout } = await execa('git', ['log', '--no-merges', '--format=%h%x09%s', range]);
      return parseLog(stdout);
    } catch (error) {
      throw new Error(
        `Failed to read git log for ${range}: ${describeError(error)}`
      );
    }
  },

  async deleteLocalTag(tag: string): Promise<void> {
    try {
      await execa('git', ['tag', '--delete', tag]);
    } catch (error) {
      throw new Error(
        `Failed to delete local tag ${tag}: ${describeError(error)}`
      );
    }
  }
};

/**
 * Parse `git log --format=%h%x09%s` output
 */
export function parseLog(stdout: string): CommitSummary[] {
  return stdout
    .split('\n')
    .filter(line => line.trim() !== '')
    .map(line => {
      const tab = line.indexOf('\t');
      if (tab === -1) {
        return { sha: line.trim(), subject: '' };
      }
      return { sha: line.slice(0, tab), subject: line.slice(tab + 1).trim() };
    });
}
