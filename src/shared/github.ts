/**
 * GitHub API client wrapper
 * Provides the release operations used by the publisher
 */

import { getOctokit } from '@actions/github';
import fs from 'fs-extra';
import type { Artifact } from './artifacts.js';
import type { RepoContext } from './config.js';
import { describeError, getErrorStatus } from '../utils.js';

// Release creation parameters
export interface CreateReleaseParams {
  tag: string;
  title: string;
  body: string;
  targetCommitish?: string;
  prerelease: boolean;
  assets: Artifact[];
}

// Created release details
export interface ReleaseInfo {
  id: number;
  tag: string;
  url: string;
}

/**
 * Release operations against one repository
 */
export interface ReleaseHost {
  readonly repository: RepoContext;
  createRelease(params: CreateReleaseParams): Promise<ReleaseInfo>;
  deleteReleaseByTag(tag: string): Promise<boolean>;
  deleteTag(tag: string): Promise<boolean>;
}

/**
 * GitHub API client for release operations
 */
export class GitHubClient implements ReleaseHost {
  private octokit: ReturnType<typeof getOctokit>;
  readonly repository: RepoContext;

  /**
   * Initialize GitHub client
   * @param token - GitHub token (PAT or GitHub token)
   * @param context - Repository context
   */
  constructor(token: string, context: RepoContext) {
    this.octokit = getOctokit(token);
    this.repository = { owner: context.owner, repo: context.repo };
  }

  private getRepo(): { owner: string; repo: string } {
    return { owner: this.repository.owner, repo: this.repository.repo };
  }

  /**
   * Create a release and upload its assets
   * The release stays a draft until every asset is uploaded; a failed upload deletes the draft.
   * The tag is created at `targetCommitish` (or the default branch) if missing
   */
  async createRelease(params: CreateReleaseParams): Promise<ReleaseInfo> {
    let draftId: number | undefined;
    try {
      const { data: draft } = await this.octokit.rest.repos.createRelease({
        ...this.getRepo(),
        tag_name: params.tag,
        name: params.title,
        body: params.body,
        prerelease: params.prerelease,
        draft: true,
        ...(params.targetCommitish ? { target_commitish: params.targetCommitish } : {})
      });
      draftId = draft.id;

      for (const asset of params.assets) {
        await this.uploadAsset(draft.upload_url, asset);
      }

      const { data: release } = await this.octokit.rest.repos.updateRelease({
        ...this.getRepo(),
        release_id: draft.id,
        draft: false
      });

      return { id: release.id, tag: release.tag_name, url: release.html_url };
    } catch (error) {
      if (draftId !== undefined) {
        await this.discardDraft(draftId, params.tag);
      }
      throw new Error(`Failed to create release ${params.tag}: ${describeError(error)}`);
    }
  }

  private async discardDraft(releaseId: number, tag: string): Promise<void> {
    try {
      await this.octokit.rest.repos.deleteRelease({
        ...this.getRepo(),
        release_id: releaseId
      });
    } catch (error) {
      console.warn(`Failed to delete draft release ${tag} (${releaseId}): ${describeError(error)}`);
    }
  }

  /**
   * Upload one file to a release
   * @param uploadUrl - The release's `upload_url` template
   */
  private async uploadAsset(uploadUrl: string, asset: Artifact): Promise<void> {
    const data = await fs.readFile(asset.path);
    await this.octokit.request({
      method: 'POST',
      url: uploadUrl,
      headers: {
        'content-type': 'application/octet-stream',
        'content-length': data.length
      },
      name: asset.name,
      data
    });
  }

  /**
   * Delete the release attached to a tag
   * @returns false when no release has that tag
   */
  async deleteReleaseByTag(tag: string): Promise<boolean> {
    let releaseId: number;
    try {
      const { data } = await this.octokit.rest.repos.getReleaseByTag({
        ...this.getRepo(),
        tag
      });
      releaseId = data.id;
    } catch (error) {
      if (getErrorStatus(error) === 404) return false;
      throw new Error(`Failed to look up release ${tag}: ${describeError(error)}`);
    }

    try {
      await this.octokit.rest.repos.deleteRelease({
        ...this.getRepo(),
        release_id: releaseId
      });
      return true;
    } catch (error) {
      throw new Error(`Failed to delete release ${tag}: ${describeError(error)}`);
    }
  }

  /**
   * Delete a tag ref
   * @returns false when the tag does not exist
   */
  async deleteTag(tag: string): Promise<boolean> {
    try {
      await this.octokit.rest.git.deleteRef({
        ...this.getRepo(),
        ref: `tags/${tag}`
      });
      return true;
    } catch (error) {
      const status = getErrorStatus(error);
      if (status === 404 || status === 422) return false;
      throw new Error(`Failed to delete tag ${tag}: ${describeError(error)}`);
    }
  }
}
