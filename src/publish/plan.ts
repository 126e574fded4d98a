/**
 * Step selection for a publish run
 */

import type { PublishConfig } from '../shared/config.js';
import type { NotesKind } from '../shared/notes.js';

export interface PlanInputs {
  nightly: boolean;
  archiveRepoConfigured: boolean;
  archiveTokenConfigured: boolean;
}

export interface StepPlan {
  archive: boolean;
  prune: boolean;
  publish: boolean;
}

// Shape of the release created in the current repository
export interface ReleaseDescriptor {
  tag: string;
  title: string;
  notes: NotesKind;
  prerelease: boolean;
}

export function planSteps(inputs: PlanInputs): StepPlan {
  const { nightly, archiveRepoConfigured, archiveTokenConfigured } = inputs;
  return {
    archive: nightly && archiveRepoConfigured && archiveTokenConfigured,
    prune: nightly && !archiveRepoConfigured,
    publish: !nightly || !archiveRepoConfigured
  };
}

export function planFromConfig(config: PublishConfig): StepPlan {
  return planSteps({
    nightly: config.nightly,
    archiveRepoConfigured: config.archiveRepository !== undefined,
    archiveTokenConfigured: config.archiveToken !== undefined
  });
}

/**
 * Nightly builds replace the rolling nightly tag; stable builds are tagged by version
 */
export function describeRelease(
  config: Pick<PublishConfig, 'nightly' | 'version' | 'projectName' | 'nightlyTag'>
): ReleaseDescriptor {
  if (config.nightly) {
    return {
      tag: config.nightlyTag,
      title: `${config.projectName} nightly ${config.version}`,
      notes: 'prerelease',
      prerelease: true
    };
  }
  return {
    tag: config.version,
    title: `${config.projectName} ${config.version}`,
    notes: 'release',
    prerelease: false
  };
}

export function archiveTitle(config: Pick<PublishConfig, 'version' | 'projectName'>): string {
  return `${config.projectName} nightly ${config.version}`;
}
