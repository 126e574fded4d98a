import * as core from '@actions/core';
import * as github from '@actions/github';
import { loadConfig } from './shared/config.js';
import { Publisher } from './publish/index.js';
import { describeError } from './utils.js';

function readActionInput(name: string): string | undefined {
  const value = core.getInput(name);
  if (value) return value;
  if (name === 'repository' && process.env.GITHUB_REPOSITORY) {
    return `${github.context.repo.owner}/${github.context.repo.repo}`;
  }
  return undefined;
}

async function run(): Promise<void> {
  try {
    const config = loadConfig(readActionInput);
    if (config.archiveToken) {
      core.setSecret(config.archiveToken);
    }
    console.log(`🚀 Publishing ${config.projectName} ${config.version}${config.nightly ? ' (nightly)' : ''}`);

    const result = await new Publisher(config).run();

    core.setOutput('release-notes-file', result.notes.release);
    if (result.published) core.setOutput('release-url', result.published.url);
    if (result.archived) core.setOutput('archive-url', result.archived.url);
  } catch (error) {
    console.error(error);
    core.setFailed(describeError(error));
  }
}

void run();

export { run };
