#!/usr/bin/env node
/**
 * Publisher executable entry point
 * Called from a workflow step or a local shell
 */

import { Publisher } from './index.js';
import { loadConfig, readEnvInput } from '../shared/config.js';

async function main() {
  const config = loadConfig(name => readEnvInput(process.env, name));

  console.log('Publisher starting...');
  console.log(`  Repo: ${config.repository.owner}/${config.repository.repo}`);
  console.log(`  Version: ${config.version}`);
  console.log(`  Target: ${config.targetCommitish}`);
  console.log(`  Nightly: ${config.nightly}`);
  if (config.archiveRepository) {
    console.log(`  Archive: ${config.archiveRepository.owner}/${config.archiveRepository.repo}`);
  }

  const result = await new Publisher(config).run();

  if (result.archived) console.log(`Archived: ${result.archived.url}`);
  if (result.published) console.log(`Published: ${result.published.url}`);
}

main().catch(error => {
  console.error('Publisher failed:', error);
  process.exit(1);
});
