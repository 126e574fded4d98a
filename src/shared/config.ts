/**
 * Configuration for a publish run
 * Built from action inputs or environment variables and validated up front
 */

// GitHub repository context
export interface RepoContext {
  owner: string;
  repo: string;
}

export interface PublishConfig {
  nightly: boolean;
  version: string;
  targetCommitish: string;
  repository: RepoContext;
  token: string;
  archiveRepository?: RepoContext;
  archiveToken?: string;
  projectName: string;
  artifactsDir: string;
  notesDir: string;
  nightlyTag: string;
  changelogCommand?: string;
  checksums: boolean;
  pruneDelayMs: number;
}

/**
 * Looks up a raw input by its kebab-case name
 */
export type InputReader = (name: string) => string | undefined;

const TRUE_VALUES = ['true', 'True', 'TRUE'];
const FALSE_VALUES = ['false', 'False', 'FALSE'];

export const DEFAULT_ARTIFACTS_DIR = 'artifact';
export const DEFAULT_NIGHTLY_TAG = 'nightly';
export const DEFAULT_PRUNE_DELAY_MS = 5000;
// Largest delay setTimeout honours; anything above fires immediately
export const MAX_PRUNE_DELAY_MS = 2147483647;

/**
 * Parse an `owner/repo` string
 * @throws Error if the value is not exactly two non-empty segments
 */
export function parseRepository(value: string): RepoContext {
  const parts = value.trim().split('/');
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new Error(`Invalid repository "${value}": expected owner/repo`);
  }
  return { owner: parts[0], repo: parts[1] };
}

/**
 * Parse a boolean input using the same accepted spellings as the Actions toolkit
 */
export function parseBoolean(name: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  const trimmed = value.trim();
  if (TRUE_VALUES.includes(trimmed)) return true;
  if (FALSE_VALUES.includes(trimmed)) return false;
  throw new Error(`${name} must be true or false, got "${value}"`);
}

function optional(read: InputReader, name: string): string | undefined {
  const value = read(name)?.trim();
  return value ? value : undefined;
}

function required(read: InputReader, name: string): string {
  const value = optional(read, name);
  if (!value) {
    throw new Error(`${name} input is required`);
  }
  return value;
}

function parseDelay(value: string | undefined): number {
  if (value === undefined) return DEFAULT_PRUNE_DELAY_MS;
  const delay = /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
  if (!Number.isSafeInteger(delay) || delay > MAX_PRUNE_DELAY_MS) {
    throw new Error(
      `prune-delay-ms must be an integer between 0 and ${MAX_PRUNE_DELAY_MS}, got "${value}"`
    );
  }
  return delay;
}

// Fallbacks to the variables the runner always provides
const ENV_FALLBACKS: Record<string, string> = {
  repository: 'GITHUB_REPOSITORY',
  'github-token': 'GITHUB_TOKEN'
};

/**
 * GitHub Actions prefixes inputs with INPUT_, so we check that first,
 * then the plain upper snake case name
 */
export function readEnvInput(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const upper = name.toUpperCase();
  const snake = upper.replace(/-/g, '_');
  const fallback = ENV_FALLBACKS[name];
  return (
    env[`INPUT_${upper}`] ||
    env[`INPUT_${snake}`] ||
    env[snake] ||
    (fallback ? env[fallback] : undefined) ||
    undefined
  );
}

/**
 * Build and validate the publish configuration
 * @param read - Input lookup (action inputs, environment, ...)
 * @returns Validated configuration
 */
export function loadConfig(read: InputReader): PublishConfig {
  const repository = parseRepository(required(read, 'repository'));
  const archiveRepo = optional(read, 'archive-repo');

  return {
    nightly: parseBoolean('nightly', read('nightly'), false),
    version: required(read, 'version'),
    targetCommitish: required(read, 'target-commitish'),
    repository,
    token: required(read, 'github-token'),
    archiveRepository: archiveRepo ? parseRepository(archiveRepo) : undefined,
    archiveToken: optional(read, 'archive-token'),
    projectName: optional(read, 'project-name') ?? repository.repo,
    artifactsDir: optional(read, 'artifacts-dir') ?? DEFAULT_ARTIFACTS_DIR,
    notesDir: optional(read, 'notes-dir') ?? '.',
    nightlyTag: optional(read, 'nightly-tag') ?? DEFAULT_NIGHTLY_TAG,
    changelogCommand: optional(read, 'changelog-command'),
    checksums: parseBoolean('checksums', read('checksums'), true),
    pruneDelayMs: parseDelay(optional(read, 'prune-delay-ms'))
  };
}
