/**
 * Unit tests for changelog generation
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ChangelogGenerator, formatCommits } from '../../src/shared/changelog.js';
import type { GitOps } from '../../src/shared/git.js';

const { execaMock } = vi.hoisted(() => ({ execaMock: vi.fn() }));

vi.mock('execa', () => ({ execa: execaMock }));

function createGit(previous: string | undefined): GitOps {
  return {
    previousTag: vi.fn(async () => previous),
    log: vi.fn(async () => [
      { sha: 'def5678', subject: 'Add option' },
      { sha: 'abc1234', subject: 'Fix parser' }
    ]),
    deleteLocalTag: vi.fn(async () => {})
  };
}

describe('formatCommits', () => {
  it('should render one bullet per commit', () => {
    expect(formatCommits([{ sha: 'abc1234', subject: 'Fix parser' }])).toBe('- Fix parser (abc1234)');
  });

  it('should say when nothing changed', () => {
    expect(formatCommits([])).toBe('No changes');
  });
});

describe('ChangelogGenerator', () => {
  beforeEach(() => {
    execaMock.mockReset();
  });

  it('should list commits since the previous tag', async () => {
    const git = createGit('v1.0');
    const changelog = await new ChangelogGenerator(git, { nightlyTag: 'nightly' }).generate('abc123');

    expect(changelog).toBe('- Add option (def5678)\n- Fix parser (abc1234)');
    expect(git.previousTag).toHaveBeenCalledWith('abc123', 'nightly');
    expect(git.log).toHaveBeenCalledWith('v1.0..abc123');
  });

  it('should use the full history when there is no earlier tag', async () => {
    const git = createGit(undefined);
    await new ChangelogGenerator(git).generate('abc123');

    expect(git.log).toHaveBeenCalledWith('abc123');
  });

  it('should use the output of a changelog command', async () => {
    execaMock.mockResolvedValue({ stdout: '\n### Fixes\n- parser\n\n' });
    const git = createGit('v1.0');

    const changelog = await new ChangelogGenerator(git, { command: 'make changelog' }).generate('abc123');

    expect(changelog).toBe('### Fixes\n- parser');
    expect(execaMock).toHaveBeenCalledWith('make changelog', { shell: true });
    expect(git.log).not.toHaveBeenCalled();
  });

  it('should hand the command to the shell unchanged', async () => {
    const command = `printf '%s' "a    b"  |  tr a A`;
    execaMock.mockResolvedValue({ stdout: 'A    b' });

    const changelog = await new ChangelogGenerator(createGit(undefined), { command }).generate('HEAD');

    expect(changelog).toBe('A    b');
    expect(execaMock).toHaveBeenCalledWith(command, { shell: true });
  });

  it('should fail when the changelog command fails', async () => {
    execaMock.mockRejectedValue(new Error('Command failed with exit code 2'));

    await expect(
      new ChangelogGenerator(createGit(undefined), { command: 'make changelog' }).generate('abc123')
    ).rejects.toThrow('Failed to generate changelog with "make changelog": Command failed with exit code 2');
  });
});
