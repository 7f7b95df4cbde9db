import { spawnSync } from 'node:child_process';
import type { IRepositorySync } from '@domain/ports/repository-sync.js';
import { SyncError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';

/** Runs `git <args>` in `cwd` and returns stdout; throws on a non-zero exit. */
export type GitRunner = (args: string[], cwd: string) => string;

export const execGit: GitRunner = (args, cwd) => {
  const proc = spawnSync('git', args, { cwd, encoding: 'utf8', timeout: 60_000 });
  if (proc.error) {
    throw new Error(`failed to spawn git: ${proc.error.message}`);
  }
  if (proc.status !== 0) {
    throw new Error(proc.stderr.trim() || `git exited with status ${proc.status ?? 'unknown'}`);
  }
  return proc.stdout;
};

export interface GitSyncOptions {
  root: string;
  push?: boolean;
  remote?: string;
  run?: GitRunner;
}

/**
 * Records the entry tree in git after a commit, so several people editing
 * their own clones converge through the remote rather than through locks.
 */
export class GitSync implements IRepositorySync {
  private readonly run: GitRunner;
  private readonly log = logger.child({ component: 'git-sync' });

  constructor(private readonly options: GitSyncOptions) {
    this.run = options.run ?? execGit;
  }

  /** @returns false when the tree had nothing to record */
  record(message: string): boolean {
    const status = this.git(['status', '--porcelain']);
    if (status.trim() === '') {
      this.log.debug('Nothing to record');
      return false;
    }

    this.git(['add', '--all']);
    this.git(['commit', '--quiet', '-m', message]);
    if (this.options.push) {
      this.git(['push', '--quiet', this.options.remote ?? 'origin']);
    }

    this.log.info(`Recorded "${message}"`, { pushed: this.options.push ?? false });
    return true;
  }

  private git(args: string[]): string {
    try {
      return this.run(args, this.options.root);
    } catch (err) {
      throw new SyncError(`git ${args.join(' ')}`, err);
    }
  }
}
