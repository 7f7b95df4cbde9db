import { existsSync } from 'node:fs';
import { Command } from 'commander';
import type { KlogConfig } from '@domain/types/config.js';
import type { IRepositorySync } from '@domain/ports/repository-sync.js';
import { EntryStore } from '@infra/persistence/entry-store.js';
import type { LogEntry } from '@infra/persistence/log-entry.js';
import { loadConfig } from '@infra/config/config-loader.js';
import { GitSync } from '@infra/sync/git-sync.js';
import { EntryNotFoundError, KlogError, RepositoryNotFoundError } from '@shared/lib/errors.js';

export interface GlobalOptions {
  json: boolean;
  verbose: boolean;
  repo?: string;
  config?: string;
}

export interface CommandContext {
  globalOpts: GlobalOptions;
  config: KlogConfig;
  store: EntryStore;
  /** Null unless `sync.enabled` is set */
  sync: IRepositorySync | null;
  /** Positional arguments of the invoked command */
  args: string[];
  cmd: Command;
}

type CommandHandler = (ctx: CommandContext) => void | Promise<void>;

export function getGlobalOptions(cmd: Command): GlobalOptions {
  const opts = cmd.optsWithGlobals<Partial<GlobalOptions>>();
  return {
    json: !!opts.json,
    verbose: !!opts.verbose,
    ...(opts.repo ? { repo: opts.repo } : {}),
    ...(opts.config ? { config: opts.config } : {}),
  };
}

/**
 * Wrap a CLI command handler with standard boilerplate: loads the
 * configuration, opens the entry store, extracts global options and
 * catches errors.
 *
 * Commander's .action() callback receives (...positionalArgs, localOpts, cmd);
 * only `cmd` is used, positional values come from `cmd.args`.
 */
export function withCommandContext(handler: CommandHandler): (...args: unknown[]) => Promise<void> {
  return async (...args: unknown[]) => {
    const cmd = args[args.length - 1];
    if (!(cmd instanceof Command)) {
      throw new Error('withCommandContext must wrap a commander action');
    }
    const globalOpts = getGlobalOptions(cmd);

    try {
      const { config } = loadConfig({ configPath: globalOpts.config, repo: globalOpts.repo });
      if (!existsSync(config.repo)) {
        throw new RepositoryNotFoundError(config.repo);
      }

      const store = new EntryStore({ root: config.repo, placeholders: config.placeholders });
      const sync = config.sync.enabled
        ? new GitSync({ root: config.repo, push: config.sync.push, remote: config.sync.remote })
        : null;

      await handler({ globalOpts, config, store, sync, args: [...cmd.args], cmd });
    } catch (error) {
      handleCommandError(error, globalOpts.verbose);
    }
  };
}

/**
 * Parse a listing ordinal as typed by the user.
 * @throws KlogError when `raw` is not a non-negative integer
 */
export function parseOrdinal(raw: string | undefined, what = 'entry number'): number {
  const value = (raw ?? '').trim();
  if (!/^\d+$/.test(value)) {
    throw new KlogError(`Invalid ${what}: "${raw ?? ''}". Expected a non-negative integer.`);
  }
  return Number(value);
}

/**
 * Look up an entry by the number `klog list` shows for it.
 * @throws EntryNotFoundError when no entry has that number
 */
export function resolveEntry(store: EntryStore, raw: string | undefined): LogEntry {
  const entry = store.byIndex(parseOrdinal(raw));
  if (!entry) throw new EntryNotFoundError(raw ?? '');
  return entry;
}

/**
 * Centralized error handler for CLI commands.
 * Prints the error message, and optionally the stack trace if verbose is enabled.
 */
export function handleCommandError(error: unknown, verbose: boolean): void {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  if (verbose && error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exitCode = 1;
}
