import { basename, resolve } from 'node:path';
import type { Command } from 'commander';
import { commitMessage, modifyEntry } from '@features/entry-modify/entry-modifier.js';
import { NodeFileSystem } from '@infra/persistence/node-file-system.js';
import { withCommandContext, parseOrdinal, resolveEntry } from '@cli/utils.js';
import { publishCommit } from '@cli/after-commit.js';

/**
 * Register `klog attach` and `klog detach`.
 */
export function registerMediaCommands(parent: Command): void {
  parent
    .command('attach')
    .description('Copy files into an entry\'s media directory')
    .argument('<number>', 'Entry number from "klog list"')
    .argument('<files...>', 'Files to attach; stored under their base name')
    .action(withCommandContext((ctx) => {
      const [ordinal, ...files] = ctx.args;
      const entry = resolveEntry(ctx.store, ordinal);
      const fs = new NodeFileSystem();

      // read everything first so a missing file attaches nothing
      const loaded = files.map((file) => [basename(file), fs.readBytes(resolve(file))] as const);
      for (const [filename, bytes] of loaded) {
        entry.attach(filename, bytes);
      }

      publishCommit(ctx, entry, commitMessage('Modified', entry), ctx.store.commit());
    }));

  parent
    .command('detach')
    .description('Remove attachments from an entry by their number in "klog show"')
    .argument('<number>', 'Entry number from "klog list"')
    .argument('<media...>', 'Attachment numbers')
    .action(withCommandContext((ctx) => {
      const [ordinal, ...rest] = ctx.args;
      const entry = resolveEntry(ctx.store, ordinal);
      const removals = rest.map((raw) => parseOrdinal(raw, 'media number'));

      const outcome = modifyEntry(ctx.store, entry, { removals });
      if (outcome.kind === 'unchanged') {
        console.log('No matching attachments.');
        return;
      }
      publishCommit(ctx, entry, outcome.message, outcome.report);
    }));
}
