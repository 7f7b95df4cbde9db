import type { CommitReport, ILogEntry } from '@domain/ports/entry-store.js';
import { syncMessage } from '@features/entry-modify/entry-modifier.js';
import { NodeFileSystem } from '@infra/persistence/node-file-system.js';
import { touchUpdateTrigger } from '@infra/sync/update-trigger.js';
import { formatCommitReport, formatCommitReportJson } from '@cli/formatters/entry-formatter.js';
import type { CommandContext } from '@cli/utils.js';

/**
 * Report a commit and run the follow-up hooks when it changed anything:
 * rewrite the update trigger, then record the tree with version control.
 * A partial failure still triggers both for the entries that did save; if
 * `target` is among the failures the recorded message names those instead.
 */
export function publishCommit(ctx: CommandContext, target: ILogEntry, message: string, report: CommitReport): void {
  console.log(ctx.globalOpts.json ? formatCommitReportJson(report, message) : formatCommitReport(report, message));

  if (report.failures.length > 0) {
    process.exitCode = 1;
  }
  if (report.saved.length === 0 && report.removed.length === 0) {
    return;
  }

  if (ctx.config.updateTrigger) {
    touchUpdateTrigger(new NodeFileSystem(), ctx.config.updateTrigger);
  }
  ctx.sync?.record(syncMessage(report, target, message));
}
