import { resolve } from 'node:path';
import type { Command } from 'commander';
import { renderTemplate, normalizeEntryText } from '@domain/services/text-codec.js';
import { composeEntryText } from '@features/entry-form/entry-form.js';
import { groupByYear } from '@features/entry-listing/year-index.js';
import { createEntry, modifyEntry, removeEntry } from '@features/entry-modify/entry-modifier.js';
import { NodeFileSystem } from '@infra/persistence/node-file-system.js';
import { toIsoDate } from '@shared/lib/dates.js';
import { withCommandContext, parseOrdinal, resolveEntry, type CommandContext } from '@cli/utils.js';
import { publishCommit } from '@cli/after-commit.js';
import {
  formatEntryList,
  formatEntryListJson,
  formatEntryDetail,
  formatEntryDetailJson,
} from '@cli/formatters/entry-formatter.js';

const TEMPLATE_COMMENTS = [
  'Lines starting with "# " above the first blank line are ignored.',
  'Optional values are written as None. Save and close to continue.',
];

interface NewOptions {
  date?: string;
  end?: string;
  topic?: string;
  appendix?: string;
  content?: string;
  file?: string;
}

interface EditOptions {
  file?: string;
  removeMedia?: string[];
  keepMedia?: boolean;
}

interface RemoveOptions {
  yes?: boolean;
}

function readTextFile(path: string): string {
  return new NodeFileSystem().readText(resolve(path));
}

async function openEditor(message: string, initial: string): Promise<string> {
  const { editor } = await import('@inquirer/prompts');
  return editor({ message, default: initial, postfix: '.txt' });
}

/** Record text for `klog new`: a file, field flags, or the editor, in that order. */
async function newEntryText(ctx: CommandContext, opts: NewOptions): Promise<string | null> {
  if (opts.file) {
    return readTextFile(opts.file);
  }

  const begin = opts.date ?? toIsoDate(new Date());
  if (opts.topic !== undefined || opts.content !== undefined) {
    return composeEntryText({
      begin,
      end: opts.end ?? null,
      topic: opts.topic ?? '',
      appendix: opts.appendix ?? null,
      content: opts.content ?? '',
    });
  }

  const { placeholders } = ctx.config;
  const template = renderTemplate(
    { begin, end: null, topic: placeholders.topic, appendix: null, body: placeholders.body, media: [], extra: {} },
    TEMPLATE_COMMENTS,
  );
  const text = await openEditor('New entry', template);
  return normalizeEntryText(text) === normalizeEntryText(template) ? null : text;
}

/**
 * Register the entry subcommands: list, show, new, edit, rm.
 */
export function registerEntryCommands(parent: Command): void {
  parent
    .command('list')
    .alias('ls')
    .description('List entries, newest first, grouped by year')
    .option('-y, --year <yyyy>', 'Only show entries beginning in this year')
    .action(withCommandContext((ctx) => {
      const { year } = ctx.cmd.opts<{ year?: string }>();
      const groups = groupByYear(ctx.store.list()).filter((g) => year === undefined || g.year === year);
      console.log(ctx.globalOpts.json ? formatEntryListJson(groups) : formatEntryList(groups, ctx.config.locale));
    }));

  parent
    .command('show')
    .description('Show one entry')
    .argument('<number>', 'Entry number from "klog list"')
    .action(withCommandContext((ctx) => {
      const entry = resolveEntry(ctx.store, ctx.args[0]);
      console.log(ctx.globalOpts.json ? formatEntryDetailJson(entry) : formatEntryDetail(entry, ctx.config.locale));
    }));

  parent
    .command('new')
    .description('Create an entry from a file, from field options, or in your editor')
    .option('-d, --date <yyyy-mm-dd>', 'Begin date (default: today)')
    .option('--end <yyyy-mm-dd>', 'End date of a multi-day entry')
    .option('-t, --topic <text>', 'Topic')
    .option('-a, --appendix <text>', 'Appendix')
    .option('-c, --content <text>', 'Body text')
    .option('-f, --file <path>', 'Read the complete record text from a file')
    .action(withCommandContext(async (ctx) => {
      const text = await newEntryText(ctx, ctx.cmd.opts<NewOptions>());
      if (text === null) {
        console.log('Template left unchanged; nothing created.');
        return;
      }
      const { entry, message, report } = createEntry(ctx.store, text);
      publishCommit(ctx, entry, message, report);
    }));

  parent
    .command('edit')
    .description('Edit an entry in your editor or replace its text from a file')
    .argument('<number>', 'Entry number from "klog list"')
    .option('-f, --file <path>', 'Read the new record text from a file')
    .option('--remove-media <numbers...>', 'Detach attachments by their number in "klog show"')
    .option('--keep-media', 'Keep attachments whose MEDIA line is missing from the new text')
    .action(withCommandContext(async (ctx) => {
      const opts = ctx.cmd.opts<EditOptions>();
      const entry = resolveEntry(ctx.store, ctx.args[0]);
      const removals = (opts.removeMedia ?? []).map((raw) => parseOrdinal(raw, 'media number'));

      let text: string | undefined;
      if (opts.file) {
        text = readTextFile(opts.file);
      } else if (removals.length === 0) {
        text = await openEditor(`Edit ${entry.summaryLine()}`, entry.currentText());
      }

      const outcome = modifyEntry(ctx.store, entry, { text, removals, preserveMedia: !!opts.keepMedia });
      if (outcome.kind === 'unchanged') {
        console.log('No changes.');
        return;
      }
      publishCommit(ctx, entry, outcome.message, outcome.report);
    }));

  parent
    .command('rm')
    .description('Remove an entry and its attachments')
    .argument('<number>', 'Entry number from "klog list"')
    .option('--yes', 'Skip the confirmation prompt')
    .action(withCommandContext(async (ctx) => {
      const entry = resolveEntry(ctx.store, ctx.args[0]);

      if (!ctx.cmd.opts<RemoveOptions>().yes) {
        const { confirm } = await import('@inquirer/prompts');
        const ok = await confirm({ message: `Remove ${entry.summaryLine()}?`, default: false });
        if (!ok) {
          console.log('Cancelled.');
          return;
        }
      }

      const { message, report } = removeEntry(ctx.store, entry);
      publishCommit(ctx, entry, message, report);
    }));
}
