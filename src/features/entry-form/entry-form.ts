import { normalizeEntryText } from '@domain/services/text-codec.js';
import { FormatError } from '@shared/lib/errors.js';

/** Discrete fields as a form (or a set of CLI flags) delivers them. */
export interface EntryForm {
  begin: string;
  end?: string | null;
  topic: string;
  appendix?: string | null;
  content: string;
}

function required(value: string | undefined, field: string): string {
  const trimmed = (value ?? '').trim();
  if (trimmed === '') throw new FormatError(`missing ${field}`);
  return trimmed;
}

function oneLine(value: string): string {
  return value.replace(/\s*\n\s*/g, ' ');
}

/**
 * Assemble record text from form fields. An empty end date, or one equal to
 * the begin date, means a single-day entry. Dates are not checked here: the
 * text goes through the codec on reload, which reports them.
 * @throws FormatError("missing <field>") for an empty required field
 */
export function composeEntryText(form: EntryForm): string {
  const begin = required(form.begin, 'begin');
  const topic = oneLine(required(form.topic, 'topic'));
  const content = required(form.content, 'content');

  const end = (form.end ?? '').trim();
  const appendix = oneLine((form.appendix ?? '').trim());

  const text = [
    `BEGIN: ${begin}`,
    `END: ${end === '' || end === begin ? 'None' : end}`,
    `TOPIC: ${topic}`,
    `APPENDIX: ${appendix === '' ? 'None' : appendix}`,
    '',
    content,
  ].join('\n');

  return normalizeEntryText(text);
}
