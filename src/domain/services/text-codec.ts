import type { EntryFields, MediaItem } from '@domain/types/entry.js';
import { isIsoDate } from '@shared/lib/dates.js';
import { FormatError } from '@shared/lib/errors.js';

/**
 * Plain-text record format:
 *
 *   BEGIN: 2024-01-05
 *   END: None
 *   TOPIC: Garden cleanup
 *   APPENDIX: None
 *   MEDIA: photo.jpg, 400
 *
 *   Free text body...
 *
 * Headers end at the first blank line. Absent optional values are spelled
 * `None`. Lines starting with "# " in the header block are comments.
 */

const SEPARATOR = '\n\n';
const HEADER_DELIMITER = ': ';
const MEDIA_DELIMITER = ', ';
const COMMENT_PREFIX = '# ';
const NONE = 'None';
const CONTROL_CHARACTER = /[\u0000-\u001f\u007f]/;

const KNOWN_KEYS = new Set(['BEGIN', 'END', 'TOPIC', 'APPENDIX', 'MEDIA']);

/**
 * Strip carriage returns, right-trim every line and end with exactly one
 * newline. Whitespace-only input normalizes to the empty string.
 */
export function normalizeEntryText(text: string): string {
  const lines = text.replace(/\r/g, '').split('\n').map((line) => line.trimEnd());
  while (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines.length === 0 ? '' : lines.join('\n') + '\n';
}

function optionalValue(value: string | undefined): string | null {
  if (value === undefined || value === '' || value.toLowerCase() === 'none') return null;
  return value;
}

function parseDate(value: string | undefined): string | null {
  const present = optionalValue(value);
  if (present === null) return null;
  if (!isIsoDate(present)) throw new FormatError('invalid date');
  return present;
}

/**
 * Rejects names that would escape the entry's media directory or not survive
 * a MEDIA line unchanged.
 */
export function assertMediaFilename(filename: string): void {
  if (
    filename === '' ||
    filename === '.' ||
    filename === '..' ||
    /[/\\]/.test(filename) ||
    filename.includes(MEDIA_DELIMITER) ||
    filename !== filename.trim() ||
    CONTROL_CHARACTER.test(filename)
  ) {
    throw new FormatError('invalid media filename');
  }
}

export function parseMediaValue(value: string): MediaItem {
  const parts = value.split(MEDIA_DELIMITER);
  if (parts.length > 2) throw new FormatError('unknown media format');
  const [filename = '', options] = parts;
  assertMediaFilename(filename);
  return { filename, options: options === undefined || options === '' ? null : options };
}

export function formatMediaValue(item: MediaItem): string {
  return item.options === null ? item.filename : `${item.filename}${MEDIA_DELIMITER}${item.options}`;
}

/** "KEY: value" into its parts. "KEY:" is an empty value whose trailing space was trimmed. */
function splitHeaderLine(line: string): [string, string] {
  const delimiterAt = line.indexOf(HEADER_DELIMITER);
  if (delimiterAt !== -1) {
    return [line.slice(0, delimiterAt), line.slice(delimiterAt + HEADER_DELIMITER.length)];
  }
  if (line.length > 1 && line.endsWith(':') && !line.slice(0, -1).includes(':')) {
    return [line.slice(0, -1), ''];
  }
  throw new FormatError('malformed header line');
}

/**
 * Parse record text into entry fields.
 * @throws FormatError naming the first violated rule
 */
export function parseEntryText(text: string): EntryFields {
  const normalized = normalizeEntryText(text);
  if (normalized === '') throw new FormatError('empty entry');

  const separatorAt = normalized.indexOf(SEPARATOR);
  if (separatorAt === -1) throw new FormatError('missing header/body separator');

  const headerBlock = normalized.slice(0, separatorAt);
  const body = normalized.slice(separatorAt + SEPARATOR.length).replace(/\n$/, '');

  const headers = new Map<string, string>();
  const extra = new Map<string, string>();
  const media: MediaItem[] = [];

  for (const line of headerBlock.split('\n')) {
    // an empty comment loses its trailing space to normalization
    if (line.startsWith(COMMENT_PREFIX) || line === COMMENT_PREFIX.trimEnd()) continue;

    const [key, value] = splitHeaderLine(line);

    if (key === 'MEDIA') {
      const item = parseMediaValue(value);
      if (media.some((m) => m.filename === item.filename)) {
        throw new FormatError('duplicate media file');
      }
      media.push(item);
    } else if (KNOWN_KEYS.has(key)) {
      headers.set(key, value);
    } else {
      extra.set(key, value);
    }
  }

  const begin = parseDate(headers.get('BEGIN'));
  if (begin === null) throw new FormatError('missing BEGIN');
  const end = parseDate(headers.get('END'));

  const topic = optionalValue(headers.get('TOPIC'));
  if (topic === null) throw new FormatError('missing TOPIC');

  if (body.trim() === '') throw new FormatError('empty content');

  return {
    begin,
    end,
    topic,
    appendix: optionalValue(headers.get('APPENDIX')),
    body,
    media,
    // own properties, so a key like __proto__ survives
    extra: Object.fromEntries(extra),
  };
}

/** Render entry fields in the canonical header order. Never emits comments. */
export function serializeEntry(fields: EntryFields): string {
  const lines = [
    `BEGIN: ${fields.begin}`,
    `END: ${fields.end ?? NONE}`,
    `TOPIC: ${fields.topic}`,
    `APPENDIX: ${fields.appendix ?? NONE}`,
  ];
  for (const [key, value] of Object.entries(fields.extra)) {
    lines.push(`${key}${HEADER_DELIMITER}${value}`);
  }
  for (const item of fields.media) {
    lines.push(`MEDIA${HEADER_DELIMITER}${formatMediaValue(item)}`);
  }
  return lines.join('\n') + SEPARATOR + fields.body + '\n';
}

/** Serialized entry preceded by "# " comment lines, for hand editing. */
export function renderTemplate(fields: EntryFields, comments: readonly string[]): string {
  const header = comments.map((c) => `${COMMENT_PREFIX}${c}\n`).join('');
  return header + serializeEntry(fields);
}
