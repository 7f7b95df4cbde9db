import { describe, it, expect } from 'vitest';
import {
  normalizeEntryText,
  parseEntryText,
  serializeEntry,
  renderTemplate,
  parseMediaValue,
  formatMediaValue,
  assertMediaFilename,
} from './text-codec.js';
import { FormatError } from '@shared/lib/errors.js';
import type { EntryFields } from '@domain/types/entry.js';

const SIMPLE = 'BEGIN: 2024-01-05\nEND: None\nTOPIC: Test\nAPPENDIX: None\n\nHello\n';

function makeFields(overrides?: Partial<EntryFields>): EntryFields {
  return {
    begin: '2024-01-05',
    end: null,
    topic: 'Test',
    appendix: null,
    body: 'Hello',
    media: [],
    extra: {},
    ...overrides,
  };
}

function ruleOf(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    if (err instanceof FormatError) return err.rule;
    throw err;
  }
  throw new Error('expected a FormatError');
}

describe('normalizeEntryText', () => {
  it('strips carriage returns and trailing whitespace', () => {
    expect(normalizeEntryText('BEGIN: 2024-01-05  \r\nTOPIC: x\t\r\n')).toBe('BEGIN: 2024-01-05\nTOPIC: x\n');
  });

  it('ends with exactly one newline', () => {
    expect(normalizeEntryText('a\n\n\n')).toBe('a\n');
    expect(normalizeEntryText('a')).toBe('a\n');
  });

  it('turns whitespace-only input into the empty string', () => {
    expect(normalizeEntryText('  \n\t\n')).toBe('');
  });

  it('is idempotent', () => {
    const once = normalizeEntryText('x  \r\n\r\ny \n\n');
    expect(normalizeEntryText(once)).toBe(once);
  });
});

describe('parseEntryText', () => {
  it('parses a minimal record', () => {
    expect(parseEntryText(SIMPLE)).toEqual(makeFields());
  });

  it('keeps inner blank lines of the body', () => {
    const fields = parseEntryText('BEGIN: 2024-01-05\nTOPIC: Test\n\nfirst\n\nsecond\n');
    expect(fields.body).toBe('first\n\nsecond');
  });

  it('treats a missing END or APPENDIX as absent', () => {
    const fields = parseEntryText('BEGIN: 2024-01-05\nTOPIC: Test\n\nHello\n');
    expect(fields.end).toBeNull();
    expect(fields.appendix).toBeNull();
  });

  it('reads None case-insensitively and an empty value as absent', () => {
    const fields = parseEntryText('BEGIN: 2024-01-05\nEND: NONE\nTOPIC: Test\nAPPENDIX: \n\nHello\n');
    expect(fields.end).toBeNull();
    expect(fields.appendix).toBeNull();
  });

  it('reads END and APPENDIX values', () => {
    const fields = parseEntryText('BEGIN: 2024-01-05\nEND: 2024-01-07\nTOPIC: Trip\nAPPENDIX: Part 2\n\nHello\n');
    expect(fields.end).toBe('2024-01-07');
    expect(fields.appendix).toBe('Part 2');
  });

  it('reads MEDIA lines in order, with and without options', () => {
    const fields = parseEntryText(
      'BEGIN: 2024-01-05\nTOPIC: Test\nMEDIA: photo.jpg, 400\nMEDIA: scan.pdf\n\nHello\n',
    );
    expect(fields.media).toEqual([
      { filename: 'photo.jpg', options: '400' },
      { filename: 'scan.pdf', options: null },
    ]);
  });

  it('skips comment lines in the header block', () => {
    const fields = parseEntryText('# note to self\n#\nBEGIN: 2024-01-05\nTOPIC: Test\n\nHello\n');
    expect(fields.topic).toBe('Test');
  });

  it('keeps unknown headers verbatim', () => {
    const fields = parseEntryText('BEGIN: 2024-01-05\nTOPIC: Test\nMOOD: good: mostly\n\nHello\n');
    expect(fields.extra).toEqual({ MOOD: 'good: mostly' });
  });

  it('keeps an unknown header named like an object property', () => {
    const text = 'BEGIN: 2024-01-05\nEND: None\nTOPIC: Test\nAPPENDIX: None\n__proto__: x\n\nHello\n';
    const fields = parseEntryText(text);

    expect(Object.keys(fields.extra)).toEqual(['__proto__']);
    expect(serializeEntry(fields)).toBe(text);
  });

  it('lets the last of a repeated header win', () => {
    const fields = parseEntryText('BEGIN: 2024-01-05\nTOPIC: First\nTOPIC: Second\n\nHello\n');
    expect(fields.topic).toBe('Second');
  });

  it('accepts CRLF input', () => {
    expect(parseEntryText(SIMPLE.replace(/\n/g, '\r\n'))).toEqual(makeFields());
  });

  it.each([
    ['', 'empty entry'],
    ['   \n', 'empty entry'],
    ['BEGIN: 2024-01-05\nTOPIC: Test\nHello\n', 'missing header/body separator'],
    ['BEGIN 2024-01-05\nTOPIC: Test\n\nHello\n', 'malformed header line'],
    ['TOPIC: Test\n\nHello\n', 'missing BEGIN'],
    ['BEGIN: None\nTOPIC: Test\n\nHello\n', 'missing BEGIN'],
    ['BEGIN: 05.01.2024\nTOPIC: Test\n\nHello\n', 'invalid date'],
    ['BEGIN: 2024-02-30\nTOPIC: Test\n\nHello\n', 'invalid date'],
    ['BEGIN: 2024-01-05\nEND: tomorrow\nTOPIC: Test\n\nHello\n', 'invalid date'],
    ['BEGIN: 2024-01-05\n\nHello\n', 'missing TOPIC'],
    ['BEGIN: 2024-01-05\nTOPIC: None\n\nHello\n', 'missing TOPIC'],
    ['BEGIN: 2024-01-05\nTOPIC: Test\nMEDIA: a.jpg, 1, 2\n\nHello\n', 'unknown media format'],
    ['BEGIN: 2024-01-05\nTOPIC: Test\nMEDIA: a.jpg\nMEDIA: a.jpg, 2\n\nHello\n', 'duplicate media file'],
    ['BEGIN: 2024-01-05\nTOPIC: Test\nMEDIA: ../secret\n\nHello\n', 'invalid media filename'],
    ['BEGIN: 2024-01-05\nTOPIC: Test\nMEDIA:  padded.jpg\n\nHello\n', 'invalid media filename'],
  ])('rejects %j with "%s"', (text, rule) => {
    expect(ruleOf(() => parseEntryText(text))).toBe(rule);
  });

  it('rejects a record whose body is only blank lines', () => {
    // normalization drops the trailing blank lines, and the separator with them
    expect(ruleOf(() => parseEntryText('BEGIN: 2024-01-05\nTOPIC: Test\n\n\n'))).toBe('missing header/body separator');
  });

  it('reports FormatError with the rule as its message', () => {
    expect(() => parseEntryText('TOPIC: Test\n\nHello\n')).toThrow(new FormatError('missing BEGIN'));
  });
});

describe('serializeEntry', () => {
  it('writes the minimal record in canonical form', () => {
    expect(serializeEntry(makeFields())).toBe(SIMPLE);
  });

  it('writes extras after APPENDIX and MEDIA last', () => {
    const text = serializeEntry(
      makeFields({
        end: '2024-01-06',
        appendix: 'A',
        media: [{ filename: 'photo.jpg', options: '400' }],
        extra: { MOOD: 'good' },
      }),
    );
    expect(text).toBe(
      'BEGIN: 2024-01-05\nEND: 2024-01-06\nTOPIC: Test\nAPPENDIX: A\nMOOD: good\nMEDIA: photo.jpg, 400\n\nHello\n',
    );
  });

  it('reproduces canonical text after parsing', () => {
    const text = 'BEGIN: 2024-03-01\nEND: None\nTOPIC: Garden\nAPPENDIX: None\nMEDIA: bed.png\n\nDug.\n\nPlanted.\n';
    expect(serializeEntry(parseEntryText(text))).toBe(text);
  });

  it('drops comments and fills in absent headers', () => {
    expect(serializeEntry(parseEntryText('# hi\nTOPIC: Test\nBEGIN: 2024-01-05\n\nHello\n'))).toBe(SIMPLE);
  });
});

describe('renderTemplate', () => {
  it('prefixes comment lines and parses back to the same fields', () => {
    const template = renderTemplate(makeFields(), ['Edit below', '']);
    expect(template).toBe(`# Edit below\n# \n${SIMPLE}`);
    expect(parseEntryText(template)).toEqual(makeFields());
  });
});

describe('assertMediaFilename', () => {
  it.each(['scan 1, page 2.jpg', ' photo.jpg', 'photo.jpg ', 'two\nlines.jpg', 'tab\there.jpg'])(
    'rejects %j',
    (filename) => {
      expect(ruleOf(() => assertMediaFilename(filename))).toBe('invalid media filename');
    },
  );

  it('accepts names with inner spaces and commas', () => {
    expect(() => assertMediaFilename('scan 1,page 2.jpg')).not.toThrow();
  });
});

describe('media values', () => {
  it('round-trips filename and options', () => {
    expect(formatMediaValue(parseMediaValue('photo.jpg, 400'))).toBe('photo.jpg, 400');
    expect(formatMediaValue(parseMediaValue('photo.jpg'))).toBe('photo.jpg');
  });

  it('treats an empty option as none', () => {
    expect(parseMediaValue('photo.jpg, ')).toEqual({ filename: 'photo.jpg', options: null });
  });
});
