import { ParseError } from '../core/errors.js';
import { CORE_FIELDS, OPTIONAL_FIELDS, type SpecField } from '../core/types.js';
import type { SourceLine } from './lexer.js';

// ── Raw sections ─────────────────────────────────────────────────────

export interface RawSection {
  readonly field: SpecField;
  /** Line of the `<name>:` header */
  readonly line: number;
  readonly body: readonly SourceLine[];
}

const SECTION_FIELDS: readonly SpecField[] = [...CORE_FIELDS, ...OPTIONAL_FIELDS];

const HEADER_NAMES: ReadonlyMap<string, SpecField> = new Map(
  SECTION_FIELDS.map((field): [string, SpecField] => [field.toLowerCase(), field]),
);

/** Headers start in the first column; indented lines always continue a section. */
const HEADER_PATTERN = new RegExp(`^(${SECTION_FIELDS.join('|')})\\s*:`, 'i');

// ── Comment stripping ────────────────────────────────────────────────

/** Drop a trailing `#` comment, ignoring `#` inside single-quoted strings. */
export function stripComment(text: string): string {
  let inString = false;
  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (char === "'") {
      inString = !inString;
    } else if (char === '#' && !inString) {
      return text.slice(0, i);
    }
  }
  return text;
}

// ── Section splitting ────────────────────────────────────────────────

/**
 * Split specification text into sections. Lines that do not open a new
 * section continue the previous one; blank and comment-only lines are
 * skipped.
 */
export function splitSections(source: string): RawSection[] {
  const sections: { field: SpecField; line: number; body: SourceLine[] }[] = [];
  const seen = new Map<SpecField, number>();

  const lines = source.split(/\r?\n/);
  for (let index = 0; index < lines.length; index++) {
    const lineNumber = index + 1;
    const stripped = stripComment(lines[index]);
    if (stripped.trim() === '') continue;

    const leading = stripped.length - stripped.trimStart().length;
    const text = stripped.trim();
    const header = leading === 0 ? HEADER_PATTERN.exec(text) : null;

    if (header) {
      const field = HEADER_NAMES.get(header[1].toLowerCase());
      if (field === undefined) continue;

      const previous = seen.get(field);
      if (previous !== undefined) {
        throw new ParseError(`duplicate section (first declared on line ${previous})`, {
          field,
          line: lineNumber,
        });
      }
      seen.set(field, lineNumber);

      const rest = text.slice(header[0].length);
      const restOffset = leading + header[0].length + (rest.length - rest.trimStart().length);
      const body: SourceLine[] = [];
      if (rest.trim() !== '') {
        body.push({ text: rest.trim(), line: lineNumber, column: restOffset + 1 });
      }
      sections.push({ field, line: lineNumber, body });
      continue;
    }

    const current = sections[sections.length - 1];
    if (!current) {
      throw new ParseError(`text before the first section: '${text}'`, { line: lineNumber });
    }
    current.body.push({ text, line: lineNumber, column: leading + 1 });
  }

  const missing = CORE_FIELDS.filter((f) => !seen.has(f));
  if (missing.length > 0) {
    throw new ParseError(
      `missing section${missing.length > 1 ? 's' : ''} ${missing.map((f) => `'${f}:'`).join(', ')}`,
      { field: missing[0] },
    );
  }

  return sections;
}
