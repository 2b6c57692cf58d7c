/**
 * RecordParser: Convert one index description into a RegistryRecord.
 *
 * A well-formed description looks like
 *   "Title. Authors. Month Year. (Key: value) (Key: value)"
 * Anything else is kept verbatim with default metadata; malformed
 * metadata never aborts an index load.
 */

import { CacheError, formatNumber } from './CacheError.js';
import type { MonthYear } from './types.js';

/** Title used when the description does not follow the expected layout. */
export const UNPARSED_TITLE = 'title not parsed';

const DESCRIPTION_PATTERN = /^(?<title>.*)\. (?<date>[A-Z][a-z]+ \d+)\. (?<flags>\(.*\))$/;

const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * RegistryRecord: immutable metadata for one numbered document.
 *
 * Equality and ordering look at `number` only.
 */
export class RegistryRecord {
  readonly flags: Readonly<Record<string, string>>;

  constructor(
    readonly number: number,
    readonly title: string,
    readonly description: string,
    flags: Record<string, string> = {},
    readonly date?: MonthYear
  ) {
    this.flags = Object.freeze({ ...flags });
    Object.freeze(this);
  }

  equals(other: RegistryRecord): boolean {
    return this.number === other.number;
  }

  compareTo(other: RegistryRecord): number {
    return this.number - other.number;
  }

  static compare(a: RegistryRecord, b: RegistryRecord): number {
    return a.compareTo(b);
  }

  toString(): string {
    return this.title;
  }
}

/**
 * Parse a "Month Year" string. Returns undefined for unknown month names.
 */
export function parseMonthYear(value: string): MonthYear | undefined {
  const [monthName, yearText] = value.split(' ');
  if (monthName === undefined || yearText === undefined) {
    return undefined;
  }
  const index = MONTHS.indexOf(monthName);
  const year = Number.parseInt(yearText, 10);
  if (index < 0 || Number.isNaN(year)) {
    return undefined;
  }
  return { year, month: index + 1 };
}

/**
 * Parse the parenthesised flags segment, e.g.
 * "(Format: TXT=21088 bytes) (Status: UNKNOWN)".
 *
 * Fragments without a colon are dropped.
 */
export function parseFlags(value: string): Record<string, string> {
  const flags: Record<string, string> = {};

  for (const fragment of value.trim().split(')')) {
    const text = fragment.replace(/^[ (]+/, '');
    if (text.trim() === '') {
      continue;
    }
    const colon = text.indexOf(':');
    if (colon < 0) {
      continue;
    }
    flags[text.slice(0, colon).trim()] = text.slice(colon + 1).trim();
  }

  return flags;
}

/**
 * Build a RegistryRecord from a document number and its raw description.
 *
 * Byte input is decoded as strict UTF-8.
 *
 * @throws CacheError (DECODE) if the bytes are not valid UTF-8
 */
export function parseRecord(number: number, raw: string | Uint8Array): RegistryRecord {
  let description: string;
  if (typeof raw === 'string') {
    description = raw;
  } else {
    try {
      description = utf8.decode(raw);
    } catch (err) {
      throw new CacheError(`Document ${formatNumber(number)}: description is not valid UTF-8`, 'DECODE', {
        cause: err,
      });
    }
  }

  const groups = DESCRIPTION_PATTERN.exec(description)?.groups;
  if (!groups) {
    return new RegistryRecord(number, UNPARSED_TITLE, description);
  }

  const title = groups.title ?? UNPARSED_TITLE;
  const date = groups.date !== undefined ? parseMonthYear(groups.date) : undefined;
  const flags = groups.flags !== undefined ? parseFlags(groups.flags) : {};

  return new RegistryRecord(number, title, description, flags, date);
}
