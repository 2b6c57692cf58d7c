/**
 * Tests for RecordParser.
 */

import { describe, it, expect } from 'vitest';
import {
  RegistryRecord,
  UNPARSED_TITLE,
  parseFlags,
  parseMonthYear,
  parseRecord,
} from './RecordParser.js';
import { CacheError } from './CacheError.js';

const HOST_SOFTWARE =
  'Host Software. S. Crocker. April 1969. (Format: TXT=21088 bytes) (Status: UNKNOWN) (DOI: 10.17487/RFC0001)';

describe('parseMonthYear', () => {
  it('parses a month name and year', () => {
    expect(parseMonthYear('March 1999')).toEqual({ year: 1999, month: 3 });
  });

  it('maps December to 12', () => {
    expect(parseMonthYear('December 2010')).toEqual({ year: 2010, month: 12 });
  });

  it('rejects unknown month names', () => {
    expect(parseMonthYear('Smarch 1999')).toBeUndefined();
  });

  it('rejects a missing year', () => {
    expect(parseMonthYear('March')).toBeUndefined();
  });
});

describe('parseFlags', () => {
  it('splits key/value fragments', () => {
    expect(parseFlags('(Format: TXT=21088 bytes) (Status: UNKNOWN)')).toEqual({
      Format: 'TXT=21088 bytes',
      Status: 'UNKNOWN',
    });
  });

  it('splits on the first colon only', () => {
    expect(parseFlags('(Obsoleted by: RFC0002: see errata)')).toEqual({
      'Obsoleted by': 'RFC0002: see errata',
    });
  });

  it('drops fragments without a colon', () => {
    expect(parseFlags('(Informational) (Status: HISTORIC)')).toEqual({ Status: 'HISTORIC' });
  });

  it('returns an empty object for empty input', () => {
    expect(parseFlags('')).toEqual({});
  });
});

describe('parseRecord', () => {
  it('parses title, date and flags', () => {
    const record = parseRecord(1, HOST_SOFTWARE);

    expect(record.number).toBe(1);
    expect(record.title).toBe('Host Software. S. Crocker');
    expect(record.date).toEqual({ year: 1969, month: 4 });
    expect(record.flags).toEqual({
      Format: 'TXT=21088 bytes',
      Status: 'UNKNOWN',
      DOI: '10.17487/RFC0001',
    });
    expect(record.description).toBe(HOST_SOFTWARE);
  });

  it('keeps the description verbatim when the layout does not match', () => {
    const record = parseRecord(42, 'Just some text');

    expect(record.title).toBe(UNPARSED_TITLE);
    expect(record.date).toBeUndefined();
    expect(record.flags).toEqual({});
    expect(record.description).toBe('Just some text');
  });

  it('keeps title and flags when the month is unknown', () => {
    const record = parseRecord(7, 'A Title. Someone. Smarch 1999. (Status: DRAFT)');

    expect(record.title).toBe('A Title. Someone');
    expect(record.date).toBeUndefined();
    expect(record.flags).toEqual({ Status: 'DRAFT' });
  });

  it('decodes UTF-8 bytes', () => {
    const bytes = new TextEncoder().encode('Café Protocol. A. Auteur. May 2001. (Status: INFORMATIONAL)');
    const record = parseRecord(3000, bytes);

    expect(record.title).toBe('Café Protocol. A. Auteur');
    expect(record.date).toEqual({ year: 2001, month: 5 });
  });

  it('rejects bytes that are not UTF-8', () => {
    const bytes = Uint8Array.from([0x41, 0xff, 0x42]);

    expect(() => parseRecord(5, bytes)).toThrow(CacheError);
    try {
      parseRecord(5, bytes);
    } catch (err) {
      expect(err).toBeInstanceOf(CacheError);
      if (err instanceof CacheError) {
        expect(err.code).toBe('DECODE');
        expect(err.message).toBe('Document 0005: description is not valid UTF-8');
      }
    }
  });
});

describe('RegistryRecord', () => {
  it('compares by number only', () => {
    const a = new RegistryRecord(10, 'Alpha', 'Alpha.');
    const b = new RegistryRecord(10, 'Beta', 'Beta.');
    const c = new RegistryRecord(20, 'Alpha', 'Alpha.');

    expect(a.equals(b)).toBe(true);
    expect(a.equals(c)).toBe(false);
    expect(a.compareTo(c)).toBeLessThan(0);
    expect(c.compareTo(a)).toBeGreaterThan(0);
    expect([c, a].sort(RegistryRecord.compare).map(r => r.number)).toEqual([10, 20]);
  });

  it('renders as its title', () => {
    expect(String(new RegistryRecord(1, 'Host Software', HOST_SOFTWARE))).toBe('Host Software');
  });

  it('is immutable', () => {
    const record = new RegistryRecord(1, 'Host Software', HOST_SOFTWARE, { Status: 'UNKNOWN' });

    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.flags)).toBe(true);
  });
});
