import { describe, it, expect } from 'vitest';
import {
  parseDate,
  parseMonth,
  parseNumeric,
  parseQuarter,
  parseReferenceDate,
  parseYear,
} from '../locale';

describe('parseNumeric', () => {
  it('should read decimal comma with thousands dots', () => {
    expect(parseNumeric('1.234,56')).toBe(1234.56);
    expect(parseNumeric('1.200,00')).toBe(1200);
    expect(parseNumeric('12,5')).toBe(12.5);
    expect(parseNumeric('-3,25')).toBe(-3.25);
  });

  it('should strip currency, percent and whitespace', () => {
    expect(parseNumeric('R$ 1.234,56')).toBe(1234.56);
    expect(parseNumeric('12,5%')).toBe(12.5);
    expect(parseNumeric(' 1 234,5 ')).toBe(1234.5);
  });

  it('should return null for sentinels', () => {
    for (const sentinel of ['...', '-', 'N/D', '', 'nan', '(...)', '--', 'None', 'x']) {
      expect(parseNumeric(sentinel)).toBeNull();
    }
    expect(parseNumeric(undefined)).toBeNull();
    expect(parseNumeric(null)).toBeNull();
  });

  it('should return null for text that is not a number', () => {
    expect(parseNumeric('abc')).toBeNull();
    expect(parseNumeric('1,2,3')).toBeNull();
    expect(parseNumeric('12.34,5')).toBeNull();
  });

  it('should treat well-formed dot groups as thousands and a lone dot as decimal', () => {
    expect(parseNumeric('1.234')).toBe(1234);
    expect(parseNumeric('1.234.567')).toBe(1234567);
    expect(parseNumeric('100.5')).toBe(100.5);
    expect(parseNumeric('0.0125')).toBe(0.0125);
  });

  it('should not read a leading zero group as thousands', () => {
    expect(parseNumeric('0.125')).toBe(0.125);
    expect(parseNumeric('-0.500')).toBe(-0.5);
    expect(parseNumeric('0.125,50')).toBeNull();
  });

  it('should keep zero as zero', () => {
    expect(parseNumeric('0')).toBe(0);
    expect(parseNumeric('0,00')).toBe(0);
  });
});

describe('parseYear', () => {
  it('should accept plain, float-formatted and footnoted years', () => {
    expect(parseYear('2020')).toBe(2020);
    expect(parseYear('2020.0')).toBe(2020);
    expect(parseYear('2020*')).toBe(2020);
  });

  it('should reject years outside 1950-2035', () => {
    expect(parseYear('1949')).toBeNull();
    expect(parseYear('2036')).toBeNull();
    expect(parseYear('20')).toBeNull();
  });
});

describe('parseMonth', () => {
  it('should match abbreviations and full names ignoring case, accents and a trailing dot', () => {
    expect(parseMonth('DEZ')).toBe(12);
    expect(parseMonth('dezembro')).toBe(12);
    expect(parseMonth('Set.')).toBe(9);
    expect(parseMonth('Março')).toBe(3);
  });

  it('should return null for unknown labels', () => {
    expect(parseMonth('foo')).toBeNull();
    expect(parseMonth('')).toBeNull();
  });
});

describe('parseQuarter', () => {
  it('should map quarter labels to their central month', () => {
    expect(parseQuarter('1T')).toBe(2);
    expect(parseQuarter('T2')).toBe(5);
    expect(parseQuarter('Q3')).toBe(8);
    expect(parseQuarter('4º TRI')).toBe(11);
  });

  it('should reject labels that are not quarters', () => {
    expect(parseQuarter('5T')).toBeNull();
    expect(parseQuarter('JAN')).toBeNull();
  });
});

describe('parseDate', () => {
  it('should build the first day of the labelled month', () => {
    expect(parseDate(2024, 'jan')).toBe('2024-01-01');
    expect(parseDate(2024, 'fev.')).toBe('2024-02-01');
    expect(parseDate('2020.0', 'dez')).toBe('2020-12-01');
  });

  it('should default to January without a label', () => {
    expect(parseDate(2024)).toBe('2024-01-01');
    expect(parseDate(2024, '')).toBe('2024-01-01');
  });

  it('should return null for unknown labels and out-of-range years', () => {
    expect(parseDate(2024, 'xyz')).toBeNull();
    expect(parseDate(1949, 'jan')).toBeNull();
    expect(parseDate(2036)).toBeNull();
  });
});

describe('parseReferenceDate', () => {
  it('should read the formats found in tall exports', () => {
    expect(parseReferenceDate('2024-01-15')).toBe('2024-01-15');
    expect(parseReferenceDate('15/01/2024')).toBe('2024-01-15');
    expect(parseReferenceDate('2024-03')).toBe('2024-03-01');
    expect(parseReferenceDate('03/2024')).toBe('2024-03-01');
    expect(parseReferenceDate('jan/24')).toBe('2024-01-01');
    expect(parseReferenceDate('mar/99')).toBe('1999-03-01');
    expect(parseReferenceDate('janeiro/2024')).toBe('2024-01-01');
    expect(parseReferenceDate('2024')).toBe('2024-01-01');
  });

  it('should reject impossible dates and free text', () => {
    expect(parseReferenceDate('31/02/2024')).toBeNull();
    expect(parseReferenceDate('2024-13-01')).toBeNull();
    expect(parseReferenceDate('foo')).toBeNull();
    expect(parseReferenceDate('')).toBeNull();
  });
});
