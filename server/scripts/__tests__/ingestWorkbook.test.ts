import { describe, it, expect } from 'vitest';
import { groupFor, parseIngestArgs } from '../ingestWorkbook';
import { ConfigError } from '../../utils/errors';

describe('parseIngestArgs', () => {
  it('should read the workbook and options', () => {
    expect(parseIngestArgs(['cub.xlsx', '--series', 'CUB_SP', '--sheet', 'Plan1', '--non-negative'])).toEqual({
      file: 'cub.xlsx',
      sheet: 'Plan1',
      seriesId: 'CUB_SP',
      table: undefined,
      layout: 'year',
      year: undefined,
      dimension: 'localidade',
      nonNegative: true,
      dryRun: false,
      help: false,
    });
  });

  it('should accept label layouts with a reference year', () => {
    const args = parseIngestArgs([
      'cub.xlsx', '--series', 'CUB', '--layout', 'label', '--year', '2022', '--dimension', 'uf', '--dry-run',
    ]);

    expect(groupFor(args)).toEqual({ kind: 'label', dimension: 'uf', referenceYear: 2022 });
    expect(args.dryRun).toBe(true);
  });

  it('should default to year grouping', () => {
    expect(groupFor(parseIngestArgs(['cub.xlsx', '--series', 'CUB']))).toEqual({ kind: 'year' });
  });

  it('should reject incomplete command lines', () => {
    expect(() => parseIngestArgs(['--series', 'CUB'])).toThrow('A workbook file is required');
    expect(() => parseIngestArgs(['cub.xlsx'])).toThrow('--series is required');
    expect(() => parseIngestArgs(['cub.xlsx', '--series'])).toThrow('--series needs a value');
    expect(() => parseIngestArgs(['cub.xlsx', '--series', 'CUB', '--layout', 'label']))
      .toThrow('--year is required with --layout label');
  });

  it('should reject unknown options', () => {
    expect(() => parseIngestArgs(['cub.xlsx', '--series', 'CUB', '--verbose'])).toThrow(ConfigError);
    expect(() => parseIngestArgs(['cub.xlsx', '--series', 'CUB', '--layout', 'diagonal'])).toThrow(ConfigError);
  });

  it('should stop at --help', () => {
    expect(parseIngestArgs(['--help']).help).toBe(true);
  });
});
