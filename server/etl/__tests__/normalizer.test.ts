import { describe, it, expect } from 'vitest';
import { matchSectionCaption, normalizeTable } from '../normalizer';
import { detectShape, normalizeColumnName, normalizeHeader } from '../shape';
import { INGESTED_AT, makeTable } from './helpers';

describe('normalizeColumnName', () => {
  it('should lower-case, strip accents and collapse separators', () => {
    expect(normalizeColumnName('Data de Referência', 0)).toBe('data_de_referencia');
    expect(normalizeColumnName(' Custo (m²) ', 1)).toBe('custo_m');
  });

  it('should name blank and unnamed headers by position', () => {
    expect(normalizeColumnName('', 3)).toBe('col_3');
    expect(normalizeColumnName('Unnamed: 2', 2)).toBe('col_2');
  });

  it('should suffix repeated names', () => {
    expect(normalizeHeader(['Valor', 'valor', 'UF'])).toEqual(['valor', 'valor_2', 'uf']);
  });
});

describe('detectShape', () => {
  it('should find a month header row below a caption', () => {
    const shape = detectShape(makeTable([
      ['Fonte: CBIC', '', '', ''],
      ['ANO', 'JAN', 'FEV', 'MAR'],
      ['2023', '1.200,00', '1.215,00', '0'],
    ]));

    expect(shape).toEqual({
      kind: 'wide',
      groupColumn: 0,
      axis: {
        layout: 'columns',
        headerRowIndex: 1,
        columns: [
          { column: 1, month: 1, label: 'JAN' },
          { column: 2, month: 2, label: 'FEV' },
          { column: 3, month: 3, label: 'MAR' },
        ],
      },
    });
  });

  it('should find month labels down the second column', () => {
    const shape = detectShape(makeTable([
      ['2020', 'JAN', '100,5'],
      ['', 'FEV', '101,0'],
    ]));

    expect(shape).toEqual({
      kind: 'wide',
      groupColumn: 0,
      axis: { layout: 'rows', labelColumn: 1, valueColumn: 2 },
    });
  });

  it('should find a tall header with date and value columns', () => {
    const shape = detectShape(makeTable([
      ['Data', 'Valor', 'UF'],
      ['2024-01-01', '1,0', 'SP'],
    ]));

    expect(shape).toEqual({
      kind: 'tall',
      headerRowIndex: 0,
      columns: ['data', 'valor', 'uf'],
      dateColumn: 0,
      valueColumn: 1,
      seriesColumn: null,
    });
  });

  it('should report tables it cannot read', () => {
    expect(detectShape(makeTable([['foo', 'bar'], ['baz', 'qux']]))).toEqual({
      kind: 'unrecognized',
      reason: 'no period header or date/value header found',
    });
    expect(detectShape(makeTable([]))).toEqual({ kind: 'unrecognized', reason: 'table has no rows' });
  });
});

describe('matchSectionCaption', () => {
  it('should extract the region from a caption', () => {
    expect(matchSectionCaption('CUB MÉDIO REGIÃO SUL')).toBe('SUL');
    expect(matchSectionCaption('Região Centro-Oeste')).toBe('CENTRO-OESTE');
    expect(matchSectionCaption('CUB MÉDIO BRASIL')).toBe('BRASIL');
    expect(matchSectionCaption('CUB MÉDIO')).toBe('');
  });

  it('should return null for cells that are not captions', () => {
    expect(matchSectionCaption('2023')).toBeNull();
    expect(matchSectionCaption('Fonte: CBIC')).toBeNull();
    expect(matchSectionCaption('Fonte: Sinduscon da Região Metropolitana')).toBeNull();
    expect(matchSectionCaption('Valores da Região Sul')).toBeNull();
  });
});

describe('normalizeTable', () => {
  it('should carry the year forward across rows with a blank first cell', () => {
    const result = normalizeTable(
      makeTable([
        ['2020', 'JAN', '100,5'],
        ['', 'FEV', '101,0'],
        ['2021', 'JAN', '110,0'],
      ]),
      { seriesId: 'CUB', ingestedAt: INGESTED_AT }
    );

    expect(result.records.map(r => [r.recordKey, r.referenceDate, r.value])).toEqual([
      ['CUB_2020-01-01', '2020-01-01', 100.5],
      ['CUB_2020-02-01', '2020-02-01', 101],
      ['CUB_2021-01-01', '2021-01-01', 110],
    ]);
  });

  it('should map quarter labels to the central month', () => {
    const result = normalizeTable(
      makeTable([
        ['2022', '1T', '10'],
        ['', '2T', '12'],
      ]),
      { seriesId: 'PIB', ingestedAt: INGESTED_AT }
    );

    expect(result.records.map(r => r.referenceDate)).toEqual(['2022-02-01', '2022-05-01']);
  });

  it('should drop zero cells of wide tables and count them', () => {
    const result = normalizeTable(
      makeTable([
        ['Fonte: CBIC', '', '', ''],
        ['ANO', 'JAN', 'FEV', 'MAR'],
        ['2023', '1.200,00', '1.215,00', '0'],
      ]),
      { seriesId: 'CUB_SP', ingestedAt: INGESTED_AT }
    );

    expect(result.records.map(r => [r.referenceDate, r.value])).toEqual([
      ['2023-01-01', 1200],
      ['2023-02-01', 1215],
    ]);
    expect(result.droppedZeroCells).toBe(1);
    expect(result.rawRowCount).toBe(3);
  });

  it('should key records by the region of the current section', () => {
    const result = normalizeTable(
      makeTable([
        ['CUB MÉDIO REGIÃO SUL', '', '', ''],
        ['ANO', 'JAN', 'FEV', 'MAR'],
        ['2023', '1.200,00', '1.215,00', '0'],
      ]),
      { seriesId: 'CUB', ingestedAt: INGESTED_AT }
    );

    expect(result.records.map(r => r.recordKey)).toEqual(['CUB_2023-01-01_SUL', 'CUB_2023-02-01_SUL']);
    expect(result.records[0].dimensions).toEqual({ region: 'SUL' });
  });

  it('should not open a section from a source line naming a region', () => {
    const result = normalizeTable(
      makeTable([
        ['Fonte: Sinduscon da Região Metropolitana', '', ''],
        ['ANO', 'JAN', 'FEV'],
        ['2023', '100', '101'],
      ]),
      { seriesId: 'CUB', ingestedAt: INGESTED_AT }
    );

    expect(result.records.map(r => r.recordKey)).toEqual(['CUB_2023-01-01', 'CUB_2023-02-01']);
    expect(result.records[0].dimensions).toEqual({});
  });

  it('should reset the carried year when a new section starts', () => {
    const result = normalizeTable(
      makeTable([
        ['REGIÃO NORTE', '', ''],
        ['2023', 'JAN', '10'],
        ['REGIÃO SUL', '', ''],
        ['', 'FEV', '20'],
        ['2023', 'MAR', '30'],
      ]),
      { seriesId: 'CUB', ingestedAt: INGESTED_AT }
    );

    expect(result.records.map(r => r.recordKey)).toEqual(['CUB_2023-01-01_NORTE', 'CUB_2023-03-01_SUL']);
  });

  it('should group wide tables by a label column and skip totals', () => {
    const result = normalizeTable(
      makeTable([
        ['LOCALIDADE', 'JAN', 'FEV'],
        ['São Paulo', '10,0', '11,0'],
        ['TOTAL', '30,0', '33,0'],
        ['Rio de Janeiro', '20,0', ''],
      ]),
      {
        seriesId: 'CUB',
        group: { kind: 'label', dimension: 'localidade', referenceYear: 2022 },
        ingestedAt: INGESTED_AT,
      }
    );

    expect(result.records.map(r => [r.recordKey, r.value])).toEqual([
      ['CUB_2022-01-01_Rio de Janeiro', 20],
      ['CUB_2022-01-01_São Paulo', 10],
      ['CUB_2022-02-01_São Paulo', 11],
    ]);
  });

  it('should read tall tables, keeping known gaps and skipping undated rows', () => {
    const result = normalizeTable(
      makeTable([
        ['data', 'valor', 'uf'],
        ['2024-01-01', '1.234,56', 'SP'],
        ['2024-02-01', '...', 'SP'],
        ['xx', '5', 'SP'],
        ['2024-01-01', '1.100,00', 'RJ'],
      ], 'ipca', 'https://example.org/ipca.csv'),
      { seriesId: 'IPCA', ingestedAt: INGESTED_AT }
    );

    expect(result.shape.kind).toBe('tall');
    expect(result.records.map(r => [r.recordKey, r.value])).toEqual([
      ['IPCA_2024-01-01_RJ', 1100],
      ['IPCA_2024-01-01_SP', 1234.56],
      ['IPCA_2024-02-01_SP', null],
    ]);
    expect(result.records[0]).toEqual({
      recordKey: 'IPCA_2024-01-01_RJ',
      seriesId: 'IPCA',
      referenceDate: '2024-01-01',
      value: 1100,
      dimensions: { uf: 'RJ' },
      variationMom: null,
      variationYoy: null,
      sourceUrl: 'https://example.org/ipca.csv',
      ingestedAt: INGESTED_AT,
    });
  });

  it('should let a series column override the configured series', () => {
    const result = normalizeTable(
      makeTable([
        ['series_id', 'reference_date', 'value'],
        ['INCC', '2024-01-01', '1,5'],
        ['', '2024-02-01', '1,6'],
      ]),
      { seriesId: 'DEFAULT', ingestedAt: INGESTED_AT }
    );

    expect(result.records.map(r => r.recordKey)).toEqual(['DEFAULT_2024-02-01', 'INCC_2024-01-01']);
  });

  it('should keep the last of repeated keys within a batch', () => {
    const result = normalizeTable(
      makeTable([
        ['2020', 'JAN', '100'],
        ['2020', 'JAN', '105'],
      ]),
      { seriesId: 'CUB', ingestedAt: INGESTED_AT }
    );

    expect(result.records).toHaveLength(1);
    expect(result.records[0].value).toBe(105);
    expect(result.emittedCount).toBe(2);
    expect(result.duplicatesRemoved).toBe(1);
  });

  it('should attach static dimensions without keying on them by default', () => {
    const result = normalizeTable(
      makeTable([['2020', 'JAN', '100']]),
      { seriesId: 'CUB', dimensions: { unit: 'R$/m2' }, ingestedAt: INGESTED_AT }
    );

    expect(result.records[0].recordKey).toBe('CUB_2020-01-01');
    expect(result.records[0].dimensions).toEqual({ unit: 'R$/m2' });
  });

  it('should produce no records for an unrecognized table', () => {
    const result = normalizeTable(makeTable([['foo', 'bar']]), { seriesId: 'X' });

    expect(result.shape.kind).toBe('unrecognized');
    expect(result.records).toEqual([]);
  });
});
