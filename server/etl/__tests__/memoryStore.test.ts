import { describe, it, expect } from 'vitest';
import { InMemorySpreadsheetStore } from '../store/memoryStore';

describe('InMemorySpreadsheetStore', () => {
  it('should read a missing table as empty', async () => {
    const store = new InMemorySpreadsheetStore();
    expect(await store.readTable('fact_series')).toEqual([]);
  });

  it('should replace a table on write and number rows from zero', async () => {
    const store = new InMemorySpreadsheetStore({ fact_series: [['old']] });

    await store.writeTable('fact_series', [['h'], ['1']]);

    expect(await store.readTable('fact_series')).toEqual([
      { index: 0, cells: ['h'] },
      { index: 1, cells: ['1'] },
    ]);
  });

  it('should create a table with its header only once', async () => {
    const store = new InMemorySpreadsheetStore();

    await store.ensureTable('_ingestion_log', ['run_id']);
    await store.appendRows('_ingestion_log', [['run-1']]);
    await store.ensureTable('_ingestion_log', ['run_id']);

    expect(store.snapshot('_ingestion_log')).toEqual([['run_id'], ['run-1']]);
  });

  it('should record calls with copies of the rows', async () => {
    const store = new InMemorySpreadsheetStore();
    const rows = [['a']];

    await store.writeTable('t', rows);
    rows[0][0] = 'changed';

    expect(store.callsTo('writeTable')).toEqual([{ method: 'writeTable', table: 't', rows: [['a']] }]);
    expect(store.snapshot('t')).toEqual([['a']]);
  });
});
