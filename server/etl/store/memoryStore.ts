import type { Cell, RawRow, SpreadsheetStore } from '../types';

export type StoreCall =
  | { method: 'readTable'; table: string }
  | { method: 'writeTable'; table: string; rows: Cell[][] }
  | { method: 'appendRows'; table: string; rows: Cell[][] }
  | { method: 'ensureTable'; table: string; header: Cell[] };

const copyRows = (rows: readonly (readonly Cell[])[]): Cell[][] => rows.map(row => [...row]);

/**
 * Map-backed store for tests and dry runs. Every call is recorded in
 * `calls`, in order.
 */
export class InMemorySpreadsheetStore implements SpreadsheetStore {
  readonly calls: StoreCall[] = [];
  private readonly tables = new Map<string, Cell[][]>();

  constructor(initial: Record<string, Cell[][]> = {}) {
    for (const [name, rows] of Object.entries(initial)) {
      this.tables.set(name, copyRows(rows));
    }
  }

  async readTable(name: string): Promise<RawRow[]> {
    this.calls.push({ method: 'readTable', table: name });
    const rows = this.tables.get(name) ?? [];
    return rows.map((cells, index) => ({ index, cells: [...cells] }));
  }

  async writeTable(name: string, rows: Cell[][]): Promise<void> {
    this.calls.push({ method: 'writeTable', table: name, rows: copyRows(rows) });
    this.tables.set(name, copyRows(rows));
  }

  async appendRows(name: string, rows: Cell[][]): Promise<void> {
    this.calls.push({ method: 'appendRows', table: name, rows: copyRows(rows) });
    const existing = this.tables.get(name) ?? [];
    this.tables.set(name, [...existing, ...copyRows(rows)]);
  }

  async ensureTable(name: string, header: Cell[]): Promise<void> {
    this.calls.push({ method: 'ensureTable', table: name, header: [...header] });
    if (!this.tables.has(name)) {
      this.tables.set(name, [[...header]]);
    }
  }

  /** Current contents of a table, header included. */
  snapshot(name: string): Cell[][] {
    return copyRows(this.tables.get(name) ?? []);
  }

  hasTable(name: string): boolean {
    return this.tables.has(name);
  }

  callsTo(method: StoreCall['method']): StoreCall[] {
    return this.calls.filter(call => call.method === method);
  }
}
