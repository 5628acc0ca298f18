import type { SheetBackend } from './sink.js';

/**
 * In-process table. Used for dry runs and tests; contents live as long as the
 * instance.
 */
export class MemoryBackend implements SheetBackend {
  readonly description: string;
  private readonly rows: string[][] = [];

  constructor(name = 'memory') {
    this.description = `memory:${name}`;
  }

  async readHeader(): Promise<string[] | null> {
    const header = this.rows[0];
    return header ? [...header] : null;
  }

  async writeHeader(header: readonly string[]): Promise<void> {
    if (this.rows.length === 0) {
      this.rows.push([...header]);
    } else {
      this.rows[0] = [...header];
    }
  }

  async readColumn(index: number): Promise<string[]> {
    return this.rows.slice(1).map((row) => row[index] ?? '');
  }

  async appendRows(rows: readonly (readonly string[])[]): Promise<void> {
    for (const row of rows) {
      this.rows.push([...row]);
    }
  }

  /** Copy of every row, header first. */
  snapshot(): string[][] {
    return this.rows.map((row) => [...row]);
  }
}
