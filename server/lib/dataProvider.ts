import fs from 'fs';
import path from 'path';
import type { DataTable } from './dataTable.js';
import { DEFAULT_SHEET, parseTabularFile } from './fileParser.js';

/**
 * Source of the table each question is answered against
 */
export interface DataProvider {
  currentTable(): DataTable;
}

export class InMemoryDataProvider implements DataProvider {
  constructor(private readonly table: DataTable) {}

  currentTable(): DataTable {
    return this.table;
  }
}

/**
 * Reads the sample table from disk and re-reads it when the file's
 * modification time changes.
 */
export class FileDataProvider implements DataProvider {
  private cached: DataTable | null = null;
  private loadedMtimeMs: number | null = null;

  constructor(
    private readonly filePath: string,
    private readonly sheetName: string = DEFAULT_SHEET
  ) {}

  currentTable(): DataTable {
    const { mtimeMs } = fs.statSync(this.filePath);
    if (this.cached && this.loadedMtimeMs === mtimeMs) {
      return this.cached;
    }

    const buffer = fs.readFileSync(this.filePath);
    const table = parseTabularFile(buffer, path.basename(this.filePath), this.sheetName);
    console.log(`📂 Loaded ${table.length} rows from '${this.sheetName}'`);

    this.cached = table;
    this.loadedMtimeMs = mtimeMs;
    return table;
  }
}
