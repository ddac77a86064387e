import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as XLSX from 'xlsx';
import type { CellSource, FilterConfig, RawCellValue } from '../src/types';

export function makeTempDir(prefix = 'sheet-wordlist-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeWorkbook(filePath: string, sheets: Record<string, RawCellValue[][]>): void {
  const workbook = XLSX.utils.book_new();
  for (const [name, rows] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), name);
  }
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  fs.writeFileSync(filePath, buffer);
}

export function memorySource(filePath: string, values: RawCellValue[]): CellSource {
  return {
    filePath,
    async *cells() {
      yield* values;
    }
  };
}

export function failingSource(filePath: string, before: RawCellValue[], message: string): CellSource {
  return {
    filePath,
    async *cells() {
      yield* before;
      throw new Error(message);
    }
  };
}

export function filterConfig(overrides: Partial<FilterConfig> = {}): FilterConfig {
  return {
    splitCharacters: new Set<string>(),
    maxLength: 32,
    requireComplexity: false,
    ...overrides
  };
}
