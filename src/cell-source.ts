import * as fs from 'fs';
import * as path from 'path';
import * as XLSX from 'xlsx';
import { parse as csvParse } from 'csv-parse';
import type { CellSource, RawCellValue } from './types';

export const WORKBOOK_EXTENSIONS = ['.xlsx', '.xlsm', '.xls', '.ods'];
const ZIP_SIGNATURE = Buffer.from([0x50, 0x4b, 0x03, 0x04]);
const CFB_SIGNATURE = Buffer.from([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1]);

// xlsx, xlsm and ods are zip packages; legacy xls is a compound file.
const CONTAINER_SIGNATURES: Record<string, Buffer> = {
  '.xlsx': ZIP_SIGNATURE,
  '.xlsm': ZIP_SIGNATURE,
  '.ods': ZIP_SIGNATURE,
  '.xls': CFB_SIGNATURE
};

/**
 * Rejects a buffer whose leading bytes do not match the container its
 * extension promises. Without this the parser falls back to reading the
 * bytes as plain text.
 */
export function assertContainer(filePath: string, data: Buffer): void {
  const signature = CONTAINER_SIGNATURES[path.extname(filePath).toLowerCase()];
  if (!signature) return;
  if (data.length < signature.length || !data.subarray(0, signature.length).equals(signature)) {
    throw new Error(`Not a valid ${path.extname(filePath).toLowerCase().slice(1)} container`);
  }
}

export const DELIMITED_EXTENSIONS: Record<string, string> = {
  '.csv': ',',
  '.tsv': '\t'
};

/**
 * Reads every sheet of a workbook. The workbook is only loaded once
 * iteration starts, and cells are handed out one at a time in sheet, row,
 * column order.
 */
export class WorkbookCellSource implements CellSource {
  constructor(readonly filePath: string) {}

  async *cells(): AsyncIterable<RawCellValue> {
    const data = fs.readFileSync(this.filePath);
    assertContainer(this.filePath, data);
    const workbook = XLSX.read(data, {
      type: 'buffer',
      cellDates: true,
      cellFormula: false,
      cellHTML: false,
      cellStyles: false
    });

    if (!workbook.SheetNames || workbook.SheetNames.length === 0) {
      throw new Error('No sheets found in workbook');
    }

    for (const sheetName of workbook.SheetNames) {
      const worksheet = workbook.Sheets[sheetName];
      if (!worksheet) continue;
      yield* this.worksheetCells(worksheet);
    }
  }

  private *worksheetCells(worksheet: XLSX.WorkSheet): Generator<RawCellValue> {
    const ref = worksheet['!ref'];
    if (!ref) return;
    const range = XLSX.utils.decode_range(ref);

    for (let row = range.s.r; row <= range.e.r; row++) {
      for (let col = range.s.c; col <= range.e.c; col++) {
        const cell: XLSX.CellObject | undefined = worksheet[XLSX.utils.encode_cell({ r: row, c: col })];
        if (cell) {
          yield this.cellValue(cell);
        }
      }
    }
  }

  private cellValue(cell: XLSX.CellObject): RawCellValue {
    switch (cell.t) {
      case 's':
      case 'n':
      case 'b':
      case 'd':
        return cell.v ?? null;
      // error and stub cells carry no text
      case 'e':
      case 'z':
      default:
        return null;
    }
  }
}

export class DelimitedCellSource implements CellSource {
  constructor(readonly filePath: string, private readonly delimiter: string = ',') {}

  async *cells(): AsyncIterable<RawCellValue> {
    const input = fs.createReadStream(this.filePath);
    const parser = csvParse({
      delimiter: this.delimiter,
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: true,
      bom: true
    });
    input.on('error', error => parser.destroy(error));
    input.pipe(parser);

    const records: AsyncIterable<unknown> = parser;
    for await (const record of records) {
      if (!Array.isArray(record)) continue;
      for (const field of record) {
        yield typeof field === 'string' ? field : null;
      }
    }
  }
}

export function openCellSource(filePath: string): CellSource {
  const extension = path.extname(filePath).toLowerCase();

  if (WORKBOOK_EXTENSIONS.includes(extension)) {
    return new WorkbookCellSource(filePath);
  }
  const delimiter = DELIMITED_EXTENSIONS[extension];
  if (delimiter !== undefined) {
    return new DelimitedCellSource(filePath, delimiter);
  }
  throw new Error(`Unsupported file format: ${extension || '(none)'}`);
}
