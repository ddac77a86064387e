import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { DelimitedCellSource, WorkbookCellSource, assertContainer, openCellSource } from '../src/cell-source';
import type { CellSource, RawCellValue } from '../src/types';
import { makeTempDir, removeDir, writeWorkbook } from './helpers';

async function collect(source: CellSource): Promise<RawCellValue[]> {
  const values: RawCellValue[] = [];
  for await (const value of source.cells()) {
    values.push(value);
  }
  return values;
}

describe('cell sources', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('reads every sheet of a workbook in sheet, row, column order', async () => {
    const filePath = path.join(dir, 'book.xlsx');
    writeWorkbook(filePath, {
      First: [['a1', 'b1'], ['a2', 42]],
      Second: [[true, 'Summer2024!']]
    });

    const values = await collect(new WorkbookCellSource(filePath));

    expect(values).toEqual(['a1', 'b1', 'a2', 42, true, 'Summer2024!']);
  });

  it('skips holes in a sparse sheet', async () => {
    const filePath = path.join(dir, 'sparse.xlsx');
    writeWorkbook(filePath, { Sheet1: [['x', null, 'z']] });

    const values = await collect(new WorkbookCellSource(filePath));

    expect(values).toEqual(['x', 'z']);
  });

  it('reads date cells as dates', async () => {
    const filePath = path.join(dir, 'dates.xlsx');
    writeWorkbook(filePath, { Sheet1: [['expires', new Date(2024, 0, 15)]] });

    const values = await collect(new WorkbookCellSource(filePath));

    expect(values[0]).toBe('expires');
    const date = values[1];
    expect(date).toBeInstanceOf(Date);
    if (!(date instanceof Date)) return;
    expect([date.getFullYear(), date.getMonth(), date.getDate()]).toEqual([2024, 0, 15]);
  });

  it('refuses a text file posing as a workbook', async () => {
    const filePath = path.join(dir, 'corrupt.xlsx');
    fs.writeFileSync(filePath, 'this is not a zip container\nSecretPass1!\n', 'utf8');

    await expect(collect(new WorkbookCellSource(filePath))).rejects.toThrow('Not a valid xlsx container');
  });

  it('reads delimited text field by field', async () => {
    const filePath = path.join(dir, 'accounts.csv');
    fs.writeFileSync(filePath, 'user,password\nadmin,"Winter, 2023"\n\nroot,toor\n', 'utf8');

    const values = await collect(new DelimitedCellSource(filePath));

    expect(values).toEqual(['user', 'password', 'admin', 'Winter, 2023', 'root', 'toor']);
  });

  it('reads rows of uneven length', async () => {
    const filePath = path.join(dir, 'ragged.tsv');
    fs.writeFileSync(filePath, 'one\ttwo\tthree\nfour\n', 'utf8');

    const values = await collect(openCellSource(filePath));

    expect(values).toEqual(['one', 'two', 'three', 'four']);
  });

  it('picks a reader by extension', () => {
    expect(openCellSource('A.XLSX')).toBeInstanceOf(WorkbookCellSource);
    expect(openCellSource('a.ods')).toBeInstanceOf(WorkbookCellSource);
    expect(openCellSource('a.csv')).toBeInstanceOf(DelimitedCellSource);
    expect(() => openCellSource('a.docx')).toThrow('Unsupported file format: .docx');
  });

  it('fails iteration when a delimited file is missing', async () => {
    await expect(collect(new DelimitedCellSource(path.join(dir, 'missing.csv')))).rejects.toThrow(/ENOENT/);
  });
});

describe('assertContainer', () => {
  it('accepts matching signatures', () => {
    expect(() => assertContainer('a.xlsx', Buffer.from([0x50, 0x4b, 0x03, 0x04, 0x14]))).not.toThrow();
    expect(() => assertContainer('a.xls', Buffer.from([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1, 0x00]))).not.toThrow();
  });

  it('rejects mismatched or short data', () => {
    expect(() => assertContainer('a.xls', Buffer.from([0x50, 0x4b, 0x03, 0x04]))).toThrow('Not a valid xls container');
    expect(() => assertContainer('a.ODS', Buffer.from('PK'))).toThrow('Not a valid ods container');
  });

  it('ignores formats without a container', () => {
    expect(() => assertContainer('a.csv', Buffer.from('plain,text'))).not.toThrow();
  });
});
