import { describe, it, expect, afterEach, vi } from 'vitest';
import { FileUnreadableError, NoFilesFoundError } from '../src/errors';
import { Reporter, truncateToWidth } from '../src/reporter';
import type { RunSummary } from '../src/types';
import { emptySkipCounts } from '../src/types';

const summary: RunSummary = {
  filesProcessed: 2,
  filesFailed: 0,
  totalFound: 3,
  uniqueWritten: 2,
  totalSkipped: 0,
  skippedByReason: emptySkipCounts(),
  outputPath: 'passwords.txt',
  elapsedMs: 12
};

describe('truncateToWidth', () => {
  it('leaves short text alone', () => {
    expect(truncateToWidth('Extracting: abc', 20)).toBe('Extracting: abc');
  });

  it('cuts long text and marks the cut', () => {
    expect(truncateToWidth('abcdefghij', 5)).toBe('abcd…');
  });

  it('flattens line breaks', () => {
    expect(truncateToWidth('a\nb', 10)).toBe('a b');
  });

  it('returns nothing for a zero width', () => {
    expect(truncateToWidth('abc', 0)).toBe('');
  });
});

describe('Reporter', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints the summary as JSON in json mode', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const reporter = new Reporter({ json: true });

    reporter.fileError(new FileUnreadableError('bad.xlsx', new Error('corrupt')));
    reporter.summary(summary);

    expect(log).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(log.mock.calls[0][0]))).toEqual({
      status: 'success',
      ...summary,
      failures: [{ filePath: 'bad.xlsx', message: 'Error processing bad.xlsx: corrupt' }]
    });
  });

  it('prints errors as JSON in json mode', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const reporter = new Reporter({ json: true });

    reporter.failure(new NoFilesFoundError('/data'), 'NO_FILES_FOUND');

    expect(JSON.parse(String(log.mock.calls[0][0]))).toEqual({
      status: 'error',
      code: 'NO_FILES_FOUND',
      message: 'No spreadsheet files found in /data'
    });
  });

  it('stays silent in quiet mode', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const reporter = new Reporter({ quiet: true });

    reporter.discovered(['a.xlsx']);
    reporter.summary(summary);

    expect(log).not.toHaveBeenCalled();
  });

  it('writes per-file lines to the console', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const reporter = new Reporter();

    reporter.fileDone({
      filePath: 'a.xlsx',
      tokens: new Set(['x']),
      foundCount: 1,
      skippedCount: 2,
      skippedByReason: { ...emptySkipCounts(), 'too-long': 2 }
    });

    expect(log).toHaveBeenCalledTimes(1);
    const line = String(log.mock.calls[0][0]);
    expect(line).toContain('Processed: a.xlsx - Found');
    expect(line.endsWith(' tokens (2 skipped)')).toBe(true);
  });
});
