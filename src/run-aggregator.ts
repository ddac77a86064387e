import * as fs from 'fs';
import { InvalidRootError, NoFilesFoundError, OutputWriteError } from './errors';
import { findSpreadsheetFiles } from './file-discovery';
import { FileExtractor } from './file-extractor';
import type { FileExtractorOptions } from './file-extractor';
import { SafetyManager } from './safety-manager';
import { SKIP_REASONS, emptySkipCounts } from './types';
import type { FileResult, RunConfig, RunSummary, SkipCounts } from './types';

/** Orders strings by Unicode code point rather than by UTF-16 code unit. */
export function compareCodePoints(a: string, b: string): number {
  const left = a[Symbol.iterator]();
  const right = b[Symbol.iterator]();

  for (;;) {
    const l = left.next();
    const r = right.next();
    if (l.done || r.done) {
      return l.done === r.done ? 0 : l.done ? -1 : 1;
    }
    const diff = (l.value.codePointAt(0) ?? 0) - (r.value.codePointAt(0) ?? 0);
    if (diff !== 0) return diff;
  }
}

export interface FinalizedRun {
  tokens: string[];
  filesProcessed: number;
  filesFailed: string[];
  totalFound: number;
  totalSkipped: number;
  skippedByReason: SkipCounts;
}

/**
 * Whole-run state: the global token set and counters. Results are folded in
 * one at a time; `finalize` may be called once, after which the accumulator
 * rejects further results.
 */
export class RunAccumulator {
  private readonly tokens = new Set<string>();
  private readonly skippedByReason = emptySkipCounts();
  private readonly failedFiles: string[] = [];
  private totalFiles = 0;
  private totalFound = 0;
  private totalSkipped = 0;
  private finalized = false;

  fold(result: FileResult): void {
    if (this.finalized) {
      throw new Error('Cannot add results to a finalized run');
    }

    for (const token of result.tokens) {
      this.tokens.add(token);
    }
    this.totalFiles++;
    this.totalFound += result.foundCount;
    this.totalSkipped += result.skippedCount;
    for (const reason of SKIP_REASONS) {
      this.skippedByReason[reason] += result.skippedByReason[reason];
    }
    if (result.error) {
      this.failedFiles.push(result.filePath);
    }
  }

  get uniqueCount(): number {
    return this.tokens.size;
  }

  finalize(): FinalizedRun {
    if (this.finalized) {
      throw new Error('Run already finalized');
    }
    this.finalized = true;

    return {
      tokens: Array.from(this.tokens).sort(compareCodePoints),
      filesProcessed: this.totalFiles,
      filesFailed: [...this.failedFiles],
      totalFound: this.totalFound,
      totalSkipped: this.totalSkipped,
      skippedByReason: { ...this.skippedByReason }
    };
  }
}

export function validateRoot(rootDir: string): void {
  let stats: fs.Stats;
  try {
    stats = fs.statSync(rootDir);
  } catch {
    throw new InvalidRootError(rootDir, 'does not exist');
  }
  if (!stats.isDirectory()) {
    throw new InvalidRootError(rootDir, 'is not a directory');
  }
}

export function writeTokens(outputPath: string, tokens: readonly string[]): void {
  const content = tokens.map(token => `${token}\n`).join('');
  try {
    fs.writeFileSync(outputPath, content, 'utf8');
  } catch (error) {
    throw new OutputWriteError(outputPath, error);
  }
}

export interface RunHooks extends Pick<FileExtractorOptions, 'onToken' | 'onError' | 'openSource'> {
  onDiscovered?: (files: string[]) => void;
  onFileStart?: (filePath: string) => void;
  onFileDone?: (result: FileResult) => void;
  onWriting?: (outputPath: string, count: number) => void;
}

/**
 * Discovers, extracts, merges and writes. Pre-flight failures (bad root, no
 * files) throw before the output file is touched.
 */
export async function runExtraction(config: RunConfig, hooks: RunHooks = {}): Promise<RunSummary> {
  const startTime = Date.now();
  validateRoot(config.rootDir);

  const files = Array.from(findSpreadsheetFiles(config.rootDir, {
    extensions: config.extensions,
    nameFilter: config.nameFilter
  }));
  if (files.length === 0) {
    throw new NoFilesFoundError(config.rootDir, config.nameFilter);
  }
  hooks.onDiscovered?.(files);

  const extractor = new FileExtractor(config, {
    safetyManager: new SafetyManager({
      maxFileSize: config.maxFileSize,
      allowedExtensions: config.extensions
    }),
    openSource: hooks.openSource,
    onToken: hooks.onToken,
    onError: hooks.onError
  });

  const accumulator = new RunAccumulator();
  for (const filePath of files) {
    hooks.onFileStart?.(filePath);
    const result = await extractor.extract(filePath);
    accumulator.fold(result);
    hooks.onFileDone?.(result);
  }

  const run = accumulator.finalize();
  hooks.onWriting?.(config.outputPath, run.tokens.length);
  writeTokens(config.outputPath, run.tokens);

  return {
    filesProcessed: run.filesProcessed,
    filesFailed: run.filesFailed.length,
    totalFound: run.totalFound,
    uniqueWritten: run.tokens.length,
    totalSkipped: run.totalSkipped,
    skippedByReason: run.skippedByReason,
    ...(config.requireComplexity ? { skippedForComplexity: run.skippedByReason['low-complexity'] } : {}),
    outputPath: config.outputPath,
    elapsedMs: Date.now() - startTime
  };
}
