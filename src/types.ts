import type { FileUnreadableError } from './errors';

export type RawCellValue = string | number | boolean | Date | null;

export type SkipReason = 'empty' | 'too-long' | 'empty-after-cleaning' | 'low-complexity';

export const SKIP_REASONS: readonly SkipReason[] = ['empty', 'too-long', 'empty-after-cleaning', 'low-complexity'];

export type SkipCounts = Record<SkipReason, number>;

export type ComplexityRule = (token: string) => boolean;

export interface FilterConfig {
  splitCharacters: ReadonlySet<string>;
  maxLength: number;
  requireComplexity: boolean;
  complexityRule?: ComplexityRule;
}

export interface RunConfig extends FilterConfig {
  rootDir: string;
  outputPath: string;
  nameFilter?: string;
  extensions: string[];
  showProgress: boolean;
  maxFileSize: number;
}

export type FilterOutcome =
  | { accepted: true; token: string }
  | { accepted: false; reason: SkipReason };

export interface FileResult {
  readonly filePath: string;
  readonly tokens: ReadonlySet<string>;
  readonly foundCount: number;
  readonly skippedCount: number;
  readonly skippedByReason: Readonly<SkipCounts>;
  readonly error?: FileUnreadableError;
}

export interface RunSummary {
  filesProcessed: number;
  filesFailed: number;
  totalFound: number;
  uniqueWritten: number;
  totalSkipped: number;
  skippedByReason: SkipCounts;
  skippedForComplexity?: number;
  outputPath: string;
  elapsedMs: number;
}

/**
 * A lazy, finite, non-restartable sequence of raw cell values read from one
 * document, in sheet, row, column order.
 */
export interface CellSource {
  readonly filePath: string;
  cells(): AsyncIterable<RawCellValue>;
}

export interface SafetyResult {
  isSafe: boolean;
  issues: string[];
}

export function emptySkipCounts(): SkipCounts {
  return { 'empty': 0, 'too-long': 0, 'empty-after-cleaning': 0, 'low-complexity': 0 };
}
