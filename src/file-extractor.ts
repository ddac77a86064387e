import { openCellSource } from './cell-source';
import { FileUnreadableError } from './errors';
import { normalizeCell } from './normalizer';
import { SafetyManager } from './safety-manager';
import { filterToken } from './token-filter';
import { buildSplitPattern, splitWith } from './tokenizer';
import { emptySkipCounts } from './types';
import type { CellSource, FileResult, FilterConfig } from './types';

export interface FileExtractorOptions {
  safetyManager?: SafetyManager;
  openSource?: (filePath: string) => CellSource;
  onToken?: (token: string, filePath: string) => void;
  onError?: (error: FileUnreadableError) => void;
}

export function emptyFileResult(filePath: string, error?: FileUnreadableError): FileResult {
  return Object.freeze({
    filePath,
    tokens: new Set<string>(),
    foundCount: 0,
    skippedCount: 0,
    skippedByReason: Object.freeze(emptySkipCounts()),
    ...(error ? { error } : {})
  });
}

export class FileExtractor {
  private readonly config: FilterConfig;
  private readonly splitPattern: RegExp | undefined;
  private readonly safetyManager: SafetyManager | undefined;
  private readonly openSource: (filePath: string) => CellSource;
  private readonly onToken?: (token: string, filePath: string) => void;
  private readonly onError?: (error: FileUnreadableError) => void;

  constructor(config: FilterConfig, options: FileExtractorOptions = {}) {
    this.config = config;
    this.splitPattern = buildSplitPattern(config.splitCharacters);
    this.safetyManager = options.safetyManager;
    this.openSource = options.openSource ?? openCellSource;
    this.onToken = options.onToken;
    this.onError = options.onError;
  }

  /**
   * Runs every cell of the file through normalize, tokenize and filter.
   * Never rejects: an unreadable file yields an empty result carrying the
   * error.
   */
  async extract(filePath: string): Promise<FileResult> {
    try {
      if (this.safetyManager) {
        const safety = await this.safetyManager.validateFile(filePath);
        if (!safety.isSafe) {
          throw new Error(safety.issues.join('; '));
        }
      }

      return await this.extractFrom(this.openSource(filePath));
    } catch (cause) {
      const error = new FileUnreadableError(filePath, cause);
      this.onError?.(error);
      return emptyFileResult(filePath, error);
    }
  }

  async extractFrom(source: CellSource): Promise<FileResult> {
    const tokens = new Set<string>();
    const skippedByReason = emptySkipCounts();
    let foundCount = 0;
    let skippedCount = 0;

    for await (const value of source.cells()) {
      const text = normalizeCell(value);
      if (text === undefined) continue;

      for (const candidate of splitWith(text, this.splitPattern)) {
        const outcome = filterToken(candidate, this.config);
        if (!outcome.accepted) {
          skippedByReason[outcome.reason]++;
          skippedCount++;
          continue;
        }
        if (tokens.has(outcome.token)) continue;

        tokens.add(outcome.token);
        foundCount++;
        this.onToken?.(outcome.token, source.filePath);
      }
    }

    return Object.freeze({
      filePath: source.filePath,
      tokens,
      foundCount,
      skippedCount,
      skippedByReason: Object.freeze(skippedByReason)
    });
  }
}
