// Main exports for the sheet-wordlist library
export { normalizeCell } from './normalizer';
export { tokenize, buildSplitPattern } from './tokenizer';
export { filterToken, fourClassComplexity, stripUnprintable, SPECIAL_CHARACTERS } from './token-filter';
export { openCellSource, WorkbookCellSource, DelimitedCellSource } from './cell-source';
export { FileExtractor } from './file-extractor';
export type { FileExtractorOptions } from './file-extractor';
export { findSpreadsheetFiles, resolveNameFilter } from './file-discovery';
export { RunAccumulator, runExtraction, compareCodePoints } from './run-aggregator';
export type { RunHooks, FinalizedRun } from './run-aggregator';
export { resolveConfig, loadConfigFile } from './config';
export type { ConfigInput } from './config';
export { SafetyManager } from './safety-manager';
export { Reporter } from './reporter';
export * from './errors';
export * from './types';

// Default export
export { runExtraction as default } from './run-aggregator';
