export type ErrorCode =
  | 'INVALID_ROOT'
  | 'NO_FILES_FOUND'
  | 'FILE_UNREADABLE'
  | 'OUTPUT_WRITE_FAILURE'
  | 'CONFIG_ERROR';

export class SheetWordlistError extends Error {
  readonly code: ErrorCode;
  readonly exitCode: number;

  constructor(code: ErrorCode, message: string, exitCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
  }
}

export class InvalidRootError extends SheetWordlistError {
  constructor(readonly rootDir: string, reason: string) {
    super('INVALID_ROOT', `Directory '${rootDir}' ${reason}`, 2);
  }
}

export class NoFilesFoundError extends SheetWordlistError {
  constructor(readonly rootDir: string, readonly nameFilter?: string) {
    super(
      'NO_FILES_FOUND',
      nameFilter
        ? `No files named '${nameFilter}' found in ${rootDir}`
        : `No spreadsheet files found in ${rootDir}`,
      3
    );
  }
}

export class FileUnreadableError extends SheetWordlistError {
  constructor(readonly filePath: string, cause: unknown) {
    super('FILE_UNREADABLE', `Error processing ${filePath}: ${describeError(cause)}`, 1, { cause });
  }
}

export class OutputWriteError extends SheetWordlistError {
  constructor(readonly outputPath: string, cause: unknown) {
    super('OUTPUT_WRITE_FAILURE', `Failed to write ${outputPath}: ${describeError(cause)}`, 4, { cause });
  }
}

export class ConfigError extends SheetWordlistError {
  constructor(readonly issues: string[]) {
    super('CONFIG_ERROR', `Invalid configuration:\n  ${issues.join('\n  ')}`, 5);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
