import * as fs from 'fs';
import * as path from 'path';
import type { SafetyResult } from './types';

export const DEFAULT_MAX_FILE_SIZE = 500 * 1024 * 1024; // 500MB

export interface SafetyOptions {
  maxFileSize?: number;
  allowedExtensions?: Iterable<string>;
}

export class SafetyManager {
  private maxFileSize: number;
  private allowedExtensions: Set<string>;

  constructor(options: SafetyOptions = {}) {
    this.maxFileSize = options.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
    this.allowedExtensions = new Set(
      Array.from(options.allowedExtensions ?? ['.xlsx', '.xlsm', '.xls', '.ods', '.csv', '.tsv'])
        .map(ext => ext.toLowerCase())
    );
  }

  async validateFile(filePath: string): Promise<SafetyResult> {
    const issues: string[] = [];

    try {
      if (!fs.existsSync(filePath)) {
        issues.push('File does not exist');
        return { isSafe: false, issues };
      }

      const stats = fs.statSync(filePath);
      if (!stats.isFile()) {
        issues.push('Not a regular file');
        return { isSafe: false, issues };
      }

      const ext = path.extname(filePath).toLowerCase();
      if (!this.allowedExtensions.has(ext)) {
        issues.push(`Unsupported file extension: ${ext || '(none)'}`);
      }

      const fileSize = stats.size;
      if (fileSize === 0) {
        issues.push('File is empty');
      } else if (fileSize > this.maxFileSize) {
        issues.push(`File too large: ${fileSize} bytes (max: ${this.maxFileSize})`);
      }

      return {
        isSafe: issues.length === 0,
        issues
      };

    } catch (error) {
      issues.push(`Validation error: ${error instanceof Error ? error.message : 'Unknown error'}`);
      return { isSafe: false, issues };
    }
  }
}
