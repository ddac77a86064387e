import chalk from 'chalk';
import ora from 'ora';
import type { FileUnreadableError } from './errors';
import { SKIP_REASONS } from './types';
import type { FileResult, RunSummary } from './types';

export interface ReporterOptions {
  quiet?: boolean;
  verbose?: boolean;
  json?: boolean;
  progress?: boolean;
  columns?: () => number;
}

export function truncateToWidth(text: string, width: number): string {
  const chars = Array.from(text.replace(/[\r\n\t]/g, ' '));
  if (width <= 0) return '';
  if (chars.length <= width) return chars.join('');
  return chars.slice(0, Math.max(0, width - 1)).join('') + '…';
}

/**
 * Console output for a run. Live progress goes through an ora spinner;
 * everything else is plain lines coloured with chalk. In json mode only the
 * final summary is printed to stdout.
 */
export class Reporter {
  private readonly options: ReporterOptions;
  private spinner: ora.Ora | undefined;
  private readonly failures: { filePath: string; message: string }[] = [];

  constructor(options: ReporterOptions = {}) {
    this.options = options;
  }

  private get chatty(): boolean {
    return !this.options.quiet && !this.options.json;
  }

  private columns(): number {
    return this.options.columns ? this.options.columns() : process.stdout.columns || 80;
  }

  discovered(files: string[]): void {
    if (!this.chatty) return;
    console.log(`Found ${chalk.cyan(files.length)} spreadsheet file${files.length === 1 ? '' : 's'}`);
  }

  fileStart(filePath: string): void {
    if (!this.chatty || !this.options.progress) return;
    this.spinner = ora(`Processing: ${filePath}`).start();
  }

  token(token: string): void {
    if (!this.spinner) return;
    // leave room for the spinner glyph
    this.spinner.text = truncateToWidth(`Extracting: ${token}`, this.columns() - 2);
  }

  fileDone(result: FileResult): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = undefined;
    }
    if (!this.chatty || result.error) return;

    console.log(`Processed: ${result.filePath} - Found ${chalk.green(result.foundCount)} tokens (${result.skippedCount} skipped)`);
    if (this.options.verbose && result.skippedCount > 0) {
      const reasons = SKIP_REASONS
        .filter(reason => result.skippedByReason[reason] > 0)
        .map(reason => `${reason}: ${result.skippedByReason[reason]}`);
      console.log(chalk.gray(`  skipped ${result.skippedCount} (${reasons.join(', ')})`));
    }
  }

  fileError(error: FileUnreadableError): void {
    this.failures.push({ filePath: error.filePath, message: error.message });
    if (this.options.json) return;
    if (this.spinner) {
      this.spinner.fail(chalk.red(error.message));
      this.spinner = undefined;
      return;
    }
    console.error(chalk.red(error.message));
  }

  writing(outputPath: string, count: number): void {
    if (!this.chatty) return;
    console.log(chalk.gray(`\nWriting ${count} sorted unique tokens to ${outputPath}...`));
  }

  summary(summary: RunSummary): void {
    if (this.options.json) {
      console.log(JSON.stringify({ status: 'success', ...summary, failures: this.failures }, null, 2));
      return;
    }
    if (this.options.quiet) return;

    console.log(chalk.green('\nProcessing complete!'));
    console.log(chalk.blue('Statistics:'));
    console.log(`- Files processed: ${summary.filesProcessed}`);
    if (summary.filesFailed > 0) {
      console.log(chalk.yellow(`- Files failed: ${summary.filesFailed}`));
    }
    console.log(`- Total tokens found: ${summary.totalFound}`);
    console.log(`- Unique tokens written: ${summary.uniqueWritten}`);
    if (summary.skippedForComplexity !== undefined) {
      console.log(`- Skipped for complexity: ${summary.skippedForComplexity}`);
    }
    if (this.options.verbose) {
      console.log(`- Total skipped: ${summary.totalSkipped}`);
      console.log(chalk.gray(`- Elapsed: ${summary.elapsedMs}ms`));
    }
    console.log(`- Results written to: ${chalk.green(summary.outputPath)}`);
  }

  failure(error: unknown, code?: string): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = undefined;
    }
    const message = error instanceof Error ? error.message : 'Unknown error';
    if (this.options.json) {
      console.log(JSON.stringify({ status: 'error', code: code ?? 'UNEXPECTED', message }, null, 2));
      return;
    }
    console.error(chalk.red(`Error: ${message}`));
  }
}
