#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { WHITESPACE_SPLIT, resolveConfig, unescapeSplitCharacters } from './config';
import type { ConfigInput } from './config';
import { SheetWordlistError } from './errors';
import { findSpreadsheetFiles } from './file-discovery';
import { Reporter } from './reporter';
import { runExtraction, validateRoot } from './run-aggregator';

interface OutputOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

interface SelectionOptions {
  directory?: string;
  name?: string;
  extensions?: string[];
  config?: string;
}

interface ExtractOptions extends OutputOptions, SelectionOptions {
  output?: string;
  splitChars?: string;
  splitWords?: boolean;
  maxLength?: number;
  complexity?: boolean;
  progress?: boolean;
  maxFileSize?: number;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function parseList(value: string): string[] {
  return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

function splitCharactersFrom(options: ExtractOptions): string | undefined {
  if (options.splitChars === undefined && !options.splitWords) {
    return undefined;
  }
  const explicit = options.splitChars !== undefined ? unescapeSplitCharacters(options.splitChars) : '';
  return (options.splitWords ? WHITESPACE_SPLIT : '') + explicit;
}

function fail(reporter: Reporter, error: unknown): never {
  if (error instanceof SheetWordlistError) {
    reporter.failure(error, error.code);
    process.exit(error.exitCode);
  }
  reporter.failure(error);
  process.exit(1);
}

const program = new Command();

program
  .name('sheet-wordlist')
  .description('Extract candidate passwords from spreadsheet cells into a sorted, unique wordlist')
  .version('1.0.0');

program
  .command('extract', { isDefault: true })
  .description('Scan a directory of spreadsheets and write every unique token to a wordlist')
  .option('-d, --directory <dir>', 'Directory to scan recursively')
  .option('-o, --output <path>', 'Output wordlist (default: passwords.txt)')
  .option('-s, --split-chars <chars>', 'Characters to split cell text on (\\s space, \\t tab)')
  .option('-w, --split-words', 'Split cell text on whitespace')
  .option('-m, --max-length <n>', 'Maximum token length (default: 32)', parsePositiveInt)
  .option('-n, --name <filename>', 'Only process files with this exact name')
  .option('-c, --complexity', 'Keep only tokens with upper, lower, digit and special characters')
  .option('-p, --progress', 'Show live extraction progress')
  .option('-e, --extensions <list>', 'Comma-separated file extensions (default: .xlsx)', parseList)
  .option('--max-file-size <bytes>', 'Skip files larger than this', parsePositiveInt)
  .option('--config <path>', 'YAML configuration file')
  .option('--json', 'JSON output for automation')
  .option('-v, --verbose', 'Detailed operation output')
  .option('-q, --quiet', 'Minimal output for automation')
  .action(async (options: ExtractOptions) => {
    const output = { json: options.json, verbose: options.verbose, quiet: options.quiet };
    let reporter = new Reporter(output);

    try {
      const input: ConfigInput = {
        rootDir: options.directory,
        outputPath: options.output,
        splitCharacters: splitCharactersFrom(options),
        maxLength: options.maxLength,
        requireComplexity: options.complexity,
        nameFilter: options.name,
        extensions: options.extensions,
        showProgress: options.progress,
        maxFileSize: options.maxFileSize
      };
      const config = resolveConfig(input, options.config);
      reporter = new Reporter({ ...output, progress: config.showProgress });

      const summary = await runExtraction(config, {
        onDiscovered: files => reporter.discovered(files),
        onFileStart: filePath => reporter.fileStart(filePath),
        onToken: token => reporter.token(token),
        onFileDone: result => reporter.fileDone(result),
        onError: error => reporter.fileError(error),
        onWriting: (outputPath, count) => reporter.writing(outputPath, count)
      });

      reporter.summary(summary);
    } catch (error) {
      fail(reporter, error);
    }
  });

program
  .command('scan')
  .description('List the spreadsheet files a run would process')
  .option('-d, --directory <dir>', 'Directory to scan recursively')
  .option('-n, --name <filename>', 'Only list files with this exact name')
  .option('-e, --extensions <list>', 'Comma-separated file extensions (default: .xlsx)', parseList)
  .option('--config <path>', 'YAML configuration file')
  .option('--json', 'JSON output for automation')
  .option('-q, --quiet', 'Minimal output for automation')
  .action((options: OutputOptions & SelectionOptions) => {
    const reporter = new Reporter({ json: options.json, quiet: options.quiet });

    try {
      const config = resolveConfig({
        rootDir: options.directory,
        nameFilter: options.name,
        extensions: options.extensions
      }, options.config);
      validateRoot(config.rootDir);

      const files = Array.from(findSpreadsheetFiles(config.rootDir, {
        extensions: config.extensions,
        nameFilter: config.nameFilter
      }));

      if (options.json) {
        console.log(JSON.stringify({ status: 'success', files }, null, 2));
        return;
      }
      files.forEach(file => console.log(file));
      if (!options.quiet) {
        console.log(chalk.gray(`\n${files.length} matching file${files.length === 1 ? '' : 's'}`));
      }
    } catch (error) {
      fail(reporter, error);
    }
  });

// Global error handlers
process.on('uncaughtException', (error) => {
  console.error(chalk.red('Uncaught Exception:'), error.message);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  console.error(chalk.red('Unhandled Rejection:'), reason);
  process.exit(1);
});

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(error instanceof Error ? error.message : 'Unknown error'));
  process.exit(1);
});
