import * as fs from 'fs';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError, describeError } from './errors';
import { DEFAULT_MAX_FILE_SIZE } from './safety-manager';
import type { RunConfig } from './types';

export const DEFAULT_OUTPUT_PATH = 'passwords.txt';
export const DEFAULT_MAX_LENGTH = 32;
export const DEFAULT_EXTENSIONS = ['.xlsx'];
export const WHITESPACE_SPLIT = ' \t\n\r';

const extensionSchema = z
  .string()
  .min(1)
  .transform(ext => (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase());

export const configInputSchema = z.object({
  rootDir: z.string().min(1).optional(),
  outputPath: z.string().min(1).optional(),
  splitCharacters: z.string().optional(),
  maxLength: z.number().int().positive().optional(),
  requireComplexity: z.boolean().optional(),
  nameFilter: z.string().min(1).optional(),
  extensions: z.array(extensionSchema).min(1).optional(),
  showProgress: z.boolean().optional(),
  maxFileSize: z.number().int().positive().optional()
}).strict();

export type ConfigInput = z.input<typeof configInputSchema>;
type ConfigValues = z.output<typeof configInputSchema>;

/**
 * Expands the escapes accepted on the command line for characters that are
 * awkward to type: `\t`, `\n`, `\r`, `\s` (space) and `\\`.
 */
export function unescapeSplitCharacters(raw: string): string {
  return raw.replace(/\\([tnrs\\])/g, (_, code: string) => {
    switch (code) {
      case 't': return '\t';
      case 'n': return '\n';
      case 'r': return '\r';
      case 's': return ' ';
      default: return '\\';
    }
  });
}

function parseInput(input: unknown, source: string): ConfigValues {
  const parsed = configInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${source}: ${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

export function loadConfigFile(filePath: string): ConfigValues {
  let document: unknown;
  try {
    document = yaml.load(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigError([`${filePath}: ${describeError(error)}`]);
  }
  return parseInput(document ?? {}, filePath);
}

/**
 * Layers defaults, an optional config file and explicit overrides (in that
 * order of precedence) into a complete run configuration.
 */
export function resolveConfig(overrides: ConfigInput, configFile?: string): RunConfig {
  const file: ConfigValues = configFile ? loadConfigFile(configFile) : {};
  const cli = parseInput(overrides, 'options');

  const rootDir = cli.rootDir ?? file.rootDir;
  if (!rootDir) {
    throw new ConfigError(['rootDir: a directory to scan is required']);
  }

  return {
    rootDir,
    outputPath: cli.outputPath ?? file.outputPath ?? DEFAULT_OUTPUT_PATH,
    splitCharacters: new Set(Array.from(cli.splitCharacters ?? file.splitCharacters ?? '')),
    maxLength: cli.maxLength ?? file.maxLength ?? DEFAULT_MAX_LENGTH,
    requireComplexity: cli.requireComplexity ?? file.requireComplexity ?? false,
    nameFilter: cli.nameFilter ?? file.nameFilter,
    extensions: cli.extensions ?? file.extensions ?? [...DEFAULT_EXTENSIONS],
    showProgress: cli.showProgress ?? file.showProgress ?? false,
    maxFileSize: cli.maxFileSize ?? file.maxFileSize ?? DEFAULT_MAX_FILE_SIZE
  };
}
