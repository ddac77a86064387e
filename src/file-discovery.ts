import * as fs from 'fs';
import * as path from 'path';

export interface DiscoveryOptions {
  extensions: string[];
  nameFilter?: string;
}

/**
 * Resolves the exact filename to look for. A name that lacks one of the
 * accepted extensions gets the first one appended.
 */
export function resolveNameFilter(nameFilter: string, extensions: string[]): string {
  const target = nameFilter.toLowerCase();
  const ext = path.extname(target);
  const accepted = extensions.map(e => e.toLowerCase());
  if (accepted.length > 0 && !accepted.includes(ext)) {
    return target + accepted[0];
  }
  return target;
}

export function matchesFile(fileName: string, options: DiscoveryOptions): boolean {
  const lower = fileName.toLowerCase();
  const accepted = options.extensions.map(e => e.toLowerCase());
  if (!accepted.includes(path.extname(lower))) {
    return false;
  }
  if (options.nameFilter) {
    return lower === resolveNameFilter(options.nameFilter, options.extensions);
  }
  return true;
}

/**
 * Recursively walks `rootDir`, yielding files that match the extension and
 * optional name filter. Symbolic links are not followed.
 */
export function* findSpreadsheetFiles(rootDir: string, options: DiscoveryOptions): Generator<string> {
  const pending: string[] = [rootDir];

  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) break;

    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch (error) {
      // unreadable subdirectories are left out of the run
      if (dir === rootDir) throw error;
      continue;
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    const subdirs: string[] = [];
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        subdirs.push(fullPath);
      } else if (entry.isFile() && matchesFile(entry.name, options)) {
        yield fullPath;
      }
    }
    pending.push(...subdirs.reverse());
  }
}
