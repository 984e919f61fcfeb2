import * as fs from 'fs';
import * as path from 'path';

export const DEFAULT_TEST_EXTENSION = '.slo';

/**
 * Recursively collects test scripts under `folderPath`.
 *
 * Entries are visited in name order at every level, so the same tree always
 * yields the same list. Symbolic links to files are collected; symbolic
 * links to directories are not followed.
 */
export function discoverTests(
  folderPath: string,
  extension: string = DEFAULT_TEST_EXTENSION,
): string[] {
  if (!fs.existsSync(folderPath)) {
    throw new Error(`Directory does not exist: ${folderPath}`);
  }

  const stat = fs.statSync(folderPath);
  if (!stat.isDirectory()) {
    throw new Error(`Path is not a directory: ${folderPath}`);
  }

  const testFiles: string[] = [];
  walk(path.resolve(folderPath), extension, testFiles);
  return testFiles;
}

function walk(dir: string, extension: string, found: string[]): void {
  const entries = fs
    .readdirSync(dir, { withFileTypes: true })
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      walk(entryPath, extension, found);
    } else if (entry.name.endsWith(extension) && isFileEntry(entry, entryPath)) {
      found.push(entryPath);
    }
  }
}

function isFileEntry(entry: fs.Dirent, entryPath: string): boolean {
  if (entry.isSymbolicLink()) {
    return fs.statSync(entryPath, { throwIfNoEntry: false })?.isFile() ?? false;
  }
  return entry.isFile();
}
