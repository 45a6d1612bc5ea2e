/**
 * docveil: Tool File Helpers
 *
 * Input discovery (explicit paths or a directory walk filtered by glob-style
 * patterns) and output writing for the document tools.
 *
 * @module tools/files
 */

import { mkdir, readFile, readdir, stat, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { ConfigurationError, InputNotFoundError, PersistenceError, errorMessage } from '../errors/index.js';

export interface FileSelection {
  files?: readonly string[];
  directory?: string;
  patterns: readonly string[];
  recursive: boolean;
}

export interface DiscoveredFile {
  absolutePath: string;
  /** Path relative to the scanned directory, `/`-separated; basename for explicit files */
  relativePath: string;
}

/**
 * Compile a glob pattern: `*` and `?` stay within one path segment, `**`
 * spans segments, `[...]` and `{a,b}` work as in shells.
 */
export function globToRegExp(pattern: string): RegExp {
  let source = '';
  for (let i = 0; i < pattern.length; i++) {
    const char = pattern.charAt(i);
    if (char === '*') {
      if (pattern.charAt(i + 1) === '*') {
        const slash = pattern.charAt(i + 2) === '/';
        source += slash ? '(?:.*/)?' : '.*';
        i += slash ? 2 : 1;
      } else {
        source += '[^/]*';
      }
    } else if (char === '?') {
      source += '[^/]';
    } else if (char === '[') {
      const close = pattern.indexOf(']', i + 1);
      if (close === -1) {
        source += '\\[';
      } else {
        const body = pattern.slice(i + 1, close).replace(/^!/, '^').replace(/\\/g, '\\\\');
        source += `[${body}]`;
        i = close;
      }
    } else if (char === '{') {
      const close = pattern.indexOf('}', i + 1);
      if (close === -1) {
        source += '\\{';
      } else {
        const options = pattern.slice(i + 1, close).split(',').map(option => option.replace(/[.+^$()|\\]/g, '\\$&'));
        source += `(?:${options.join('|')})`;
        i = close;
      }
    } else {
      source += char.replace(/[.+^$()|\\\]}]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`);
}

/**
 * Patterns without a `/` match the file name at any depth
 */
export function matchesAny(relativePath: string, matchers: ReadonlyArray<{ glob: RegExp; byName: boolean }>): boolean {
  const name = path.posix.basename(relativePath);
  return matchers.some(matcher => matcher.glob.test(matcher.byName ? name : relativePath));
}

/**
 * @throws InputNotFoundError when a named file or the directory is missing
 * @throws ConfigurationError when neither files nor a directory is given
 */
export async function findFiles(selection: FileSelection): Promise<DiscoveredFile[]> {
  if (selection.files && selection.files.length > 0) {
    const found = new Map<string, DiscoveredFile>();
    for (const file of selection.files) {
      const absolutePath = path.resolve(file);
      if (!(await isFile(absolutePath))) {
        throw new InputNotFoundError(file);
      }
      found.set(absolutePath, { absolutePath, relativePath: path.basename(absolutePath) });
    }
    return [...found.values()];
  }

  if (selection.directory) {
    const root = path.resolve(selection.directory);
    if (!(await isDirectory(root))) {
      throw new InputNotFoundError(selection.directory, 'Directory');
    }

    const matchers = selection.patterns.map(pattern => ({
      glob: globToRegExp(pattern),
      byName: !pattern.includes('/'),
    }));
    const entries = await readdir(root, { recursive: selection.recursive });

    const found: DiscoveredFile[] = [];
    for (const entry of entries) {
      const relativePath = entry.split(path.sep).join('/');
      if (!matchesAny(relativePath, matchers)) continue;
      const absolutePath = path.join(root, entry);
      if (await isFile(absolutePath)) {
        found.push({ absolutePath, relativePath });
      }
    }
    return found.sort((a, b) => (a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0));
  }

  throw new ConfigurationError("Either 'files' or 'directory' must be provided");
}

/**
 * `relativePath` with its extension replaced, made unique against `taken`
 */
export function outputName(relativePath: string, extension: string, taken: Set<string>): string {
  const parsed = path.posix.parse(relativePath);
  const stem = path.posix.join(parsed.dir, parsed.name);
  let candidate = `${stem}${extension}`;
  for (let n = 2; taken.has(candidate); n++) {
    candidate = `${stem}_${n}${extension}`;
  }
  taken.add(candidate);
  return candidate;
}

/**
 * Read a UTF-8 input file
 *
 * @throws InputNotFoundError when the path is not a readable file
 */
export async function readTextInput(filePath: string, displayPath: string = filePath): Promise<string> {
  if (!(await isFile(filePath))) {
    throw new InputNotFoundError(displayPath);
  }
  return readFile(filePath, 'utf-8');
}

/**
 * Write a UTF-8 file, creating parent directories
 *
 * @throws PersistenceError
 */
export async function writeOutput(filePath: string, content: string): Promise<void> {
  try {
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, content, 'utf-8');
  } catch (error) {
    throw new PersistenceError(filePath, `Failed to write ${filePath}: ${errorMessage(error)}`, { cause: error });
  }
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}
