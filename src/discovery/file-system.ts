/**
 * File-system access used by the scanners and the sync step.
 *
 * Scanners only see this interface, so they run unchanged against the real
 * disk or an in-memory tree.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { isNotFoundCode } from '../errors.js';

export interface DirectoryEntry {
  name: string;
  isDirectory: boolean;
  isFile: boolean;
}

export interface CatalogFileSystem {
  /** List a directory. Resolves to null when the directory does not exist. */
  readDir(dirPath: string): Promise<DirectoryEntry[] | null>;
  /**
   * Read a UTF-8 file. Rejects with an ENOENT error when it does not exist,
   * and with a TypeError when the bytes are not valid UTF-8.
   */
  readFile(filePath: string): Promise<string>;
  writeFile(filePath: string, content: string): Promise<void>;
}

// ============================================
// Node implementation
// ============================================

const utf8 = new TextDecoder('utf-8', { fatal: true });

export const nodeFileSystem: CatalogFileSystem = {
  async readDir(dirPath) {
    let entries;
    try {
      entries = await fs.readdir(dirPath, { withFileTypes: true });
    } catch (error) {
      if (isNotFoundCode(error)) return null;
      throw error;
    }
    return entries.map((entry) => ({
      name: entry.name,
      isDirectory: entry.isDirectory(),
      isFile: entry.isFile(),
    }));
  },

  async readFile(filePath) {
    const bytes = await fs.readFile(filePath);
    try {
      return utf8.decode(bytes);
    } catch (error) {
      throw new TypeError(`${filePath} is not valid UTF-8`, { cause: error });
    }
  },

  async writeFile(filePath, content) {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
  },
};

// ============================================
// In-memory implementation
// ============================================

/**
 * Create a file system backed by a map of absolute paths to file contents.
 * Directories exist implicitly for every file beneath them.
 */
export function createMemoryFileSystem(
  files: Record<string, string> = {}
): CatalogFileSystem & { files: Map<string, string> } {
  const store = new Map<string, string>();
  for (const [filePath, content] of Object.entries(files)) {
    store.set(path.resolve(filePath), content);
  }

  return {
    files: store,

    async readDir(dirPath) {
      const dir = path.resolve(dirPath);
      const children = new Map<string, DirectoryEntry>();

      for (const filePath of store.keys()) {
        const rel = path.relative(dir, filePath);
        if (!rel || rel.startsWith('..') || path.isAbsolute(rel)) continue;

        const [head, ...rest] = rel.split(path.sep);
        if (!head || children.has(head)) continue;
        const isDirectory = rest.length > 0;
        children.set(head, { name: head, isDirectory, isFile: !isDirectory });
      }

      if (children.size === 0) return null;
      return Array.from(children.values());
    },

    async readFile(filePath) {
      const content = store.get(path.resolve(filePath));
      if (content === undefined) {
        throw Object.assign(new Error(`ENOENT: no such file or directory, open '${filePath}'`), {
          code: 'ENOENT',
        });
      }
      return content;
    },

    async writeFile(filePath, content) {
      store.set(path.resolve(filePath), content);
    },
  };
}

// ============================================
// Traversal
// ============================================

export interface WalkOptions {
  /** Descend into subdirectories (default: true) */
  recursive?: boolean;
  /** Directory names that are not entered */
  skipDirs?: ReadonlyArray<string>;
}

/**
 * Collect the files below `root` accepted by `match`, sorted by path.
 *
 * Order never depends on what the file system returns: paths are compared
 * segment by segment, so `a/x` sorts before `a-b/x`.
 */
export async function walkFiles(
  fileSystem: CatalogFileSystem,
  root: string,
  match: (fileName: string) => boolean,
  options: WalkOptions = {}
): Promise<string[]> {
  const recursive = options.recursive ?? true;
  const skipDirs = new Set(options.skipDirs ?? []);
  const found: string[] = [];

  const visit = async (dir: string): Promise<void> => {
    const entries = await fileSystem.readDir(dir);
    if (!entries) return;

    for (const entry of entries) {
      const entryPath = path.join(dir, entry.name);
      if (entry.isDirectory) {
        if (recursive && !skipDirs.has(entry.name)) {
          await visit(entryPath);
        }
      } else if (entry.isFile && match(entry.name)) {
        found.push(entryPath);
      }
    }
  };

  await visit(root);

  return found.sort((a, b) => comparePaths(path.relative(root, a), path.relative(root, b)));
}

/**
 * Compare two relative paths segment by segment, by code unit.
 */
export function comparePaths(a: string, b: string): number {
  const left = a.split(path.sep);
  const right = b.split(path.sep);
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const l = left[i] ?? '';
    const r = right[i] ?? '';
    if (l < r) return -1;
    if (l > r) return 1;
  }
  return left.length - right.length;
}
