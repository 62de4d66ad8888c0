/**
 * Catalog sync orchestrator.
 *
 * Coordinates the full flow:
 * resolve paths → discover entries → render → write or compare
 */

import * as path from 'path';
import { resolveCatalogPaths, type CatalogConfig } from './config.js';
import { discoverCatalog } from './discovery/scanners.js';
import { nodeFileSystem, type CatalogFileSystem } from './discovery/file-system.js';
import { countEntries, renderCatalog } from './report/catalog.js';
import { NotFoundError, isNotFoundCode } from './errors.js';
import type {
  CatalogCollections,
  LineDifference,
  NavigationLink,
  RenderOptions,
  SyncMode,
  SyncResult,
  WarningSink,
} from './types.js';

export interface SyncOptions {
  config: CatalogConfig;
  /** Write the catalog (default) or only compare it with the file on disk */
  mode?: SyncMode;
  /** File system to scan and write (default: the real disk) */
  fs?: CatalogFileSystem;
  /** Receives one line per skipped or suspicious input file */
  warn?: WarningSink;
  /** Base for a relative rootDir (default: process.cwd()) */
  cwd?: string;
}

export interface RenderedCatalog {
  collections: CatalogCollections;
  content: string;
  outputPath: string;
}

/**
 * Discover all entries and render the catalog without touching the output file.
 */
export async function buildCatalog(options: SyncOptions): Promise<RenderedCatalog> {
  const fileSystem = options.fs ?? nodeFileSystem;
  const warn = options.warn ?? ((message: string) => console.error(message));
  const paths = resolveCatalogPaths(options.config, options.cwd);

  const collections = await discoverCatalog(paths, fileSystem, warn);

  const renderOptions: RenderOptions = {
    title: options.config.title,
    generator: options.config.generator,
    navigation: options.config.navigation.map((link) => rebaseLink(link, paths.root, paths.outputDir)),
    rootLink: toPosix(path.relative(paths.outputDir, paths.root)),
    customDir: options.config.customDir,
  };

  return {
    collections,
    content: renderCatalog(collections, renderOptions),
    outputPath: paths.output,
  };
}

const EXTERNAL_HREF_RE = /^(?:[a-z][a-z0-9+.-]*:|#|\/)/i;

/**
 * Turn a root-relative navigation href into one relative to the catalog.
 * URLs, anchors and absolute paths are kept as written.
 */
function rebaseLink(link: NavigationLink, root: string, outputDir: string): NavigationLink {
  if (!link.href || EXTERNAL_HREF_RE.test(link.href)) return link;

  const hashIndex = link.href.indexOf('#');
  const target = hashIndex === -1 ? link.href : link.href.slice(0, hashIndex);
  const fragment = hashIndex === -1 ? '' : link.href.slice(hashIndex);
  const relative = toPosix(path.relative(outputDir, path.resolve(root, target)));

  return { label: link.label, href: `${relative}${fragment}` };
}

function toPosix(filePath: string): string {
  return filePath.split(path.sep).join('/');
}

/**
 * Regenerate the catalog, or in check mode verify that the file on disk matches.
 *
 * @throws NotFoundError in check mode when the catalog file does not exist
 */
export async function syncCatalog(options: SyncOptions): Promise<SyncResult> {
  const mode = options.mode ?? 'write';
  const fileSystem = options.fs ?? nodeFileSystem;
  const { collections, content, outputPath } = await buildCatalog(options);
  const counts = countEntries(collections);

  if (mode === 'write') {
    await fileSystem.writeFile(outputPath, content);
    return { mode, status: 'written', outputPath, content, counts };
  }

  let existing: string;
  try {
    existing = await fileSystem.readFile(outputPath);
  } catch (error) {
    if (isNotFoundCode(error)) {
      throw new NotFoundError(outputPath);
    }
    throw error;
  }

  if (existing === content) {
    return { mode, status: 'up-to-date', outputPath, content, counts };
  }

  return {
    mode,
    status: 'out-of-date',
    outputPath,
    content,
    counts,
    difference: findFirstDifference(content, existing),
  };
}

/**
 * Locate the first line where `actual` departs from `expected`.
 * A missing line on either side is reported as null.
 */
export function findFirstDifference(expected: string, actual: string): LineDifference | undefined {
  if (expected === actual) return undefined;

  const expectedLines = expected.split('\n');
  const actualLines = actual.split('\n');
  const length = Math.max(expectedLines.length, actualLines.length);

  for (let i = 0; i < length; i++) {
    const e = expectedLines[i];
    const a = actualLines[i];
    if (e !== a) {
      return { line: i + 1, expected: e ?? null, actual: a ?? null };
    }
  }
  return undefined;
}
