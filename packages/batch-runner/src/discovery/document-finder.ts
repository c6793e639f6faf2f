import type { SourceDocument } from '@ordoscan/model';

import type { Dirent } from 'node:fs';

import { existsSync, readdirSync, statSync } from 'node:fs';
import { basename, join, relative, resolve, sep } from 'node:path';

import { DirectoryNotFoundError, NoInputError } from '../errors/batch-run-error';

/** Extension of the documents processed by default */
export const DOCUMENT_EXTENSION = '.pdf';

/** Options for document discovery */
export interface FindDocumentsOptions {
  /** Descend into subdirectories (default: false) */
  recursive?: boolean;
  /** Case-sensitive file extension, dot included (default: '.pdf') */
  extension?: string;
}

function collectFiles(directory: string, recursive: boolean): string[] {
  const files: string[] = [];

  for (const entry of readdirSync(directory, { withFileTypes: true })) {
    const entryPath = join(directory, entry.name);
    if (entry.isDirectory()) {
      if (recursive) {
        files.push(...collectFiles(entryPath, recursive));
      }
    } else if (entry.isFile() || isLinkToFile(entry, entryPath)) {
      files.push(entryPath);
    }
  }

  return files;
}

/** Symbolic links count as documents when they point at a file */
function isLinkToFile(entry: Dirent, entryPath: string): boolean {
  return (
    entry.isSymbolicLink() &&
    (statSync(entryPath, { throwIfNoEntry: false })?.isFile() ?? false)
  );
}

/**
 * Order paths segment by segment, so that `a/b.pdf` comes before `a-c.pdf`
 * even though `-` sorts before the separator.
 */
function comparePaths(root: string, left: string, right: string): number {
  const leftSegments = relative(root, left).split(sep);
  const rightSegments = relative(root, right).split(sep);
  const length = Math.min(leftSegments.length, rightSegments.length);

  for (let i = 0; i < length; i++) {
    if (leftSegments[i] !== rightSegments[i]) {
      return leftSegments[i] < rightSegments[i] ? -1 : 1;
    }
  }
  return leftSegments.length - rightSegments.length;
}

/**
 * List the documents of a directory, sorted by path segments so that runs
 * are reproducible whatever order the filesystem returns. Links to files
 * are listed; linked directories are not descended into.
 *
 * @throws DirectoryNotFoundError when `inputDir` is missing or not a directory
 * @throws NoInputError when no file has the expected extension
 */
export function findDocuments(
  inputDir: string,
  options: FindDocumentsOptions = {},
): SourceDocument[] {
  const { recursive = false, extension = DOCUMENT_EXTENSION } = options;
  const root = resolve(inputDir);

  if (!existsSync(root) || !statSync(root).isDirectory()) {
    throw new DirectoryNotFoundError(root);
  }

  const paths = collectFiles(root, recursive)
    .filter((path) => path.endsWith(extension))
    .sort((left, right) => comparePaths(root, left, right));

  if (paths.length === 0) {
    throw new NoInputError(root, extension);
  }

  return paths.map((path) => ({ path, basename: basename(path) }));
}
