import fs from 'fs/promises';
import type { Dirent, Stats } from 'fs';
import path from 'path';
import { InvalidArgumentError, PathNotFoundError } from '../common/errors';
import { describeError, hasErrorCode } from '../common/fsErrors';
import type { DirTree, DirTreeOptions, FileInfoOptions } from '../types/dirTree';
import { getLogger, type TreeLogger } from '../utils/logger';
import { getFileInfo } from './fileInfo';
import { DEFAULT_DEPTH } from './treeConfig';

export interface GetDirTreeOptions extends DirTreeOptions {
  logger?: TreeLogger;
}

type EntryKind = 'dir' | 'file' | 'other';

interface WalkOptions {
  fileInfo: FileInfoOptions;
  followSymlinks: boolean;
  logger: TreeLogger;
}

const defaultLogger = getLogger('dir-tree-builder');

export const UNLIMITED_DEPTH = -1;

const compareNames = (a: string, b: string) => {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (left !== right) {
    return left < right ? -1 : 1;
  }
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
};

const sortEntries = (entries: Dirent[]): Dirent[] =>
  [...entries].sort((a, b) => compareNames(a.name, b.name));

const nextDepth = (depth: number) => (depth === UNLIMITED_DEPTH ? UNLIMITED_DEPTH : depth - 1);

const resolveEntryKind = async (
  entry: Dirent,
  entryPath: string,
  options: WalkOptions,
): Promise<EntryKind> => {
  if (!entry.isSymbolicLink()) {
    if (entry.isDirectory()) return 'dir';
    if (entry.isFile()) return 'file';
    return 'other';
  }

  if (!options.followSymlinks) {
    return 'other';
  }

  try {
    const target = await fs.stat(entryPath);
    if (target.isDirectory()) return 'dir';
    if (target.isFile()) return 'file';
  } catch (error) {
    options.logger.debug(`Cannot resolve symlink: ${entryPath} (${describeError(error)})`);
  }
  return 'other';
};

const walkDirectory = async (
  dirPath: string,
  depth: number,
  options: WalkOptions,
): Promise<DirTree> => {
  if (depth === 0) {
    return {};
  }

  let entries: Dirent[];
  try {
    entries = await fs.readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    if (hasErrorCode(error, 'EACCES', 'EPERM')) {
      options.logger.warn(`Permission denied: ${dirPath}`);
    } else {
      options.logger.warn(`Cannot read directory: ${dirPath} (${describeError(error)})`);
    }
    return {};
  }

  const tree: Array<[string, DirTree[string]]> = [];

  for (const entry of sortEntries(entries)) {
    const entryPath = path.join(dirPath, entry.name);
    const kind = await resolveEntryKind(entry, entryPath, options);

    if (kind === 'dir') {
      tree.push([entry.name, await walkDirectory(entryPath, nextDepth(depth), options)]);
    } else if (kind === 'file') {
      tree.push([entry.name, await getFileInfo(entryPath, { ...options.fileInfo, logger: options.logger })]);
    } else {
      options.logger.debug(`Skipping non-file, non-dir entry: ${entryPath}`);
    }
  }

  // fromEntries defines own keys, so names like `__proto__` survive intact.
  return Object.fromEntries(tree);
};

const validateOptions = (targetPath: unknown, depth: unknown, humanReadable: unknown) => {
  if (typeof targetPath !== 'string' || targetPath.length === 0) {
    throw new InvalidArgumentError(`'path' must be a non-empty string, got ${JSON.stringify(targetPath)}`);
  }
  if (typeof depth !== 'number' || !Number.isInteger(depth)) {
    throw new InvalidArgumentError(`'depth' must be an integer, got ${String(depth)}`);
  }
  if (depth < UNLIMITED_DEPTH) {
    throw new InvalidArgumentError(`'depth' must be -1 (unlimited) or >= 0, got ${depth}`);
  }
  if (typeof humanReadable !== 'boolean') {
    throw new InvalidArgumentError(`'humanReadable' must be a boolean, got ${typeof humanReadable}`);
  }
};

/**
 * Builds a nested mapping of the tree rooted at `targetPath`.
 *
 * Directories map to nested trees (`{}` when empty, unreadable or at the depth
 * limit) and files map to their metadata. A file given as the root yields a
 * single-entry tree keyed by its name. Entries are ordered by case-insensitive
 * name, except that integer-like names (`"2"`, `"10"`) come first in numeric
 * order, since that is how JavaScript objects enumerate such keys.
 */
export const getDirTree = async (
  targetPath: string,
  {
    depth = DEFAULT_DEPTH,
    humanReadable = false,
    includeMimeType = false,
    followSymlinks = true,
    logger = defaultLogger,
  }: GetDirTreeOptions = {},
): Promise<DirTree> => {
  validateOptions(targetPath, depth, humanReadable);

  let stats: Stats;
  try {
    stats = await fs.stat(targetPath);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT', 'ENOTDIR')) {
      throw new PathNotFoundError(targetPath);
    }
    throw error;
  }

  const options: WalkOptions = {
    fileInfo: { humanReadable, includeMimeType },
    followSymlinks,
    logger,
  };

  if (stats.isFile()) {
    const name = path.basename(path.resolve(targetPath));
    const entry: [string, DirTree[string]] = [
      name,
      await getFileInfo(targetPath, { ...options.fileInfo, logger }),
    ];
    return Object.fromEntries([entry]);
  }

  return walkDirectory(targetPath, depth, options);
};
