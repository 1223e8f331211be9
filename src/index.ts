export { getDirTree, UNLIMITED_DEPTH } from './main/dirTreeBuilder';
export type { GetDirTreeOptions } from './main/dirTreeBuilder';
export { getFileInfo } from './main/fileInfo';
export type { GetFileInfoOptions } from './main/fileInfo';
export { dirTreeToJson, writeDirTree, DEFAULT_INDENT } from './main/serialize';
export { resolveTreeConfig, coerceBoolean, DEFAULT_DEPTH } from './main/treeConfig';
export type { TreeConfig } from './main/treeConfig';
export { runCli, createProgram } from './main/cli';
export type { CliIo } from './main/cli';
export { humanReadableSize, humanReadableTime } from './common/humanReadable';
export { DirTreeError, InvalidArgumentError, PathNotFoundError } from './common/errors';
export { setupLogger, getLogger, resetLogger } from './utils/logger';
export type { TreeLogger, TreeLogLevel, LoggerSetupOptions } from './utils/logger';
export type { DirTree, DirTreeOptions, EmptyEntry, FileInfoOptions, FileMetadata } from './types/dirTree';
