import fs from 'fs/promises';
import mime from 'mime-types';
import { InvalidArgumentError } from '../common/errors';
import { describeError, hasErrorCode } from '../common/fsErrors';
import { humanReadableSize, humanReadableTime } from '../common/humanReadable';
import type { EmptyEntry, FileInfoOptions, FileMetadata } from '../types/dirTree';
import { getLogger, type TreeLogger } from '../utils/logger';

export interface GetFileInfoOptions extends FileInfoOptions {
  logger?: TreeLogger;
}

const defaultLogger = getLogger('file-info');

/**
 * Reads size and modification time for a single file.
 *
 * A file that vanished or cannot be stat'ed yields `{}` and a warning instead
 * of an exception, so one bad entry never aborts a tree walk.
 */
export const getFileInfo = async (
  filePath: string,
  { humanReadable = false, includeMimeType = false, logger = defaultLogger }: GetFileInfoOptions = {},
): Promise<FileMetadata | EmptyEntry> => {
  if (typeof filePath !== 'string' || filePath.length === 0) {
    throw new InvalidArgumentError(`'path' must be a non-empty string, got ${JSON.stringify(filePath)}`);
  }

  try {
    const stats = await fs.stat(filePath);
    const modifiedSeconds = stats.mtimeMs / 1000;
    const info: FileMetadata = {
      size: humanReadable ? humanReadableSize(stats.size) : stats.size,
      modified_time: humanReadable ? humanReadableTime(modifiedSeconds) : modifiedSeconds,
    };
    if (includeMimeType) {
      info.mime_type = mime.lookup(filePath) || null;
    }
    return info;
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT', 'ENOTDIR')) {
      logger.warn(`File does not exist: ${filePath}`);
    } else {
      logger.warn(`Cannot access file info for: ${filePath} (${describeError(error)})`);
    }
    return {};
  }
};
