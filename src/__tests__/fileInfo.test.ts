import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { InvalidArgumentError } from '../common/errors';
import { getFileInfo } from '../main/fileInfo';
import type { TreeLogger } from '../utils/logger';

const createLogger = () => ({
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
}) satisfies TreeLogger;

describe('getFileInfo', () => {
  let tempDir: string;
  let samplePath: string;
  const modified = new Date(2024, 5, 1, 9, 5, 0);

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'file-info-'));
    samplePath = path.join(tempDir, 'sample.txt');
    await fs.writeFile(samplePath, 'Hello world');
    await fs.utimes(samplePath, modified, modified);
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('returns the raw size and modification timestamp in seconds', async () => {
    const info = await getFileInfo(samplePath);

    expect(info).toEqual({
      size: 11,
      modified_time: modified.getTime() / 1000,
    });
  });

  it('formats size and time when human readable output is requested', async () => {
    const info = await getFileInfo(samplePath, { humanReadable: true });

    expect(info).toEqual({ size: '11 B', modified_time: '2024-06-01 09:05' });
  });

  it('adds the MIME type inferred from the extension', async () => {
    const unknownPath = path.join(tempDir, 'blob.zzunknown');
    await fs.writeFile(unknownPath, 'x');

    expect(await getFileInfo(samplePath, { includeMimeType: true })).toMatchObject({
      mime_type: 'text/plain',
    });
    expect(await getFileInfo(unknownPath, { includeMimeType: true })).toMatchObject({
      mime_type: null,
    });
  });

  it('warns and returns an empty entry when the file is missing', async () => {
    const logger = createLogger();
    const missing = path.join(tempDir, 'missing.txt');

    const info = await getFileInfo(missing, { logger });

    expect(info).toEqual({});
    expect(logger.warn).toHaveBeenCalledWith(`File does not exist: ${missing}`);
  });

  it('rejects an empty path', async () => {
    await expect(getFileInfo('')).rejects.toBeInstanceOf(InvalidArgumentError);
  });
});
