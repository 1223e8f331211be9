import fs from 'fs/promises';
import path from 'path';
import type { DirTree } from '../types/dirTree';

export const DEFAULT_INDENT = 4;

export const dirTreeToJson = (tree: DirTree, indent: number = DEFAULT_INDENT): string =>
  JSON.stringify(tree, null, indent);

export const writeDirTree = async (
  tree: DirTree,
  outputPath: string,
  indent: number = DEFAULT_INDENT,
): Promise<{ filePath: string; bytes: number }> => {
  const filePath = path.resolve(outputPath);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const payload = `${dirTreeToJson(tree, indent)}\n`;
  await fs.writeFile(filePath, payload, 'utf8');
  return { filePath, bytes: Buffer.byteLength(payload, 'utf8') };
};
