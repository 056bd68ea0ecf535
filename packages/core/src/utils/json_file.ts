import { promises as fs } from 'fs';
import * as path from 'path';
import { randomUUID } from 'node:crypto';

/**
 * Reads and parses a JSON file. Null when the file does not exist.
 * Any other read error and invalid JSON are thrown.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw error;
  }
  const data: unknown = JSON.parse(content);
  return data;
}

/**
 * Writes `content` through a temp file and rename, creating the parent
 * directory when missing. The temp name is unique per write, so concurrent
 * writers of one path never share or remove each other's temp file.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}-${randomUUID()}.tmp`;
  try {
    await fs.writeFile(tmpPath, content, 'utf-8');
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.rm(tmpPath, { force: true });
    throw error;
  }
}

/**
 * Writes `value` as indented JSON with writeFileAtomic.
 */
export async function writeJsonFile(filePath: string, value: unknown): Promise<void> {
  await writeFileAtomic(filePath, JSON.stringify(value, null, 2));
}
