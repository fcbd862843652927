import * as fs from 'fs';
import * as path from 'path';

/**
 * Atomic write: write to a temp file beside the target, then rename over it
 */
export async function writeFileAtomic(filePath: string, data: string | Buffer): Promise<string> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.tmp`;
  await fs.promises.writeFile(tempPath, data);
  await fs.promises.rename(tempPath, filePath);

  return filePath;
}

export async function writeJsonAtomic(filePath: string, payload: unknown): Promise<string> {
  return writeFileAtomic(filePath, JSON.stringify(payload, null, 2));
}

/** Read a JSON file, or null when it does not exist */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) return null;
    throw error;
  }
  return JSON.parse(content);
}

/**
 * Load a JSON array log. A missing file is an empty log; a file that is not
 * an array is an error rather than silently replaced.
 */
export async function readJsonArray(filePath: string): Promise<unknown[]> {
  const parsed = await readJsonFile(filePath);
  if (parsed === null) return [];
  if (!Array.isArray(parsed)) {
    throw new Error(`${filePath} does not hold a JSON array`);
  }
  return parsed;
}

/** Append entries to a JSON array log and rewrite it atomically */
export async function appendJsonArray<T>(filePath: string, entries: readonly T[]): Promise<string> {
  const existing = await readJsonArray(filePath);
  return writeJsonAtomic(filePath, [...existing, ...entries]);
}

// fs errors can come from another realm (Jest's VM), so match on shape
export function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
