import * as fs from 'fs';
import * as path from 'path';
import { DateTime } from 'luxon';
import { calculateFileHash } from '../ingestion/deduplication';
import { isNotFound, writeFileAtomic } from './fsStore';

/** Durable storage for raw uploaded bytes */
export interface BlobStore {
  save(filename: string, bytes: Buffer): Promise<string>;
  read(location: string): Promise<Buffer>;
  delete(location: string): Promise<void>;
}

/** Strip directories and anything outside a conservative filename alphabet */
export function safeFilename(filename: string): string {
  const base = path.basename(filename.replace(/\\/g, '/'));
  const cleaned = base.replace(/[^A-Za-z0-9._-]+/g, '_').replace(/^[._]+/, '');
  return cleaned.length > 0 ? cleaned : 'upload';
}

export class FsBlobStore implements BlobStore {
  constructor(
    private readonly dir: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  /** `{yyyyMMdd_HHmmssSSS}_{sha256 prefix}_{name}`; only identical bytes share a path */
  async save(filename: string, bytes: Buffer): Promise<string> {
    const stamp = DateTime.fromJSDate(this.now(), { zone: 'utc' }).toFormat('yyyyMMdd_HHmmssSSS');
    const digest = calculateFileHash(bytes).slice(0, 8);
    const filePath = path.join(this.dir, `${stamp}_${digest}_${safeFilename(filename)}`);
    return writeFileAtomic(filePath, bytes);
  }

  async read(location: string): Promise<Buffer> {
    return fs.promises.readFile(location);
  }

  async delete(location: string): Promise<void> {
    try {
      await fs.promises.unlink(location);
    } catch (error) {
      if (!isNotFound(error)) throw error;
    }
  }
}
