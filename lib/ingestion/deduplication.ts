/**
 * File hash and re-upload detection
 */

import * as crypto from 'crypto';
import { UploadLog, UploadLogEntry } from '../storage/uploadLog';

/**
 * Calculate SHA-256 hash of file buffer
 */
export function calculateFileHash(buffer: Buffer): string {
  return crypto.createHash('sha256').update(buffer).digest('hex');
}

/**
 * Earlier uploads of the same bytes. Re-uploading is allowed (it is how a
 * reviewed record converges), so this only informs.
 */
export async function findPriorUploads(log: UploadLog, fileHash: string): Promise<UploadLogEntry[]> {
  const prior = await log.findByHash(fileHash);
  if (prior.length > 0) {
    const last = prior[prior.length - 1];
    console.log(`[ingest] Identical file uploaded ${prior.length} time(s) before, last as ${last.originalFilename} at ${last.loggedAt}`);
  }
  return prior;
}
