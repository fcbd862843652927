import { z } from 'zod';
import { appendJsonArray, readJsonArray } from './fsStore';

export type UploadStatus = 'saved' | 'staged' | 'committed' | 'failed';

export interface UploadLogEntry {
  location: string;
  originalFilename: string;
  status: UploadStatus;
  description: string;
  loggedAt: string;
  fileHash?: string;
  id?: number;
}

const entrySchema = z.object({
  location: z.string(),
  originalFilename: z.string(),
  status: z.enum(['saved', 'staged', 'committed', 'failed']),
  description: z.string(),
  loggedAt: z.string(),
  fileHash: z.string().optional(),
  id: z.number().int().optional(),
});

/** Append-only JSON log of every upload that reached durable storage */
export class UploadLog {
  constructor(
    private readonly file: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  async record(entry: Omit<UploadLogEntry, 'loggedAt'>): Promise<UploadLogEntry> {
    const logged: UploadLogEntry = { ...entry, loggedAt: this.now().toISOString() };
    await appendJsonArray(this.file, [logged]);
    return logged;
  }

  async entries(): Promise<UploadLogEntry[]> {
    const raw = await readJsonArray(this.file);
    return raw.flatMap(item => {
      const parsed = entrySchema.safeParse(item);
      return parsed.success ? [parsed.data] : [];
    });
  }

  /** Earlier uploads with identical bytes */
  async findByHash(fileHash: string): Promise<UploadLogEntry[]> {
    return (await this.entries()).filter(e => e.fileHash === fileHash);
  }
}
