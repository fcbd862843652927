import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { BlobStore } from "@/lib/storage/blobStore";
import { RecordStore, RecordStoreError, RecordStoreErrorKind } from "@/lib/storage/recordStore";
import { StoredRecord } from "@/lib/types/ingest";

/** Record store kept in a Map, counting every call */
export class MemoryRecordStore implements RecordStore {
  readonly records = new Map<number, StoredRecord>();
  gets = 0;
  readonly upserts: Array<{ id: number; fields: StoredRecord }> = [];
  failNext: { op: "get" | "upsert"; kind: RecordStoreErrorKind } | null = null;

  constructor(initial: Record<number, StoredRecord> = {}) {
    for (const [id, record] of Object.entries(initial)) {
      this.records.set(Number(id), { ...record });
    }
  }

  private maybeFail(op: "get" | "upsert") {
    if (this.failNext && this.failNext.op === op) {
      const { kind } = this.failNext;
      this.failNext = null;
      throw new RecordStoreError(kind, `injected ${kind} failure on ${op}`);
    }
  }

  async get(id: number): Promise<StoredRecord | null> {
    this.gets++;
    this.maybeFail("get");
    const record = this.records.get(id);
    return record ? { ...record } : null;
  }

  async upsert(id: number, fields: StoredRecord): Promise<void> {
    this.maybeFail("upsert");
    this.upserts.push({ id, fields: { ...fields } });
    this.records.set(id, { ...(this.records.get(id) ?? {}), ...fields });
  }
}

export class MemoryBlobStore implements BlobStore {
  readonly blobs = new Map<string, Buffer>();
  failSave = false;

  async save(filename: string, bytes: Buffer): Promise<string> {
    if (this.failSave) throw new Error("disk full");
    const location = `mem://${this.blobs.size + 1}/${filename}`;
    this.blobs.set(location, bytes);
    return location;
  }

  async read(location: string): Promise<Buffer> {
    const bytes = this.blobs.get(location);
    if (!bytes) throw new Error(`no blob at ${location}`);
    return bytes;
  }

  async delete(location: string): Promise<void> {
    this.blobs.delete(location);
  }
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "sheet-staging-"));
}

export function removeDir(dir: string) {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Silence console output from the code under test */
export function quietConsole() {
  jest.spyOn(console, "log").mockImplementation(() => {});
  jest.spyOn(console, "warn").mockImplementation(() => {});
  jest.spyOn(console, "error").mockImplementation(() => {});
}
