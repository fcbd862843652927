import * as fs from "fs";
import * as path from "path";
import { FsRecordStore, RecordStoreError, storeFailure } from "@/lib/storage/recordStore";
import { FsBlobStore, safeFilename } from "@/lib/storage/blobStore";
import { isNotFound } from "@/lib/storage/fsStore";
import { makeTempDir, removeDir } from "./helpers/stores";

let dir: string;

beforeEach(() => {
  dir = makeTempDir();
});

afterEach(() => removeDir(dir));

describe("FsRecordStore", () => {
  it("merges upserts into one document per key", async () => {
    const store = new FsRecordStore(dir);
    expect(await store.get(5)).toBeNull();

    await store.upsert(5, { facility_name: "Acme", contact_name: null });
    await store.upsert(5, { contact_name: "Pat Lee" });

    expect(await store.get(5)).toEqual({ facility_name: "Acme", contact_name: "Pat Lee" });
    expect(JSON.parse(fs.readFileSync(path.join(dir, "5.json"), "utf-8"))).toEqual({
      id: 5,
      fields: { facility_name: "Acme", contact_name: "Pat Lee" },
    });
  });

  it("rejects ids that are not positive integers", async () => {
    const store = new FsRecordStore(dir);
    await expect(store.upsert(0, { a: "x" })).rejects.toMatchObject({ kind: "validation" });
  });

  it("reports a corrupt document as an integrity failure", async () => {
    fs.writeFileSync(path.join(dir, "6.json"), JSON.stringify({ id: 7, fields: {} }));
    await expect(new FsRecordStore(dir).get(6)).rejects.toMatchObject({ kind: "integrity" });
  });
});

describe("isNotFound", () => {
  it("matches ENOENT by shape, whatever realm the error comes from", () => {
    expect(isNotFound({ code: "ENOENT", message: "no such file" })).toBe(true);
    expect(isNotFound(Object.assign(new Error("gone"), { code: "ENOENT" }))).toBe(true);
    expect(isNotFound({ code: "EACCES" })).toBe(false);
    expect(isNotFound(null)).toBe(false);
    expect(isNotFound("ENOENT")).toBe(false);
  });

  it("treats a missing record file as no record", async () => {
    expect(await new FsRecordStore(path.join(dir, "not-created-yet")).get(1)).toBeNull();
  });
});

describe("storeFailure", () => {
  it("maps store error kinds to outcome kinds", () => {
    expect(storeFailure(new RecordStoreError("validation", "bad"), "Writing record 1")).toEqual({
      ok: false,
      kind: "validation_error",
      message: "Writing record 1 rejected: bad",
    });
    expect(storeFailure(new RecordStoreError("integrity", "locked"), "Writing record 1").kind).toBe("database_error");
    expect(storeFailure(new Error("socket closed"), "Reading record 1").kind).toBe("database_error");
  });
});

describe("FsBlobStore", () => {
  it("saves uploads under a timestamped safe name", async () => {
    const blobs = new FsBlobStore(dir, () => new Date("2025-01-15T16:30:00Z"));
    const location = await blobs.save("../reports/Q1 feedback.xlsx", Buffer.from("bytes"));

    expect(location).toBe(path.join(dir, "20250115_163000000_277089d9_Q1_feedback.xlsx"));
    expect((await blobs.read(location)).toString()).toBe("bytes");
    await blobs.delete(location);
    await blobs.delete(location);
    expect(fs.existsSync(location)).toBe(false);
  });

  it("keeps same-named uploads in the same instant apart", async () => {
    const blobs = new FsBlobStore(dir, () => new Date("2025-01-15T16:30:00Z"));
    const first = await blobs.save("feedback.xlsx", Buffer.from("first upload"));
    const second = await blobs.save("feedback.xlsx", Buffer.from("second upload"));

    expect(first).toBe(path.join(dir, "20250115_163000000_34d9215f_feedback.xlsx"));
    expect(second).toBe(path.join(dir, "20250115_163000000_89f5a9e5_feedback.xlsx"));
    expect((await blobs.read(first)).toString()).toBe("first upload");
  });

  it("strips paths and unsafe characters", () => {
    expect(safeFilename("C:\\temp\\report.xlsx")).toBe("report.xlsx");
    expect(safeFilename("..")).toBe("upload");
    expect(safeFilename(".hidden file")).toBe("hidden_file");
  });
});
