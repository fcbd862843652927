import * as fs from "fs";
import * as path from "path";
import { StagingConflictError, StagingStore, artifactFileName, parseArtifact } from "@/lib/storage/stagingStore";
import { stagedRecord } from "./helpers/records";
import { makeTempDir, quietConsole, removeDir } from "./helpers/stores";

let dir: string;
let stagingDir: string;
let store: StagingStore;

beforeEach(() => {
  quietConsole();
  dir = makeTempDir();
  stagingDir = path.join(dir, "staging");
  store = new StagingStore(stagingDir, path.join(stagingDir, "processed"));
});

afterEach(() => {
  jest.restoreAllMocks();
  removeDir(dir);
});

describe("StagingStore", () => {
  it("names artifacts by identity key and UTC capture time", () => {
    expect(artifactFileName(stagedRecord())).toBe("id_1001_ts_20250115_163000.json");
  });

  it("round-trips a staged record through its artifact", async () => {
    const record = stagedRecord();
    const location = await store.save(record);
    expect(location).toBe(path.join(stagingDir, "id_1001_ts_20250115_163000.json"));

    const doc = JSON.parse(fs.readFileSync(location, "utf-8"));
    expect(doc.format).toBe("staged-record");
    expect(doc.identity_key).toBe(1001);
    expect(doc.captured_at).toBe("2025-01-15T16:30:00.000Z");
    expect(doc.confirmed_fields).toEqual([]);

    const artifact = await store.find(1001);
    expect(artifact).not.toBeNull();
    if (!artifact) return;
    expect(artifact.record).toEqual(record);
    expect(artifact.revision).toBe(0);
    expect(artifact.location).toBe(location);
  });

  it("supersedes an earlier artifact for the same key", async () => {
    await store.save(stagedRecord());
    const later = await store.save(stagedRecord({ capturedAt: "2025-01-15T17:00:00.000Z" }));

    expect(fs.readdirSync(stagingDir).filter((n) => n.endsWith(".json"))).toEqual(["id_1001_ts_20250115_170000.json"]);
    expect((await store.find(1001))?.location).toBe(later);
    expect(console.log).toHaveBeenCalledWith("[staging] Superseded id_1001_ts_20250115_163000.json for 1001");
  });

  it("rejects a second artifact when asked to", async () => {
    await store.save(stagedRecord());
    await expect(store.save(stagedRecord({ capturedAt: "2025-01-16T00:00:00.000Z" }), "reject")).rejects.toBeInstanceOf(
      StagingConflictError
    );
    expect((await store.list()).map((a) => a.record.capture.capturedAt)).toEqual(["2025-01-15T16:30:00.000Z"]);
  });

  it("keeps artifacts for different keys apart", async () => {
    await store.save(stagedRecord());
    await store.save(stagedRecord({ id: 1002, fields: { id_incidence: { kind: "integer", value: 1002 } } }));
    fs.writeFileSync(path.join(stagingDir, "notes.txt"), "ignore me");

    expect((await store.list()).map((a) => a.record.id)).toEqual([1001, 1002]);
  });

  it("bumps the revision when review progress is saved", async () => {
    await store.save(stagedRecord());
    const artifact = await store.find(1001);
    if (!artifact) throw new Error("artifact missing");

    const updated = await store.update(artifact, ["facility_name"]);
    expect(updated.revision).toBe(1);

    const reread = await store.find(1001);
    expect(reread?.confirmedFields).toEqual(["facility_name"]);
    expect(reread?.revision).toBe(1);
  });

  it("moves processed artifacts out of the pending area", async () => {
    await store.save(stagedRecord());
    const artifact = await store.find(1001);
    if (!artifact) throw new Error("artifact missing");

    const target = await store.markProcessed(artifact);
    expect(target).toBe(path.join(stagingDir, "processed", "id_1001_ts_20250115_163000.json"));
    expect(fs.existsSync(target)).toBe(true);
    expect(await store.find(1001)).toBeNull();
    expect(await store.list()).toEqual([]);
  });

  it("returns nothing for an empty or missing directory", async () => {
    expect(await store.find(1001)).toBeNull();
    expect(await store.list()).toEqual([]);
  });

  it("refuses documents that are not staged records", () => {
    expect(() => parseArtifact({ format: "other" }, "/tmp/x.json")).toThrow("/tmp/x.json is not a staged-record artifact");
  });
});
