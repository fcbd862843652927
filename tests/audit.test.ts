import * as path from "path";
import { buildImportAudit } from "@/lib/audit/importAudit";
import { ChangeLog, describeChanges } from "@/lib/audit/changeLog";
import { SchemaCatalog } from "@/lib/schema/catalog";
import { NormalizedPayload } from "@/lib/types/ingest";
import { makeTempDir, removeDir } from "./helpers/stores";

const AT = new Date("2025-01-15T16:30:00Z");

describe("buildImportAudit", () => {
  const loaded = SchemaCatalog.load([
    {
      name: "form_v1",
      fields: {
        facility_name: { value_address: "$C$3", value_type: "string", label_address: "$B$3", label: "Name" },
        id_incidence: { value_address: "$C$2", value_type: "integer" },
      },
    },
  ]);
  if (!loaded.ok) throw new Error(loaded.message);
  const catalog = loaded.value;

  const payload: NormalizedPayload = {
    metadata: { sector: "Landfill" },
    schemas: { Form: "form_v1" },
    tabs: [
      {
        tabName: "Form",
        schemaId: "form_v1",
        fields: { facility_name: { kind: "string", value: "Acme" }, id_incidence: { kind: "absent" } },
        diagnostics: [
          {
            severity: "warning",
            code: "label_mismatch",
            message: 'Expected label "Name" but found "Site"',
            tab: "Form",
            field: "facility_name",
            address: "$B$3",
          },
        ],
      },
    ],
    diagnostics: [{ severity: "warning", code: "tab_skipped", message: "worksheet not found", tab: "Other" }],
  };

  it("reports every field in worksheet order", () => {
    const report = buildImportAudit({ filename: "f.xlsx", payload, catalog, startedAt: AT, context: "weekly batch" });
    expect(report.split("\n")).toEqual([
      "Import of file named f.xlsx began at 2025-01-15 16:30:00 UTC.",
      "Context: weekly batch",
      "",
      "Schema manifest:",
      "{",
      '  "Form": "form_v1"',
      "}",
      "Workbook metadata:",
      "{",
      '  "sector": "Landfill"',
      "}",
      "",
      '=== Tab "Form" (schema form_v1) ===',
      "  field         id_incidence",
      "    address       $C$2",
      "    type          integer",
      "    value         <absent>",
      "  field         facility_name",
      "    address       $C$3",
      "    label         Name",
      "    type          string",
      '    value         "Acme" (string)',
      '    note          warning: Expected label "Name" but found "Site"',
      "",
      "Workbook notes:",
      "  warning: [Other] worksheet not found",
      "",
    ]);
  });
});

describe("change log", () => {
  it("skips unchanged values and null to empty text", () => {
    const entries = describeChanges(
      7,
      { a: "x", b: null, c: 1 },
      { a: "x", b: "", c: 2, d: true },
      { user: "pat", comments: "fixed units" },
      AT
    );
    expect(entries).toEqual([
      { id: 7, field: "c", oldValue: 1, newValue: 2, user: "pat", comments: "fixed units", timestamp: "2025-01-15T16:30:00.000Z" },
      { id: 7, field: "d", oldValue: null, newValue: true, user: "pat", comments: "fixed units", timestamp: "2025-01-15T16:30:00.000Z" },
    ]);
  });

  it("appends entries and filters them by key", async () => {
    const dir = makeTempDir();
    try {
      const log = new ChangeLog(path.join(dir, "audit", "changes.json"), () => AT);
      await log.append(1, null, { a: "x" });
      await log.append(2, { a: "x" }, { a: "x" });
      await log.append(2, { a: "x" }, { a: "y" });

      expect((await log.entries()).map((e) => [e.id, e.field, e.newValue, e.user])).toEqual([
        [1, "a", "x", "anonymous"],
        [2, "a", "y", "anonymous"],
      ]);
      expect(await log.entries(2)).toHaveLength(1);
    } finally {
      removeDir(dir);
    }
  });
});
