import { SchemaCatalog } from "@/lib/schema/catalog";
import { extractTab } from "@/lib/ingestion/extractor";
import { fromXlsxWorkbook } from "@/lib/ingestion/workbook";
import { SchemaVersion } from "@/lib/types/ingest";
import { Cell, buildWorkbook, excelSerial } from "./helpers/workbooks";

const LA = "America/Los_Angeles";

function formSchema(): SchemaVersion {
  const loaded = SchemaCatalog.load([
    {
      name: "form_v1",
      fields: {
        id_incidence: { value_address: "$C$2", value_type: "integer", label_address: "$B$2", label: "Incidence ID" },
        facility_name: { value_address: "$C$3", value_type: "string", label_address: "$B$3", label: "Facility Name" },
        lat_and_long: { value_address: "$C$4", value_type: "string" },
        observation_timestamp: { value_address: "$C$5", value_type: "datetime" },
        emission_type_fk: { value_address: "$C$6", value_type: "string", is_drop_down: true },
        initial_leak_concentration: { value_address: "$C$7", value_type: "float" },
      },
    },
  ]);
  if (!loaded.ok) throw new Error(loaded.message);
  const resolved = loaded.value.resolve("form_v1");
  if (!resolved.ok) throw new Error(resolved.message);
  return resolved.value.schema;
}

const baseCells: Record<string, Cell> = {
  B2: "Incidence ID",
  C2: 1001,
  B3: "Facility",
  C3: "Acme Landfill",
  C4: "34.05,-118.25",
  C5: { t: "n", v: excelSerial(2025, 1, 15, 8, 30), z: "yyyy-mm-dd hh:mm" },
  C6: "Please Select",
  C7: "n/a",
};

function view(cells: Record<string, Cell>) {
  return fromXlsxWorkbook(buildWorkbook({ tabs: { Form: cells } }));
}

describe("extractTab", () => {
  const schema = formSchema();

  it("extracts typed fields in declaration order with diagnostics", () => {
    const result = extractTab(view(baseCells), "Form", schema, { referenceZone: LA });
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    const tab = result.value;
    expect(tab.tabName).toBe("Form");
    expect(tab.schemaId).toBe("form_v1");
    expect(Object.keys(tab.fields)).toEqual([
      "id_incidence",
      "facility_name",
      "lat_arb",
      "long_arb",
      "observation_timestamp",
      "emission_type_fk",
      "initial_leak_concentration",
    ]);
    expect(tab.fields.id_incidence).toEqual({ kind: "integer", value: 1001 });
    expect(tab.fields.lat_arb).toEqual({ kind: "float", value: 34.05 });
    expect(tab.fields.observation_timestamp).toEqual({ kind: "datetime", value: "2025-01-15T08:30:00" });
    expect(tab.fields.emission_type_fk).toEqual({ kind: "string", value: "Please Select" });
    expect(tab.fields.initial_leak_concentration).toEqual({ kind: "absent" });

    expect(tab.diagnostics.map((d) => d.code)).toEqual(["label_mismatch", "drop_down_placeholder", "coerced_to_absent"]);
    expect(tab.diagnostics[0]).toEqual({
      severity: "warning",
      code: "label_mismatch",
      message: 'Expected label "Facility Name" but found "Facility"',
      tab: "Form",
      field: "facility_name",
      address: "$B$3",
    });
    expect(tab.diagnostics[2]).toMatchObject({ field: "initial_leak_concentration", address: "$C$7" });
  });

  it("is deterministic for the same workbook", () => {
    const workbook = view(baseCells);
    expect(extractTab(workbook, "Form", schema, { referenceZone: LA })).toEqual(
      extractTab(workbook, "Form", schema, { referenceZone: LA })
    );
  });

  it("treats missing cells as absent without diagnostics", () => {
    const result = extractTab(view({ B2: "Incidence ID", B3: "Facility Name" }), "Form", schema, { referenceZone: LA });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.fields.id_incidence).toEqual({ kind: "absent" });
    expect(result.value.fields.lat_arb).toBeUndefined();
    expect(result.value.diagnostics).toEqual([]);
  });

  it("drops wall times skipped by a DST transition", () => {
    const cells = { ...baseCells, C5: "2025-03-09 02:30" };
    const result = extractTab(view(cells), "Form", schema, { referenceZone: LA });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.fields.observation_timestamp).toEqual({ kind: "absent" });
    const dropped = result.value.diagnostics.find((d) => d.code === "datetime_dropped");
    expect(dropped).toMatchObject({ severity: "warning", field: "observation_timestamp", address: "$C$5" });
    expect(dropped?.message).toContain("nonexistent");
  });

  it("fails the tab on a malformed compound value", () => {
    const result = extractTab(view({ ...baseCells, C4: "34.05" }), "Form", schema, { referenceZone: LA });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.kind).toBe("compound_field_invalid");
    expect(result.message.startsWith('Tab "Form": ')).toBe(true);
  });

  it("honours a custom drop-down placeholder", () => {
    const result = extractTab(view({ ...baseCells, C6: "-- choose --" }), "Form", schema, {
      referenceZone: LA,
      dropDownPlaceholder: "-- choose --",
    });
    expect(result.ok && result.value.diagnostics.some((d) => d.code === "drop_down_placeholder")).toBe(true);
  });
});
