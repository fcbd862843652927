import { coerceCell } from "@/lib/ingestion/coerce";
import { RawCell } from "@/lib/types/ingest";

const str = (value: string): RawCell => ({ type: "string", value });
const num = (value: number): RawCell => ({ type: "number", value });

describe("coerceCell", () => {
  it("treats empty cells and blank text as absent without a note", () => {
    expect(coerceCell({ type: "empty" }, "integer")).toEqual({ value: { kind: "absent" } });
    expect(coerceCell(str("   "), "string")).toEqual({ value: { kind: "absent" } });
  });

  it("keeps values that already match", () => {
    expect(coerceCell(num(42), "integer")).toEqual({ value: { kind: "integer", value: 42 } });
    expect(coerceCell(num(12.5), "float")).toEqual({ value: { kind: "float", value: 12.5 } });
    expect(coerceCell(str(" Acme "), "string")).toEqual({ value: { kind: "string", value: " Acme " } });
    expect(coerceCell({ type: "boolean", value: false }, "boolean")).toEqual({ value: { kind: "boolean", value: false } });
    expect(coerceCell({ type: "datetime", value: "2025-01-15T08:30:00" }, "datetime")).toEqual({
      value: { kind: "datetime", value: "2025-01-15T08:30:00" },
    });
  });

  it("applies safe conversions with an info note", () => {
    const cases: Array<[RawCell, Parameters<typeof coerceCell>[1], unknown]> = [
      [str("42"), "integer", { kind: "integer", value: 42 }],
      [str("12.0"), "integer", { kind: "integer", value: 12 }],
      [str("1e3"), "float", { kind: "float", value: 1000 }],
      [str("Yes"), "boolean", { kind: "boolean", value: true }],
      [str("no"), "boolean", { kind: "boolean", value: false }],
      [num(1), "boolean", { kind: "boolean", value: true }],
      [num(34.05), "string", { kind: "string", value: "34.05" }],
      [str("1/15/2025 8:30 AM"), "datetime", { kind: "datetime", value: "2025-01-15T08:30:00" }],
    ];
    for (const [raw, type, expected] of cases) {
      const result = coerceCell(raw, type);
      expect(result.value).toEqual(expected);
      expect(result.note?.severity).toBe("info");
      expect(result.note?.code).toBe("value_coerced");
    }
  });

  it("drops unsafe conversions with a warning and never guesses", () => {
    const cases: Array<[RawCell, Parameters<typeof coerceCell>[1]]> = [
      [num(42.5), "integer"],
      [str("forty"), "integer"],
      [str("12.5"), "integer"],
      [str("n/a"), "float"],
      [str("maybe"), "boolean"],
      [num(2), "boolean"],
      [num(45672), "datetime"],
      [{ type: "boolean", value: true }, "integer"],
      [{ type: "error", value: "#DIV/0!" }, "float"],
      [str("sometime"), "datetime"],
    ];
    for (const [raw, type] of cases) {
      const result = coerceCell(raw, type);
      expect(result.value).toEqual({ kind: "absent" });
      expect(result.note).toMatchObject({ severity: "warning", code: "coerced_to_absent" });
    }
  });

  it("drops datetimes that carry their own offset", () => {
    const result = coerceCell(str("2025-01-15T08:30:00+02:00"), "datetime");
    expect(result.value).toEqual({ kind: "absent" });
    expect(result.note).toMatchObject({ severity: "warning", code: "datetime_dropped" });
  });
});
