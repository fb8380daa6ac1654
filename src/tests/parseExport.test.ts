import { describe, expect, it } from "vitest";
import { FieldDecodeError, HeaderValidationError, MissingHeaderError, RowShapeError } from "../errors.js";
import { choiceField, integerField, multiChoiceField, numberField, timestampField } from "../fields.js";
import { parseExport } from "../parseExport.js";
import { summarizeField } from "../summary.js";
import { ENGINE_VERSION } from "../types.js";

const HEADER = ["#", "Age", "Start Date (UTC)", "Submit Date (UTC)", "Network ID"];
const TAIL_CELLS = ["2021-01-01 10:00:00", "2021-01-01 10:05:00", "net-1"];

describe("parseExport", () => {
  it("decodes a minimal export into typed columns", () => {
    const result = parseExport([integerField("Age")], [HEADER, ["1", "29", ...TAIL_CELLS]], { env: {} });

    expect(result.table.columns()).toEqual({
      ID: ["1"],
      Age: [29],
      "Start Date": [new Date("2021-01-01T10:00:00Z")],
      "End Date": [new Date("2021-01-01T10:05:00Z")],
      "Network ID": ["net-1"],
    });
    expect([...summarizeField(result.table, "Age").stats]).toEqual([
      ["Count", "1"],
      ["Min", "29"],
      ["Mean", "29.0"],
      ["Max", "29"],
    ]);
    expect(result.meta).toEqual({ totalRows: 1, headerWidth: 5, fieldCount: 5, engineVersion: ENGINE_VERSION });
    expect(result.diagnostics).toEqual([]);
  });

  it("accepts any iterable of rows", () => {
    function* rows() {
      yield HEADER;
      yield ["1", "29", ...TAIL_CELLS];
      yield ["2", "31", ...TAIL_CELLS];
    }
    expect(parseExport([integerField("Age")], rows(), { env: {} }).table.column("Age")).toEqual([29, 31]);
  });

  it("returns no table when an integer cell is malformed", () => {
    const rows = [HEADER, ["1", "29", ...TAIL_CELLS], ["2", "twenty", ...TAIL_CELLS]];
    expect(() => parseExport([integerField("Age")], rows, { env: {} })).toThrow(FieldDecodeError);
  });

  it("returns no table when a timestamp cell is malformed", () => {
    const rows = [HEADER, ["1", "29", "yesterday", "2021-01-01 10:05:00", "net-1"]];
    expect(() => parseExport([integerField("Age")], rows, { env: {} })).toThrow('row 2, field "Start Date"');
  });

  it("returns no table when a choice cell holds an unknown label", () => {
    const plan = choiceField("Plan", { basic: "Basic", pro: "Pro" });
    const header = ["#", "Plan", "Start Date (UTC)", "Submit Date (UTC)", "Network ID"];
    const rows = [header, ["1", "Pro", ...TAIL_CELLS], ["2", "Gold", ...TAIL_CELLS]];
    let caught: unknown;
    try {
      parseExport([plan], rows, { env: {} });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(FieldDecodeError);
    if (!(caught instanceof FieldDecodeError)) return;
    expect(caught.code).toBe("E_CHOICE_UNKNOWN");
    expect(caught.row).toBe(3);
    expect(caught.field).toBe("Plan");
    expect(caught.message).toBe('row 3, field "Plan": unknown option "Gold"');
  });

  it("returns no table when an integer is too large to hold exactly", () => {
    const rows = [HEADER, ["1", "9007199254740993", ...TAIL_CELLS]];
    expect(() => parseExport([integerField("Age")], rows, { env: {} })).toThrow(
      'row 2, field "Age": integer out of range: "9007199254740993"'
    );
  });

  it("keeps going past a malformed lenient number", () => {
    const header = ["#", "Years", "Start Date (UTC)", "Submit Date (UTC)", "Network ID"];
    const rows = [header, ["1", "n/a", ...TAIL_CELLS], ["2", "about 12 years", ...TAIL_CELLS]];
    const result = parseExport([numberField("Years")], rows, { env: {} });
    expect(result.table.column("Years")).toEqual([null, 12]);
    expect(result.diagnostics).toEqual([
      { row: 2, field: "Years", code: "E_NUM", message: 'no number found in "n/a"', level: "warn" },
    ]);
    expect(result.meta.totalRows).toBe(2);
  });

  it("summarizes a multi-choice question end to end", () => {
    const colors = multiChoiceField("Favourite colours", { Red: "Red", Blue: "Blue" }, "Colors");
    const header = ["#", "Red", "Blue", "Start Date (UTC)", "Submit Date (UTC)", "Network ID"];
    const rows = [header, ["1", "Red", "", ...TAIL_CELLS], ["2", "", "Blue", ...TAIL_CELLS]];
    const { table } = parseExport([colors], rows, { env: {} });
    expect(table.column("Colors")[0]).toEqual({ Red: true, Blue: false });
    expect(Object.fromEntries(summarizeField(table, "Colors").stats)).toEqual({ Count: "2", Red: "1", Blue: "1" });
  });

  it("fails before any row when the header does not match", () => {
    const rows = [["#", "Height", "Start Date (UTC)", "Submit Date (UTC)", "Network ID"], ["1", "not even read"]];
    expect(() => parseExport([integerField("Age")], rows)).toThrow(HeaderValidationError);
  });

  it("fails on a short data row", () => {
    expect(() => parseExport([integerField("Age")], [HEADER, ["1", "29"]], { env: {} })).toThrow(RowShapeError);
  });

  it("fails on an empty export", () => {
    expect(() => parseExport([timestampField("At")], [])).toThrow(MissingHeaderError);
  });
});
