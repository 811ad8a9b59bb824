import { describe, expect, it } from "vitest";
import * as XLSX from "xlsx";

import { buildWorkbook, sheetName } from "./workbookSink.v1";

const table = { kind: "MATCH" as const, header: ["Username", "Points"], rows: [["amy", "1.0"], ["o,brien", "0.0"]] };

describe("workbookSink", () => {
  it("cleans sheet names", () => {
    expect(sheetName("Week 1/2 [draft]")).toBe("Week 1_2 _draft_");
    expect(sheetName("a".repeat(40))).toBe("a".repeat(31));
    expect(sheetName("  ")).toBe("Sheet");
  });

  it("puts the header and rows on the sheet", () => {
    const wb = buildWorkbook([{ name: "Weekly winner", table }]);
    const rows = XLSX.utils.sheet_to_json<string[]>(wb.Sheets["Weekly winner"], { header: 1 });
    expect(rows).toEqual([["Username", "Points"], ["amy", "1.0"], ["o,brien", "0.0"]]);
  });
});
