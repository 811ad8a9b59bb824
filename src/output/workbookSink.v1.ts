// src/output/workbookSink.v1.ts
// TableV1 -> .xlsx workbook, one sheet per table.

import fs from "node:fs";
import path from "node:path";
import * as XLSX from "xlsx";

import type { TableV1 } from "../leaderboard/tables.v1";

/** Sheet names are capped at 31 chars and may not contain []:*?/\ */
export function sheetName(name: string): string {
  const cleaned = name.replace(/[[\]:*?/\\]/g, "_").trim();
  return (cleaned || "Sheet").slice(0, 31);
}

export function buildWorkbook(sheets: ReadonlyArray<{ name: string; table: TableV1 }>): XLSX.WorkBook {
  const wb = XLSX.utils.book_new();
  for (const { name, table } of sheets) {
    const ws = XLSX.utils.aoa_to_sheet([table.header, ...table.rows]);
    XLSX.utils.book_append_sheet(wb, ws, sheetName(name));
  }
  return wb;
}

export function writeWorkbook(absPath: string, sheets: ReadonlyArray<{ name: string; table: TableV1 }>): string {
  const buf: Buffer = XLSX.write(buildWorkbook(sheets), { type: "buffer", bookType: "xlsx" });
  fs.mkdirSync(path.dirname(absPath), { recursive: true });
  fs.writeFileSync(absPath, buf);
  return absPath;
}
