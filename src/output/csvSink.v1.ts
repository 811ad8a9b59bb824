// src/output/csvSink.v1.ts
// TableV1 -> CSV text / file. Written with a UTF-8 BOM so spreadsheet apps pick the right encoding.

import fs from "node:fs";
import path from "node:path";
import { stringify } from "csv-stringify/sync";

import type { TableV1 } from "../leaderboard/tables.v1";

export function renderCsv(table: TableV1): string {
  return stringify([table.header, ...table.rows], { bom: true });
}

export function writeCsvTable(absPath: string, table: TableV1): string {
  fs.mkdirSync(path.dirname(absPath), { recursive: true });
  fs.writeFileSync(absPath, renderCsv(table), "utf8");
  return absPath;
}
