import { createReadStream } from "fs";
import { readFile } from "fs/promises";
import { basename, extname } from "path";
import { parse } from "csv-parse";
import * as XLSX from "xlsx";
import type { GroupData, InterviewRecord, Notice, RawRow } from "../types";
import { ValidationFailureError } from "./errors";
import { normalizeText } from "./text-normalizer";
import { debugLog } from "./debug";

export const REQUIRED_COLUMNS = ["question", "response", "respondent_id"] as const;
type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];

export interface ValidationReport {
  valid: boolean;
  problems: string[];
}

// Load rows from a CSV or Excel file
export async function loadRecordFile(path: string): Promise<RawRow[]> {
  const ext = extname(path).toLowerCase();

  if (ext === ".csv") {
    return loadCsv(path);
  }
  if (ext === ".xlsx" || ext === ".xls") {
    return loadWorkbook(path);
  }

  throw new ValidationFailureError([
    { group: basename(path), problems: [`unsupported file type "${ext || "none"}" (expected .csv, .xlsx or .xls)`] },
  ]);
}

async function loadCsv(path: string): Promise<RawRow[]> {
  const parser = createReadStream(path, "utf8").pipe(
    parse({
      columns: true,
      skip_empty_lines: true,
      bom: true,
    })
  );

  const rows: RawRow[] = [];
  for await (const row of parser) {
    rows.push(row);
  }
  debugLog(`Parsed ${rows.length} CSV rows from ${path}`);
  return rows;
}

async function loadWorkbook(path: string): Promise<RawRow[]> {
  const workbook = XLSX.read(await readFile(path), { type: "buffer" });
  const firstSheet = workbook.SheetNames[0];
  if (!firstSheet) return [];

  const rows = XLSX.utils.sheet_to_json<RawRow>(workbook.Sheets[firstSheet], { defval: "" });
  debugLog(`Parsed ${rows.length} rows from sheet "${firstSheet}" of ${path}`);
  return rows;
}

// "Respondent ID", "respondent-id" and "respondent_id" all name the same column
function normalizeHeader(header: string): string {
  return header.trim().toLowerCase().replace(/[\s-]+/g, "_");
}

function resolveColumns(rows: readonly RawRow[]): Partial<Record<RequiredColumn, string>> {
  const headers = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) headers.add(key);
  }

  const resolved: Partial<Record<RequiredColumn, string>> = {};
  for (const header of headers) {
    const normalized = normalizeHeader(header);
    const column = REQUIRED_COLUMNS.find(c => c === normalized);
    if (column && resolved[column] === undefined) {
      resolved[column] = header;
    }
  }
  return resolved;
}

export function validateRows(rows: readonly RawRow[]): ValidationReport {
  const problems: string[] = [];

  if (rows.length === 0) {
    return { valid: false, problems: ["no rows"] };
  }

  const columns = resolveColumns(rows);
  const missing = REQUIRED_COLUMNS.filter(c => columns[c] === undefined);
  if (missing.length > 0) {
    problems.push(`missing column(s): ${missing.join(", ")}`);
  } else {
    const complete = rows.some(row =>
      REQUIRED_COLUMNS.every(c => normalizeText(row[columns[c] ?? c]).length > 0)
    );
    if (!complete) {
      problems.push(`no row has ${REQUIRED_COLUMNS.join(", ")} all filled in`);
    }
  }

  return { valid: problems.length === 0, problems };
}

export function isValid(rows: readonly RawRow[]): boolean {
  return validateRows(rows).valid;
}

/**
 * Turn validated rows into frozen interview records. Rows without a
 * question or a response are dropped; a blank respondent id becomes
 * `<group>-<row number>`.
 */
export function preprocessRows(rows: readonly RawRow[], group: string): InterviewRecord[] {
  const columns = resolveColumns(rows);
  const questionKey = columns.question ?? "question";
  const responseKey = columns.response ?? "response";
  const respondentKey = columns.respondent_id ?? "respondent_id";

  const records: InterviewRecord[] = [];
  rows.forEach((row, index) => {
    const question = normalizeText(row[questionKey]);
    const response = normalizeText(row[responseKey]);
    if (!question || !response) return;

    records.push(
      Object.freeze({
        question,
        response,
        respondentId: normalizeText(row[respondentKey]) || `${group}-${index + 1}`,
        group,
      })
    );
  });

  const dropped = rows.length - records.length;
  if (dropped > 0) {
    debugLog(`${group}: dropped ${dropped} row(s) without question or response`);
  }
  return records;
}

// How many rows preprocessing dropped from a group, as a notice for the caller
export function droppedRowsNotice(group: string, rowCount: number, recordCount: number): Notice | null {
  const dropped = rowCount - recordCount;
  if (dropped <= 0) return null;
  return {
    code: "ROWS_DROPPED",
    message: `${group}: dropped ${dropped} of ${rowCount} row(s) without question or response`,
  };
}

export function buildGroup(group: string, records: readonly InterviewRecord[], sourceFile: string | null = null): GroupData {
  return Object.freeze({ group, sourceFile, records: Object.freeze([...records]) });
}

export function groupNameFromFile(path: string): string {
  return basename(path, extname(path));
}
