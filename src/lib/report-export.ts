import { createWriteStream } from "fs";
import { mkdir, writeFile } from "fs/promises";
import { once } from "events";
import { dirname, extname, join, basename } from "path";
import { stringify } from "csv-stringify/sync";
import PDFDocument from "pdfkit";
import * as XLSX from "xlsx";
import type { AnalysisResult, ComparisonView, ExportFormat } from "../types";
import { parseExportFormat } from "./analysis-config";

export type Cell = string | number;

export interface Table {
  headers: string[];
  rows: Cell[][];
}

const FILE_EXTENSIONS: Record<ExportFormat, string> = {
  Excel: ".xlsx",
  CSV: ".csv",
  PDF: ".pdf",
};

function round(value: number, digits = 4): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function comparisonTable(view: ComparisonView): Table {
  switch (view.method) {
    case "Theme Prevalence":
      return {
        headers: ["Theme", ...view.groups.flatMap(g => [`${g} matched`, `${g} prevalence`])],
        rows: view.rows.map(row => [
          row.theme,
          ...view.groups.flatMap(g => [row.matched[g] ?? 0, round(row.prevalence[g] ?? 0)]),
        ]),
      };

    case "Question Distribution":
      return {
        headers: ["Question", ...view.groups, "Total"],
        rows: view.rows.map(row => [row.question, ...view.groups.map(g => row.counts[g] ?? 0), row.total]),
      };

    case "Response Length":
      return {
        headers: ["Theme", ...view.groups.flatMap(g => [`${g} responses`, `${g} mean words`, `${g} variance`])],
        rows: view.rows.map(row => [
          row.theme,
          ...view.groups.flatMap(g => {
            const stats = row.stats[g];
            return stats ? [stats.count, round(stats.mean, 2), round(stats.variance, 2)] : [0, 0, 0];
          }),
        ]),
      };
  }
}

export function themesTable(result: AnalysisResult): Table {
  return {
    headers: ["Theme", "Keywords", "Frequency"],
    rows: [...result.taxonomy.values()].map(theme => [theme.name, theme.keywords.join(", "), theme.frequency]),
  };
}

export function countsTable(result: AnalysisResult): Table {
  const rows: Cell[][] = [];
  for (const groupCounts of result.counts) {
    for (const entry of groupCounts) {
      for (const question of entry.questions) {
        rows.push([question.group, question.themeName, question.questionText, question.count]);
      }
    }
  }
  return { headers: ["Group", "Theme", "Question", "Count"], rows };
}

function toMatrix(table: Table): Cell[][] {
  return [table.headers, ...table.rows];
}

// Fixed-width text rendering for the terminal
export function renderTable(table: Table): string {
  const matrix = toMatrix(table).map(row => row.map(cell => String(cell)));
  const widths = table.headers.map((_, col) => Math.max(...matrix.map(row => (row[col] ?? "").length)));
  const line = (row: string[]) =>
    row
      .map((cell, col) => cell.padEnd(widths[col] ?? 0))
      .join("  ")
      .trimEnd();

  return [line(matrix[0] ?? []), widths.map(w => "-".repeat(w)).join("  "), ...matrix.slice(1).map(line)].join("\n");
}

// Output path with the extension the format implies
export function resolveOutputPath(output: string, format: ExportFormat): string {
  const ext = FILE_EXTENSIONS[format];
  return extname(output).toLowerCase() === ext ? output : `${output}${ext}`;
}

/**
 * Write a report of the analysis and one comparison view. Returns the paths
 * written (CSV produces one file per table).
 */
export async function exportReport(
  result: AnalysisResult,
  view: ComparisonView | null,
  format: unknown,
  output: string
): Promise<string[]> {
  const exportFormat = parseExportFormat(format);
  const path = resolveOutputPath(output, exportFormat);
  await mkdir(dirname(path), { recursive: true });

  const tables: Array<{ title: string; table: Table }> = [
    ...(view ? [{ title: view.method, table: comparisonTable(view) }] : []),
    { title: "Themes", table: themesTable(result) },
    { title: "Question Counts", table: countsTable(result) },
  ];

  switch (exportFormat) {
    case "Excel":
      await writeWorkbook(path, tables);
      return [path];
    case "CSV":
      return writeCsvFiles(path, tables);
    case "PDF":
      await writePdf(path, result, tables);
      return [path];
  }
}

async function writeWorkbook(path: string, tables: Array<{ title: string; table: Table }>) {
  const workbook = XLSX.utils.book_new();
  for (const { title, table } of tables) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(toMatrix(table)), title.slice(0, 31));
  }
  const buffer: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  await writeFile(path, buffer);
}

// First table at the given path, the others beside it with a suffix
async function writeCsvFiles(path: string, tables: Array<{ title: string; table: Table }>): Promise<string[]> {
  const base = basename(path, ".csv");
  const paths: string[] = [];

  for (const [i, { title, table }] of tables.entries()) {
    const target = i === 0 ? path : join(dirname(path), `${base}-${title.toLowerCase().replace(/\s+/g, "-")}.csv`);
    await writeFile(target, stringify(toMatrix(table)));
    paths.push(target);
  }
  return paths;
}

// Characters Windows-1252 adds to Latin-1 in 0x80-0x9F
const WIN_ANSI_EXTRAS = new Set("€‚ƒ„…†‡ˆ‰Š‹ŒŽ‘’“”•–—˜™š›œžŸ");

/**
 * The built-in PDF fonts only encode WinAnsi; anything else is replaced with
 * "?" instead of being written as the wrong glyphs.
 */
export function toPdfText(text: string): string {
  let out = "";
  for (const char of text) {
    const code = char.codePointAt(0) ?? 0;
    const printable = (code >= 0x20 && code <= 0x7e) || (code >= 0xa0 && code <= 0xff) || code === 0x0a;
    out += printable || WIN_ANSI_EXTRAS.has(char) ? char : "?";
  }
  return out;
}

async function writePdf(path: string, result: AnalysisResult, tables: Array<{ title: string; table: Table }>) {
  const doc = new PDFDocument({ margin: 50, size: "A4" });
  const stream = createWriteStream(path);
  doc.pipe(stream);

  const title = result.project ? result.project.name : "Interview theme analysis";
  doc.fontSize(18).text(toPdfText(title));
  if (result.project?.description) {
    doc.moveDown(0.5).fontSize(11).text(toPdfText(result.project.description));
  }
  doc
    .moveDown(0.5)
    .fontSize(10)
    .text(
      `Method: ${result.parameters.extractionMethod} · min frequency ${result.parameters.minThemeFreq} · up to ${result.parameters.numThemes} themes`
    )
    .text(toPdfText(`Groups: ${result.groups.map(g => `${g.group} (${g.records.length})`).join(", ")}`));

  for (const { title: heading, table } of tables) {
    doc.moveDown().fontSize(14).text(toPdfText(heading));
    doc.moveDown(0.3).fontSize(9).text(toPdfText(table.headers.join(" | ")));
    for (const row of table.rows) {
      doc.text(toPdfText(row.join(" | ")));
    }
    if (table.rows.length === 0) {
      doc.text("(none)");
    }
  }

  doc.end();
  await once(stream, "finish");
}
