import path from "node:path";
import { parse as parseCsv } from "csv-parse/sync";
import ExcelJS from "exceljs";

import { UnsupportedFileError } from "./errors";
import type { RawAssessmentTable } from "./types";

function toStringMatrix(records: unknown): string[][] {
  if (!Array.isArray(records)) return [];
  return records.map((record) =>
    Array.isArray(record) ? record.map((cell) => (cell === null || cell === undefined ? "" : String(cell))) : []
  );
}

function hasValues(row: string[]) {
  return row.some((cell) => cell.trim() !== "");
}

function padRow(row: string[], width: number) {
  if (row.length >= width) return row.slice(0, width);
  return [...row, ...Array.from({ length: width - row.length }, () => "")];
}

export function parseCsvText(filename: string, text: string): RawAssessmentTable {
  const records = toStringMatrix(
    parseCsv(text, {
      bom: true,
      skip_empty_lines: true,
      relax_quotes: true,
      relax_column_count: true,
    })
  );
  const [headerRow, ...body] = records;
  if (!headerRow) {
    return { filename, headers: [], rows: [] };
  }

  const headers = headerRow.map((header) => header.replace(/^\uFEFF/, "").trim());
  return {
    filename,
    headers,
    rows: body.filter(hasValues).map((row) => padRow(row, headers.length)),
  };
}

export function parseCsvFile(filename: string, buffer: Buffer): RawAssessmentTable {
  return parseCsvText(filename, buffer.toString("utf8"));
}

function cellToString(cell: ExcelJS.Cell): string {
  const value = cell.value;
  if (value === null || value === undefined) return "";
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "object") {
    if ("text" in value && typeof value.text === "string") return value.text;
    if ("result" in value && value.result !== null && value.result !== undefined) {
      return value.result instanceof Date ? value.result.toISOString() : String(value.result);
    }
    return cell.text ?? "";
  }
  return String(value);
}

export async function parseXlsxFile(filename: string, buffer: Buffer): Promise<RawAssessmentTable> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(buffer);
  const sheet = workbook.worksheets[0];
  if (!sheet) {
    return { filename, headers: [], rows: [] };
  }

  const columnCount = sheet.columnCount;
  if (!columnCount) {
    return { filename, headers: [], rows: [] };
  }

  const headerRow = sheet.getRow(1);
  const headers: string[] = [];
  for (let col = 1; col <= columnCount; col++) {
    headers.push(cellToString(headerRow.getCell(col)).trim());
  }

  const rows: string[][] = [];
  for (let rowNumber = 2; rowNumber <= sheet.rowCount; rowNumber++) {
    const row = sheet.getRow(rowNumber);
    const cells: string[] = [];
    for (let col = 1; col <= columnCount; col++) {
      cells.push(cellToString(row.getCell(col)));
    }
    if (hasValues(cells)) {
      rows.push(cells);
    }
  }

  return { filename, headers, rows };
}

export async function parseFile(filename: string, buffer: Buffer): Promise<RawAssessmentTable> {
  const ext = path.extname(filename).toLowerCase();
  if (ext === ".csv") return parseCsvFile(filename, buffer);
  if (ext === ".xlsx") return parseXlsxFile(filename, buffer);
  if (ext === ".xls") {
    throw new UnsupportedFileError("XLS files are not supported. Please save as .xlsx.");
  }
  throw new UnsupportedFileError(`Unsupported file type: ${ext || "(none)"}`);
}
