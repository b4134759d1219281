import { classifyColumns, coerceNumber, columnsWithRole } from "./column_classifier";
import {
  EmptyInputError,
  MissingIdentityColumnError,
  NoSkillColumnsError,
  SkillsAuditError,
} from "./errors";
import { parseSkillsMatrix } from "./skills_matrix";
import type {
  AssessmentKind,
  AssessmentRow,
  ColumnDescriptor,
  NormalizationStats,
  NormalizedAssessment,
  NormalizedTable,
  RawAssessmentTable,
  RaterKind,
  SkillsMatrix,
} from "./types";

export const MIN_RATING = 0;
export const MAX_RATING = 5;

export type NormalizeResult<T extends NormalizedTable> =
  | { ok: true; value: T }
  | { ok: false; error: SkillsAuditError };

export function toTitleCase(value: string) {
  return value.toLowerCase().replace(/(^|[^\p{L}])(\p{L})/gu, (_match, before: string, letter: string) => {
    return `${before}${letter.toUpperCase()}`;
  });
}

function optionalCell(row: string[], column: ColumnDescriptor | undefined) {
  if (!column) return null;
  const value = (row[column.index] ?? "").trim();
  return value === "" ? null : value;
}

// Two columns with the same header would otherwise overwrite each other's ratings.
function uniqueSkillNames(columns: ColumnDescriptor[]) {
  const counts = new Map<string, number>();
  return columns.map((column) => {
    const base = column.header.trim();
    const seen = counts.get(base) ?? 0;
    counts.set(base, seen + 1);
    return seen === 0 ? base : `${base} (${seen + 1})`;
  });
}

export function normalizeAssessment(table: RawAssessmentTable, kind: RaterKind): NormalizedAssessment {
  if (table.rows.length === 0) {
    throw new EmptyInputError(table.filename);
  }

  const columns = classifyColumns(table);
  const [nameColumn] = columnsWithRole(columns, "name");
  if (!nameColumn) {
    throw new MissingIdentityColumnError(table.filename);
  }
  const skillColumns = columnsWithRole(columns, "skill");
  if (skillColumns.length === 0) {
    throw new NoSkillColumnsError(table.filename);
  }

  const [emailColumn] = columnsWithRole(columns, "email");
  const [jobTitleColumn] = columnsWithRole(columns, "job_title");
  const [departmentColumn] = columnsWithRole(columns, "department");
  const skills = uniqueSkillNames(skillColumns);

  const stats: NormalizationStats = {
    rows_in: table.rows.length,
    rows_kept: 0,
    rows_missing_name: 0,
    rows_duplicate_name: 0,
    cells_non_numeric: 0,
    cells_clamped: 0,
  };

  const seen = new Set<string>();
  const rows: AssessmentRow[] = [];

  for (const row of table.rows) {
    const employee = toTitleCase((row[nameColumn.index] ?? "").trim());
    if (!employee) {
      stats.rows_missing_name += 1;
      continue;
    }
    if (seen.has(employee)) {
      stats.rows_duplicate_name += 1;
      continue;
    }
    seen.add(employee);

    const ratings: Record<string, number> = {};
    skillColumns.forEach((column, i) => {
      const cell = row[column.index] ?? "";
      const value = coerceNumber(cell);
      if (value === null) {
        if (cell.trim() !== "") stats.cells_non_numeric += 1;
        ratings[skills[i]] = 0;
        return;
      }
      if (value < MIN_RATING || value > MAX_RATING) stats.cells_clamped += 1;
      ratings[skills[i]] = Math.min(Math.max(value, MIN_RATING), MAX_RATING);
    });

    rows.push({
      employee,
      email: optionalCell(row, emailColumn)?.toLowerCase() ?? null,
      job_title: optionalCell(row, jobTitleColumn),
      department: optionalCell(row, departmentColumn),
      ratings,
    });
  }

  stats.rows_kept = rows.length;
  return { kind, filename: table.filename, columns, skills, rows, stats };
}

function normalizeTable(table: RawAssessmentTable, kind: AssessmentKind): NormalizedTable {
  return kind === "skills_matrix" ? parseSkillsMatrix(table) : normalizeAssessment(table, kind);
}

export function normalize(table: RawAssessmentTable, kind: RaterKind): NormalizeResult<NormalizedAssessment>;
export function normalize(table: RawAssessmentTable, kind: "skills_matrix"): NormalizeResult<SkillsMatrix>;
export function normalize(table: RawAssessmentTable, kind: AssessmentKind): NormalizeResult<NormalizedTable>;
export function normalize(table: RawAssessmentTable, kind: AssessmentKind): NormalizeResult<NormalizedTable> {
  try {
    return { ok: true, value: normalizeTable(table, kind) };
  } catch (error) {
    if (error instanceof SkillsAuditError) {
      return { ok: false, error };
    }
    throw error;
  }
}

export function normalizeOrThrow(table: RawAssessmentTable, kind: RaterKind): NormalizedAssessment;
export function normalizeOrThrow(table: RawAssessmentTable, kind: "skills_matrix"): SkillsMatrix;
export function normalizeOrThrow(table: RawAssessmentTable, kind: AssessmentKind): NormalizedTable;
export function normalizeOrThrow(table: RawAssessmentTable, kind: AssessmentKind): NormalizedTable {
  return normalizeTable(table, kind);
}
