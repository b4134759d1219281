/**
 * Skills matrix parsing and required-level lookup.
 *
 * Two layouts are accepted:
 *   long: one row per skill with a required level column, optionally with
 *          job title and department columns.
 *   wide: job title and department in the first two columns, skill names in
 *          the first data row from the third column on, required levels below.
 *
 * Bad cells never fail the file. They are skipped and counted in stats.
 * A table of three or more columns in neither layout yields no entries, so
 * every lookup lands on DEFAULT_REQUIRED_LEVEL; narrower tables are rejected.
 */

import { coerceNumber, findRoleColumn, normalizeHeader } from "./column_classifier";
import { EmptyInputError, InvalidMatrixFormatError } from "./errors";
import type {
  RawAssessmentTable,
  RequiredLevelSource,
  SkillsMatrix,
  SkillsMatrixEntry,
  SkillsMatrixStats,
} from "./types";

export const DEFAULT_REQUIRED_LEVEL = 3.0;

const WIDE_FIRST_SKILL_COLUMN = 2;
const WIDE_CANDIDATE_COLUMNS = 5;
const WIDE_MIN_NAMED_COLUMNS = 2;
const MIN_MATRIX_COLUMNS = 3;
const FALLBACK_DIMENSION = "General";

const LEVEL_TERMS = ["level", "required", "target"];
const PLACEHOLDER_NAMES = new Set(["", "nan", "unnamed"]);

function isUsableName(value: string) {
  return !PLACEHOLDER_NAMES.has(value.trim().toLowerCase());
}

function isValidLevel(level: number | null): level is number {
  return level !== null && level >= 1 && level <= 5;
}

function emptyStats(rows_in: number): SkillsMatrixStats {
  return { rows_in, cells_skipped: 0, rows_skipped: 0, duplicate_entries: 0, used_first_row_fallback: false };
}

function entryKey(skill: string, job_title: string | null, department: string | null) {
  return [skill, job_title ?? "", department ?? ""].map((part) => part.trim().toLowerCase()).join("|");
}

function dedupeEntries(entries: SkillsMatrixEntry[], stats: SkillsMatrixStats) {
  const seen = new Set<string>();
  const unique: SkillsMatrixEntry[] = [];
  for (const entry of entries) {
    const key = entryKey(entry.skill, entry.job_title, entry.department);
    if (seen.has(key)) {
      stats.duplicate_entries += 1;
      continue;
    }
    seen.add(key);
    unique.push(entry);
  }
  return unique;
}

export function detectWideFormat(table: RawAssessmentTable) {
  if (table.headers.length <= WIDE_FIRST_SKILL_COLUMN) return false;
  const firstRow = table.rows[0];
  if (!firstRow) return false;
  const candidates = firstRow.slice(WIDE_FIRST_SKILL_COLUMN, WIDE_FIRST_SKILL_COLUMN + WIDE_CANDIDATE_COLUMNS);
  const named = candidates.filter((cell) => isUsableName(cell) && coerceNumber(cell) === null).length;
  return named >= WIDE_MIN_NAMED_COLUMNS;
}

type LongColumns = {
  skill: number;
  level: number;
  job_title: number | null;
  department: number | null;
};

export function detectLongFormat(headers: string[]): LongColumns | null {
  let skill: number | null = null;
  let level: number | null = null;
  for (let index = 0; index < headers.length; index++) {
    const normalized = normalizeHeader(headers[index]);
    if (normalized.includes("skill") && skill === null) {
      skill = index;
    } else if (LEVEL_TERMS.some((term) => normalized.includes(term)) && level === null) {
      level = index;
    }
  }
  if (skill === null || level === null) return null;

  const taken = new Set<number>([skill, level]);
  const job_title = findRoleColumn(headers, "job_title", taken);
  if (job_title !== null) taken.add(job_title);
  const department = findRoleColumn(headers, "department", taken);
  return { skill, level, job_title, department };
}

function dimension(row: string[], index: number) {
  const value = (row[index] ?? "").trim();
  return value === "" ? FALLBACK_DIMENSION : value;
}

function collectWideRow(
  row: string[],
  skillColumns: Array<{ index: number; skill: string }>,
  stats: SkillsMatrixStats
): SkillsMatrixEntry[] {
  const job_title = dimension(row, 0);
  const department = dimension(row, 1);
  const entries: SkillsMatrixEntry[] = [];
  for (const { index, skill } of skillColumns) {
    const cell = row[index] ?? "";
    const level = coerceNumber(cell);
    if (!isValidLevel(level)) {
      if (cell.trim() !== "") stats.cells_skipped += 1;
      continue;
    }
    entries.push({ skill, required_level: level, job_title, department });
  }
  return entries;
}

function parseWideMatrix(table: RawAssessmentTable): SkillsMatrix {
  const stats = emptyStats(table.rows.length);
  const [firstRow] = table.rows;

  const skillColumns: Array<{ index: number; skill: string }> = [];
  for (let index = WIDE_FIRST_SKILL_COLUMN; index < table.headers.length; index++) {
    const fromRow = (firstRow[index] ?? "").trim();
    const skill = fromRow !== "" ? fromRow : table.headers[index].trim();
    if (isUsableName(skill)) skillColumns.push({ index, skill });
  }

  let entries: SkillsMatrixEntry[] = [];
  const start = table.rows.length > 1 ? 1 : 0;
  for (const row of table.rows.slice(start)) {
    const rowEntries = collectWideRow(row, skillColumns, stats);
    if (rowEntries.length === 0) stats.rows_skipped += 1;
    entries.push(...rowEntries);
  }

  if (entries.length === 0) {
    // Single-row matrices carry skill names in the header and levels in the first row.
    stats.used_first_row_fallback = true;
    const headerColumns = table.headers
      .map((header, index) => ({ index, skill: header.trim() }))
      .filter(({ index, skill }) => index >= WIDE_FIRST_SKILL_COLUMN && isUsableName(skill));
    entries = collectWideRow(firstRow, headerColumns, stats);
  }

  return { format: "wide", entries: dedupeEntries(entries, stats), stats };
}

function parseLongMatrix(table: RawAssessmentTable, columns: LongColumns): SkillsMatrix {
  const stats = emptyStats(table.rows.length);
  const entries: SkillsMatrixEntry[] = [];

  const optional = (row: string[], index: number | null) => {
    if (index === null) return null;
    const value = (row[index] ?? "").trim();
    return value === "" ? null : value;
  };

  for (const row of table.rows) {
    const skill = (row[columns.skill] ?? "").trim();
    const level = coerceNumber(row[columns.level]);
    if (!isUsableName(skill) || !isValidLevel(level)) {
      stats.rows_skipped += 1;
      continue;
    }
    entries.push({
      skill,
      required_level: level,
      job_title: optional(row, columns.job_title),
      department: optional(row, columns.department),
    });
  }

  return { format: "long", entries: dedupeEntries(entries, stats), stats };
}

export function parseSkillsMatrix(table: RawAssessmentTable): SkillsMatrix {
  if (table.rows.length === 0) {
    throw new EmptyInputError(table.filename);
  }

  const longColumns = detectLongFormat(table.headers);
  if (longColumns) {
    return parseLongMatrix(table, longColumns);
  }
  if (detectWideFormat(table)) {
    return parseWideMatrix(table);
  }
  if (table.headers.length < MIN_MATRIX_COLUMNS) {
    throw new InvalidMatrixFormatError(table.filename);
  }
  const stats = emptyStats(table.rows.length);
  stats.rows_skipped = table.rows.length;
  return { format: "unrecognized", entries: [], stats };
}

// ─── Lookup ──────────────────────────────────────────────────────────────────

export type RequiredLevel = {
  level: number;
  source: RequiredLevelSource;
};

export type RequiredLevelLookup = (
  skill: string,
  job_title: string | null,
  department: string | null
) => RequiredLevel;

function lower(value: string | null) {
  const trimmed = value?.trim().toLowerCase() ?? "";
  return trimmed === "" ? null : trimmed;
}

function setIfAbsent(map: Map<string, number>, key: string, value: number) {
  if (!map.has(key)) map.set(key, value);
}

/**
 * Build a lookup over the matrix. Resolution order for one skill:
 * job title + department, job title, department, any entry for the skill
 * (entries without dimensions first), then DEFAULT_REQUIRED_LEVEL.
 */
export function createRequiredLevelLookup(matrix: SkillsMatrix | null): RequiredLevelLookup {
  const byBoth = new Map<string, number>();
  const byJob = new Map<string, number>();
  const byDepartment = new Map<string, number>();
  const undimensioned = new Map<string, number>();
  const anyEntry = new Map<string, number>();

  for (const entry of matrix?.entries ?? []) {
    const skill = entry.skill.trim().toLowerCase();
    const job = lower(entry.job_title);
    const department = lower(entry.department);
    if (job && department) setIfAbsent(byBoth, `${skill}|${job}|${department}`, entry.required_level);
    if (job) setIfAbsent(byJob, `${skill}|${job}`, entry.required_level);
    if (department) setIfAbsent(byDepartment, `${skill}|${department}`, entry.required_level);
    if (!job && !department) setIfAbsent(undimensioned, skill, entry.required_level);
    setIfAbsent(anyEntry, skill, entry.required_level);
  }

  return (skillName, jobTitle, departmentName) => {
    const skill = skillName.trim().toLowerCase();
    const job = lower(jobTitle);
    const department = lower(departmentName);

    if (job && department) {
      const level = byBoth.get(`${skill}|${job}|${department}`);
      if (level !== undefined) return { level, source: "job_title_department" };
    }
    if (job) {
      const level = byJob.get(`${skill}|${job}`);
      if (level !== undefined) return { level, source: "job_title" };
    }
    if (department) {
      const level = byDepartment.get(`${skill}|${department}`);
      if (level !== undefined) return { level, source: "department" };
    }
    const global = undimensioned.get(skill) ?? anyEntry.get(skill);
    if (global !== undefined) return { level: global, source: "global" };
    return { level: DEFAULT_REQUIRED_LEVEL, source: "default" };
  };
}
