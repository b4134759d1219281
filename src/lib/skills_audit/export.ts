import ExcelJS from "exceljs";

import type {
  GapRecord,
  MergedEmployeeRecord,
  MergedTable,
  RatedSkill,
  SkillDistribution,
  SkillScores,
} from "./types";

export type FlatSkillRow = {
  employee: string;
  email: string | null;
  job_title: string | null;
  department: string | null;
  skill: string;
  self_rating: number;
  manager_rating: number;
  average_rating: number;
  perception_gap: number;
  required_level: number | null;
  matrix_gap: number | null;
};

export type SheetCell = string | number | null;
export type SheetRow = Record<string, SheetCell>;

export const SHEET_NAMES = {
  merged: "Skills Data",
  gaps: "Gap Analysis",
  skills: "Skills Summary",
} as const;

function round2(value: number) {
  return Math.round(value * 100) / 100;
}

function skillNames(items: Array<{ skill: string }>) {
  return items.map((item) => item.skill).join(", ");
}

// ─── Flat rows ────────────────────────────────────────────────────────────────

export function toFlatRows(table: MergedTable): FlatSkillRow[] {
  const rows: FlatSkillRow[] = [];
  for (const record of table.records) {
    for (const skill of table.skills) {
      const scores = record.skills[skill];
      if (!scores) continue;
      rows.push({
        employee: record.employee,
        email: record.email,
        job_title: record.job_title,
        department: record.department,
        skill,
        ...scores,
      });
    }
  }
  return rows;
}

/**
 * Rebuilds a merged table from flat rows. Employees and skills keep the order
 * they first appear in. Matrix lookup sources are not part of the flat shape,
 * so the rebuilt stats report zero for every source.
 */
export function fromFlatRows(rows: FlatSkillRow[]): MergedTable {
  const skills: string[] = [];
  const seenSkills = new Set<string>();
  const byEmployee = new Map<string, MergedEmployeeRecord>();

  for (const row of rows) {
    if (!seenSkills.has(row.skill)) {
      seenSkills.add(row.skill);
      skills.push(row.skill);
    }
    let record = byEmployee.get(row.employee);
    if (!record) {
      record = {
        employee: row.employee,
        email: row.email,
        job_title: row.job_title,
        department: row.department,
        skills: {},
      };
      byEmployee.set(row.employee, record);
    }
    const scores: SkillScores = {
      self_rating: row.self_rating,
      manager_rating: row.manager_rating,
      average_rating: row.average_rating,
      perception_gap: row.perception_gap,
      required_level: row.required_level,
      matrix_gap: row.matrix_gap,
    };
    record.skills[row.skill] = scores;
  }

  const records = [...byEmployee.values()];
  let self_only = 0;
  let manager_only = 0;
  for (const record of records) {
    const all = Object.values(record.skills);
    const hasSelf = all.some((scores) => scores.self_rating > 0);
    const hasManager = all.some((scores) => scores.manager_rating > 0);
    if (hasSelf && !hasManager) self_only += 1;
    if (hasManager && !hasSelf) manager_only += 1;
  }

  return {
    skills,
    records,
    has_matrix: rows.some((row) => row.required_level !== null),
    stats: {
      employees: records.length,
      self_only,
      manager_only,
      required_level_sources: { job_title_department: 0, job_title: 0, department: 0, global: 0, default: 0 },
    },
  };
}

// ─── Sheet rows ───────────────────────────────────────────────────────────────

/** One row per employee with Self / Manager / Average / Gap columns for each skill. */
export function toMergedSheetRows(table: MergedTable): SheetRow[] {
  return table.records.map((record) => {
    const row: SheetRow = {
      Employee: record.employee,
      Email: record.email,
      "Job Title": record.job_title,
      Department: record.department,
    };
    for (const skill of table.skills) {
      const scores = record.skills[skill];
      row[`${skill} Self`] = scores?.self_rating ?? 0;
      row[`${skill} Manager`] = scores?.manager_rating ?? 0;
      row[`${skill} Average`] = scores?.average_rating ?? 0;
      row[`${skill} Gap`] = scores?.perception_gap ?? 0;
      if (table.has_matrix) {
        row[`${skill} Required`] = scores?.required_level ?? null;
        row[`${skill} Matrix Gap`] = scores?.matrix_gap ?? null;
      }
    }
    return row;
  });
}

export function toGapSummaryRows(gaps: GapRecord[]): SheetRow[] {
  return gaps.map((gap) => ({
    employee: gap.employee,
    avg_skill_level: round2(gap.avg_skill_level),
    avg_gap_score: round2(gap.avg_gap_score),
    max_gap: round2(gap.max_gap),
    significant_gaps_count: gap.significant_gaps_count,
    has_gaps: gap.has_gaps ? "Yes" : "No",
    significant_gaps: skillNames(gap.significant_gaps),
    strengths: skillNames(gap.strengths),
    development_areas: skillNames(gap.development_areas),
    gap_type: gap.gap_type,
  }));
}

export function toSkillSummaryRows(distributions: SkillDistribution[]): SheetRow[] {
  return distributions.map((distribution) => ({
    skill: distribution.skill,
    total_assessments: distribution.total_assessments,
    average_rating: round2(distribution.average_rating),
    median_rating: round2(distribution.median_rating),
    std_deviation: round2(distribution.std_deviation),
    min_rating: distribution.min_rating,
    max_rating: distribution.max_rating,
    rating_1: distribution.rating_distribution[1],
    rating_2: distribution.rating_distribution[2],
    rating_3: distribution.rating_distribution[3],
    rating_4: distribution.rating_distribution[4],
    rating_5: distribution.rating_distribution[5],
    average_gap: distribution.gap_analysis ? round2(distribution.gap_analysis.average_gap) : null,
    significant_gaps: distribution.gap_analysis?.significant_gaps ?? null,
  }));
}

function topSkill(items: RatedSkill[]) {
  return items[0]?.skill ?? null;
}

export function toEmployeeReportRow(gap: GapRecord, record: MergedEmployeeRecord | null = null): SheetRow {
  return {
    employee: gap.employee,
    job_title: record?.job_title ?? null,
    department: record?.department ?? null,
    avg_skill_level: round2(gap.avg_skill_level),
    avg_gap_score: round2(gap.avg_gap_score),
    top_strength: topSkill(gap.strengths),
    top_development_area: topSkill(gap.development_areas),
    largest_gap: gap.significant_gaps[0]?.skill ?? null,
    significant_gaps: skillNames(gap.significant_gaps),
  };
}

/** One report row per gap record, joined to the merged record of the same employee. */
export function toEmployeeReportRows(table: MergedTable, gaps: GapRecord[]): SheetRow[] {
  const records = new Map(table.records.map((record) => [record.employee, record]));
  return gaps.map((gap) => toEmployeeReportRow(gap, records.get(gap.employee) ?? null));
}

// ─── CSV ──────────────────────────────────────────────────────────────────────

export function escapeCell(value: string): string {
  if (value.includes(",") || value.includes("\n") || value.includes("\r") || value.includes("\"")) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsv<T extends Record<string, SheetCell>>(rows: T[], columns: Array<keyof T & string>): string {
  const header = columns.map(escapeCell).join(",");
  const body = rows.map((row) => columns.map((column) => escapeCell(String(row[column] ?? ""))).join(","));
  return [header, ...body].join("\n") + "\n";
}

export function sheetColumns(rows: SheetRow[]): string[] {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }
  return columns;
}

// ─── Workbook ─────────────────────────────────────────────────────────────────

export type WorkbookInput = {
  table: MergedTable;
  gaps: GapRecord[];
  distributions: SkillDistribution[];
};

function addSheet(workbook: ExcelJS.Workbook, name: string, rows: SheetRow[]) {
  const sheet = workbook.addWorksheet(name);
  sheet.columns = sheetColumns(rows).map((key) => ({ header: key, key, width: Math.max(12, key.length + 2) }));
  for (const row of rows) {
    sheet.addRow(row);
  }
  return sheet;
}

export function buildWorkbook(input: WorkbookInput): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  addSheet(workbook, SHEET_NAMES.merged, toMergedSheetRows(input.table));
  addSheet(workbook, SHEET_NAMES.gaps, toGapSummaryRows(input.gaps));
  addSheet(workbook, SHEET_NAMES.skills, toSkillSummaryRows(input.distributions));
  return workbook;
}

export async function writeWorkbookBuffer(input: WorkbookInput): Promise<Buffer> {
  const buffer = await buildWorkbook(input).xlsx.writeBuffer();
  return Buffer.from(buffer);
}
