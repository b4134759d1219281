import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";

import { fromFlatRows, toFlatRows } from "./export";
import type { FlatSkillRow } from "./export";
import type {
  GapRecord,
  MergedTable,
  NormalizedAssessment,
  RaterKind,
  SkillsMatrix,
} from "./types";

export type SessionSummary = {
  session_id: string;
  assessment_rows: number;
  matrix_entries: number;
  processed_rows: number;
  gap_records: number;
  updated_at: string;
};

export type SkillsStore = {
  saveAssessment: (sessionId: string, table: NormalizedAssessment) => void;
  loadAssessment: (sessionId: string, kind: RaterKind) => NormalizedAssessment | null;
  saveSkillsMatrix: (sessionId: string, matrix: SkillsMatrix) => void;
  loadSkillsMatrix: (sessionId: string) => SkillsMatrix | null;
  saveMergedTable: (sessionId: string, table: MergedTable) => void;
  loadMergedTable: (sessionId: string) => MergedTable | null;
  saveGapAnalysis: (sessionId: string, gaps: GapRecord[], threshold: number) => void;
  loadGapAnalysis: (sessionId: string, gapType?: GapRecord["gap_type"]) => GapRecord[];
  listSessions: () => SessionSummary[];
  deleteSession: (sessionId: string) => number;
  close: () => void;
};

// ─── Row schemas ──────────────────────────────────────────────────────────────

const AssessmentRowSchema = z.object({
  filename: z.string(),
  employee: z.string(),
  email: z.string().nullable(),
  job_title: z.string().nullable(),
  department: z.string().nullable(),
  skill: z.string(),
  rating: z.number(),
});

const MatrixRowSchema = z.object({
  format: z.enum(["wide", "long", "unrecognized"]),
  skill: z.string(),
  job_title: z.string(),
  department: z.string(),
  required_level: z.number(),
});

const ProcessedRowSchema = z.object({
  employee: z.string(),
  email: z.string().nullable(),
  job_title: z.string().nullable(),
  department: z.string().nullable(),
  skill: z.string(),
  self_rating: z.number(),
  manager_rating: z.number(),
  average_rating: z.number(),
  perception_gap: z.number(),
  required_level: z.number().nullable(),
  matrix_gap: z.number().nullable(),
});

const GapTypeSchema = z.enum(["perception", "matrix"]);
const RatedSkillSchema = z.object({ skill: z.string(), rating: z.number() });
const SignificantGapSchema = z.object({
  skill: z.string(),
  gap_value: z.number(),
  direction: z.string(),
  gap_type: GapTypeSchema,
});

const GapRowSchema = z.object({
  employee: z.string(),
  gap_type: GapTypeSchema,
  avg_skill_level: z.number(),
  avg_gap_score: z.number(),
  max_gap: z.number(),
  significant_gaps_count: z.number().int(),
  has_gaps: z.number().int(),
  significant_gaps: z.string(),
  strengths: z.string(),
  development_areas: z.string(),
});

const SessionRowSchema = z.object({
  session_id: z.string(),
  assessment_rows: z.number().int(),
  matrix_entries: z.number().int(),
  processed_rows: z.number().int(),
  gap_records: z.number().int(),
  updated_at: z.string(),
});

function parseJsonList<T>(schema: z.ZodType<T>, text: string): T[] {
  return z.array(schema).parse(JSON.parse(text));
}

// ─── SQLite ───────────────────────────────────────────────────────────────────

function openDatabase(dbPath: string) {
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  const db = new Database(dbPath);
  db.exec(`
    create table if not exists assessments (
      session_id text not null,
      assessment_type text not null,
      filename text not null,
      employee text not null,
      email text,
      job_title text,
      department text,
      skill text not null,
      rating real not null,
      position integer not null,
      created_at text not null,
      unique (session_id, assessment_type, employee, skill)
    );
    create table if not exists skills_matrix (
      session_id text not null,
      format text not null,
      skill text not null,
      job_title text not null default '',
      department text not null default '',
      required_level real not null,
      position integer not null,
      created_at text not null,
      unique (session_id, skill, job_title, department)
    );
    create table if not exists processed_assessments (
      session_id text not null,
      employee text not null,
      email text,
      job_title text,
      department text,
      skill text not null,
      self_rating real not null,
      manager_rating real not null,
      average_rating real not null,
      perception_gap real not null,
      required_level real,
      matrix_gap real,
      position integer not null,
      created_at text not null,
      unique (session_id, employee, skill)
    );
    create table if not exists gap_analysis (
      session_id text not null,
      employee text not null,
      gap_type text not null,
      avg_skill_level real not null,
      avg_gap_score real not null,
      max_gap real not null,
      significant_gaps_count integer not null,
      has_gaps integer not null,
      significant_gaps text not null,
      strengths text not null,
      development_areas text not null,
      threshold real not null,
      position integer not null,
      created_at text not null,
      unique (session_id, employee, gap_type)
    );
  `);
  return db;
}

export function createSqliteStore(dbPath: string): SkillsStore {
  const db = openDatabase(dbPath);

  const saveAssessment = db.transaction((sessionId: string, table: NormalizedAssessment) => {
    const created_at = new Date().toISOString();
    db.prepare("delete from assessments where session_id = ? and assessment_type = ?").run(sessionId, table.kind);
    const insert = db.prepare(
      `insert into assessments
         (session_id, assessment_type, filename, employee, email, job_title, department, skill, rating, position, created_at)
       values (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
       on conflict(session_id, assessment_type, employee, skill) do update set
         rating = excluded.rating,
         created_at = excluded.created_at`
    );
    let position = 0;
    for (const row of table.rows) {
      for (const skill of table.skills) {
        insert.run(
          sessionId,
          table.kind,
          table.filename,
          row.employee,
          row.email,
          row.job_title,
          row.department,
          skill,
          row.ratings[skill] ?? 0,
          position++,
          created_at
        );
      }
    }
  });

  const saveSkillsMatrix = db.transaction((sessionId: string, matrix: SkillsMatrix) => {
    const created_at = new Date().toISOString();
    db.prepare("delete from skills_matrix where session_id = ?").run(sessionId);
    const insert = db.prepare(
      `insert into skills_matrix (session_id, format, skill, job_title, department, required_level, position, created_at)
       values (?, ?, ?, ?, ?, ?, ?, ?)
       on conflict(session_id, skill, job_title, department) do update set
         required_level = excluded.required_level,
         created_at = excluded.created_at`
    );
    matrix.entries.forEach((entry, position) => {
      insert.run(
        sessionId,
        matrix.format,
        entry.skill,
        entry.job_title ?? "",
        entry.department ?? "",
        entry.required_level,
        position,
        created_at
      );
    });
  });

  const saveMergedTable = db.transaction((sessionId: string, table: MergedTable) => {
    const created_at = new Date().toISOString();
    db.prepare("delete from processed_assessments where session_id = ?").run(sessionId);
    const insert = db.prepare(
      `insert into processed_assessments
         (session_id, employee, email, job_title, department, skill, self_rating, manager_rating,
          average_rating, perception_gap, required_level, matrix_gap, position, created_at)
       values (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    );
    toFlatRows(table).forEach((row, position) => {
      insert.run(
        sessionId,
        row.employee,
        row.email,
        row.job_title,
        row.department,
        row.skill,
        row.self_rating,
        row.manager_rating,
        row.average_rating,
        row.perception_gap,
        row.required_level,
        row.matrix_gap,
        position,
        created_at
      );
    });
  });

  const saveGapAnalysis = db.transaction((sessionId: string, gaps: GapRecord[], threshold: number) => {
    const created_at = new Date().toISOString();
    const gapTypes = new Set(gaps.map((gap) => gap.gap_type));
    const remove = db.prepare("delete from gap_analysis where session_id = ? and gap_type = ?");
    for (const gapType of gapTypes) {
      remove.run(sessionId, gapType);
    }
    const insert = db.prepare(
      `insert into gap_analysis
         (session_id, employee, gap_type, avg_skill_level, avg_gap_score, max_gap, significant_gaps_count,
          has_gaps, significant_gaps, strengths, development_areas, threshold, position, created_at)
       values (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
       on conflict(session_id, employee, gap_type) do update set
         avg_skill_level = excluded.avg_skill_level,
         avg_gap_score = excluded.avg_gap_score,
         max_gap = excluded.max_gap,
         significant_gaps_count = excluded.significant_gaps_count,
         has_gaps = excluded.has_gaps,
         significant_gaps = excluded.significant_gaps,
         strengths = excluded.strengths,
         development_areas = excluded.development_areas,
         threshold = excluded.threshold,
         created_at = excluded.created_at`
    );
    gaps.forEach((gap, position) => {
      insert.run(
        sessionId,
        gap.employee,
        gap.gap_type,
        gap.avg_skill_level,
        gap.avg_gap_score,
        gap.max_gap,
        gap.significant_gaps_count,
        gap.has_gaps ? 1 : 0,
        JSON.stringify(gap.significant_gaps),
        JSON.stringify(gap.strengths),
        JSON.stringify(gap.development_areas),
        threshold,
        position,
        created_at
      );
    });
  });

  const deleteSession = db.transaction((sessionId: string) => {
    let removed = 0;
    for (const table of ["assessments", "skills_matrix", "processed_assessments", "gap_analysis"]) {
      removed += db.prepare(`delete from ${table} where session_id = ?`).run(sessionId).changes;
    }
    return removed;
  });

  return {
    saveAssessment: (sessionId, table) => saveAssessment(sessionId, table),

    loadAssessment(sessionId, kind) {
      const rows = z
        .array(AssessmentRowSchema)
        .parse(
          db
            .prepare(
              `select filename, employee, email, job_title, department, skill, rating
               from assessments where session_id = ? and assessment_type = ? order by position`
            )
            .all(sessionId, kind)
        );
      if (!rows.length) return null;

      const skills: string[] = [];
      const byEmployee = new Map<string, NormalizedAssessment["rows"][number]>();
      for (const row of rows) {
        if (!skills.includes(row.skill)) skills.push(row.skill);
        let assessment = byEmployee.get(row.employee);
        if (!assessment) {
          assessment = {
            employee: row.employee,
            email: row.email,
            job_title: row.job_title,
            department: row.department,
            ratings: {},
          };
          byEmployee.set(row.employee, assessment);
        }
        assessment.ratings[row.skill] = row.rating;
      }

      const assessments = [...byEmployee.values()];
      return {
        kind,
        filename: rows[0].filename,
        columns: [],
        skills,
        rows: assessments,
        stats: {
          rows_in: assessments.length,
          rows_kept: assessments.length,
          rows_missing_name: 0,
          rows_duplicate_name: 0,
          cells_non_numeric: 0,
          cells_clamped: 0,
        },
      };
    },

    saveSkillsMatrix: (sessionId, matrix) => saveSkillsMatrix(sessionId, matrix),

    loadSkillsMatrix(sessionId) {
      const rows = z
        .array(MatrixRowSchema)
        .parse(
          db
            .prepare(
              `select format, skill, job_title, department, required_level
               from skills_matrix where session_id = ? order by position`
            )
            .all(sessionId)
        );
      if (!rows.length) return null;
      return {
        format: rows[0].format,
        entries: rows.map((row) => ({
          skill: row.skill,
          required_level: row.required_level,
          job_title: row.job_title || null,
          department: row.department || null,
        })),
        stats: {
          rows_in: rows.length,
          cells_skipped: 0,
          rows_skipped: 0,
          duplicate_entries: 0,
          used_first_row_fallback: false,
        },
      };
    },

    saveMergedTable: (sessionId, table) => saveMergedTable(sessionId, table),

    loadMergedTable(sessionId) {
      const rows: FlatSkillRow[] = z
        .array(ProcessedRowSchema)
        .parse(
          db
            .prepare(
              `select employee, email, job_title, department, skill, self_rating, manager_rating,
                      average_rating, perception_gap, required_level, matrix_gap
               from processed_assessments where session_id = ? order by position`
            )
            .all(sessionId)
        );
      return rows.length ? fromFlatRows(rows) : null;
    },

    saveGapAnalysis: (sessionId, gaps, threshold) => saveGapAnalysis(sessionId, gaps, threshold),

    loadGapAnalysis(sessionId, gapType) {
      const statement = gapType
        ? db.prepare(
            `select employee, gap_type, avg_skill_level, avg_gap_score, max_gap, significant_gaps_count,
                    has_gaps, significant_gaps, strengths, development_areas
             from gap_analysis where session_id = ? and gap_type = ? order by gap_type, position`
          )
        : db.prepare(
            `select employee, gap_type, avg_skill_level, avg_gap_score, max_gap, significant_gaps_count,
                    has_gaps, significant_gaps, strengths, development_areas
             from gap_analysis where session_id = ? order by gap_type, position`
          );
      const raw = gapType ? statement.all(sessionId, gapType) : statement.all(sessionId);
      return z
        .array(GapRowSchema)
        .parse(raw)
        .map((row) => ({
          employee: row.employee,
          avg_skill_level: row.avg_skill_level,
          avg_gap_score: row.avg_gap_score,
          max_gap: row.max_gap,
          significant_gaps_count: row.significant_gaps_count,
          has_gaps: row.has_gaps === 1,
          significant_gaps: parseJsonList(SignificantGapSchema, row.significant_gaps),
          strengths: parseJsonList(RatedSkillSchema, row.strengths),
          development_areas: parseJsonList(RatedSkillSchema, row.development_areas),
          gap_type: row.gap_type,
        }));
    },

    listSessions() {
      const raw = db
        .prepare(
          `select session_id,
                  sum(kind = 'assessments') as assessment_rows,
                  sum(kind = 'skills_matrix') as matrix_entries,
                  sum(kind = 'processed_assessments') as processed_rows,
                  sum(kind = 'gap_analysis') as gap_records,
                  max(created_at) as updated_at
           from (
             select session_id, 'assessments' as kind, created_at from assessments
             union all select session_id, 'skills_matrix', created_at from skills_matrix
             union all select session_id, 'processed_assessments', created_at from processed_assessments
             union all select session_id, 'gap_analysis', created_at from gap_analysis
           )
           group by session_id
           order by updated_at desc, session_id`
        )
        .all();
      return z.array(SessionRowSchema).parse(raw);
    },

    deleteSession: (sessionId) => deleteSession(sessionId),

    close: () => {
      db.close();
    },
  };
}
