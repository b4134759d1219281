import fs from "node:fs/promises";
import path from "node:path";

import { AuditLogger } from "./audit_logger";
import { parseFile } from "./file_parsers";
import { calculateGaps, getOrganizationInsights, getSkillDistribution, resolveGapType } from "./gap_analyzer";
import { normalizeOrThrow } from "./normalizer";
import { createSession, ensureMerged, withAssessment, withSkillsMatrix } from "./session";
import type { Session } from "./session";
import type {
  GapRecord,
  GapType,
  MergedTable,
  OrganizationInsights,
  RawAssessmentTable,
  SkillDistribution,
} from "./types";

export type SkillsAuditInput = {
  employee: RawAssessmentTable;
  manager: RawAssessmentTable;
  matrix?: RawAssessmentTable | null;
  config: { gap_threshold: number; gap_type: GapType };
  logger?: AuditLogger;
  session?: Session;
};

export type SkillsAuditResult = {
  session: Session;
  merged: MergedTable;
  gap_type: GapType;
  gaps: GapRecord[];
  insights: OrganizationInsights;
  distributions: SkillDistribution[];
};

export async function readUpload(filePath: string): Promise<RawAssessmentTable> {
  const buffer = await fs.readFile(filePath);
  return parseFile(path.basename(filePath), buffer);
}

export function runSkillsAudit(input: SkillsAuditInput): SkillsAuditResult {
  const logger = input.logger ?? new AuditLogger();
  const started = Date.now();
  let session = input.session ?? createSession();
  logger.setSession(session.id);
  logger.logEvent("audit.started", {
    employee_file: input.employee.filename,
    manager_file: input.manager.filename,
    matrix_file: input.matrix?.filename ?? null,
    gap_type: input.config.gap_type,
    gap_threshold: input.config.gap_threshold,
  });

  try {
    const employee = normalizeOrThrow(input.employee, "employee");
    logger.logEvent("normalize.employee", { skills: employee.skills.length, ...employee.stats });
    const manager = normalizeOrThrow(input.manager, "manager");
    logger.logEvent("normalize.manager", { skills: manager.skills.length, ...manager.stats });
    session = withAssessment(withAssessment(session, "employee", employee), "manager", manager);

    if (input.matrix) {
      const matrix = normalizeOrThrow(input.matrix, "skills_matrix");
      logger.logEvent("normalize.skills_matrix", {
        format: matrix.format,
        entries: matrix.entries.length,
        ...matrix.stats,
      });
      session = withSkillsMatrix(session, matrix);
    }

    session = ensureMerged(session);
    const merged = session.merged;
    if (!merged) {
      throw new Error(`Session ${session.id} could not be merged`);
    }
    logger.logEvent("merge.completed", { skills: merged.skills.length, ...merged.stats });

    const gap_type = resolveGapType(merged, input.config.gap_type);
    if (gap_type !== input.config.gap_type) {
      logger.logEvent("gaps.gap_type_fallback", { requested: input.config.gap_type, used: gap_type });
    }
    const gaps = calculateGaps(merged, { gap_type, threshold: input.config.gap_threshold });
    const insights = getOrganizationInsights(merged);
    const distributions = merged.skills
      .map((skill) => getSkillDistribution(merged, skill, input.config.gap_threshold))
      .filter((distribution): distribution is SkillDistribution => distribution !== null);

    logger.logDuration("audit.completed", started, {
      employees: gaps.length,
      employees_with_gaps: gaps.filter((gap) => gap.has_gaps).length,
    });

    return { session, merged, gap_type, gaps, insights, distributions };
  } catch (error) {
    logger.logDuration("audit.failed", started, { error: AuditLogger.serializeError(error) });
    throw error;
  }
}
