/**
 * Reconcile self- and manager-assessments into one record per employee.
 *
 * The join is an outer join on the standardised employee name. A skill rated
 * by only one side still takes part; the other side counts as "no rating" (0).
 */

import { NoCommonSkillsError } from "./errors";
import { createRequiredLevelLookup } from "./skills_matrix";
import type {
  AssessmentRow,
  MergeStats,
  MergedEmployeeRecord,
  MergedTable,
  NormalizedAssessment,
  RequiredLevelSource,
  SkillScores,
  SkillsMatrix,
} from "./types";

export function averageOfPresent(selfRating: number, managerRating: number) {
  const present = [selfRating, managerRating].filter((rating) => rating > 0);
  return present.length ? present.reduce((sum, rating) => sum + rating, 0) / present.length : 0;
}

export function perceptionGap(selfRating: number, managerRating: number) {
  return selfRating > 0 && managerRating > 0 ? managerRating - selfRating : 0;
}

function unionSkills(employee: NormalizedAssessment, manager: NormalizedAssessment) {
  const skills = [...employee.skills];
  const seen = new Set(skills);
  for (const skill of manager.skills) {
    if (!seen.has(skill)) {
      seen.add(skill);
      skills.push(skill);
    }
  }
  return skills;
}

function indexByEmployee(rows: AssessmentRow[]) {
  const index = new Map<string, AssessmentRow>();
  for (const row of rows) {
    if (!index.has(row.employee)) index.set(row.employee, row);
  }
  return index;
}

function emptySourceCounts(): Record<RequiredLevelSource, number> {
  return { job_title_department: 0, job_title: 0, department: 0, global: 0, default: 0 };
}

export function merge(
  employeeTable: NormalizedAssessment,
  managerTable: NormalizedAssessment,
  matrix?: SkillsMatrix | null
): MergedTable {
  const skills = unionSkills(employeeTable, managerTable);
  if (skills.length === 0) {
    throw new NoCommonSkillsError();
  }

  const selfRows = indexByEmployee(employeeTable.rows);
  const managerRows = indexByEmployee(managerTable.rows);
  const names = [...selfRows.keys()];
  for (const name of managerRows.keys()) {
    if (!selfRows.has(name)) names.push(name);
  }

  const lookup = matrix ? createRequiredLevelLookup(matrix) : null;
  const stats: MergeStats = {
    employees: names.length,
    self_only: 0,
    manager_only: 0,
    required_level_sources: emptySourceCounts(),
  };

  const records: MergedEmployeeRecord[] = names.map((employee) => {
    const self = selfRows.get(employee);
    const manager = managerRows.get(employee);
    if (self && !manager) stats.self_only += 1;
    if (manager && !self) stats.manager_only += 1;

    const job_title = self?.job_title ?? manager?.job_title ?? null;
    const department = self?.department ?? manager?.department ?? null;

    const scores: Record<string, SkillScores> = {};
    for (const skill of skills) {
      const self_rating = self?.ratings[skill] ?? 0;
      const manager_rating = manager?.ratings[skill] ?? 0;
      const average_rating = averageOfPresent(self_rating, manager_rating);

      let required_level: number | null = null;
      let matrix_gap: number | null = null;
      if (lookup) {
        const required = lookup(skill, job_title, department);
        stats.required_level_sources[required.source] += 1;
        required_level = required.level;
        matrix_gap = average_rating - required.level;
      }

      scores[skill] = {
        self_rating,
        manager_rating,
        average_rating,
        perception_gap: perceptionGap(self_rating, manager_rating),
        required_level,
        matrix_gap,
      };
    }

    return {
      employee,
      email: self?.email ?? manager?.email ?? null,
      job_title,
      department,
      skills: scores,
    };
  });

  return { skills, records, has_matrix: lookup !== null, stats };
}

export function getSkillsList(table: MergedTable) {
  return [...table.skills];
}
