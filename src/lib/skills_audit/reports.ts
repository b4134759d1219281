/**
 * Organisation-level reports built from gap records: the executive summary
 * and the development-priority ranking.
 */

import type { Priority } from "./training_plan";
import type { GapRecord, OrganizationInsights } from "./types";

export type ExecutiveSummary = {
  total_employees: number;
  skills_assessed: number;
  employees_with_gaps: number;
  /** 0..100 */
  gap_percentage: number;
  avg_skill_level: number;
};

export type DevelopmentPriority = {
  employee: string;
  priority_score: number;
  priority_level: Priority;
  avg_skill_level: number;
  avg_gap_score: number;
  significant_gaps_count: number;
  development_areas_count: number;
  focus_areas: string[];
};

export type DevelopmentPriorityReport = {
  priorities: DevelopmentPriority[];
  counts: Record<Priority, number>;
};

const MAX_RATING = 5;
const HIGH_PRIORITY_SCORE = 6;
const MEDIUM_PRIORITY_SCORE = 3;
const FOCUS_AREAS = 2;

export function getExecutiveSummary(gaps: GapRecord[], insights: OrganizationInsights): ExecutiveSummary {
  const employees_with_gaps = gaps.filter((gap) => gap.has_gaps).length;
  const total = insights.total_employees;
  return {
    total_employees: total,
    skills_assessed: insights.skills_assessed,
    employees_with_gaps,
    gap_percentage: total > 0 ? (employees_with_gaps / total) * 100 : 0,
    avg_skill_level: gaps.length ? gaps.reduce((sum, gap) => sum + gap.avg_skill_level, 0) / gaps.length : 0,
  };
}

// Weighs perception misalignment double against distance from the top of the scale.
export function priorityScore(gap: Pick<GapRecord, "avg_gap_score" | "avg_skill_level">) {
  return gap.avg_gap_score * 2 + (MAX_RATING - gap.avg_skill_level);
}

export function priorityLevel(score: number): Priority {
  if (score >= HIGH_PRIORITY_SCORE) return "High";
  if (score >= MEDIUM_PRIORITY_SCORE) return "Medium";
  return "Low";
}

/** Employees by priority score, highest first; ties keep gap-record order. */
export function getDevelopmentPriorities(gaps: GapRecord[]): DevelopmentPriorityReport {
  const priorities = gaps
    .map((gap) => {
      const priority_score = priorityScore(gap);
      return {
        employee: gap.employee,
        priority_score,
        priority_level: priorityLevel(priority_score),
        avg_skill_level: gap.avg_skill_level,
        avg_gap_score: gap.avg_gap_score,
        significant_gaps_count: gap.significant_gaps_count,
        development_areas_count: gap.development_areas.length,
        focus_areas: gap.development_areas.slice(0, FOCUS_AREAS).map((area) => area.skill),
      };
    })
    .sort((a, b) => b.priority_score - a.priority_score);

  const counts: Record<Priority, number> = { High: 0, Medium: 0, Low: 0 };
  for (const item of priorities) counts[item.priority_level] += 1;

  return { priorities, counts };
}
