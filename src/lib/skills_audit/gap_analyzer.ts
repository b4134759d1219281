// =============================================================================
// Gap analysis over a merged assessment table.
//
// Pure functions of (table, threshold, gap type). Nothing here throws on a
// well-formed table; missing data degrades to empty lists and zero scores.
//
// Cut-offs:
//   strength           average_rating >= 4.0
//   development area   0 < average_rating <= 2.5
//   org strength       skill mean >= 3.5, otherwise an org gap
//   high performers    top max(1, ceil(N / 5)) employees
// =============================================================================

import type {
  GapAnalysisOptions,
  GapRecord,
  GapType,
  HighPerformer,
  MergedEmployeeRecord,
  MergedTable,
  OrganizationInsights,
  RatedSkill,
  RatingBucket,
  SignificantGap,
  SkillAverage,
  SkillDistribution,
  SkillGapBreakdown,
} from "./types";

export const STRENGTH_THRESHOLD = 4.0;
export const DEVELOPMENT_THRESHOLD = 2.5;
export const ORG_STRENGTH_THRESHOLD = 3.5;
export const HIGH_PERFORMER_SHARE = 5;

const RATING_BUCKETS: RatingBucket[] = [1, 2, 3, 4, 5];

// ─── Helpers ──────────────────────────────────────────────────────────────────

function mean(values: number[]) {
  return values.length ? values.reduce((sum, value) => sum + value, 0) / values.length : 0;
}

function median(values: number[]) {
  if (!values.length) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/** Sample standard deviation (n − 1). Zero when fewer than two values. */
function sampleStdDev(values: number[]) {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const squares = values.reduce((sum, value) => sum + (value - avg) ** 2, 0);
  return Math.sqrt(squares / (values.length - 1));
}

/** Round half to even, so an average of 4.5 lands in bucket 4 and 3.5 in bucket 4. */
export function roundHalfEven(value: number) {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (Math.abs(diff - 0.5) > 1e-9) return Math.round(value);
  return floor % 2 === 0 ? floor : floor + 1;
}

export function resolveGapType(table: MergedTable, requested: GapType): GapType {
  return requested === "matrix" && table.has_matrix ? "matrix" : "perception";
}

function selectedGap(record: MergedEmployeeRecord, skill: string, gapType: GapType): number | null {
  const scores = record.skills[skill];
  if (!scores) return null;
  return gapType === "matrix" ? scores.matrix_gap : scores.perception_gap;
}

function gapDirection(gapValue: number, gapType: GapType) {
  if (gapType === "matrix") {
    return gapValue > 0 ? "Above standard" : "Below standard";
  }
  return gapValue > 0 ? "Manager rates higher" : "Self-rates higher";
}

export function employeeAverageSkill(table: MergedTable, record: MergedEmployeeRecord) {
  const present = table.skills
    .map((skill) => record.skills[skill]?.average_rating ?? 0)
    .filter((rating) => rating > 0);
  return mean(present);
}

function ratedSkills(table: MergedTable, record: MergedEmployeeRecord, keep: (rating: number) => boolean) {
  const rated: RatedSkill[] = [];
  for (const skill of table.skills) {
    const rating = record.skills[skill]?.average_rating ?? 0;
    if (keep(rating)) rated.push({ skill, rating });
  }
  return rated;
}

// ─── Per-employee gaps ────────────────────────────────────────────────────────

export function analyzeEmployee(
  table: MergedTable,
  record: MergedEmployeeRecord,
  gapType: GapType,
  threshold: number
): GapRecord {
  const gaps: Array<{ skill: string; gap: number }> = [];
  for (const skill of table.skills) {
    const gap = selectedGap(record, skill, gapType);
    if (gap !== null) gaps.push({ skill, gap });
  }

  // A skill rated by one side only has perception gap 0 and still counts here.
  // TODO: confirm with product whether one-sided skills should leave avg_gap_score.
  const absolute = gaps.map(({ gap }) => Math.abs(gap));
  const avg_gap_score = mean(absolute);

  const significant_gaps: SignificantGap[] = gaps
    .filter(({ gap }) => Math.abs(gap) >= threshold)
    .map(({ skill, gap }) => ({
      skill,
      gap_value: gap,
      direction: gapDirection(gap, gapType),
      gap_type: gapType,
    }))
    .sort((a, b) => Math.abs(b.gap_value) - Math.abs(a.gap_value));

  const strengths = ratedSkills(table, record, (rating) => rating >= STRENGTH_THRESHOLD).sort(
    (a, b) => b.rating - a.rating
  );
  const development_areas = ratedSkills(
    table,
    record,
    (rating) => rating > 0 && rating <= DEVELOPMENT_THRESHOLD
  ).sort((a, b) => a.rating - b.rating);

  return {
    employee: record.employee,
    avg_skill_level: employeeAverageSkill(table, record),
    avg_gap_score,
    max_gap: absolute.length ? Math.max(...absolute) : 0,
    significant_gaps_count: significant_gaps.length,
    has_gaps: avg_gap_score >= threshold,
    significant_gaps,
    strengths,
    development_areas,
    gap_type: gapType,
  };
}

/**
 * One GapRecord per employee, in table order. Asking for matrix gaps on a
 * table merged without a matrix falls back to perception gaps; the fallback
 * shows in each record's gap_type.
 */
export function calculateGaps(table: MergedTable, options: GapAnalysisOptions): GapRecord[] {
  if (table.records.length === 0) return [];
  const gapType = resolveGapType(table, options.gap_type);
  return table.records.map((record) => analyzeEmployee(table, record, gapType, options.threshold));
}

// ─── Organisation insights ────────────────────────────────────────────────────

export function emptyInsights(): OrganizationInsights {
  return {
    total_employees: 0,
    skills_assessed: 0,
    overall_skill_strengths: [],
    overall_skill_gaps: [],
    high_performers: [],
  };
}

export function highPerformerCount(employeeCount: number) {
  return Math.max(1, Math.ceil(employeeCount / HIGH_PERFORMER_SHARE));
}

export function getOrganizationInsights(table: MergedTable): OrganizationInsights {
  if (table.records.length === 0) return emptyInsights();

  const strengths: SkillAverage[] = [];
  const gaps: SkillAverage[] = [];
  for (const skill of table.skills) {
    const ratings = table.records
      .map((record) => record.skills[skill]?.average_rating ?? 0)
      .filter((rating) => rating > 0);
    if (!ratings.length) continue;
    const summary = { skill, average_rating: mean(ratings), employee_count: ratings.length };
    (summary.average_rating >= ORG_STRENGTH_THRESHOLD ? strengths : gaps).push(summary);
  }
  strengths.sort((a, b) => b.average_rating - a.average_rating);
  gaps.sort((a, b) => a.average_rating - b.average_rating);

  const ranked: HighPerformer[] = table.records
    .map((record) => ({ employee: record.employee, average_skill: employeeAverageSkill(table, record) }))
    .sort((a, b) => b.average_skill - a.average_skill);

  return {
    total_employees: table.records.length,
    skills_assessed: table.skills.length,
    overall_skill_strengths: strengths,
    overall_skill_gaps: gaps,
    high_performers: ranked.slice(0, highPerformerCount(table.records.length)),
  };
}

// ─── Skill distribution ───────────────────────────────────────────────────────

function gapBreakdown(gaps: number[], threshold: number): SkillGapBreakdown {
  return {
    average_gap: mean(gaps),
    positive_gaps: gaps.filter((gap) => gap > 0).length,
    negative_gaps: gaps.filter((gap) => gap < 0).length,
    no_gaps: gaps.filter((gap) => gap === 0).length,
    significant_gaps: gaps.filter((gap) => Math.abs(gap) >= threshold).length,
  };
}

/**
 * Distribution of one skill's averages across every employee. An unrated
 * employee counts with average 0 in the statistics but lands in no bucket.
 */
export function getSkillDistribution(
  table: MergedTable,
  skill: string,
  threshold: number
): SkillDistribution | null {
  if (table.records.length === 0 || !table.skills.includes(skill)) return null;

  const ratings = table.records.map((record) => record.skills[skill]?.average_rating ?? 0);

  const rating_distribution: Record<RatingBucket, number> = { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 };
  for (const rating of ratings) {
    const bucket = RATING_BUCKETS.find((candidate) => candidate === roundHalfEven(rating));
    if (bucket !== undefined) rating_distribution[bucket] += 1;
  }

  const gaps = table.records.map((record) => record.skills[skill]?.perception_gap ?? 0);

  return {
    skill,
    total_assessments: ratings.length,
    average_rating: mean(ratings),
    median_rating: median(ratings),
    std_deviation: sampleStdDev(ratings),
    min_rating: ratings.length ? Math.min(...ratings) : 0,
    max_rating: ratings.length ? Math.max(...ratings) : 0,
    rating_distribution,
    gap_analysis: gaps.length ? gapBreakdown(gaps, threshold) : null,
  };
}
