export type AssessmentKind = "employee" | "manager" | "skills_matrix";
export type RaterKind = Exclude<AssessmentKind, "skills_matrix">;

export type GapType = "perception" | "matrix";

export type RawAssessmentTable = {
  filename: string;
  headers: string[];
  rows: string[][];
};

export type ColumnRole =
  | "name"
  | "email"
  | "job_title"
  | "department"
  | "metadata"
  | "skill"
  | "other";

export type ColumnDescriptor = {
  index: number;
  header: string;
  role: ColumnRole;
  numeric_values: number;
};

export type AssessmentRow = {
  employee: string;
  email: string | null;
  job_title: string | null;
  department: string | null;
  ratings: Record<string, number>;
};

export type NormalizationStats = {
  rows_in: number;
  rows_kept: number;
  rows_missing_name: number;
  rows_duplicate_name: number;
  cells_non_numeric: number;
  cells_clamped: number;
};

export type NormalizedAssessment = {
  kind: RaterKind;
  filename: string;
  columns: ColumnDescriptor[];
  skills: string[];
  rows: AssessmentRow[];
  stats: NormalizationStats;
};

export type SkillsMatrixEntry = {
  skill: string;
  required_level: number;
  job_title: string | null;
  department: string | null;
};

export type SkillsMatrixFormat = "wide" | "long" | "unrecognized";

export type SkillsMatrixStats = {
  rows_in: number;
  cells_skipped: number;
  rows_skipped: number;
  duplicate_entries: number;
  used_first_row_fallback: boolean;
};

export type SkillsMatrix = {
  format: SkillsMatrixFormat;
  entries: SkillsMatrixEntry[];
  stats: SkillsMatrixStats;
};

export type NormalizedTable = NormalizedAssessment | SkillsMatrix;

export type RequiredLevelSource =
  | "job_title_department"
  | "job_title"
  | "department"
  | "global"
  | "default";

export type SkillScores = {
  self_rating: number;
  manager_rating: number;
  average_rating: number;
  perception_gap: number;
  required_level: number | null;
  matrix_gap: number | null;
};

export type MergedEmployeeRecord = {
  employee: string;
  email: string | null;
  job_title: string | null;
  department: string | null;
  skills: Record<string, SkillScores>;
};

export type MergeStats = {
  employees: number;
  self_only: number;
  manager_only: number;
  required_level_sources: Record<RequiredLevelSource, number>;
};

export type MergedTable = {
  skills: string[];
  records: MergedEmployeeRecord[];
  has_matrix: boolean;
  stats: MergeStats;
};

export type SignificantGap = {
  skill: string;
  gap_value: number;
  direction: string;
  gap_type: GapType;
};

export type RatedSkill = {
  skill: string;
  rating: number;
};

export type GapRecord = {
  employee: string;
  avg_skill_level: number;
  avg_gap_score: number;
  max_gap: number;
  significant_gaps_count: number;
  has_gaps: boolean;
  significant_gaps: SignificantGap[];
  strengths: RatedSkill[];
  development_areas: RatedSkill[];
  gap_type: GapType;
};

export type GapAnalysisOptions = {
  gap_type: GapType;
  threshold: number;
};

export type SkillAverage = {
  skill: string;
  average_rating: number;
  employee_count: number;
};

export type HighPerformer = {
  employee: string;
  average_skill: number;
};

export type OrganizationInsights = {
  total_employees: number;
  skills_assessed: number;
  overall_skill_strengths: SkillAverage[];
  overall_skill_gaps: SkillAverage[];
  high_performers: HighPerformer[];
};

export type RatingBucket = 1 | 2 | 3 | 4 | 5;

export type SkillGapBreakdown = {
  average_gap: number;
  positive_gaps: number;
  negative_gaps: number;
  no_gaps: number;
  significant_gaps: number;
};

export type SkillDistribution = {
  skill: string;
  total_assessments: number;
  average_rating: number;
  median_rating: number;
  std_deviation: number;
  min_rating: number;
  max_rating: number;
  rating_distribution: Record<RatingBucket, number>;
  gap_analysis: SkillGapBreakdown | null;
};
