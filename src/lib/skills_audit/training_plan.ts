import fs from "node:fs";
import Ajv from "ajv";

import { ConfigError } from "./errors";
import type { GapRecord, MergedEmployeeRecord, RatedSkill, SignificantGap } from "./types";

export type SkillTier = "Beginner" | "Intermediate" | "Advanced" | "All Levels";
export type Priority = "High" | "Medium" | "Low";

export type TrainingResource = {
  title: string;
  type: string;
  provider: string;
  duration: string;
  description: string;
  skill_level: SkillTier;
  url?: string;
};

export type TrainingCatalog = {
  resources: Record<string, TrainingResource[]>;
  synonyms: Record<string, string>;
  /** Resources added by users, keyed by exact skill name. */
  custom?: Record<string, TrainingResource[]>;
};

export type TrainingRecommendation = TrainingResource & {
  skill: string;
  gap_value: number;
  priority: Priority;
};

export type SuccessMetric = {
  skill: string;
  current_gap: number;
  target_improvement: number;
  measurement_method: string;
  target_timeline: string;
};

export type Milestone = {
  week: number;
  milestone: string;
  deliverable: string;
};

export type DevelopmentPlan = {
  employee_name: string;
  plan_created: string;
  plan_duration_weeks: number;
  target_completion: string;
  skills_to_develop: string[];
  current_strengths: string[];
  immediate_priorities: TrainingRecommendation[];
  secondary_development: TrainingRecommendation[];
  success_metrics: SuccessMetric[];
  milestones: Milestone[];
  recommended_resources: TrainingRecommendation[];
};

export type PlanGap = Pick<SignificantGap, "skill" | "gap_value">;

export type PlanOptions = {
  current_ratings?: Record<string, number>;
  catalog?: TrainingCatalog;
  now?: Date;
};

const MAX_RESOURCES_PER_SKILL = 3;
const MAX_TARGET_IMPROVEMENT = 1.5;
const PRIORITY_RANK: Record<Priority, number> = { High: 3, Medium: 2, Low: 1 };
const WEEK_MS = 7 * 24 * 60 * 60 * 1000;

// ─── Catalog ──────────────────────────────────────────────────────────────────

const ajv = new Ajv({ allErrors: true });

const resourceSchema = {
  type: "object",
  additionalProperties: false,
  required: ["title", "type", "provider", "duration", "description", "skill_level"],
  properties: {
    title: { type: "string" },
    type: { type: "string" },
    provider: { type: "string" },
    duration: { type: "string" },
    description: { type: "string" },
    skill_level: { enum: ["Beginner", "Intermediate", "Advanced", "All Levels"] },
    url: { type: "string" },
  },
};

const catalogSchema = {
  type: "object",
  additionalProperties: false,
  required: ["resources", "synonyms"],
  properties: {
    resources: {
      type: "object",
      additionalProperties: { type: "array", items: resourceSchema },
    },
    synonyms: {
      type: "object",
      additionalProperties: { type: "string" },
    },
    custom: {
      type: "object",
      additionalProperties: { type: "array", items: resourceSchema },
    },
  },
};

const validateCatalog = ajv.compile<TrainingCatalog>(catalogSchema);
const validateResource = ajv.compile<TrainingResource>(resourceSchema);

export function validateTrainingCatalog(
  data: unknown
): { ok: true; catalog: TrainingCatalog } | { ok: false; errors: string[] } {
  if (!validateCatalog(data)) {
    return { ok: false, errors: ajv.errorsText(validateCatalog.errors).split(", ") };
  }
  return { ok: true, catalog: data };
}

export function loadTrainingCatalog(file: string | URL = new URL("./training_catalog.json", import.meta.url)) {
  const data: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
  const result = validateTrainingCatalog(data);
  if (!result.ok) {
    throw new ConfigError(result.errors.map((error) => `training catalog ${error}`));
  }
  return result.catalog;
}

let defaultCatalog: TrainingCatalog | null = null;

export function getDefaultCatalog() {
  defaultCatalog ??= loadTrainingCatalog();
  return defaultCatalog;
}

/** Returns a new catalog with `resource` appended to the custom entries for `skill`. */
export function withCustomResource(catalog: TrainingCatalog, skill: string, resource: unknown): TrainingCatalog {
  if (!validateResource(resource)) {
    throw new ConfigError(
      ajv.errorsText(validateResource.errors).split(", ").map((error) => `custom resource for ${skill} ${error}`)
    );
  }
  const custom = catalog.custom ?? {};
  return {
    ...catalog,
    custom: { ...custom, [skill]: [...(custom[skill] ?? []), resource] },
  };
}

// ─── Recommendations ──────────────────────────────────────────────────────────

function catalogResources(skill: string, catalog: TrainingCatalog): TrainingResource[] | null {
  const direct = catalog.resources[skill];
  if (direct) return direct;

  const skillLower = skill.toLowerCase();
  for (const [key, category] of Object.entries(catalog.synonyms)) {
    if (key.includes(skillLower) || skillLower.includes(key)) {
      return catalog.resources[category] ?? [];
    }
  }
  return null;
}

/** Catalog matches followed by custom entries; the generic plan only when both are empty. */
export function findResourcesForSkill(skill: string, catalog: TrainingCatalog): TrainingResource[] {
  const found = catalogResources(skill, catalog);
  const custom = catalog.custom?.[skill] ?? [];
  if (found) return custom.length ? [...found, ...custom] : found;
  if (custom.length) return custom;

  return [
    {
      title: `${skill} Development Plan`,
      type: "Custom Training",
      provider: "Internal",
      duration: "Varies",
      description: `Customized development plan for ${skill}`,
      skill_level: "All Levels",
    },
  ];
}

export function targetTier(currentRating: number): SkillTier {
  if (currentRating <= 2) return "Beginner";
  if (currentRating <= 3.5) return "Intermediate";
  return "Advanced";
}

export function priorityForGap(gapMagnitude: number): Priority {
  if (gapMagnitude >= 2) return "High";
  if (gapMagnitude >= 1) return "Medium";
  return "Low";
}

export function getRecommendedTraining(
  gaps: PlanGap[],
  catalog: TrainingCatalog,
  currentRatings: Record<string, number> = {}
): TrainingRecommendation[] {
  const recommendations: TrainingRecommendation[] = [];

  for (const gap of gaps) {
    const gap_value = Math.abs(gap.gap_value);
    const tier = targetTier(currentRatings[gap.skill] ?? 0);
    const matching = findResourcesForSkill(gap.skill, catalog).filter(
      (resource) => resource.skill_level === tier || resource.skill_level === "All Levels"
    );
    for (const resource of matching.slice(0, MAX_RESOURCES_PER_SKILL)) {
      recommendations.push({ ...resource, skill: gap.skill, gap_value, priority: priorityForGap(gap_value) });
    }
  }

  return recommendations.sort(
    (a, b) => PRIORITY_RANK[b.priority] - PRIORITY_RANK[a.priority] || b.gap_value - a.gap_value
  );
}

// ─── Plan ─────────────────────────────────────────────────────────────────────

export function generateSuccessMetrics(gaps: PlanGap[]): SuccessMetric[] {
  return gaps.map((gap) => {
    const current_gap = Math.abs(gap.gap_value);
    return {
      skill: gap.skill,
      current_gap,
      target_improvement: Math.min(current_gap, MAX_TARGET_IMPROVEMENT),
      measurement_method: "Skills assessment score improvement",
      target_timeline: "3 months",
    };
  });
}

export function generateMilestones(timelineWeeks: number): Milestone[] {
  return [
    {
      week: 2,
      milestone: "Complete initial skills assessment and select training resources",
      deliverable: "Development plan agreement with manager",
    },
    {
      week: 4,
      milestone: "Begin primary skills development activities",
      deliverable: "Training enrollment confirmation",
    },
    {
      week: Math.floor(timelineWeeks / 2),
      milestone: "Mid-point progress review",
      deliverable: "Progress assessment and plan adjustment if needed",
    },
    {
      week: timelineWeeks - 2,
      milestone: "Pre-completion skills assessment",
      deliverable: "Skills improvement measurement",
    },
    {
      week: timelineWeeks,
      milestone: "Development plan completion and evaluation",
      deliverable: "Final assessment and next steps planning",
    },
  ];
}

export function createPlan(
  employee: string,
  significantGaps: PlanGap[],
  strengths: Array<Pick<RatedSkill, "skill">>,
  timelineWeeks: number,
  options: PlanOptions = {}
): DevelopmentPlan {
  const catalog = options.catalog ?? getDefaultCatalog();
  const start = options.now ?? new Date();
  const end = new Date(start.getTime() + timelineWeeks * WEEK_MS);

  const recommended = getRecommendedTraining(significantGaps, catalog, options.current_ratings);

  return {
    employee_name: employee,
    plan_created: start.toISOString().slice(0, 10),
    plan_duration_weeks: timelineWeeks,
    target_completion: end.toISOString().slice(0, 10),
    skills_to_develop: significantGaps.map((gap) => gap.skill),
    current_strengths: strengths.map((strength) => strength.skill),
    immediate_priorities: recommended.filter((item) => item.priority === "High").slice(0, 3),
    secondary_development: recommended.filter((item) => item.priority === "Medium").slice(0, 3),
    success_metrics: generateSuccessMetrics(significantGaps),
    milestones: generateMilestones(timelineWeeks),
    recommended_resources: recommended,
  };
}

/** Plan for one analysed employee, choosing resource tiers from their current averages. */
export function createPlanForEmployee(
  gapRecord: GapRecord,
  mergedRecord: MergedEmployeeRecord,
  timelineWeeks: number,
  options: Omit<PlanOptions, "current_ratings"> = {}
): DevelopmentPlan {
  const current_ratings: Record<string, number> = {};
  for (const [skill, scores] of Object.entries(mergedRecord.skills)) {
    current_ratings[skill] = scores.average_rating;
  }
  return createPlan(gapRecord.employee, gapRecord.significant_gaps, gapRecord.strengths, timelineWeeks, {
    ...options,
    current_ratings,
  });
}
