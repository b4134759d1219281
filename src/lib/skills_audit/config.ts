import path from "node:path";
import { z } from "zod";

import { ConfigError } from "./errors";

export const SkillsAuditConfigSchema = z.object({
  gap_threshold: z.number().min(0).max(5),
  gap_type: z.enum(["perception", "matrix"]),
  timeline_weeks: z.number().int().min(4),
  db_path: z.string().min(1),
  log_dir: z.string().min(1),
});
export type SkillsAuditConfig = z.infer<typeof SkillsAuditConfigSchema>;

export type SkillsAuditConfigOverrides = Partial<Record<keyof SkillsAuditConfig, string | number | undefined>>;

type Env = Record<string, string | undefined>;

function readNumber(value: string | number | undefined, fallback: number) {
  if (value === undefined || value === "") return fallback;
  return typeof value === "number" ? value : Number(value);
}

function readString(value: string | number | undefined, fallback: string) {
  if (value === undefined || value === "") return fallback;
  return String(value);
}

/**
 * Resolves configuration from the environment, with explicit overrides (CLI
 * flags) taking precedence. Every invalid field is reported in one ConfigError.
 */
export function getSkillsAuditConfig(env: Env = process.env, overrides: SkillsAuditConfigOverrides = {}) {
  const candidate = {
    gap_threshold: readNumber(overrides.gap_threshold ?? env.SKILLS_GAP_THRESHOLD, 2.0),
    gap_type: readString(overrides.gap_type ?? env.SKILLS_GAP_TYPE, "perception").toLowerCase(),
    timeline_weeks: readNumber(overrides.timeline_weeks ?? env.SKILLS_TIMELINE_WEEKS, 12),
    db_path: readString(overrides.db_path ?? env.SKILLS_DB_PATH, path.resolve("tmp", "skills_audit.db")),
    log_dir: readString(overrides.log_dir ?? env.SKILLS_LOG_DIR, path.resolve("runs")),
  };

  const parsed = SkillsAuditConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }
  return parsed.data;
}
