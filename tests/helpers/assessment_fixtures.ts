import fs from "node:fs";
import path from "node:path";

import { parseCsvText } from "../../src/lib/skills_audit/file_parsers";
import { merge } from "../../src/lib/skills_audit/merger";
import { normalizeOrThrow } from "../../src/lib/skills_audit/normalizer";
import type { MergedTable, RawAssessmentTable } from "../../src/lib/skills_audit/types";

export function rawTable(filename: string, headers: string[], rows: string[][]): RawAssessmentTable {
  return { filename, headers, rows };
}

export function fixturePath(name: string) {
  return path.resolve("fixtures", name);
}

export function loadFixtureTable(name: string): RawAssessmentTable {
  return parseCsvText(name, fs.readFileSync(fixturePath(name), "utf8"));
}

/** Alice, Bob and Carol self-assess; the manager file covers Alice, Bob and Dan. */
export function buildSampleMergedTable(options: { matrix?: "long" | "wide" } = {}): MergedTable {
  const employee = normalizeOrThrow(loadFixtureTable("employee_assessment.csv"), "employee");
  const manager = normalizeOrThrow(loadFixtureTable("manager_assessment.csv"), "manager");
  const matrix = options.matrix
    ? normalizeOrThrow(loadFixtureTable(`skills_matrix_${options.matrix}.csv`), "skills_matrix")
    : null;
  return merge(employee, manager, matrix);
}

/** Self {Communication 4, Leadership 2} against manager {Communication 5, Leadership 2}. */
export function buildAliceTable(): MergedTable {
  const employee = normalizeOrThrow(
    rawTable("self.csv", ["Employee Name", "Communication", "Leadership"], [["Alice", "4", "2"]]),
    "employee"
  );
  const manager = normalizeOrThrow(
    rawTable("manager.csv", ["Employee Name", "Communication", "Leadership"], [["Alice", "5", "2"]]),
    "manager"
  );
  return merge(employee, manager);
}
