import { describe, expect, it } from "vitest";

import { NoCommonSkillsError } from "../src/lib/skills_audit/errors";
import { calculateGaps } from "../src/lib/skills_audit/gap_analyzer";
import { averageOfPresent, getSkillsList, merge, perceptionGap } from "../src/lib/skills_audit/merger";
import { normalizeOrThrow } from "../src/lib/skills_audit/normalizer";
import type { NormalizedAssessment } from "../src/lib/skills_audit/types";
import { buildAliceTable, buildSampleMergedTable, rawTable } from "./helpers/assessment_fixtures";

describe("merger", () => {
  it("averages only the ratings that are present", () => {
    expect(averageOfPresent(4, 5)).toBe(4.5);
    expect(averageOfPresent(0, 3)).toBe(3);
    expect(averageOfPresent(0, 0)).toBe(0);
  });

  it("computes perception gaps only when both sides rated", () => {
    expect(perceptionGap(3, 5)).toBe(2);
    expect(perceptionGap(5, 4)).toBe(-1);
    expect(perceptionGap(0, 4)).toBe(0);
  });

  it("merges a single employee rated by both sides", () => {
    const table = buildAliceTable();
    expect(table.skills).toEqual(["Communication", "Leadership"]);
    expect(table.records).toHaveLength(1);
    expect(table.records[0].skills.Communication).toEqual({
      self_rating: 4,
      manager_rating: 5,
      average_rating: 4.5,
      perception_gap: 1,
      required_level: null,
      matrix_gap: null,
    });
    expect(table.records[0].skills.Leadership.average_rating).toBe(2);
    expect(table.records[0].skills.Leadership.perception_gap).toBe(0);
    expect(table.has_matrix).toBe(false);
  });

  it("outer-joins on the standardised name", () => {
    const table = buildSampleMergedTable();
    expect(table.records.map((record) => record.employee)).toEqual([
      "Alice Smith",
      "Bob Jones",
      "Carol White",
      "Dan Brown",
    ]);
    expect(table.stats.employees).toBe(4);
    expect(table.stats.self_only).toBe(1);
    expect(table.stats.manager_only).toBe(1);

    const alice = table.records[0];
    expect(alice.email).toBe("alice@example.com");
    expect(alice.job_title).toBe("Analyst");
    expect(alice.department).toBe("Finance");
  });

  it("keeps manager-only employees with manager ratings alone", () => {
    const dan = buildSampleMergedTable().records[3];
    expect(dan.job_title).toBeNull();
    for (const scores of Object.values(dan.skills)) {
      expect(scores.self_rating).toBe(0);
      expect(scores.average_rating).toBe(scores.manager_rating);
      expect(scores.perception_gap).toBe(0);
    }
    expect(dan.skills.Communication.average_rating).toBe(3);
  });

  it("holds the average and gap invariants for every cell", () => {
    const table = buildSampleMergedTable();
    for (const record of table.records) {
      for (const skill of getSkillsList(table)) {
        const scores = record.skills[skill];
        expect(scores.average_rating === 0).toBe(scores.self_rating === 0 && scores.manager_rating === 0);
        const bothPresent = scores.self_rating > 0 && scores.manager_rating > 0;
        expect(scores.perception_gap).toBe(bothPresent ? scores.manager_rating - scores.self_rating : 0);
      }
    }
  });

  it("resolves required levels through the matrix fallback", () => {
    const table = buildSampleMergedTable({ matrix: "long" });
    expect(table.has_matrix).toBe(true);
    expect(table.stats.required_level_sources).toEqual({
      job_title_department: 2,
      job_title: 3,
      department: 1,
      global: 6,
      default: 0,
    });

    const [alice, bob, carol, dan] = table.records;
    expect(alice.skills["Technical Skills"]).toMatchObject({ required_level: 2, matrix_gap: 2 });
    expect(bob.skills.Communication).toMatchObject({ required_level: 3, matrix_gap: 1.5 });
    expect(carol.skills.Leadership).toMatchObject({ required_level: 3, matrix_gap: -2 });
    expect(dan.skills["Technical Skills"]).toMatchObject({ required_level: 4, matrix_gap: -2 });
  });

  it("scores a manager against the matrix level for their job title", () => {
    const employee = normalizeOrThrow(
      rawTable("self.csv", ["Employee Name", "Job Title", "Communication"], [["Bob", "Manager", "5"]]),
      "employee"
    );
    const manager = normalizeOrThrow(rawTable("mgr.csv", ["Employee Name", "Communication"], [["Bob", "5"]]), "manager");
    const matrix = normalizeOrThrow(
      rawTable("matrix.csv", ["Skill", "Required Level", "Job Title"], [["Communication", "3", "Manager"]]),
      "skills_matrix"
    );

    const table = merge(employee, manager, matrix);
    expect(table.records[0].skills.Communication).toMatchObject({ average_rating: 5, required_level: 3, matrix_gap: 2 });
    expect(table.stats.required_level_sources.job_title).toBe(1);

    const [bob] = calculateGaps(table, { gap_type: "matrix", threshold: 2 });
    expect(bob.gap_type).toBe("matrix");
    expect(bob.has_gaps).toBe(true);
    expect(bob.significant_gaps).toEqual([
      { skill: "Communication", gap_value: 2, direction: "Above standard", gap_type: "matrix" },
    ]);
  });

  it("takes the union of skills when a column exists in one file only", () => {
    const employee = normalizeOrThrow(rawTable("self.csv", ["Employee Name", "Communication"], [["Alice", "4"]]), "employee");
    const manager = normalizeOrThrow(
      rawTable("mgr.csv", ["Employee Name", "Communication", "Leadership"], [["Alice", "5", "3"]]),
      "manager"
    );

    const table = merge(employee, manager);
    expect(getSkillsList(table)).toEqual(["Communication", "Leadership"]);
    expect(table.records[0].skills.Leadership).toEqual({
      self_rating: 0,
      manager_rating: 3,
      average_rating: 3,
      perception_gap: 0,
      required_level: null,
      matrix_gap: null,
    });
  });

  it("rejects assessments with no skills on either side", () => {
    const empty: NormalizedAssessment = {
      kind: "employee",
      filename: "self.csv",
      columns: [],
      skills: [],
      rows: [],
      stats: { rows_in: 0, rows_kept: 0, rows_missing_name: 0, rows_duplicate_name: 0, cells_non_numeric: 0, cells_clamped: 0 },
    };
    expect(() => merge(empty, { ...empty, kind: "manager" })).toThrow(NoCommonSkillsError);
  });
});
