import { describe, expect, it } from "vitest";

import {
  calculateGaps,
  emptyInsights,
  getOrganizationInsights,
  getSkillDistribution,
  highPerformerCount,
  roundHalfEven,
} from "../src/lib/skills_audit/gap_analyzer";
import { merge } from "../src/lib/skills_audit/merger";
import { normalizeOrThrow } from "../src/lib/skills_audit/normalizer";
import type { MergedTable } from "../src/lib/skills_audit/types";
import { buildAliceTable, buildSampleMergedTable, rawTable } from "./helpers/assessment_fixtures";

const emptyTable: MergedTable = {
  skills: ["Communication"],
  records: [],
  has_matrix: false,
  stats: {
    employees: 0,
    self_only: 0,
    manager_only: 0,
    required_level_sources: { job_title_department: 0, job_title: 0, department: 0, global: 0, default: 0 },
  },
};

describe("gap_analyzer", () => {
  describe("calculateGaps", () => {
    it("scores a lightly misaligned employee without flagging gaps", () => {
      const [alice] = calculateGaps(buildAliceTable(), { gap_type: "perception", threshold: 2.0 });
      expect(alice).toEqual({
        employee: "Alice",
        avg_skill_level: 3.25,
        avg_gap_score: 0.5,
        max_gap: 1,
        significant_gaps_count: 0,
        has_gaps: false,
        significant_gaps: [],
        strengths: [{ skill: "Communication", rating: 4.5 }],
        development_areas: [{ skill: "Leadership", rating: 2 }],
        gap_type: "perception",
      });
    });

    it("lists significant perception gaps with their direction", () => {
      const gaps = calculateGaps(buildSampleMergedTable(), { gap_type: "perception", threshold: 2.0 });
      expect(gaps.map((gap) => gap.employee)).toEqual(["Alice Smith", "Bob Jones", "Carol White", "Dan Brown"]);

      const alice = gaps[0];
      expect(alice.significant_gaps).toEqual([
        { skill: "Communication", gap_value: 2, direction: "Manager rates higher", gap_type: "perception" },
      ]);
      expect(alice.avg_gap_score).toBeCloseTo(2 / 3, 10);
      expect(alice.max_gap).toBe(2);
      expect(alice.strengths).toEqual([
        { skill: "Communication", rating: 4 },
        { skill: "Technical Skills", rating: 4 },
      ]);

      expect(gaps[1].strengths.map((item) => item.skill)).toEqual(["Technical Skills", "Communication", "Leadership"]);
      expect(gaps[2].development_areas).toEqual([
        { skill: "Leadership", rating: 1 },
        { skill: "Communication", rating: 2 },
      ]);
    });

    it("labels self-rated-higher gaps", () => {
      const [, bob] = calculateGaps(buildSampleMergedTable(), { gap_type: "perception", threshold: 1 });
      expect(bob.significant_gaps).toEqual([
        { skill: "Communication", gap_value: -1, direction: "Self-rates higher", gap_type: "perception" },
      ]);
    });

    it("uses matrix gaps when a matrix was merged", () => {
      const gaps = calculateGaps(buildSampleMergedTable({ matrix: "long" }), { gap_type: "matrix", threshold: 2.0 });
      const [alice, bob, carol, dan] = gaps;

      expect(alice.gap_type).toBe("matrix");
      expect(alice.significant_gaps).toEqual([
        { skill: "Technical Skills", gap_value: 2, direction: "Above standard", gap_type: "matrix" },
      ]);
      expect(alice.avg_gap_score).toBe(1);
      expect(bob.significant_gaps).toEqual([]);
      expect(carol.significant_gaps.map((gap) => [gap.skill, gap.gap_value, gap.direction])).toEqual([
        ["Communication", -2, "Below standard"],
        ["Leadership", -2, "Below standard"],
      ]);
      expect(dan.significant_gaps.map((gap) => gap.skill)).toEqual(["Technical Skills"]);
    });

    it("falls back to perception gaps without a matrix", () => {
      const gaps = calculateGaps(buildSampleMergedTable(), { gap_type: "matrix", threshold: 2.0 });
      expect(gaps.every((gap) => gap.gap_type === "perception")).toBe(true);
      expect(gaps[0].significant_gaps_count).toBe(1);
    });

    it("flags has_gaps at the threshold boundary", () => {
      const table = buildAliceTable();
      expect(calculateGaps(table, { gap_type: "perception", threshold: 0.5 })[0].has_gaps).toBe(true);
      expect(calculateGaps(table, { gap_type: "perception", threshold: 0.51 })[0].has_gaps).toBe(false);
      for (const threshold of [0, 0.25, 1, 2, 5]) {
        for (const gap of calculateGaps(buildSampleMergedTable(), { gap_type: "perception", threshold })) {
          expect(gap.has_gaps).toBe(gap.avg_gap_score >= threshold);
        }
      }
    });

    it("is idempotent and keeps the sort order laws", () => {
      const table = buildSampleMergedTable({ matrix: "long" });
      const first = calculateGaps(table, { gap_type: "matrix", threshold: 1 });
      const second = calculateGaps(table, { gap_type: "matrix", threshold: 1 });
      expect(second).toEqual(first);

      for (const gap of first) {
        for (let i = 1; i < gap.strengths.length; i++) {
          expect(gap.strengths[i - 1].rating).toBeGreaterThanOrEqual(gap.strengths[i].rating);
        }
        for (let i = 1; i < gap.development_areas.length; i++) {
          expect(gap.development_areas[i - 1].rating).toBeLessThanOrEqual(gap.development_areas[i].rating);
        }
        for (let i = 1; i < gap.significant_gaps.length; i++) {
          expect(Math.abs(gap.significant_gaps[i - 1].gap_value)).toBeGreaterThanOrEqual(
            Math.abs(gap.significant_gaps[i].gap_value)
          );
        }
      }
    });

    it("returns no records for an empty table", () => {
      expect(calculateGaps(emptyTable, { gap_type: "perception", threshold: 2 })).toEqual([]);
    });
  });

  describe("getOrganizationInsights", () => {
    it("splits skills into strengths and gaps and ranks performers", () => {
      const insights = getOrganizationInsights(buildSampleMergedTable());
      expect(insights.total_employees).toBe(4);
      expect(insights.skills_assessed).toBe(3);
      expect(insights.overall_skill_strengths).toEqual([
        { skill: "Technical Skills", average_rating: 3.5, employee_count: 4 },
      ]);
      expect(insights.overall_skill_gaps).toEqual([
        { skill: "Leadership", average_rating: 2.5, employee_count: 4 },
        { skill: "Communication", average_rating: 3.375, employee_count: 4 },
      ]);
      expect(insights.high_performers).toEqual([{ employee: "Bob Jones", average_skill: 4.5 }]);
    });

    it("sizes the high performer list to the top fifth", () => {
      expect([1, 4, 5, 6, 10, 11].map(highPerformerCount)).toEqual([1, 1, 1, 2, 2, 3]);
    });

    it("returns empty insights for an empty table", () => {
      expect(getOrganizationInsights(emptyTable)).toEqual(emptyInsights());
    });
  });

  describe("getSkillDistribution", () => {
    it("summarises ratings and perception gaps for one skill", () => {
      const distribution = getSkillDistribution(buildSampleMergedTable(), "Communication", 2.0);
      expect(distribution).not.toBeNull();
      if (!distribution) return;

      expect(distribution.total_assessments).toBe(4);
      expect(distribution.average_rating).toBe(3.375);
      expect(distribution.median_rating).toBe(3.5);
      expect(distribution.std_deviation).toBeCloseTo(Math.sqrt(3.6875 / 3), 10);
      expect(distribution.min_rating).toBe(2);
      expect(distribution.max_rating).toBe(4.5);
      expect(distribution.rating_distribution).toEqual({ 1: 0, 2: 1, 3: 1, 4: 2, 5: 0 });
      expect(distribution.gap_analysis).toEqual({
        average_gap: 0.25,
        positive_gaps: 1,
        negative_gaps: 1,
        no_gaps: 2,
        significant_gaps: 1,
      });
    });

    it("counts unrated employees in the statistics but not in the buckets", () => {
      const table = merge(
        normalizeOrThrow(rawTable("self.csv", ["Name", "Communication"], [["A", "4"], ["B", "0"]]), "employee"),
        normalizeOrThrow(rawTable("manager.csv", ["Name", "Communication"], [["A", "4"], ["B", "0"]]), "manager")
      );
      const distribution = getSkillDistribution(table, "Communication", 2.0);
      expect(distribution).not.toBeNull();
      if (!distribution) return;

      expect(distribution.total_assessments).toBe(2);
      expect(distribution.average_rating).toBe(2);
      expect(distribution.median_rating).toBe(2);
      expect(distribution.std_deviation).toBeCloseTo(Math.sqrt(8), 10);
      expect(distribution.min_rating).toBe(0);
      expect(distribution.max_rating).toBe(4);
      expect(distribution.rating_distribution).toEqual({ 1: 0, 2: 0, 3: 0, 4: 1, 5: 0 });
    });

    it("returns null for unknown skills and empty tables", () => {
      expect(getSkillDistribution(buildSampleMergedTable(), "Juggling", 2)).toBeNull();
      expect(getSkillDistribution(emptyTable, "Communication", 2)).toBeNull();
    });

    it("rounds half to even when bucketing", () => {
      expect([0.5, 1.5, 2.5, 3.5, 4.5, 4.6].map(roundHalfEven)).toEqual([0, 2, 2, 4, 4, 5]);
    });
  });
});
