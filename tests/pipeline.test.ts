import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { AuditLogger } from "../src/lib/skills_audit/audit_logger";
import { NoSkillColumnsError } from "../src/lib/skills_audit/errors";
import { readUpload, runSkillsAudit } from "../src/lib/skills_audit/pipeline";
import { createSession } from "../src/lib/skills_audit/session";
import { fixturePath, rawTable } from "./helpers/assessment_fixtures";

let logDir = "";

describe("runSkillsAudit", () => {
  beforeEach(() => {
    logDir = fs.mkdtempSync(path.join(os.tmpdir(), "skills-audit-runs-"));
  });

  afterEach(() => {
    if (logDir && fs.existsSync(logDir)) {
      fs.rmSync(logDir, { recursive: true, force: true });
    }
    logDir = "";
  });

  async function loadInputs() {
    return {
      employee: await readUpload(fixturePath("employee_assessment.csv")),
      manager: await readUpload(fixturePath("manager_assessment.csv")),
      matrix: await readUpload(fixturePath("skills_matrix_long.csv")),
    };
  }

  it("runs the full audit and logs each step", async () => {
    const { employee, manager } = await loadInputs();
    const logger = new AuditLogger({ run_id: "run-1", log_dir: logDir });

    const result = runSkillsAudit({
      employee,
      manager,
      config: { gap_threshold: 2, gap_type: "perception" },
      logger,
      session: createSession("session-test"),
    });

    expect(result.session.id).toBe("session-test");
    expect(result.gap_type).toBe("perception");
    expect(result.gaps.map((gap) => gap.employee)).toEqual(["Alice Smith", "Bob Jones", "Carol White", "Dan Brown"]);
    expect(result.insights.high_performers).toEqual([{ employee: "Bob Jones", average_skill: 4.5 }]);
    expect(result.distributions.map((item) => item.skill)).toEqual(["Communication", "Leadership", "Technical Skills"]);
    expect(result.session.merged).toBe(result.merged);

    expect(logger.log_path).toBe(path.join(logDir, "run-1.jsonl"));
    expect(logger.readEvents().map((event) => event.type)).toEqual([
      "audit.started",
      "normalize.employee",
      "normalize.manager",
      "merge.completed",
      "audit.completed",
    ]);
    expect(new Set(logger.readEvents().map((event) => event.session_id))).toEqual(new Set(["session-test"]));
  });

  it("folds in the skills matrix", async () => {
    const { employee, manager, matrix } = await loadInputs();
    const logger = new AuditLogger({ log_dir: logDir });

    const result = runSkillsAudit({ employee, manager, matrix, config: { gap_threshold: 2, gap_type: "matrix" }, logger });

    expect(result.gap_type).toBe("matrix");
    expect(result.session.matrix?.entries).toHaveLength(5);
    expect(result.gaps[2].significant_gaps.map((gap) => gap.skill)).toEqual(["Communication", "Leadership"]);

    const matrixEvent = logger.readEvents().find((event) => event.type === "normalize.skills_matrix");
    expect(matrixEvent).toMatchObject({ format: "long", entries: 5, duplicate_entries: 0 });
  });

  it("logs the fallback when matrix gaps are requested without a matrix", async () => {
    const { employee, manager } = await loadInputs();
    const logger = new AuditLogger({ log_dir: logDir });

    const result = runSkillsAudit({ employee, manager, config: { gap_threshold: 2, gap_type: "matrix" }, logger });

    expect(result.gap_type).toBe("perception");
    expect(logger.readEvents().find((event) => event.type === "gaps.gap_type_fallback")).toMatchObject({
      requested: "matrix",
      used: "perception",
    });
  });

  it("logs and rethrows normalisation failures", async () => {
    const { employee } = await loadInputs();
    const logger = new AuditLogger({ log_dir: logDir });
    const manager = rawTable("manager.csv", ["Employee Name", "Comment"], [["Alice Smith", "great"]]);

    expect(() =>
      runSkillsAudit({ employee, manager, config: { gap_threshold: 2, gap_type: "perception" }, logger })
    ).toThrow(NoSkillColumnsError);

    const events = logger.readEvents();
    const failed = events[events.length - 1];
    expect(failed.type).toBe("audit.failed");
    expect(failed.error).toMatchObject({ name: "NoSkillColumnsError", code: "NO_SKILL_COLUMNS" });
  });
});
