#!/usr/bin/env node
/**
 * CLI for the skills audit: analyse assessment files, print a development
 * plan, manage stored sessions.
 */

import "dotenv/config";
import fs from "node:fs";
import path from "node:path";
import { Command } from "commander";

import { AuditLogger } from "../src/lib/skills_audit/audit_logger";
import { getSkillsAuditConfig } from "../src/lib/skills_audit/config";
import { toFailureSummary } from "../src/lib/skills_audit/errors";
import {
  sheetColumns,
  toCsv,
  toEmployeeReportRows,
  toGapSummaryRows,
  writeWorkbookBuffer,
} from "../src/lib/skills_audit/export";
import type { SheetRow } from "../src/lib/skills_audit/export";
import { readUpload, runSkillsAudit } from "../src/lib/skills_audit/pipeline";
import { getDevelopmentPriorities, getExecutiveSummary } from "../src/lib/skills_audit/reports";
import type { SkillsAuditResult } from "../src/lib/skills_audit/pipeline";
import { createSession } from "../src/lib/skills_audit/session";
import { createSqliteStore } from "../src/lib/skills_audit/store";
import { createPlanForEmployee } from "../src/lib/skills_audit/training_plan";

type AuditOptions = {
  employee: string;
  manager: string;
  matrix?: string;
  threshold?: string;
  gapType?: string;
  session?: string;
  logDir?: string;
};

type AnalyzeOptions = AuditOptions & {
  csv?: string;
  report?: string;
  xlsx?: string;
  save?: boolean;
  db?: string;
};

type PlanOptions = AuditOptions & {
  name: string;
  weeks?: string;
};

function fail(error: unknown) {
  const summary = toFailureSummary(error);
  console.error(`❌ ${summary.message}`);
  console.error(`   Next: ${summary.next_action}`);
  process.exitCode = 1;
}

async function runFromFiles(options: AuditOptions, extra: { weeks?: string; db?: string } = {}) {
  const config = getSkillsAuditConfig(process.env, {
    gap_threshold: options.threshold,
    gap_type: options.gapType,
    timeline_weeks: extra.weeks,
    db_path: extra.db,
    log_dir: options.logDir,
  });
  const logger = new AuditLogger({ log_dir: config.log_dir });
  try {
    const [employee, manager, matrix] = await Promise.all([
      readUpload(options.employee),
      readUpload(options.manager),
      options.matrix ? readUpload(options.matrix) : Promise.resolve(null),
    ]);
    const result = runSkillsAudit({
      employee,
      manager,
      matrix,
      config,
      logger,
      session: options.session ? createSession(options.session) : undefined,
    });
    return { config, logger, result };
  } catch (error) {
    logger.logEvent("cli.failed", { error: AuditLogger.serializeError(error) });
    throw error;
  }
}

function printSummary(result: SkillsAuditResult) {
  const { insights, gaps } = result;
  const summary = getExecutiveSummary(gaps, insights);
  console.log(`\nSession: ${result.session.id}`);
  console.log(`Employees: ${summary.total_employees}  Skills: ${summary.skills_assessed}  Gap type: ${result.gap_type}`);
  console.log(`Employees with gaps: ${summary.employees_with_gaps} (${summary.gap_percentage.toFixed(1)}%)`);
  console.log(`Avg organisation skill: ${summary.avg_skill_level.toFixed(2)}/5.0`);

  if (insights.overall_skill_strengths.length) {
    console.log("\nOrganisation strengths:");
    for (const item of insights.overall_skill_strengths) {
      console.log(`  ${item.skill}: ${item.average_rating.toFixed(2)} (${item.employee_count})`);
    }
  }
  if (insights.overall_skill_gaps.length) {
    console.log("\nOrganisation gaps:");
    for (const item of insights.overall_skill_gaps) {
      console.log(`  ${item.skill}: ${item.average_rating.toFixed(2)} (${item.employee_count})`);
    }
  }
  console.log("\nHigh performers:");
  for (const performer of insights.high_performers) {
    console.log(`  ${performer.employee}: ${performer.average_skill.toFixed(2)}`);
  }

  const { priorities, counts } = getDevelopmentPriorities(gaps);
  console.log(`\nDevelopment priorities (High ${counts.High}  Medium ${counts.Medium}  Low ${counts.Low}):`);
  for (const item of priorities) {
    const focus = item.focus_areas.length ? item.focus_areas.join(", ") : "general skills development";
    console.log(`  ${item.priority_level.padEnd(6)} ${item.priority_score.toFixed(2)}  ${item.employee}: ${focus}`);
  }
}

function writeCsv(file: string, rows: SheetRow[]) {
  const out = path.resolve(file);
  fs.mkdirSync(path.dirname(out), { recursive: true });
  fs.writeFileSync(out, toCsv(rows, sheetColumns(rows)));
  return out;
}

const program = new Command();

program
  .name("skills-audit")
  .description("Reconcile self and manager skill assessments and report gaps")
  .version("0.1.0");

function withAuditOptions(command: Command) {
  return command
    .requiredOption("-e, --employee <file>", "Employee self-assessment (.csv or .xlsx)")
    .requiredOption("-m, --manager <file>", "Manager assessment (.csv or .xlsx)")
    .option("-x, --matrix <file>", "Skills matrix (.csv or .xlsx)")
    .option("-t, --threshold <number>", "Significant gap threshold (default: SKILLS_GAP_THRESHOLD or 2.0)")
    .option("-g, --gap-type <type>", "perception|matrix (default: SKILLS_GAP_TYPE or perception)")
    .option("--session <id>", "Session id (default: session_YYYYMMDD_HHMMSS)")
    .option("--log-dir <dir>", "Run log directory (default: SKILLS_LOG_DIR or ./runs)");
}

withAuditOptions(program.command("analyze"))
  .description("Analyse assessments and print an organisation summary")
  .option("--csv <file>", "Write the gap summary as CSV")
  .option("--report <file>", "Write one report row per employee as CSV")
  .option("--xlsx <file>", "Write the three-sheet workbook")
  .option("--save", "Persist the session to SQLite")
  .option("--db <file>", "SQLite path (default: SKILLS_DB_PATH or ./tmp/skills_audit.db)")
  .action(async (options: AnalyzeOptions) => {
    try {
      const { config, logger, result } = await runFromFiles(options, { db: options.db });
      printSummary(result);

      if (options.csv) {
        const rows = toGapSummaryRows(result.gaps);
        const out = writeCsv(options.csv, rows);
        logger.logEvent("export.csv", { path: out, rows: rows.length });
        console.log(`\nCSV: ${out}`);
      }
      if (options.report) {
        const rows = toEmployeeReportRows(result.merged, result.gaps);
        const out = writeCsv(options.report, rows);
        logger.logEvent("export.report", { path: out, rows: rows.length });
        console.log(`Employee report: ${out}`);
      }
      if (options.xlsx) {
        const out = path.resolve(options.xlsx);
        fs.mkdirSync(path.dirname(out), { recursive: true });
        fs.writeFileSync(
          out,
          await writeWorkbookBuffer({ table: result.merged, gaps: result.gaps, distributions: result.distributions })
        );
        logger.logEvent("export.xlsx", { path: out });
        console.log(`Workbook: ${out}`);
      }
      if (options.save) {
        const store = createSqliteStore(config.db_path);
        try {
          const { session } = result;
          if (session.employee) store.saveAssessment(session.id, session.employee);
          if (session.manager) store.saveAssessment(session.id, session.manager);
          if (session.matrix) store.saveSkillsMatrix(session.id, session.matrix);
          store.saveMergedTable(session.id, result.merged);
          store.saveGapAnalysis(session.id, result.gaps, config.gap_threshold);
          logger.logEvent("store.saved", { db_path: config.db_path });
          console.log(`Saved session ${session.id} to ${config.db_path}`);
        } finally {
          store.close();
        }
      }
      console.log(`\nRun log: ${logger.log_path}`);
    } catch (error) {
      fail(error);
    }
  });

withAuditOptions(program.command("plan"))
  .description("Print one employee's development plan as JSON")
  .requiredOption("-n, --name <employee>", "Employee name")
  .option("-w, --weeks <number>", "Plan length in weeks (default: SKILLS_TIMELINE_WEEKS or 12)")
  .action(async (options: PlanOptions) => {
    try {
      const { config, logger, result } = await runFromFiles(options, { weeks: options.weeks });
      const wanted = options.name.trim().toLowerCase();
      const gap = result.gaps.find((record) => record.employee.toLowerCase() === wanted);
      const record = result.merged.records.find((item) => item.employee.toLowerCase() === wanted);
      if (!gap || !record) {
        logger.logEvent("plan.employee_not_found", { name: options.name });
        console.error(`❌ No employee named "${options.name}" in this audit.`);
        process.exitCode = 1;
        return;
      }
      const plan = createPlanForEmployee(gap, record, config.timeline_weeks);
      logger.logEvent("plan.created", { employee: plan.employee_name, resources: plan.recommended_resources.length });
      console.log(JSON.stringify(plan, null, 2));
    } catch (error) {
      fail(error);
    }
  });

const sessions = program.command("sessions").description("Manage stored sessions");

sessions
  .command("list")
  .description("List stored sessions")
  .option("--db <file>", "SQLite path (default: SKILLS_DB_PATH or ./tmp/skills_audit.db)")
  .action((options: { db?: string }) => {
    try {
      const config = getSkillsAuditConfig(process.env, { db_path: options.db });
      const store = createSqliteStore(config.db_path);
      try {
        const rows = store.listSessions();
        if (!rows.length) {
          console.log("No stored sessions.");
          return;
        }
        for (const row of rows) {
          console.log(
            `${row.session_id}  updated ${row.updated_at}  skill rows ${row.processed_rows}  gap-records ${row.gap_records}`
          );
        }
      } finally {
        store.close();
      }
    } catch (error) {
      fail(error);
    }
  });

sessions
  .command("delete <sessionId>")
  .description("Delete every stored row for a session")
  .option("--db <file>", "SQLite path (default: SKILLS_DB_PATH or ./tmp/skills_audit.db)")
  .action((sessionId: string, options: { db?: string }) => {
    try {
      const config = getSkillsAuditConfig(process.env, { db_path: options.db });
      const store = createSqliteStore(config.db_path);
      try {
        const removed = store.deleteSession(sessionId);
        console.log(removed ? `Deleted ${removed} rows for ${sessionId}.` : `No rows stored for ${sessionId}.`);
      } finally {
        store.close();
      }
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => fail(error));
