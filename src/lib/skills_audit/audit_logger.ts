import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import { z } from "zod";

import { SkillsAuditError } from "./errors";

const AuditLogEventSchema = z
  .object({
    ts: z.string(),
    run_id: z.string(),
    session_id: z.string().nullable(),
    type: z.string(),
    duration_ms: z.number().optional(),
  })
  .passthrough();

export type AuditLogEvent = z.infer<typeof AuditLogEventSchema>;

export type AuditLoggerOptions = {
  run_id?: string;
  log_dir?: string;
};

/** One JSONL file per audit run under `log_dir`; events carry the session once it is known. */
export class AuditLogger {
  readonly run_id: string;
  readonly log_path: string;
  private session_id: string | null = null;

  constructor(options: AuditLoggerOptions = {}) {
    this.run_id = options.run_id ?? crypto.randomUUID();
    this.log_path = path.resolve(options.log_dir ?? "runs", `${this.run_id}.jsonl`);
  }

  setSession(sessionId: string) {
    this.session_id = sessionId;
  }

  logEvent(type: string, payload: Record<string, unknown> = {}): AuditLogEvent {
    const record: AuditLogEvent = {
      ts: new Date().toISOString(),
      run_id: this.run_id,
      session_id: this.session_id,
      type,
      ...payload,
    };
    fs.mkdirSync(path.dirname(this.log_path), { recursive: true });
    fs.appendFileSync(this.log_path, `${JSON.stringify(record)}\n`);
    return record;
  }

  logDuration(type: string, startMs: number, payload: Record<string, unknown> = {}) {
    return this.logEvent(type, { ...payload, duration_ms: Date.now() - startMs });
  }

  readEvents(): AuditLogEvent[] {
    if (!fs.existsSync(this.log_path)) return [];
    return fs
      .readFileSync(this.log_path, "utf8")
      .split("\n")
      .filter((line) => line.trim() !== "")
      .map((line) => AuditLogEventSchema.parse(JSON.parse(line)));
  }

  static serializeError(error: unknown) {
    if (error instanceof SkillsAuditError) {
      return { name: error.name, code: error.code, message: error.message, next_action: error.next_action };
    }
    if (error instanceof Error) {
      return { name: error.name, message: error.message, stack: error.stack };
    }
    return { name: "Error", message: String(error) };
  }
}
