import { merge } from "./merger";
import type { MergedTable, NormalizedAssessment, RaterKind, SkillsMatrix } from "./types";

export type Session = {
  id: string;
  created_at: string;
  employee: NormalizedAssessment | null;
  manager: NormalizedAssessment | null;
  matrix: SkillsMatrix | null;
  merged: MergedTable | null;
};

function pad(value: number) {
  return String(value).padStart(2, "0");
}

export function formatSessionId(date: Date) {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `session_${day}_${time}`;
}

export function createSession(id?: string, now: Date = new Date()): Session {
  return {
    id: id ?? formatSessionId(now),
    created_at: now.toISOString(),
    employee: null,
    manager: null,
    matrix: null,
    merged: null,
  };
}

export function withAssessment(session: Session, kind: RaterKind, table: NormalizedAssessment): Session {
  return kind === "employee"
    ? { ...session, employee: table, merged: null }
    : { ...session, manager: table, merged: null };
}

export function withSkillsMatrix(session: Session, matrix: SkillsMatrix | null): Session {
  return { ...session, matrix, merged: null };
}

/**
 * Returns the session with a merged table when both assessments are present.
 * A session that is already merged comes back unchanged.
 */
export function ensureMerged(session: Session): Session {
  if (session.merged || !session.employee || !session.manager) return session;
  return { ...session, merged: merge(session.employee, session.manager, session.matrix) };
}
