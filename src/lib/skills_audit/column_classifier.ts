/**
 * Column classification for assessment uploads.
 *
 * Skill columns are never declared: a column is a skill when it is not an
 * identity or metadata column and at least one of its cells is numeric.
 */

import type { ColumnDescriptor, ColumnRole, RawAssessmentTable } from "./types";

// Form exports add these alongside the answers.
const METADATA_HEADERS = new Set([
  "timestamp",
  "start time",
  "completion time",
  "last modified time",
  "id",
  "submit date",
  "response id",
  "submission id",
]);

// An identity header is the field name itself, optionally owned ("Employee Email")
// and qualified ("Department Name"). "Cross-Department Collaboration" and
// "Email Etiquette" stay skills.
const ROLE_PATTERNS: Record<"email" | "job_title" | "department", { heads: string[]; qualifiers: string[] }> = {
  email: { heads: ["email", "e-mail", "mail"], qualifiers: ["address", "id"] },
  job_title: {
    heads: ["job title", "jobtitle", "job_title", "job role", "job position", "designation", "role", "position", "title"],
    qualifiers: ["name"],
  },
  department: { heads: ["department", "dept", "dept.", "division", "team"], qualifiers: ["name"] },
};

const ROLE_OWNERS = ["employee", "staff", "your"];

const NAME_TERMS = ["employee", "name", "person"];
const REVIEWER_TERMS = ["manager", "reviewer", "rater", "assessor"];

const NUMERIC_RE = /^[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/;

export function normalizeHeader(header: string) {
  return header.toLowerCase().replace(/\s+/g, " ").trim();
}

export function coerceNumber(value: string | undefined): number | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  if (!NUMERIC_RE.test(trimmed)) return null;
  const num = Number(trimmed);
  return Number.isFinite(num) ? num : null;
}

function matchesAny(header: string, terms: string[]) {
  return terms.some((term) => header.includes(term));
}

function countNumeric(table: RawAssessmentTable, index: number) {
  return table.rows.reduce((acc, row) => (coerceNumber(row[index]) === null ? acc : acc + 1), 0);
}

function isRoleHeader(header: string, role: keyof typeof ROLE_PATTERNS) {
  const { heads, qualifiers } = ROLE_PATTERNS[role];
  let rest = normalizeHeader(header).replace(/[:?*]+$/, "").trim();
  const owner = ROLE_OWNERS.find((word) => rest.startsWith(`${word} `));
  if (owner) rest = rest.slice(owner.length + 1);
  return heads.some((head) => {
    if (rest === head) return true;
    return qualifiers.some((qualifier) => rest === `${head} ${qualifier}`);
  });
}

function isIdentityHeader(header: string) {
  return isRoleHeader(header, "email") || isRoleHeader(header, "job_title") || isRoleHeader(header, "department");
}

/**
 * Pick the column that names the assessed employee. Headers mentioning
 * "employee" win over a bare "name", and reviewer columns such as
 * "Manager Name" are used only when nothing else qualifies.
 */
export function findNameColumn(headers: string[]): number | null {
  const normalized = headers.map((header) => (isIdentityHeader(header) ? "" : normalizeHeader(header)));
  const passes: Array<(header: string) => boolean> = [
    (h) => h.includes("employee") && !matchesAny(h, ["email", ...REVIEWER_TERMS]),
    (h) => matchesAny(h, NAME_TERMS) && !matchesAny(h, ["email", ...REVIEWER_TERMS]),
    (h) => matchesAny(h, NAME_TERMS) && !h.includes("email"),
  ];
  for (const pass of passes) {
    const index = normalized.findIndex(pass);
    if (index >= 0) return index;
  }
  return null;
}

/** `skip` holds columns already claimed or unfit for an identity role. */
export function findRoleColumn(headers: string[], role: keyof typeof ROLE_PATTERNS, skip: Set<number>) {
  const index = headers.findIndex((header, i) => !skip.has(i) && isRoleHeader(header, role));
  return index >= 0 ? index : null;
}

function mostlyNumeric(table: RawAssessmentTable, index: number) {
  const filled = table.rows.filter((row) => (row[index] ?? "").trim() !== "").length;
  return filled > 0 && countNumeric(table, index) * 2 > filled;
}

export function classifyColumns(table: RawAssessmentTable): ColumnDescriptor[] {
  const roles = new Map<number, ColumnRole>();

  const nameIndex = findNameColumn(table.headers);
  if (nameIndex !== null) roles.set(nameIndex, "name");

  // A column of ratings is never an identity field, whatever its header says.
  const numeric = table.headers.map((_, index) => index).filter((index) => mostlyNumeric(table, index));
  for (const role of ["email", "job_title", "department"] as const) {
    const index = findRoleColumn(table.headers, role, new Set([...roles.keys(), ...numeric]));
    if (index !== null) roles.set(index, role);
  }

  return table.headers.map((header, index) => {
    const numeric_values = countNumeric(table, index);
    const assigned = roles.get(index);
    let role: ColumnRole;
    if (assigned) {
      role = assigned;
    } else if (METADATA_HEADERS.has(normalizeHeader(header))) {
      role = "metadata";
    } else if (header.trim() === "") {
      role = "other";
    } else {
      role = numeric_values > 0 ? "skill" : "other";
    }
    return { index, header, role, numeric_values };
  });
}

export function columnsWithRole(columns: ColumnDescriptor[], role: ColumnRole) {
  return columns.filter((column) => column.role === role);
}
