export type SkillsAuditErrorCode =
  | "EMPTY_INPUT"
  | "MISSING_IDENTITY_COLUMN"
  | "NO_SKILL_COLUMNS"
  | "INVALID_MATRIX_FORMAT"
  | "NO_COMMON_SKILLS"
  | "UNSUPPORTED_FILE"
  | "CONFIG_INVALID";

export type FailureSummary = {
  code: SkillsAuditErrorCode | "UNEXPECTED";
  message: string;
  next_action: string;
};

export class SkillsAuditError extends Error {
  readonly code: SkillsAuditErrorCode;
  readonly next_action: string;

  constructor(params: { code: SkillsAuditErrorCode; message: string; next_action?: string }) {
    super(params.message);
    this.name = "SkillsAuditError";
    this.code = params.code;
    this.next_action = params.next_action ?? "Check the uploaded file and try again.";
  }

  toFailureSummary(): FailureSummary {
    return { code: this.code, message: this.message, next_action: this.next_action };
  }
}

export class EmptyInputError extends SkillsAuditError {
  constructor(filename: string) {
    super({
      code: "EMPTY_INPUT",
      message: `${filename || "Upload"} is empty`,
      next_action: "Export the form responses again and make sure the file has data rows.",
    });
    this.name = "EmptyInputError";
  }
}

export class MissingIdentityColumnError extends SkillsAuditError {
  constructor(filename: string) {
    super({
      code: "MISSING_IDENTITY_COLUMN",
      message: `No employee name column found in ${filename || "upload"}. Expected a column containing 'name', 'employee', or 'person'`,
      next_action: "Add or rename a column so it identifies the employee being assessed.",
    });
    this.name = "MissingIdentityColumnError";
  }
}

export class NoSkillColumnsError extends SkillsAuditError {
  constructor(filename: string) {
    super({
      code: "NO_SKILL_COLUMNS",
      message: `No skill assessment columns found in ${filename || "upload"}. Expected columns with numeric ratings (1-5)`,
      next_action: "Make sure ratings are exported as numbers rather than labels.",
    });
    this.name = "NoSkillColumnsError";
  }
}

export class InvalidMatrixFormatError extends SkillsAuditError {
  constructor(filename: string) {
    super({
      code: "INVALID_MATRIX_FORMAT",
      message: `${filename || "Skills matrix"} is not a recognised skills matrix. Use job title and department in the first two columns with skill names in the first row, or columns for skill and required level`,
      next_action: "Reshape the matrix into one of the two supported layouts.",
    });
    this.name = "InvalidMatrixFormatError";
  }
}

export class NoCommonSkillsError extends SkillsAuditError {
  constructor() {
    super({
      code: "NO_COMMON_SKILLS",
      message: "No common skills found between employee and manager assessments.",
      next_action: "Check that both files contain numeric skill rating columns.",
    });
    this.name = "NoCommonSkillsError";
  }
}

export class UnsupportedFileError extends SkillsAuditError {
  constructor(message: string) {
    super({
      code: "UNSUPPORTED_FILE",
      message,
      next_action: "Upload a .csv or .xlsx file.",
    });
    this.name = "UnsupportedFileError";
  }
}

export class ConfigError extends SkillsAuditError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super({
      code: "CONFIG_INVALID",
      message: `Invalid configuration: ${issues.join("; ")}`,
      next_action: "Fix the listed environment variables or command options.",
    });
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function toFailureSummary(error: unknown): FailureSummary {
  if (error instanceof SkillsAuditError) {
    return error.toFailureSummary();
  }

  const message = error instanceof Error ? error.message : String(error);
  return {
    code: "UNEXPECTED",
    message,
    next_action: "Review the run log for the failing step and rerun the audit.",
  };
}
