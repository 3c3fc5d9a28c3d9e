import type { ZodIssue } from "zod";

export type StepwrightErrorCode =
  | "configuration"
  | "event_parse"
  | "generative_response"
  | "workflow_schema";

export class StepwrightError extends Error {
  code: StepwrightErrorCode;

  constructor(code: StepwrightErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigurationError extends StepwrightError {
  constructor(message: string) {
    super("configuration", message);
  }
}

/** A recorded event that cannot become an EventLog. Callers skip the event. */
export class EventParseError extends StepwrightError {
  index: number;

  constructor(index: number, message: string) {
    super("event_parse", `Event ${index}: ${message}`);
    this.index = index;
  }
}

export class GenerativeResponseError extends StepwrightError {
  rawText: string;

  constructor(message: string, rawText: string) {
    super("generative_response", message);
    this.rawText = rawText;
  }
}

export class WorkflowSchemaError extends StepwrightError {
  issues: ZodIssue[];

  constructor(issues: ZodIssue[]) {
    super("workflow_schema", `Invalid workflow: ${formatIssues(issues)}`);
    this.issues = issues;
  }
}

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${where}: ${issue.message}`;
    })
    .join("; ");
}
