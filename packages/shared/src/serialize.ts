import {
  WorkflowDefinition,
  WorkflowDefinitionSchema,
  WorkflowStep,
  WorkflowStepSchema,
} from "./workflow";
import { WorkflowSchemaError } from "./errors";

export function validateWorkflow(value: unknown): WorkflowDefinition {
  const result = WorkflowDefinitionSchema.safeParse(value);
  if (!result.success) {
    throw new WorkflowSchemaError(result.error.issues);
  }
  return result.data;
}

export function validateStep(value: unknown): WorkflowStep {
  const result = WorkflowStepSchema.safeParse(value);
  if (!result.success) {
    throw new WorkflowSchemaError(result.error.issues);
  }
  return result.data;
}

export function serializeWorkflow(workflow: WorkflowDefinition): string {
  return JSON.stringify(workflow, null, 2);
}

export function parseWorkflow(json: string): WorkflowDefinition {
  return validateWorkflow(JSON.parse(json));
}
