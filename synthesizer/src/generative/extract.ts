import {
  GenerativeResponseError,
  WorkflowDefinition,
  validateWorkflow,
} from "@stepwright/shared";

const CODE_FENCE = /```(?:[A-Za-z]+)?\s*([\s\S]*?)```/;

function unwrap(text: string): string {
  const trimmed = text.trim();
  const fenced = trimmed.match(CODE_FENCE);
  if (fenced) {
    return fenced[1].trim();
  }
  const start = trimmed.indexOf("{");
  const end = trimmed.lastIndexOf("}");
  if (start >= 0 && end > start) {
    return trimmed.slice(start, end + 1);
  }
  return trimmed;
}

/** Parses the JSON object in a model response, ignoring fences and surrounding prose. */
export function extractJson(text: string): Record<string, unknown> {
  const candidate = unwrap(text);
  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new GenerativeResponseError(`Response is not valid JSON: ${reason}`, text);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new GenerativeResponseError("Response JSON is not an object", text);
  }
  return { ...parsed };
}

export function parseGeneratedWorkflow(text: string): WorkflowDefinition {
  return validateWorkflow(extractJson(text));
}
