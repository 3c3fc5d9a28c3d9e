import { Selector, WorkflowDefinition, WorkflowStep, isDragSpan } from "@stepwright/shared";

const RULE = "=".repeat(70);
const THIN_RULE = "-".repeat(70);

function banner(title: string): string[] {
  return [RULE, `   ${title}`, RULE];
}

function formatValue(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

function selectorLines(selector: Selector): string[] {
  if (selector.type === "text") {
    const lines = [`  • Text Selector: "${selector.value}"`];
    if (selector.fallback) {
      const { x, y } = selector.fallback.value;
      lines.push(`  • Fallback Coordinates: (${x}, ${y})`);
    }
    return lines;
  }
  const value = selector.value;
  if (isDragSpan(value)) {
    return [
      `  • Drag from (${value.start_x}, ${value.start_y}) to (${value.end_x}, ${value.end_y})`,
    ];
  }
  return [`  • Coordinates: (${value.x}, ${value.y})`];
}

function stepLines(step: WorkflowStep, position: number): string[] {
  const lines = [
    THIN_RULE,
    `STEP ${position}: ${step.step_id}`,
    THIN_RULE,
    `Action: ${step.action}`,
    `Description: ${step.description}`,
    "",
  ];

  if (step.selector) {
    lines.push("Target:", ...selectorLines(step.selector), "");
  }

  const parameters = Object.entries(step.parameters);
  if (parameters.length > 0) {
    lines.push("Parameters:");
    for (const [key, value] of parameters) {
      lines.push(`  • ${key}: ${formatValue(value)}`);
    }
    lines.push("");
  }

  lines.push(
    "Execution Settings:",
    `  • Wait After: ${step.wait_after}s`,
    `  • Retry Count: ${step.retry_count}`,
    `  • On Failure: ${step.on_failure}`,
    "",
  );
  return lines;
}

/** Human-readable rendering of a workflow. One-way: it does not parse back. */
export function formatWorkflowAsText(workflow: WorkflowDefinition): string {
  const lines = [...banner(`WORKFLOW: ${workflow.name}`), ""];

  lines.push(`Description: ${workflow.description}`);
  if (workflow.application) {
    lines.push(`Application: ${workflow.application}`);
  }
  lines.push(
    `Version: ${workflow.version}`,
    `Workflow ID: ${workflow.workflow_id}`,
    `Total Steps: ${workflow.steps.length}`,
    "",
    ...banner("WORKFLOW STEPS"),
    "",
  );

  workflow.steps.forEach((step, index) => {
    lines.push(...stepLines(step, index + 1));
  });

  lines.push(...banner("END OF WORKFLOW"));
  return lines.join("\n");
}
