import { ActionKinds, SessionTimeline, WorkflowStep } from "@stepwright/shared";

export interface WorkflowIntent {
  name: string;
  description: string;
}

export function inferWorkflowIntent(
  steps: readonly WorkflowStep[],
  session: SessionTimeline,
): WorkflowIntent {
  const firstTyping = steps.find((step) => step.action === ActionKinds.typeText);
  const hasSearch = steps.some((step) => step.description.toLowerCase().includes("search"));

  if (firstTyping?.action === ActionKinds.typeText && hasSearch) {
    const query = firstTyping.parameters.text;
    if (query) {
      return {
        name: `Search for '${query}'`,
        description: `User performs a web search for '${query}' and navigates results`,
      };
    }
    return {
      name: "Web Search and Navigation",
      description: "User performs a web search and navigates through results",
    };
  }

  return {
    name: `${session.application} - User Session`,
    description: `Recorded user session in ${session.application}`,
  };
}
