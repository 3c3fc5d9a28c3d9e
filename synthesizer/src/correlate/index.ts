import { EventLog, WorkflowStep } from "@stepwright/shared";
import { StepEventMatcher, defaultMatchers } from "./matchers";

export const POSITIONAL_STRATEGY = "position";

export interface StepCorrelation {
  event: EventLog;
  strategy: string;
}

/**
 * Finds the event a step came from. Kind-specific matchers are tried in
 * order; when none matches, the event at the step's own index is used.
 * The positional fallback is approximate and can pair a step with the wrong
 * event when many steps fail to match.
 */
export function correlateStep(
  step: WorkflowStep,
  events: readonly EventLog[],
  stepIndex: number,
  matchers: readonly StepEventMatcher[] = defaultMatchers,
): StepCorrelation | null {
  for (const matcher of matchers) {
    const event = events.find((candidate) => matcher.matches(step, candidate));
    if (event) {
      return { event, strategy: matcher.name };
    }
  }

  if (stepIndex >= 0 && stepIndex < events.length) {
    return { event: events[stepIndex], strategy: POSITIONAL_STRATEGY };
  }
  return null;
}

export function findStepEvent(
  step: WorkflowStep,
  events: readonly EventLog[],
  stepIndex: number,
): EventLog | null {
  return correlateStep(step, events, stepIndex)?.event ?? null;
}

export * from "./matchers";
