import {
  ActionKinds,
  EventLog,
  Point,
  SessionTimeline,
  WorkflowDefinition,
  WorkflowStep,
  eventPoint,
  fallbackPoint,
} from "@stepwright/shared";

function findEventAt(point: Point, events: readonly EventLog[]): EventLog | null {
  return (
    events.find((event) => {
      const recorded = eventPoint(event);
      return recorded !== null && recorded.x === point.x && recorded.y === point.y;
    }) ?? null
  );
}

function repairStep(step: WorkflowStep, events: readonly EventLog[]): WorkflowStep {
  switch (step.action) {
    case ActionKinds.click:
    case ActionKinds.rightClick:
    case ActionKinds.doubleClick:
    case ActionKinds.drag:
    case ActionKinds.scroll:
    case ActionKinds.typeText: {
      const selector = step.selector;
      if (selector?.type !== "text" || selector.value) {
        return step;
      }
      const point = fallbackPoint(selector);
      const elementName = point ? findEventAt(point, events)?.data.element_name : undefined;
      if (!elementName) {
        return step;
      }
      return { ...step, selector: { ...selector, value: elementName } };
    }
    default:
      return step;
  }
}

/**
 * Fills empty text-selector values with the element name of the session
 * event recorded at the selector's fallback point.
 */
export function enrichWorkflow(
  workflow: WorkflowDefinition,
  session: SessionTimeline,
): WorkflowDefinition {
  return {
    ...workflow,
    steps: workflow.steps.map((step) => repairStep(step, session.events)),
  };
}
