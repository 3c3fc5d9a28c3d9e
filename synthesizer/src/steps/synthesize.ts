import {
  ActionKinds,
  EventKinds,
  EventLog,
  WorkflowStep,
  canonicalKey,
  elementNameOf,
  elementTypeOf,
  eventPoint,
  formatKeyCombination,
  keyDisplayName,
  stepDefaults,
} from "@stepwright/shared";
import { clipboardPreview, describeClick, describeTyping } from "./descriptions";
import { dragSelector, pointSelector, targetSelector, textSelector } from "./selectors";

function stepBase(stepNumber: number) {
  return {
    step_id: `step-${stepNumber}`,
    ...stepDefaults,
  };
}

/**
 * Converts one simplified event into a workflow step. Screenshot events are
 * reference points and produce no step.
 */
export function eventToStep(event: EventLog, stepNumber: number): WorkflowStep | null {
  const elementName = elementNameOf(event);
  const elementType = elementTypeOf(event);

  switch (event.event_type) {
    case EventKinds.mouseClick: {
      const button = event.data.button ?? "left";
      const action = button === "right" ? ActionKinds.rightClick : ActionKinds.click;
      const point = { x: event.data.x, y: event.data.y };
      return {
        ...stepBase(stepNumber),
        action,
        description: describeClick(action, elementName, elementType, point),
        selector: targetSelector(elementName, point),
        parameters: button !== "left" ? { button } : {},
        screenshot_before: event.screenshot_ref ?? null,
      };
    }
    case EventKinds.mouseDoubleClick: {
      const point = { x: event.data.x, y: event.data.y };
      return {
        ...stepBase(stepNumber),
        action: ActionKinds.doubleClick,
        description: describeClick(ActionKinds.doubleClick, elementName, elementType, point),
        selector: targetSelector(elementName, point),
        parameters: {},
      };
    }
    case EventKinds.mouseDrag: {
      const { start_x, start_y, end_x, end_y } = event.data;
      const description =
        event.data.user_intent === "select_text_for_copy"
          ? `Select text by dragging from (${start_x}, ${start_y}) to (${end_x}, ${end_y})`
          : `Drag from (${start_x}, ${start_y}) to (${end_x}, ${end_y})`;
      return {
        ...stepBase(stepNumber),
        action: ActionKinds.drag,
        description,
        selector: dragSelector({ start_x, start_y, end_x, end_y }),
        parameters: { end_x, end_y },
      };
    }
    case EventKinds.textInput: {
      const text = event.data.text;
      return {
        ...stepBase(stepNumber),
        action: ActionKinds.typeText,
        description: describeTyping(text, elementName, event.data.grouped_from ?? 0),
        selector: elementName ? textSelector(elementName, eventPoint(event)) : null,
        parameters: { text },
      };
    }
    case EventKinds.keyPress: {
      const key = canonicalKey(event.data.key);
      const display = keyDisplayName(key);
      return {
        ...stepBase(stepNumber),
        action: ActionKinds.pressKey,
        description:
          event.data.user_intent === "submit_input"
            ? `Submit by pressing ${display}`
            : `Press ${display} key`,
        selector: null,
        parameters: { key },
      };
    }
    case EventKinds.keyCombination: {
      const intent = event.data.user_intent;
      if (intent === "copy_to_clipboard" || intent === "paste_from_clipboard") {
        const content = event.data.clipboard_content ?? "";
        const preview = clipboardPreview(content);
        const copying = intent === "copy_to_clipboard";
        let description: string;
        if (copying) {
          description = preview
            ? `Copy text to clipboard: '${preview}'`
            : "Copy selected text to clipboard (Ctrl+C)";
        } else {
          description = preview
            ? `Paste text from clipboard: '${preview}'`
            : "Paste from clipboard (Ctrl+V)";
        }
        return {
          ...stepBase(stepNumber),
          action: ActionKinds.keyCombination,
          description,
          selector: null,
          parameters: {
            keys: copying ? ["Ctrl", "C"] : ["Ctrl", "V"],
            clipboard_content: content,
          },
        };
      }
      return {
        ...stepBase(stepNumber),
        action: ActionKinds.keyCombination,
        description: `Press ${formatKeyCombination(event.data.keys)}`,
        selector: null,
        parameters: { keys: [...event.data.keys] },
      };
    }
    case EventKinds.scroll: {
      const { delta_x, delta_y } = event.data;
      return {
        ...stepBase(stepNumber),
        action: ActionKinds.scroll,
        description: `Scroll ${delta_y > 0 ? "down" : "up"}`,
        selector: pointSelector({ x: event.data.x, y: event.data.y }),
        parameters: { delta_x, delta_y },
      };
    }
    case EventKinds.navigation:
      return {
        ...stepBase(stepNumber),
        action: ActionKinds.navigate,
        description: `Navigate to ${event.data.url}`,
        selector: null,
        parameters: { url: event.data.url },
      };
    case EventKinds.screenshot:
      return null;
  }
}

/** Synthesizes steps in event order, numbering them `step-1`, `step-2`, ... */
export function synthesizeSteps(events: readonly EventLog[]): WorkflowStep[] {
  const steps: WorkflowStep[] = [];
  for (const event of events) {
    const step = eventToStep(event, steps.length + 1);
    if (step) {
      steps.push(step);
    }
  }
  return steps;
}
