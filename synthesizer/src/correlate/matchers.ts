import {
  ActionKinds,
  DragStep,
  EventKinds,
  EventLog,
  Point,
  WorkflowStep,
  canonicalKey,
  eventPoint,
  fallbackPoint,
  isClickFamily,
  isCopyCombination,
  isDragSpan,
  isPasteCombination,
} from "@stepwright/shared";

export type StepEventPredicate = (step: WorkflowStep, event: EventLog) => boolean;

export interface StepEventMatcher {
  name: string;
  matches: StepEventPredicate;
}

function samePoint(left: Point | null, right: Point | null): boolean {
  return left !== null && right !== null && left.x === right.x && left.y === right.y;
}

function dragStart(event: EventLog): Point | null {
  if (event.event_type !== EventKinds.mouseDrag) {
    return null;
  }
  return { x: event.data.start_x, y: event.data.start_y };
}

export const clickAtPoint: StepEventMatcher = {
  name: "click_point",
  matches: (step, event) =>
    isClickFamily(step) &&
    event.event_type === EventKinds.mouseClick &&
    samePoint(fallbackPoint(step.selector), eventPoint(event)),
};

export const typedText: StepEventMatcher = {
  name: "typed_text",
  matches: (step, event) =>
    step.action === ActionKinds.typeText &&
    event.event_type === EventKinds.textInput &&
    event.data.text === step.parameters.text,
};

export const pressedKey: StepEventMatcher = {
  name: "pressed_key",
  matches: (step, event) =>
    step.action === ActionKinds.pressKey &&
    event.event_type === EventKinds.keyPress &&
    canonicalKey(event.data.key) === canonicalKey(step.parameters.key),
};

export const clipboardChord: StepEventMatcher = {
  name: "clipboard_chord",
  matches: (step, event) => {
    if (
      step.action !== ActionKinds.keyCombination ||
      event.event_type !== EventKinds.keyCombination
    ) {
      return false;
    }
    const stepKeys = step.parameters.keys;
    const eventKeys = event.data.keys;
    return (
      (isCopyCombination(stepKeys) && isCopyCombination(eventKeys)) ||
      (isPasteCombination(stepKeys) && isPasteCombination(eventKeys))
    );
  },
};

function dragSelectorPoint(step: DragStep): Point | null {
  const selector = step.selector;
  if (selector.type !== "coordinates") {
    return null;
  }
  const value = selector.value;
  return isDragSpan(value) ? { x: value.start_x, y: value.start_y } : null;
}

function dragParameterPoint(step: DragStep): Point | null {
  const { start_x, start_y } = step.parameters;
  if (start_x === undefined || start_y === undefined) {
    return null;
  }
  return { x: start_x, y: start_y };
}

/**
 * Start coordinates are read from the selector, then the parameters, then the
 * text selector's fallback. All three are tried against each event in turn,
 * so the earliest event matching any of them wins.
 */
export const dragStartPoint: StepEventMatcher = {
  name: "drag_start",
  matches: (step, event) => {
    if (step.action !== ActionKinds.drag) {
      return false;
    }
    const start = dragStart(event);
    return (
      samePoint(dragSelectorPoint(step), start) ||
      samePoint(dragParameterPoint(step), start) ||
      samePoint(fallbackPoint(step.selector), start)
    );
  },
};

export const scrollPoint: StepEventMatcher = {
  name: "scroll_point",
  matches: (step, event) => {
    if (
      step.action !== ActionKinds.scroll ||
      event.event_type !== EventKinds.scroll ||
      step.selector.type !== "coordinates"
    ) {
      return false;
    }
    const value = step.selector.value;
    return !isDragSpan(value) && samePoint(value, eventPoint(event));
  },
};

/** Kind-specific matchers in priority order. */
export const defaultMatchers: readonly StepEventMatcher[] = [
  clickAtPoint,
  typedText,
  pressedKey,
  clipboardChord,
  dragStartPoint,
  scrollPoint,
];
