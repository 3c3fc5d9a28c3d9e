import {
  EventKinds,
  EventLog,
  canonicalKey,
  elementNameOf,
  elementTypeOf,
  isCopyCombination,
  isPasteCombination,
} from "@stepwright/shared";

/**
 * Short phrase explaining a pause after `previous`. Rules are checked in a
 * fixed order and the first match wins. No rule reads `next` yet.
 */
export function inferWaitReason(previous: EventLog, next: EventLog): string {
  const elementName = elementNameOf(previous).toLowerCase();
  const elementType = elementTypeOf(previous).toLowerCase();

  if (previous.event_type === EventKinds.keyPress && canonicalKey(previous.data.key) === "enter") {
    return "page load and navigation";
  }
  if (elementName.includes("search") || elementName.includes("address")) {
    return "search results to load";
  }

  switch (previous.event_type) {
    case EventKinds.mouseClick:
      if (elementName.includes("tab")) {
        return "new tab to open";
      }
      if (elementType.includes("button") || elementType.includes("link")) {
        return "page load after click";
      }
      if (elementName.includes("window")) {
        return "window to open";
      }
      return "UI response";
    case EventKinds.keyCombination:
      if (isCopyCombination(previous.data.keys)) {
        return "copy operation";
      }
      if (isPasteCombination(previous.data.keys)) {
        return "paste operation";
      }
      return "keyboard shortcut";
    case EventKinds.mouseDrag:
      return "text selection";
    default:
      return "action to complete";
  }
}
