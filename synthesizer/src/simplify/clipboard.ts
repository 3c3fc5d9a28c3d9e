import {
  EventKinds,
  EventLog,
  UserIntent,
  canonicalKey,
  isCopyCombination,
  isPasteCombination,
} from "@stepwright/shared";

function withIntent<T extends EventLog>(event: T, intent: UserIntent): T {
  return { ...event, data: { ...event.data, user_intent: intent } };
}

/**
 * Tags `drag → Ctrl+C` as a text selection followed by a copy, and
 * `Ctrl+V → enter` as a paste followed by a submit. Returns new event objects.
 */
export function labelClipboardPatterns(events: readonly EventLog[]): EventLog[] {
  const labelled: EventLog[] = [];
  let index = 0;

  while (index < events.length) {
    const event = events[index];
    const next = events[index + 1];

    if (
      event.event_type === EventKinds.mouseDrag &&
      next?.event_type === EventKinds.keyCombination &&
      isCopyCombination(next.data.keys)
    ) {
      labelled.push(withIntent(event, "select_text_for_copy"));
      labelled.push(withIntent(next, "copy_to_clipboard"));
      index += 2;
      continue;
    }

    if (
      event.event_type === EventKinds.keyCombination &&
      isPasteCombination(event.data.keys) &&
      next?.event_type === EventKinds.keyPress &&
      canonicalKey(next.data.key) === "enter"
    ) {
      labelled.push(withIntent(event, "paste_from_clipboard"));
      labelled.push(withIntent(next, "submit_input"));
      index += 2;
      continue;
    }

    labelled.push(event);
    index += 1;
  }

  return labelled;
}
