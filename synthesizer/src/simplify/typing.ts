import {
  EventKinds,
  EventLog,
  TextInputEvent,
  canonicalKey,
} from "@stepwright/shared";

function isSpaceKey(event: EventLog | undefined): boolean {
  return (
    event !== undefined &&
    event.event_type === EventKinds.keyPress &&
    canonicalKey(event.data.key) === "space"
  );
}

/**
 * Merges `TEXT_INPUT, space, TEXT_INPUT, space, ...` runs into one
 * `TEXT_INPUT` whose `grouped_from` counts the merged events.
 *
 * A space key press joins the run only when it follows a text fragment and
 * is not itself followed by another space. The merged event keeps the first
 * fragment's timestamp, element attributes and screenshot.
 */
export function groupTypingSequences(events: readonly EventLog[]): EventLog[] {
  const grouped: EventLog[] = [];
  let index = 0;

  while (index < events.length) {
    const first = events[index];
    if (first.event_type !== EventKinds.textInput) {
      grouped.push(first);
      index += 1;
      continue;
    }

    const parts: string[] = [];
    let cursor = index;
    while (cursor < events.length) {
      const current = events[cursor];
      if (current.event_type !== EventKinds.textInput) {
        break;
      }
      parts.push(current.data.text);
      cursor += 1;

      if (isSpaceKey(events[cursor]) && !isSpaceKey(events[cursor + 1])) {
        parts.push(" ");
        cursor += 1;
        continue;
      }
      break;
    }

    if (cursor > index + 1) {
      const merged: TextInputEvent = {
        timestamp: first.timestamp,
        event_type: EventKinds.textInput,
        data: {
          ...first.data,
          text: parts.join("").trim(),
          grouped_from: cursor - index,
        },
        screenshot_ref: first.screenshot_ref,
      };
      grouped.push(merged);
    } else {
      grouped.push(first);
    }
    index = cursor;
  }

  return grouped;
}
