import { EventLog } from "@stepwright/shared";
import { labelClipboardPatterns } from "./clipboard";
import { groupTypingSequences } from "./typing";

export interface SimplifyOptions {
  labelClipboardPatterns?: boolean;
}

export function simplifyEvents(
  events: readonly EventLog[],
  options: SimplifyOptions = {},
): EventLog[] {
  const grouped = groupTypingSequences(events);
  if (!options.labelClipboardPatterns) {
    return grouped;
  }
  return labelClipboardPatterns(grouped);
}

export { groupTypingSequences, labelClipboardPatterns };
