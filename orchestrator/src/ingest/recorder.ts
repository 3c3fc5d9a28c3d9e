import { z } from "zod";
import {
  EventKind,
  EventKinds,
  EventLog,
  EventLogSchema,
  EventParseError,
  SessionTimeline,
  createLogger,
  formatIssues,
  sortEventsByTime,
} from "@stepwright/shared";

const log = createLogger("ingest");

export const DEFAULT_APPLICATION = "Firefox Browser";

const COMMAND_EVENT_KINDS = new Map<string, EventKind>([
  ["CLICK", EventKinds.mouseClick],
  ["TYPE", EventKinds.textInput],
  ["PRESS", EventKinds.keyPress],
  ["SCROLL", EventKinds.scroll],
  ["DRAG", EventKinds.mouseDrag],
  ["HOTKEY", EventKinds.keyCombination],
  ["COPY", EventKinds.keyCombination],
  ["PASTE", EventKinds.keyCombination],
]);

// Recorder placeholders that mean "no value".
const PLACEHOLDER_NAMES = ["Error", "N/A", "Unknown"];
const PLACEHOLDER_TYPES = ["Unknown"];
const PLACEHOLDER_AUTOMATION_IDS = ["N/A"];

const RecordedElementSchema = z
  .object({
    name: z.string().optional(),
    control_type: z.string().optional(),
    automation_id: z.string().optional(),
  })
  .passthrough();

const RecordedActionSchema = z.object({
  command: z.string(),
  timestamp: z.string(),
  element: RecordedElementSchema.nullable().optional(),
  parameters: z.record(z.unknown()).nullable().optional(),
  screenshot: z.string().nullable().optional(),
});

const RecordingSchema = z.object({
  metadata: z
    .object({
      startTimeSeconds: z.union([z.number(), z.string()]).optional(),
      startTimeFormatted: z.string().optional(),
    })
    .passthrough()
    .default({}),
  actions: z.array(z.unknown()).default([]),
});

export type RecordedAction = z.infer<typeof RecordedActionSchema>;

export interface RecordingOptions {
  application?: string;
  now?: () => Date;
}

function keepValue(value: string | undefined, placeholders: readonly string[]): string | undefined {
  if (!value || placeholders.includes(value)) {
    return undefined;
  }
  return value;
}

/** `"17:56M:47"` becomes `"17:56:47"`; the recorder sometimes leaks a marker before a colon. */
export function repairTimestamp(raw: string): string {
  return raw.replace(/M:/g, ":");
}

function eventData(action: RecordedAction): Record<string, unknown> {
  const data: Record<string, unknown> = { ...(action.parameters ?? {}) };

  const { button, key, content } = data;
  if (typeof button === "string") {
    data.button = button.replace("Button.", "").toLowerCase();
  }
  if (typeof key === "string" && key.startsWith("Key.")) {
    data.key = key.slice("Key.".length).toLowerCase();
  }

  if (action.command === "COPY" || action.command === "PASTE") {
    const copying = action.command === "COPY";
    data.user_intent = copying ? "copy_to_clipboard" : "paste_from_clipboard";
    data.clipboard_content = typeof content === "string" ? content : "";
    if (!Array.isArray(data.keys)) {
      data.keys = ["ctrl", copying ? "c" : "v"];
    }
  }

  const element = action.element ?? {};
  const elementName = keepValue(element.name, PLACEHOLDER_NAMES);
  const elementType = keepValue(element.control_type, PLACEHOLDER_TYPES);
  const automationId = keepValue(element.automation_id, PLACEHOLDER_AUTOMATION_IDS);
  if (elementName) {
    data.element_name = elementName;
  }
  if (elementType) {
    data.element_type = elementType;
  }
  if (automationId) {
    data.automation_id = automationId;
  }
  return data;
}

/**
 * Converts one recorder action. Returns null for commands that carry no
 * event (`STOP`, unknown commands); throws EventParseError when the action
 * cannot become a valid event.
 */
export function convertAction(raw: unknown, index: number): EventLog | null {
  const shape = RecordedActionSchema.safeParse(raw);
  if (!shape.success) {
    throw new EventParseError(index, formatIssues(shape.error.issues));
  }
  const action = shape.data;

  const eventType = COMMAND_EVENT_KINDS.get(action.command);
  if (!eventType) {
    return null;
  }

  const timestamp = repairTimestamp(action.timestamp);
  const millis = Date.parse(timestamp);
  if (Number.isNaN(millis)) {
    throw new EventParseError(index, `unparseable timestamp '${action.timestamp}'`);
  }

  const event = EventLogSchema.safeParse({
    timestamp: new Date(millis).toISOString(),
    event_type: eventType,
    data: eventData(action),
    screenshot_ref: action.screenshot ?? null,
  });
  if (!event.success) {
    throw new EventParseError(index, formatIssues(event.error.issues));
  }
  return event.data;
}

/** Recorder start times are rewritten in the same ISO form as event timestamps. */
function normaliseStartTime(raw: string | undefined): string | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const millis = Date.parse(repairTimestamp(raw));
  return Number.isNaN(millis) ? undefined : new Date(millis).toISOString();
}

/**
 * Builds a session from the external recorder's `{ metadata, actions }`
 * document. Actions that fail to convert are logged and skipped.
 */
export function convertRecording(raw: unknown, options: RecordingOptions = {}): SessionTimeline {
  const recording = RecordingSchema.parse(raw);
  const now = options.now ?? (() => new Date());
  const events: EventLog[] = [];

  recording.actions.forEach((action, index) => {
    try {
      const event = convertAction(action, index);
      if (event) {
        events.push(event);
      }
    } catch (error) {
      if (!(error instanceof EventParseError)) {
        throw error;
      }
      log.warn({ index: error.index, err: error }, "skipping recorded action");
    }
  });

  const { startTimeSeconds, startTimeFormatted } = recording.metadata;
  const ordered = sortEventsByTime(events);
  const first = ordered.length > 0 ? ordered[0] : null;
  const last = ordered.length > 0 ? ordered[ordered.length - 1] : null;

  return {
    session_id: `session-${startTimeSeconds ?? "unknown"}`,
    start_time: normaliseStartTime(startTimeFormatted) ?? first?.timestamp ?? now().toISOString(),
    end_time: last ? last.timestamp : null,
    application: options.application ?? DEFAULT_APPLICATION,
    events: ordered,
    metadata: { ...recording.metadata },
  };
}
