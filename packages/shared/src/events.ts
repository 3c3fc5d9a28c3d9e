import { z } from "zod";

export const EventKinds = {
  mouseClick: "MOUSE_CLICK",
  mouseDoubleClick: "MOUSE_DOUBLE_CLICK",
  mouseDrag: "MOUSE_DRAG",
  scroll: "SCROLL",
  textInput: "TEXT_INPUT",
  keyPress: "KEY_PRESS",
  keyCombination: "KEY_COMBINATION",
  navigation: "NAVIGATION",
  screenshot: "SCREENSHOT",
} as const;

export type EventKind = (typeof EventKinds)[keyof typeof EventKinds];

export const UserIntentSchema = z.enum([
  "select_text_for_copy",
  "copy_to_clipboard",
  "paste_from_clipboard",
  "submit_input",
]);

export type UserIntent = z.infer<typeof UserIntentSchema>;

const ElementFields = {
  element_name: z.string().optional(),
  element_type: z.string().optional(),
  automation_id: z.string().optional(),
  user_intent: UserIntentSchema.optional(),
};

const PointData = z
  .object({
    ...ElementFields,
    x: z.number(),
    y: z.number(),
  })
  .passthrough();

const eventBase = {
  timestamp: z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
    message: "timestamp must be an ISO-8601 date-time",
  }),
  screenshot_ref: z.string().nullable().optional(),
};

export const MouseClickEventSchema = z.object({
  ...eventBase,
  event_type: z.literal(EventKinds.mouseClick),
  data: PointData.extend({ button: z.string().optional() }),
});

export const MouseDoubleClickEventSchema = z.object({
  ...eventBase,
  event_type: z.literal(EventKinds.mouseDoubleClick),
  data: PointData,
});

export const MouseDragEventSchema = z.object({
  ...eventBase,
  event_type: z.literal(EventKinds.mouseDrag),
  data: z
    .object({
      ...ElementFields,
      start_x: z.number(),
      start_y: z.number(),
      end_x: z.number(),
      end_y: z.number(),
    })
    .passthrough(),
});

export const ScrollEventSchema = z.object({
  ...eventBase,
  event_type: z.literal(EventKinds.scroll),
  data: PointData.extend({
    delta_x: z.number().default(0),
    delta_y: z.number().default(0),
  }),
});

export const TextInputEventSchema = z.object({
  ...eventBase,
  event_type: z.literal(EventKinds.textInput),
  data: z
    .object({
      ...ElementFields,
      text: z.string(),
      x: z.number().optional(),
      y: z.number().optional(),
      grouped_from: z.number().int().positive().optional(),
    })
    .passthrough(),
});

export const KeyPressEventSchema = z.object({
  ...eventBase,
  event_type: z.literal(EventKinds.keyPress),
  data: z
    .object({
      ...ElementFields,
      key: z.string().min(1),
    })
    .passthrough(),
});

export const KeyCombinationEventSchema = z.object({
  ...eventBase,
  event_type: z.literal(EventKinds.keyCombination),
  data: z
    .object({
      ...ElementFields,
      keys: z.array(z.string()).min(1),
      clipboard_content: z.string().optional(),
    })
    .passthrough(),
});

export const NavigationEventSchema = z.object({
  ...eventBase,
  event_type: z.literal(EventKinds.navigation),
  data: z
    .object({
      ...ElementFields,
      url: z.string(),
    })
    .passthrough(),
});

export const ScreenshotEventSchema = z.object({
  ...eventBase,
  event_type: z.literal(EventKinds.screenshot),
  data: z.object(ElementFields).passthrough().default({}),
});

export const EventLogSchema = z.discriminatedUnion("event_type", [
  MouseClickEventSchema,
  MouseDoubleClickEventSchema,
  MouseDragEventSchema,
  ScrollEventSchema,
  TextInputEventSchema,
  KeyPressEventSchema,
  KeyCombinationEventSchema,
  NavigationEventSchema,
  ScreenshotEventSchema,
]);

export type EventLog = z.infer<typeof EventLogSchema>;
export type EventLogInput = z.input<typeof EventLogSchema>;
export type MouseClickEvent = z.infer<typeof MouseClickEventSchema>;
export type MouseDoubleClickEvent = z.infer<typeof MouseDoubleClickEventSchema>;
export type MouseDragEvent = z.infer<typeof MouseDragEventSchema>;
export type ScrollEvent = z.infer<typeof ScrollEventSchema>;
export type TextInputEvent = z.infer<typeof TextInputEventSchema>;
export type KeyPressEvent = z.infer<typeof KeyPressEventSchema>;
export type KeyCombinationEvent = z.infer<typeof KeyCombinationEventSchema>;
export type NavigationEvent = z.infer<typeof NavigationEventSchema>;
export type ScreenshotEvent = z.infer<typeof ScreenshotEventSchema>;

export const SessionTimelineSchema = z.object({
  session_id: z.string().min(1),
  start_time: z.string(),
  end_time: z.string().nullable().optional(),
  application: z.string(),
  events: z.array(EventLogSchema),
  metadata: z.record(z.unknown()).default({}),
});

export type SessionTimeline = z.infer<typeof SessionTimelineSchema>;
export type SessionTimelineInput = z.input<typeof SessionTimelineSchema>;

export function parseSession(value: unknown): SessionTimeline {
  return SessionTimelineSchema.parse(value);
}

export function eventTimeMs(event: EventLog): number {
  return Date.parse(event.timestamp);
}

export function sortEventsByTime(events: readonly EventLog[]): EventLog[] {
  // Array.prototype.sort is stable, so equal timestamps keep recording order.
  return [...events].sort((left, right) => eventTimeMs(left) - eventTimeMs(right));
}

export function elementNameOf(event: EventLog): string {
  return event.data.element_name ?? "";
}

export function elementTypeOf(event: EventLog): string {
  return event.data.element_type ?? "";
}

/** Point recorded on an event, for the kinds that record one. */
export function eventPoint(event: EventLog): { x: number; y: number } | null {
  const { x, y } = event.data;
  if (typeof x === "number" && typeof y === "number") {
    return { x, y };
  }
  return null;
}
