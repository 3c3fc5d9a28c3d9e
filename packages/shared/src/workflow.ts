import { z } from "zod";
import { canonicalKey } from "./keys";

export const ActionKinds = {
  click: "CLICK",
  rightClick: "RIGHT_CLICK",
  doubleClick: "DOUBLE_CLICK",
  typeText: "TYPE_TEXT",
  pressKey: "PRESS_KEY",
  keyCombination: "KEY_COMBINATION",
  scroll: "SCROLL",
  drag: "DRAG",
  wait: "WAIT",
  navigate: "NAVIGATE",
} as const;

export type ActionKind = (typeof ActionKinds)[keyof typeof ActionKinds];

export const MOUSE_ACTIONS: readonly ActionKind[] = [
  ActionKinds.click,
  ActionKinds.rightClick,
  ActionKinds.doubleClick,
  ActionKinds.drag,
  ActionKinds.scroll,
];

export const KEYBOARD_ACTIONS: readonly ActionKind[] = [
  ActionKinds.typeText,
  ActionKinds.pressKey,
  ActionKinds.keyCombination,
];

export const PointSchema = z.object({
  x: z.number(),
  y: z.number(),
});

export const DragSpanSchema = z.object({
  start_x: z.number(),
  start_y: z.number(),
  end_x: z.number(),
  end_y: z.number(),
});

export type Point = z.infer<typeof PointSchema>;
export type DragSpan = z.infer<typeof DragSpanSchema>;

export const CoordinatesSelectorSchema = z.object({
  type: z.literal("coordinates"),
  value: z.union([DragSpanSchema, PointSchema]),
});

export const PointSelectorSchema = z.object({
  type: z.literal("coordinates"),
  value: PointSchema,
});

export const TextSelectorSchema = z.object({
  type: z.literal("text"),
  value: z.string(),
  fallback: PointSelectorSchema.nullable().optional(),
});

export const SelectorSchema = z.discriminatedUnion("type", [
  TextSelectorSchema,
  CoordinatesSelectorSchema,
]);

export type TextSelector = z.infer<typeof TextSelectorSchema>;
export type CoordinatesSelector = z.infer<typeof CoordinatesSelectorSchema>;
export type PointSelector = z.infer<typeof PointSelectorSchema>;
export type Selector = z.infer<typeof SelectorSchema>;

const stepBase = {
  step_id: z.string().min(1),
  description: z.string(),
  wait_after: z.number().nonnegative().default(0.5),
  retry_count: z.number().int().nonnegative().default(3),
  on_failure: z.literal("stop").default("stop"),
  screenshot_before: z.string().nullable().optional(),
  screenshot_after: z.string().nullable().optional(),
};

const NoSelector = z.null().default(null);
const KeyName = z.string().min(1).transform(canonicalKey);

const ClickParameters = z
  .object({ button: z.string().optional() })
  .passthrough()
  .default({});

export const ClickStepSchema = z.object({
  ...stepBase,
  action: z.literal(ActionKinds.click),
  selector: SelectorSchema,
  parameters: ClickParameters,
});

export const RightClickStepSchema = z.object({
  ...stepBase,
  action: z.literal(ActionKinds.rightClick),
  selector: SelectorSchema,
  parameters: ClickParameters,
});

export const DoubleClickStepSchema = z.object({
  ...stepBase,
  action: z.literal(ActionKinds.doubleClick),
  selector: SelectorSchema,
  parameters: ClickParameters,
});

export const DragStepSchema = z.object({
  ...stepBase,
  action: z.literal(ActionKinds.drag),
  selector: SelectorSchema,
  parameters: z
    .object({
      end_x: z.number(),
      end_y: z.number(),
      start_x: z.number().optional(),
      start_y: z.number().optional(),
    })
    .passthrough(),
});

export const ScrollStepSchema = z.object({
  ...stepBase,
  action: z.literal(ActionKinds.scroll),
  selector: SelectorSchema,
  parameters: z
    .object({
      delta_x: z.number().default(0),
      delta_y: z.number(),
    })
    .passthrough(),
});

export const TypeTextStepSchema = z.object({
  ...stepBase,
  action: z.literal(ActionKinds.typeText),
  selector: TextSelectorSchema.nullable().default(null),
  parameters: z.object({ text: z.string() }).passthrough(),
});

export const PressKeyStepSchema = z.object({
  ...stepBase,
  action: z.literal(ActionKinds.pressKey),
  selector: NoSelector,
  parameters: z.object({ key: KeyName }).passthrough(),
});

export const KeyCombinationStepSchema = z.object({
  ...stepBase,
  action: z.literal(ActionKinds.keyCombination),
  selector: NoSelector,
  parameters: z
    .object({
      keys: z.array(z.string()).min(1),
      clipboard_content: z.string().optional(),
    })
    .passthrough(),
});

export const WaitStepSchema = z.object({
  ...stepBase,
  action: z.literal(ActionKinds.wait),
  selector: NoSelector,
  parameters: z
    .object({
      duration_seconds: z.number().nonnegative(),
      original_gap: z.number().optional(),
    })
    .passthrough(),
});

export const NavigateStepSchema = z.object({
  ...stepBase,
  action: z.literal(ActionKinds.navigate),
  selector: NoSelector,
  parameters: z.object({ url: z.string() }).passthrough(),
});

export const WorkflowStepSchema = z.discriminatedUnion("action", [
  ClickStepSchema,
  RightClickStepSchema,
  DoubleClickStepSchema,
  DragStepSchema,
  ScrollStepSchema,
  TypeTextStepSchema,
  PressKeyStepSchema,
  KeyCombinationStepSchema,
  WaitStepSchema,
  NavigateStepSchema,
]);

export type WorkflowStep = z.infer<typeof WorkflowStepSchema>;
export type WorkflowStepInput = z.input<typeof WorkflowStepSchema>;
export type ClickStep = z.infer<typeof ClickStepSchema>;
export type RightClickStep = z.infer<typeof RightClickStepSchema>;
export type DoubleClickStep = z.infer<typeof DoubleClickStepSchema>;
export type DragStep = z.infer<typeof DragStepSchema>;
export type ScrollStep = z.infer<typeof ScrollStepSchema>;
export type TypeTextStep = z.infer<typeof TypeTextStepSchema>;
export type PressKeyStep = z.infer<typeof PressKeyStepSchema>;
export type KeyCombinationStep = z.infer<typeof KeyCombinationStepSchema>;
export type WaitStep = z.infer<typeof WaitStepSchema>;
export type NavigateStep = z.infer<typeof NavigateStepSchema>;

export type ClickFamilyStep = ClickStep | RightClickStep | DoubleClickStep;

export const WorkflowDefinitionSchema = z.object({
  workflow_id: z.string().min(1),
  name: z.string(),
  description: z.string(),
  version: z.string().default("1.0.0"),
  application: z.string().nullable().optional(),
  steps: z.array(WorkflowStepSchema),
  variables: z.record(z.unknown()).default({}),
  preconditions: z.array(z.string()).default([]),
  metadata: z.record(z.unknown()).default({}),
});

export type WorkflowDefinition = z.infer<typeof WorkflowDefinitionSchema>;
export type WorkflowDefinitionInput = z.input<typeof WorkflowDefinitionSchema>;

export const stepDefaults = {
  wait_after: 0.5,
  retry_count: 3,
  on_failure: "stop",
} as const;

export function isMouseAction(action: ActionKind): boolean {
  return MOUSE_ACTIONS.includes(action);
}

export function isKeyboardAction(action: ActionKind): boolean {
  return KEYBOARD_ACTIONS.includes(action);
}

export function isClickFamily(step: WorkflowStep): step is ClickFamilyStep {
  return (
    step.action === ActionKinds.click ||
    step.action === ActionKinds.rightClick ||
    step.action === ActionKinds.doubleClick
  );
}

export function isDragSpan(value: Point | DragSpan): value is DragSpan {
  return "start_x" in value;
}

/** Fallback point of a text selector, or null for any other selector. */
export function fallbackPoint(selector: Selector | null): Point | null {
  if (selector?.type !== "text" || !selector.fallback) {
    return null;
  }
  return selector.fallback.value;
}
