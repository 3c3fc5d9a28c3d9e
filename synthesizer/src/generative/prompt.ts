import { SessionTimeline } from "@stepwright/shared";

const WORKFLOW_SHAPE = `{
  "workflow_id": "string",
  "name": "string - descriptive name for the workflow",
  "description": "string - what this workflow accomplishes",
  "version": "1.0.0",
  "application": "string - target application name",
  "steps": [
    {
      "step_id": "string",
      "action": "CLICK|RIGHT_CLICK|DOUBLE_CLICK|TYPE_TEXT|PRESS_KEY|KEY_COMBINATION|SCROLL|DRAG|WAIT|NAVIGATE",
      "description": "string - human readable description",
      "selector": {
        "type": "text",
        "value": "visible text or label of UI element",
        "fallback": { "type": "coordinates", "value": { "x": 0, "y": 0 } }
      },
      "parameters": {},
      "wait_after": 0.5,
      "retry_count": 3,
      "on_failure": "stop"
    }
  ],
  "variables": {},
  "preconditions": [],
  "metadata": {}
}`;

const RULES = [
  "CLICK, RIGHT_CLICK and DOUBLE_CLICK steps use a \"text\" selector naming the element, with a \"coordinates\" fallback holding the exact x and y from the event data. Use a \"coordinates\" selector alone when the element has no name.",
  "TYPE_TEXT, PRESS_KEY, KEY_COMBINATION, WAIT and NAVIGATE steps use \"selector\": null, except that TYPE_TEXT may name the field typed into with a \"text\" selector.",
  "DRAG steps use a \"coordinates\" selector with start_x, start_y, end_x and end_y, and repeat end_x and end_y in parameters.",
  "SCROLL steps use a \"coordinates\" selector with x and y, and put delta_x and delta_y in parameters.",
  "Parameters: TYPE_TEXT needs \"text\", PRESS_KEY needs \"key\" (lower-case, e.g. \"enter\"), KEY_COMBINATION needs \"keys\", WAIT needs \"duration_seconds\", NAVIGATE needs \"url\".",
];

export function buildWorkflowPrompt(session: SessionTimeline): string {
  return [
    "Analyze this user session recording and generate a structured workflow definition.",
    "",
    "SESSION DATA:",
    JSON.stringify(session, null, 2),
    "",
    "Create a JSON workflow definition that can replay these actions.",
    "",
    "Output ONLY valid JSON matching this shape:",
    WORKFLOW_SHAPE,
    "",
    "Rules:",
    ...RULES.map((rule) => `- ${rule}`),
    "",
    "Generate the workflow JSON:",
  ].join("\n");
}
