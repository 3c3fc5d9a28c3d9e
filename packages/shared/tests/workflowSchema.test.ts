import { describe, expect, it } from "vitest";
import {
  WorkflowDefinition,
  WorkflowSchemaError,
  parseSession,
  parseWorkflow,
  serializeWorkflow,
  validateWorkflow,
} from "../src";

const workflow: WorkflowDefinition = {
  workflow_id: "login-workflow",
  name: "Sign in",
  description: "Signs into the portal",
  version: "1.0.0",
  application: "Chrome Browser",
  steps: [
    {
      step_id: "step-1",
      action: "CLICK",
      description: "Click the 'Sign In' button",
      selector: {
        type: "text",
        value: "Sign In",
        fallback: { type: "coordinates", value: { x: 540, y: 520 } },
      },
      parameters: {},
      wait_after: 0.5,
      retry_count: 3,
      on_failure: "stop",
      screenshot_before: "shot-1.png",
    },
    {
      step_id: "step-1-wait",
      action: "WAIT",
      description: "Wait 4.4s for page load after click",
      selector: null,
      parameters: { duration_seconds: 4.4, original_gap: 3.4 },
      wait_after: 0.5,
      retry_count: 3,
      on_failure: "stop",
    },
    {
      step_id: "step-2",
      action: "DRAG",
      description: "Drag from (10, 20) to (110, 20)",
      selector: {
        type: "coordinates",
        value: { start_x: 10, start_y: 20, end_x: 110, end_y: 20 },
      },
      parameters: { end_x: 110, end_y: 20 },
      wait_after: 0.5,
      retry_count: 3,
      on_failure: "stop",
    },
    {
      step_id: "step-3",
      action: "PRESS_KEY",
      description: "Press Enter key",
      selector: null,
      parameters: { key: "enter" },
      wait_after: 0.5,
      retry_count: 3,
      on_failure: "stop",
    },
  ],
  variables: { user: "test-user" },
  preconditions: ["Portal is open"],
  metadata: { total_steps: 4, wait_steps_inserted: 1 },
};

describe("workflow serialization", () => {
  it("round-trips through canonical JSON", () => {
    const parsed = parseWorkflow(serializeWorkflow(workflow));
    expect(parsed).toEqual(workflow);
    expect(parsed.steps.map((step) => step.step_id)).toEqual([
      "step-1",
      "step-1-wait",
      "step-2",
      "step-3",
    ]);
  });

  it("fills execution defaults for sparse steps", () => {
    const parsed = validateWorkflow({
      workflow_id: "w",
      name: "n",
      description: "d",
      steps: [
        {
          step_id: "s1",
          action: "PRESS_KEY",
          description: "Press Enter",
          parameters: { key: "Key.enter" },
        },
      ],
    });
    expect(parsed.version).toBe("1.0.0");
    expect(parsed.steps[0]).toMatchObject({
      selector: null,
      parameters: { key: "enter" },
      wait_after: 0.5,
      retry_count: 3,
      on_failure: "stop",
    });
  });
});

describe("workflow invariants", () => {
  function stepWorkflow(step: Record<string, unknown>): unknown {
    return { workflow_id: "w", name: "n", description: "d", steps: [step] };
  }

  it("rejects keyboard steps that carry a selector", () => {
    const invalid = stepWorkflow({
      step_id: "s1",
      action: "KEY_COMBINATION",
      description: "Copy",
      selector: { type: "coordinates", value: { x: 1, y: 2 } },
      parameters: { keys: ["Ctrl", "C"] },
    });
    expect(() => validateWorkflow(invalid)).toThrow();
  });

  it("rejects mouse steps without a selector", () => {
    const invalid = stepWorkflow({
      step_id: "s1",
      action: "CLICK",
      description: "Click",
      selector: null,
      parameters: {},
    });
    expect(() => validateWorkflow(invalid)).toThrow();
  });

  it("rejects drag steps without end coordinates", () => {
    const invalid = stepWorkflow({
      step_id: "s1",
      action: "DRAG",
      description: "Drag",
      selector: { type: "coordinates", value: { x: 1, y: 2 } },
      parameters: { end_x: 5 },
    });
    try {
      validateWorkflow(invalid);
      expect.unreachable("validation should fail");
    } catch (error) {
      expect(error).toBeInstanceOf(WorkflowSchemaError);
      if (error instanceof WorkflowSchemaError) {
        expect(error.issues[0].path).toEqual(["steps", 0, "parameters", "end_y"]);
      }
    }
  });
});

describe("session parsing", () => {
  it("preserves extra event attributes and defaults screenshot data", () => {
    const session = parseSession({
      session_id: "session-1",
      start_time: "2025-10-19T17:56:40",
      application: "Firefox Browser",
      events: [
        {
          timestamp: "2025-10-19T17:56:41",
          event_type: "MOUSE_CLICK",
          data: { x: 1, y: 2, button: "left", interval: 0.1 },
        },
        {
          timestamp: "2025-10-19T17:56:42",
          event_type: "SCREENSHOT",
          screenshot_ref: "shot.png",
        },
      ],
    });
    expect(session.metadata).toEqual({});
    expect(session.events[0].data).toEqual({ x: 1, y: 2, button: "left", interval: 0.1 });
    expect(session.events[1].data).toEqual({});
  });

  it("rejects unparsable timestamps", () => {
    expect(() =>
      parseSession({
        session_id: "session-1",
        start_time: "2025-10-19T17:56:40",
        application: "Firefox Browser",
        events: [{ timestamp: "not-a-time", event_type: "KEY_PRESS", data: { key: "a" } }],
      }),
    ).toThrow();
  });

  it("rejects key events without a key", () => {
    const withEvent = (event: unknown) => ({
      session_id: "session-1",
      start_time: "2025-10-19T17:56:40",
      application: "Firefox Browser",
      events: [event],
    });
    expect(() =>
      parseSession(withEvent({ timestamp: "2025-10-19T17:56:41", event_type: "KEY_PRESS", data: { key: "" } })),
    ).toThrow();
    expect(() =>
      parseSession(
        withEvent({ timestamp: "2025-10-19T17:56:41", event_type: "KEY_COMBINATION", data: { keys: [] } }),
      ),
    ).toThrow();
  });
});
