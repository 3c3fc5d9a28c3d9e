import { describe, expect, it } from "vitest";
import { WorkflowDefinition, validateWorkflow } from "@stepwright/shared";
import { enrichWorkflow } from "../src/enrich/selectors";
import { click, session, typed } from "./_helpers/events";

function workflowWithSelectorValue(value: string): WorkflowDefinition {
  return validateWorkflow({
    workflow_id: "w",
    name: "n",
    description: "d",
    steps: [
      {
        step_id: "1",
        action: "CLICK",
        description: "Click the sign in button",
        selector: {
          type: "text",
          value,
          fallback: { type: "coordinates", value: { x: 540, y: 520 } },
        },
      },
      {
        step_id: "2",
        action: "TYPE_TEXT",
        description: "Type the user name",
        parameters: { text: "test-user" },
      },
    ],
  });
}

describe("enrichWorkflow", () => {
  const recorded = session([
    typed(0, "test-user"),
    click(1, 540, 520, { element_name: "Sign In", element_type: "Button" }),
  ]);

  it("fills an empty text selector from the event at its fallback point", () => {
    const enriched = enrichWorkflow(workflowWithSelectorValue(""), recorded);
    expect(enriched.steps[0].selector).toEqual({
      type: "text",
      value: "Sign In",
      fallback: { type: "coordinates", value: { x: 540, y: 520 } },
    });
    expect(enriched.steps[1]).toEqual(workflowWithSelectorValue("").steps[1]);
  });

  it("leaves populated selectors and unmatched points alone", () => {
    const populated = workflowWithSelectorValue("Log In");
    expect(enrichWorkflow(populated, recorded)).toEqual(populated);

    const elsewhere = session([click(1, 10, 10, { element_name: "Other" })]);
    const empty = workflowWithSelectorValue("");
    expect(enrichWorkflow(empty, elsewhere).steps[0].selector).toMatchObject({ value: "" });
  });

  it("returns a new workflow without touching the input", () => {
    const empty = workflowWithSelectorValue("");
    enrichWorkflow(empty, recorded);
    expect(empty.steps[0].selector).toMatchObject({ value: "" });
  });
});
