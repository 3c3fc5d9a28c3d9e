import { describe, expect, it } from "vitest";
import { GenerativeResponseError, WorkflowSchemaError } from "@stepwright/shared";
import { WorkflowCompiler } from "../src/compile";
import { extractJson } from "../src/generative/extract";
import { WorkflowProducer, WorkflowProducerRequest } from "../src/generative/producer";
import { click, key, session, typed } from "./_helpers/events";

class FakeProducer implements WorkflowProducer {
  requests: WorkflowProducerRequest[] = [];

  constructor(private response: string) {}

  async generate(request: WorkflowProducerRequest): Promise<string> {
    this.requests.push(request);
    return this.response;
  }
}

const generatedWorkflow = {
  workflow_id: "login-workflow",
  name: "Sign in",
  description: "Signs into the portal",
  application: "Chrome Browser",
  steps: [
    {
      step_id: "1",
      action: "CLICK",
      description: "Click the sign in button",
      selector: {
        type: "text",
        value: "",
        fallback: { type: "coordinates", value: { x: 540, y: 520 } },
      },
      parameters: {},
    },
    {
      step_id: "2",
      action: "PRESS_KEY",
      description: "Press Enter",
      selector: null,
      parameters: { key: "Key.enter" },
    },
  ],
};

describe("extractJson", () => {
  it("reads JSON inside a fenced block surrounded by prose", () => {
    const text = "Here is the workflow:\n```json\n{\"a\": 1}\n```\nLet me know.";
    expect(extractJson(text)).toEqual({ a: 1 });
  });

  it("reads an unlabelled fence and bare objects after prose", () => {
    expect(extractJson("```\n{\"b\": [1, 2]}\n```")).toEqual({ b: [1, 2] });
    expect(extractJson("Sure! {\"c\": true} Done.")).toEqual({ c: true });
  });

  it("reads an object that opens the reply and is followed by prose", () => {
    expect(extractJson("{\"a\": 1}\nHope this helps!")).toEqual({ a: 1 });
  });

  it("keeps the raw text when parsing fails", () => {
    let caught: unknown;
    try {
      extractJson("I cannot help with that.");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(GenerativeResponseError);
    expect(caught).toMatchObject({
      code: "generative_response",
      rawText: "I cannot help with that.",
    });
  });

  it("rejects JSON that is not an object", () => {
    expect(() => extractJson("[1, 2, 3]")).toThrow("Response JSON is not an object");
  });
});

describe("WorkflowCompiler.compileWithProducer", () => {
  const recorded = session([
    typed(0, "portal"),
    click(1, 540, 520, { element_name: "Sign In", element_type: "Button" }),
    key(4.4, "Key.enter"),
  ]);
  const compiler = new WorkflowCompiler({
    waits: { minWaitSeconds: 2, bufferSeconds: 1, maxWaitSeconds: 10 },
  });

  it("parses, gap-analyzes and enriches the producer's workflow", async () => {
    const producer = new FakeProducer(
      `Here you go:\n\`\`\`json\n${JSON.stringify(generatedWorkflow)}\n\`\`\``,
    );
    const workflow = await compiler.compileWithProducer(recorded, producer);

    expect(producer.requests).toHaveLength(1);
    expect(producer.requests[0].prompt).toContain("SESSION DATA:");
    expect(producer.requests[0].prompt).toContain("\"session_id\": \"session-test\"");

    expect(workflow.steps.map((step) => step.step_id)).toEqual(["1", "1-wait", "2"]);
    expect(workflow.steps[0].selector).toMatchObject({ type: "text", value: "Sign In" });
    expect(workflow.steps[1].description).toBe("Wait 4.4s for page load after click");
    expect(workflow.steps[2].parameters).toEqual({ key: "enter" });
    expect(workflow.version).toBe("1.0.0");
    expect(workflow.metadata).toEqual({ total_steps: 3, wait_steps_inserted: 1 });
  });

  it("surfaces unparsable responses", async () => {
    const producer = new FakeProducer("no json here");
    await expect(compiler.compileWithProducer(recorded, producer)).rejects.toBeInstanceOf(
      GenerativeResponseError,
    );
  });

  it("rejects workflows that break the schema", async () => {
    const producer = new FakeProducer(JSON.stringify({ ...generatedWorkflow, steps: undefined }));
    await expect(compiler.compileWithProducer(recorded, producer)).rejects.toBeInstanceOf(
      WorkflowSchemaError,
    );
  });
});
