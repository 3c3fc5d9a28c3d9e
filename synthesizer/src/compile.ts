import {
  Logger,
  SessionTimeline,
  WorkflowDefinition,
  createLogger,
} from "@stepwright/shared";
import { enrichWorkflow } from "./enrich/selectors";
import { parseGeneratedWorkflow } from "./generative/extract";
import { buildWorkflowPrompt } from "./generative/prompt";
import { WorkflowProducer } from "./generative/producer";
import { inferWorkflowIntent } from "./intent";
import { SimplifyOptions, simplifyEvents } from "./simplify";
import { synthesizeSteps } from "./steps/synthesize";
import { WaitSettings, insertWaitSteps } from "./waits/insert";

export interface CompilerOptions {
  waits: WaitSettings;
  simplify?: SimplifyOptions;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Turns a recorded session into a workflow: simplify, synthesize (or ask a
 * producer), insert waits, enrich selectors. Every stage returns new values;
 * the session passed in is never modified.
 */
export class WorkflowCompiler {
  private waits: WaitSettings;
  private simplifyOptions: SimplifyOptions;
  private logger: Logger;
  private now: () => Date;

  constructor(options: CompilerOptions) {
    this.waits = options.waits;
    this.simplifyOptions = options.simplify ?? {};
    this.logger = options.logger ?? createLogger("compiler");
    this.now = options.now ?? (() => new Date());
  }

  simplify(session: SessionTimeline): SessionTimeline {
    return {
      ...session,
      events: simplifyEvents(session.events, this.simplifyOptions),
    };
  }

  compileFromEvents(session: SessionTimeline): WorkflowDefinition {
    const simplified = this.simplify(session);
    const steps = synthesizeSteps(simplified.events);
    const intent = inferWorkflowIntent(steps, session);

    const synthesized: WorkflowDefinition = {
      workflow_id: `${session.session_id}-workflow`,
      name: intent.name,
      description: intent.description,
      version: "1.0.0",
      application: session.application,
      steps,
      variables: {},
      preconditions: [],
      metadata: {
        source_session: session.session_id,
        generated_at: this.now().toISOString(),
        event_count: session.events.length,
        simplified_count: simplified.events.length,
      },
    };

    return this.finish(synthesized, session);
  }

  async compileWithProducer(
    session: SessionTimeline,
    producer: WorkflowProducer,
  ): Promise<WorkflowDefinition> {
    const simplified = this.simplify(session);
    const prompt = buildWorkflowPrompt(simplified);
    this.logger.info(
      { session_id: session.session_id, events: simplified.events.length },
      "requesting workflow from producer",
    );

    const response = await producer.generate({ session: simplified, prompt });
    const generated = parseGeneratedWorkflow(response);
    return this.finish(generated, session);
  }

  private finish(workflow: WorkflowDefinition, session: SessionTimeline): WorkflowDefinition {
    const withWaits = insertWaitSteps(workflow, session, this.waits);
    const enriched = enrichWorkflow(withWaits, session);
    this.logger.info(
      {
        session_id: session.session_id,
        workflow_id: enriched.workflow_id,
        steps: enriched.steps.length,
        waits: enriched.metadata.wait_steps_inserted,
      },
      "compiled workflow",
    );
    return enriched;
  }
}
