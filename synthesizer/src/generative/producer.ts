import { SessionTimeline } from "@stepwright/shared";

export interface WorkflowProducerRequest {
  /** Simplified session, as sent to the model. */
  session: SessionTimeline;
  prompt: string;
}

/**
 * Text generator that answers a prompt with a workflow definition, usually
 * as JSON inside prose or a code fence. Timeouts and retries are the
 * producer's concern.
 */
export interface WorkflowProducer {
  generate(request: WorkflowProducerRequest): Promise<string>;
}
