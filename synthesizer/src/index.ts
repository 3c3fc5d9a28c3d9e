export { WorkflowCompiler } from "./compile";
export type { CompilerOptions } from "./compile";
export { simplifyEvents, groupTypingSequences, labelClipboardPatterns } from "./simplify";
export type { SimplifyOptions } from "./simplify";
export { eventToStep, synthesizeSteps } from "./steps/synthesize";
export { targetSelector, textSelector, pointSelector, dragSelector } from "./steps/selectors";
export { describeClick, describeTyping } from "./steps/descriptions";
export {
  correlateStep,
  findStepEvent,
  defaultMatchers,
  POSITIONAL_STRATEGY,
} from "./correlate";
export type { StepCorrelation, StepEventMatcher, StepEventPredicate } from "./correlate";
export { insertWaitSteps, waitDuration } from "./waits/insert";
export type { WaitSettings } from "./waits/insert";
export { inferWaitReason } from "./waits/reasons";
export { enrichWorkflow } from "./enrich/selectors";
export { inferWorkflowIntent } from "./intent";
export type { WorkflowIntent } from "./intent";
export { buildWorkflowPrompt } from "./generative/prompt";
export { extractJson, parseGeneratedWorkflow } from "./generative/extract";
export type { WorkflowProducer, WorkflowProducerRequest } from "./generative/producer";
export { formatWorkflowAsText } from "./format/text";
