import {
  ActionKinds,
  SessionTimeline,
  WaitStep,
  WorkflowDefinition,
  WorkflowStep,
  createLogger,
  eventTimeMs,
  sortEventsByTime,
  stepDefaults,
} from "@stepwright/shared";
import { correlateStep } from "../correlate";
import { inferWaitReason } from "./reasons";

const log = createLogger("waits");

export interface WaitSettings {
  /** Smallest gap, in seconds, that earns a wait step. */
  minWaitSeconds: number;
  bufferSeconds: number;
  maxWaitSeconds: number;
}

function roundTenth(value: number): number {
  return Math.round(value * 10) / 10;
}

export function waitDuration(gapSeconds: number, settings: WaitSettings): number {
  return Math.min(roundTenth(gapSeconds + settings.bufferSeconds), settings.maxWaitSeconds);
}

/**
 * Returns a copy of the workflow with a `WAIT` step after every step whose
 * correlated event is followed by a gap of at least `minWaitSeconds`.
 * Boundaries where either side fails to correlate get no wait.
 */
export function insertWaitSteps(
  workflow: WorkflowDefinition,
  session: SessionTimeline,
  settings: WaitSettings,
): WorkflowDefinition {
  const events = sortEventsByTime(session.events);
  const steps = workflow.steps;
  const expanded: WorkflowStep[] = [];

  steps.forEach((step, index) => {
    expanded.push(step);
    if (index === steps.length - 1) {
      return;
    }

    const current = correlateStep(step, events, index);
    const next = correlateStep(steps[index + 1], events, index + 1);
    if (!current || !next) {
      log.debug({ step_id: step.step_id }, "no timing evidence; skipping wait");
      return;
    }

    const gapSeconds = Math.max(0, (eventTimeMs(next.event) - eventTimeMs(current.event)) / 1000);
    if (gapSeconds < settings.minWaitSeconds) {
      return;
    }

    const duration = waitDuration(gapSeconds, settings);
    const reason = inferWaitReason(current.event, next.event);
    const wait: WaitStep = {
      step_id: `${step.step_id}-wait`,
      action: ActionKinds.wait,
      description: `Wait ${duration}s for ${reason}`,
      selector: null,
      parameters: {
        duration_seconds: duration,
        original_gap: roundTenth(gapSeconds),
      },
      ...stepDefaults,
    };
    log.debug(
      { step_id: step.step_id, gap: gapSeconds, strategies: [current.strategy, next.strategy] },
      "inserting wait",
    );
    expanded.push(wait);
  });

  return {
    ...workflow,
    steps: expanded,
    metadata: {
      ...workflow.metadata,
      total_steps: expanded.length,
      wait_steps_inserted: expanded.length - steps.length,
    },
  };
}
