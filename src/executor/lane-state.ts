/**
 * Per-lane state machine.
 *
 *   pending -> running(0) -> running(i+1) | failed | succeeded
 *
 * A stage failure moves straight to failed unless the stage tolerates
 * failure, in which case the lane keeps going but can no longer succeed.
 * cancel moves any non-terminal phase to cancelled.
 */
export type LanePhase =
  | { state: 'pending' }
  | { state: 'running'; stageIndex: number; firstFailure?: number }
  | { state: 'succeeded' }
  | { state: 'failed'; stageIndex: number }
  | { state: 'cancelled'; stageIndex: number };

export type LaneEvent =
  | { type: 'start' }
  | { type: 'stage-passed' }
  | { type: 'stage-failed'; continueLane: boolean }
  | { type: 'cancel' };

export class IllegalLaneTransitionError extends Error {
  constructor(phase: LanePhase, event: LaneEvent) {
    super(`Lane cannot handle '${event.type}' while ${phase.state}`);
    this.name = 'IllegalLaneTransitionError';
  }
}

export const PENDING: LanePhase = { state: 'pending' };

export function isTerminal(phase: LanePhase): boolean {
  return phase.state === 'succeeded' || phase.state === 'failed' || phase.state === 'cancelled';
}

function advance(from: number, firstFailure: number | undefined, stageCount: number): LanePhase {
  const next = from + 1;
  if (next < stageCount) return { state: 'running', stageIndex: next, firstFailure };
  return firstFailure === undefined
    ? { state: 'succeeded' }
    : { state: 'failed', stageIndex: firstFailure };
}

export function nextPhase(phase: LanePhase, event: LaneEvent, stageCount: number): LanePhase {
  switch (phase.state) {
    case 'pending':
      if (event.type === 'start') {
        return stageCount > 0 ? { state: 'running', stageIndex: 0 } : { state: 'succeeded' };
      }
      if (event.type === 'cancel') return { state: 'cancelled', stageIndex: 0 };
      break;

    case 'running':
      if (event.type === 'stage-passed') {
        return advance(phase.stageIndex, phase.firstFailure, stageCount);
      }
      if (event.type === 'stage-failed') {
        if (!event.continueLane) return { state: 'failed', stageIndex: phase.stageIndex };
        return advance(phase.stageIndex, phase.firstFailure ?? phase.stageIndex, stageCount);
      }
      if (event.type === 'cancel') return { state: 'cancelled', stageIndex: phase.stageIndex };
      break;
  }

  throw new IllegalLaneTransitionError(phase, event);
}
