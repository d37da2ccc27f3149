export type StageStatus = 'success' | 'failed' | 'cancelled' | 'skipped';
export type LaneStatus = 'success' | 'failed' | 'cancelled';
export type RunStatus = LaneStatus;

/**
 * stage: a stage command exited non-zero
 * provisioning: the toolchain could not be bound for the lane
 * infrastructure: command could not be spawned, worker lost, or timeout.
 * Only infrastructure failures are ever retried.
 */
export type FailureKind = 'stage' | 'provisioning' | 'infrastructure';

export interface StageResult {
  stageIndex: number;
  name: string;
  status: StageStatus;
  /** null when the stage never produced an exit status (skipped, cancelled, spawn error) */
  exitCode: number | null;
  failureKind?: FailureKind;
  output: string;
  durationMs: number;
  startedAt: Date | null;
  completedAt: Date | null;
}

export interface LaneResult {
  laneId: string;
  status: LaneStatus;
  failureKind?: FailureKind;
  /** Stages that ran, in order; on cancellation, also the ones left skipped */
  stages: StageResult[];
  durationMs: number;
}

export interface RunResult {
  status: RunStatus;
  lanes: LaneResult[];
}

export interface LaneOutputEvent {
  laneId: string;
  /** Stage name, or the provisioning step name */
  step: string;
  line: string;
  level: 'info' | 'error';
}

export type LaneOutputListener = (event: LaneOutputEvent) => void;

/**
 * success iff every lane succeeded; failed if any failed; otherwise cancelled.
 */
export function summarizeRun(lanes: readonly LaneResult[]): RunStatus {
  if (lanes.some((lane) => lane.status === 'failed')) return 'failed';
  if (lanes.some((lane) => lane.status === 'cancelled')) return 'cancelled';
  return 'success';
}
