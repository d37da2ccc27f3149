import type { LaneResult, RunResult, StageResult } from '../executor/executor.types';
import type { Lane } from '../matrix/matrix.types';

function formatStage(stage: StageResult): string {
  if (stage.status === 'failed' && stage.exitCode !== null) {
    return `${stage.name}=failed(${stage.exitCode})`;
  }
  return `${stage.name}=${stage.status}`;
}

/** e.g. `FAILED    linux-beta [stage]  build=success lint=failed(101)` */
export function formatLaneSummary(lane: LaneResult): string {
  const kind = lane.failureKind ? ` [${lane.failureKind}]` : '';
  const stages = lane.stages.map(formatStage).join(' ');
  return `${lane.status.toUpperCase().padEnd(9)} ${lane.laneId}${kind}${stages ? `  ${stages}` : ''}`;
}

export function formatRunSummary(result: RunResult): string[] {
  const passed = result.lanes.filter((lane) => lane.status === 'success').length;
  return [
    ...result.lanes.map(formatLaneSummary),
    `Run ${result.status}: ${passed}/${result.lanes.length} lanes passed`,
  ];
}

export function formatLaneList(lanes: readonly Lane[]): string[] {
  return lanes.map((lane) => `${lane.id}  image=${lane.image}`);
}
