/**
 * Database entities: pipelines, pipeline_runs, lanes, stage_results, lane_logs.
 */
export { Pipeline } from './pipeline.entity';
export { PipelineRun } from './pipeline-run.entity';
export { LaneRecord } from './lane.entity';
export { StageResultRecord } from './stage-result.entity';
export { LaneLog } from './lane-log.entity';
