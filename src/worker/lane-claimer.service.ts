import { Injectable, Logger } from '@nestjs/common';
import { LaneRecord } from '../database/entities/lane.entity';
import type { Lane } from '../matrix/matrix.types';
import { LaneQueueService } from '../queue/lane-queue.service';
import { parsePipelineConfig, type PipelineConfig } from '../queue/dto/pipeline.dto';

export interface ClaimedLane {
  record: LaneRecord;
  lane: Lane;
  /** Snapshot taken when the run was triggered */
  config: PipelineConfig;
  /** Stage results of this attempt are stored under this number */
  attempt: number;
  runCreatedAt: Date;
}

/**
 * Claims lanes from the queue in postgres (see LaneQueueService) and turns the row back into
 * the lane and run config the executor works on.
 */
@Injectable()
export class LaneClaimerService {
  private readonly logger = new Logger(LaneClaimerService.name);

  constructor(private readonly laneQueue: LaneQueueService) {}

  /** returns a lane or null if none pending. */
  async claimNext(workerId: string): Promise<ClaimedLane | null> {
    const record = await this.laneQueue.claimNextLane(workerId);
    if (!record) return null;

    const config = parsePipelineConfig(record.pipeline_run.config_snapshot);
    this.logger.log(`worker=${workerId} claimed lane ${record.lane_key} (run ${record.pipeline_run_id})`);

    return {
      record,
      lane: Object.freeze({
        id: record.lane_key,
        labels: record.labels,
        variables: record.variables,
        image: record.image,
      }),
      config,
      attempt: record.retry_count,
      runCreatedAt: record.pipeline_run.created_at,
    };
  }
}
