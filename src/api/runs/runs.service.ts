import { ConflictException, Inject, Injectable, NotFoundException } from '@nestjs/common';
import { type ConfigType } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { orchestratorConfig } from '../../config/orchestrator.config';
import { LaneLog } from '../../database/entities/lane-log.entity';
import { LaneRecord } from '../../database/entities/lane.entity';
import { PipelineRun } from '../../database/entities/pipeline-run.entity';
import { RunExecutorService } from '../../executor/run-executor.service';
import type { Lane } from '../../matrix/matrix.types';
import { parsePipelineConfig } from '../../queue/dto/pipeline.dto';
import { LaneQueueService } from '../../queue/lane-queue.service';
import { PipelinesService } from '../pipelines/pipelines.service';

export interface TriggerOptions {
  triggerType?: string;
  triggerMetadata?: Record<string, unknown> | null;
  /** Subset of lane ids; default is the whole matrix */
  lanes?: readonly string[];
}

export interface TriggeredRun {
  runId: string;
  pipelineId: string;
  status: string;
  lanes: { id: string; laneId: string; image: string }[];
}

export interface CancelledLanes {
  runId: string;
  laneIds: string[];
}

const TERMINAL_STATUSES = new Set(['success', 'failed', 'cancelled']);

/**
 * trigger pipeline runs, get run and lane status, lane logs, cancellation.
 */
@Injectable()
export class RunsService {
  constructor(
    private readonly dataSource: DataSource,
    private readonly pipelinesService: PipelinesService,
    private readonly laneQueue: LaneQueueService,
    private readonly executor: RunExecutorService,
    @Inject(orchestratorConfig.KEY)
    private readonly settings: ConfigType<typeof orchestratorConfig>,
  ) {}

  async findAll(pipelineId?: string): Promise<PipelineRun[]> {
    return this.dataSource.getRepository(PipelineRun).find({
      where: pipelineId ? { pipeline_id: pipelineId } : undefined,
      order: { created_at: 'DESC' },
      take: 100,
    });
  }

  async findOne(runId: string): Promise<PipelineRun | null> {
    return this.laneQueue.findRun(runId);
  }

  // Run with its lanes and every stage result (status view)
  async findOneWithLanes(
    runId: string,
  ): Promise<{ run: PipelineRun; lanes: LaneRecord[] } | null> {
    const run = await this.laneQueue.findRun(runId);
    if (!run) return null;
    const lanes = await this.dataSource.getRepository(LaneRecord).find({
      where: { pipeline_run_id: runId },
      relations: ['stage_results'],
      order: { lane_order: 'ASC', stage_results: { attempt: 'ASC', stage_index: 'ASC' } },
    });
    return { run, lanes };
  }

  async getLaneLogs(runId: string, laneId: string): Promise<LaneLog[]> {
    const lane = await this.laneQueue.findLane(runId, laneId);
    if (!lane) throw new NotFoundException('Lane not found');
    return this.dataSource.getRepository(LaneLog).find({
      where: { lane_id: laneId },
      order: { timestamp: 'ASC', id: 'ASC' },
    });
  }

  /**
   * Expand the pipeline matrix once, then create the run (with a frozen config) and one
   * pending lane per expanded lane. A config error rejects the trigger before anything is stored.
   */
  async triggerRun(pipelineId: string, options: TriggerOptions = {}): Promise<TriggeredRun> {
    const pipeline = await this.pipelinesService.findOne(pipelineId);
    if (!pipeline) throw new NotFoundException('Pipeline not found');

    const config = parsePipelineConfig(pipeline.config);
    const lanes: Lane[] = this.executor.planLanes(config, options.lanes);

    const { runId, laneIds } = await this.laneQueue.createRunWithLanes({
      pipelineId,
      triggerType: options.triggerType ?? 'manual',
      triggerMetadata: options.triggerMetadata ?? null,
      config,
      lanes,
      maxRetries: this.settings.laneMaxRetries,
    });

    return {
      runId,
      pipelineId,
      status: 'pending',
      lanes: lanes.map((lane, index) => ({ id: laneIds[index], laneId: lane.id, image: lane.image })),
    };
  }

  /** Cancel every unfinished lane of a run. */
  async cancelRun(runId: string): Promise<CancelledLanes> {
    const run = await this.laneQueue.findRun(runId);
    if (!run) throw new NotFoundException('Run not found');
    if (TERMINAL_STATUSES.has(run.status)) {
      throw new ConflictException(`Run already ${run.status}`);
    }

    const stageNames = parsePipelineConfig(run.config_snapshot).stages.map((stage) => stage.name);
    const laneIds = await this.laneQueue.cancelLanes(runId, stageNames);
    return { runId, laneIds };
  }

  /** Cancel one lane; its siblings keep running. */
  async cancelLane(runId: string, laneId: string): Promise<CancelledLanes> {
    const run = await this.laneQueue.findRun(runId);
    if (!run) throw new NotFoundException('Run not found');
    const lane = await this.laneQueue.findLane(runId, laneId);
    if (!lane) throw new NotFoundException('Lane not found');
    if (TERMINAL_STATUSES.has(lane.status)) {
      throw new ConflictException(`Lane ${lane.lane_key} already ${lane.status}`);
    }

    const stageNames = parsePipelineConfig(run.config_snapshot).stages.map((stage) => stage.name);
    const laneIds = await this.laneQueue.cancelLanes(runId, stageNames, laneId);
    return { runId, laneIds };
  }
}
