import { Injectable } from '@nestjs/common';
import { DataSource, type QueryRunner } from 'typeorm';
import { z } from 'zod';
import { LaneRecord } from '../database/entities/lane.entity';
import { PipelineRun } from '../database/entities/pipeline-run.entity';
import { StageResultRecord } from '../database/entities/stage-result.entity';
import type { LaneResult, StageResult } from '../executor/executor.types';
import type { Lane } from '../matrix/matrix.types';
import type { PipelineConfig } from './dto/pipeline.dto';

const IdRow = z.object({ id: z.string() });
const StatusRow = z.object({ id: z.string(), status: z.string(), retry_count: z.coerce.number() });
const HeartbeatRow = z.object({ cancel_requested: z.boolean() });

export interface NewRun {
  pipelineId: string;
  triggerType: string;
  triggerMetadata: Record<string, unknown> | null;
  config: PipelineConfig;
  lanes: readonly Lane[];
  maxRetries: number;
}

export type LaneDisposition = 'finished' | 'retrying';

/**
 * Lane queue on Postgres. Every lane of a run is claimable at once: lanes never wait on each other.
 */
@Injectable()
export class LaneQueueService {
  constructor(private readonly dataSource: DataSource) {}

  private async withRunner<T>(
    work: (runner: QueryRunner) => Promise<T>,
    { transaction = false } = {},
  ): Promise<T> {
    const runner = this.dataSource.createQueryRunner();
    await runner.connect();
    try {
      if (!transaction) return await work(runner);

      await runner.startTransaction();
      try {
        const result = await work(runner);
        await runner.commitTransaction();
        return result;
      } catch (err) {
        await runner.rollbackTransaction();
        throw err;
      }
    } finally {
      await runner.release();
    }
  }

  /** Rows from an INSERT/UPDATE ... RETURNING, validated against schema. */
  private async returning<T>(
    runner: QueryRunner,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    sql: string,
    params: unknown[],
  ): Promise<T[]> {
    const result = await runner.query(sql, params, true);
    return z.array(schema).parse(result.records);
  }

  /**
   * Create the run (with its frozen config) and one pending lane per expanded lane, atomically.
   */
  async createRunWithLanes(run: NewRun): Promise<{ runId: string; laneIds: string[] }> {
    return this.withRunner(
      async (runner) => {
        const [created] = await this.returning(
          runner,
          IdRow,
          `INSERT INTO pipeline_runs (pipeline_id, trigger_type, trigger_metadata, config_snapshot, status)
           VALUES ($1, $2, $3, $4, 'pending')
           RETURNING id`,
          [run.pipelineId, run.triggerType, run.triggerMetadata ?? {}, run.config],
        );

        const laneIds: string[] = [];
        for (const [order, lane] of run.lanes.entries()) {
          const [row] = await this.returning(
            runner,
            IdRow,
            `INSERT INTO lanes (
               pipeline_run_id, lane_key, lane_order, labels, variables, image,
               status, retry_count, max_retries
             ) VALUES ($1, $2, $3, $4, $5, $6, 'pending', 0, $7)
             RETURNING id`,
            [created.id, lane.id, order, lane.labels, lane.variables, lane.image, run.maxRetries],
          );
          laneIds.push(row.id);
        }

        return { runId: created.id, laneIds };
      },
      { transaction: true },
    );
  }

  /**
   * Claims the oldest pending lane. Returns it with its run (for the config snapshot).
   */
  async claimNextLane(workerId: string): Promise<LaneRecord | null> {
    const [claimed] = await this.withRunner((runner) =>
      this.returning(
        runner,
        IdRow,
        `
        UPDATE lanes
        SET claimed_by = $1,
            claimed_at = NOW(),
            heartbeat_at = NOW(),
            started_at = NOW(),
            status = 'running'
        WHERE id = (
          SELECT l.id
          FROM lanes l
          WHERE l.status = 'pending'
            AND NOT l.cancel_requested
          ORDER BY l.created_at ASC, l.lane_order ASC
          FOR UPDATE SKIP LOCKED
          LIMIT 1
        )
        RETURNING id
        `,
        [workerId],
      ),
    );
    if (!claimed) return null;

    return this.dataSource.getRepository(LaneRecord).findOne({
      where: { id: claimed.id },
      relations: ['pipeline_run'],
    });
  }

  /** Keeps heartbeat_at fresh; tells the worker whether someone asked to cancel the lane. */
  async heartbeat(laneId: string): Promise<{ cancelRequested: boolean }> {
    const [row] = await this.withRunner((runner) =>
      this.returning(
        runner,
        HeartbeatRow,
        `UPDATE lanes SET heartbeat_at = NOW() WHERE id = $1 RETURNING cancel_requested`,
        [laneId],
      ),
    );
    return { cancelRequested: row?.cancel_requested ?? false };
  }

  async recordStageResult(laneId: string, attempt: number, result: StageResult): Promise<void> {
    await this.dataSource.getRepository(StageResultRecord).insert({
      lane_id: laneId,
      attempt,
      stage_index: result.stageIndex,
      stage_name: result.name,
      status: result.status,
      exit_code: result.exitCode,
      failure_kind: result.failureKind ?? null,
      output: result.output,
      duration_ms: result.durationMs,
      started_at: result.startedAt,
      completed_at: result.completedAt,
    });
  }

  /**
   * Store the lane outcome. Infrastructure failures go back to pending while retries remain;
   * stage and provisioning failures are final.
   */
  async finishLane(laneId: string, result: LaneResult): Promise<LaneDisposition> {
    const [row] = await this.withRunner((runner) =>
      this.returning(
        runner,
        StatusRow,
        `
        UPDATE lanes
        SET status = CASE WHEN retry THEN 'pending' ELSE $2 END,
            failure_kind = CASE WHEN retry THEN NULL ELSE $3 END,
            retry_count = CASE WHEN retry THEN retry_count + 1 ELSE retry_count END,
            completed_at = CASE WHEN retry THEN NULL ELSE NOW() END,
            claimed_by = NULL,
            claimed_at = NULL
        FROM (
          SELECT id AS retry_id,
                 ($2 = 'failed' AND $3 = 'infrastructure'
                  AND retry_count < max_retries AND NOT cancel_requested) AS retry
          FROM lanes WHERE id = $1
        ) decision
        WHERE lanes.id = decision.retry_id
        RETURNING lanes.id, lanes.status, lanes.retry_count
        `,
        [laneId, result.status, result.failureKind ?? null],
      ),
    );
    return row?.status === 'pending' ? 'retrying' : 'finished';
  }

  /**
   * Cancel a run (or one lane of it). Pending lanes become cancelled at once with every stage
   * recorded as skipped; running lanes get cancel_requested and their worker stops them on the
   * next heartbeat. Returns the ids of the lanes touched.
   */
  async cancelLanes(
    runId: string,
    stageNames: readonly string[],
    laneId?: string,
  ): Promise<string[]> {
    return this.withRunner(
      async (runner) => {
        const rows = await this.returning(
          runner,
          StatusRow,
          `
          UPDATE lanes
          SET cancel_requested = true,
              status = CASE WHEN status = 'pending' THEN 'cancelled' ELSE status END,
              completed_at = CASE WHEN status = 'pending' THEN NOW() ELSE completed_at END,
              claimed_by = CASE WHEN status = 'pending' THEN NULL ELSE claimed_by END
          WHERE pipeline_run_id = $1
            AND ($2::uuid IS NULL OR id = $2::uuid)
            AND status IN ('pending', 'running')
          RETURNING id, status, retry_count
          `,
          [runId, laneId ?? null],
        );

        for (const row of rows.filter((r) => r.status === 'cancelled')) {
          for (const [stageIndex, stageName] of stageNames.entries()) {
            await runner.query(
              `INSERT INTO stage_results (lane_id, attempt, stage_index, stage_name, status, output, duration_ms)
               VALUES ($1, $2, $3, $4, 'skipped', '', 0)`,
              [row.id, row.retry_count, stageIndex, stageName],
            );
          }
        }

        return rows.map((row) => row.id);
      },
      { transaction: true },
    );
  }

  /**
   * Reclaim lanes whose worker stopped heartbeating. A lost worker is an infrastructure failure:
   * the lane is retried while retries remain, otherwise failed (or cancelled, if that was asked for).
   */
  async reclaimStuckLanes(timeoutSeconds: number): Promise<{ requeued: number; failed: number }> {
    return this.withRunner(
      async (runner) => {
        const stale = `status = 'running' AND heartbeat_at < NOW() - ($1::text || ' seconds')::interval`;

        const requeued = await this.returning(
          runner,
          IdRow,
          `
          UPDATE lanes
          SET status = 'pending',
              claimed_by = NULL,
              claimed_at = NULL,
              retry_count = retry_count + 1
          WHERE ${stale}
            AND retry_count < max_retries
            AND NOT cancel_requested
          RETURNING id
          `,
          [timeoutSeconds],
        );

        const failed = await this.returning(
          runner,
          IdRow,
          `
          UPDATE lanes
          SET status = CASE WHEN cancel_requested THEN 'cancelled' ELSE 'failed' END,
              failure_kind = CASE WHEN cancel_requested THEN NULL ELSE 'infrastructure' END,
              completed_at = NOW(),
              claimed_by = NULL
          WHERE ${stale}
          RETURNING id
          `,
          [timeoutSeconds],
        );

        return { requeued: requeued.length, failed: failed.length };
      },
      { transaction: true },
    );
  }

  async findRun(runId: string): Promise<PipelineRun | null> {
    return this.dataSource.getRepository(PipelineRun).findOne({ where: { id: runId } });
  }

  async findLane(runId: string, laneId: string): Promise<LaneRecord | null> {
    return this.dataSource
      .getRepository(LaneRecord)
      .findOne({ where: { id: laneId, pipeline_run_id: runId } });
  }
}
