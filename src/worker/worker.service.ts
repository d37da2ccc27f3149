import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { type ConfigType } from '@nestjs/config';
import { randomUUID } from 'node:crypto';
import { orchestratorConfig } from '../config/orchestrator.config';
import type { LaneResult } from '../executor/executor.types';
import { LaneQueueService } from '../queue/lane-queue.service';
import { LaneClaimerService } from './lane-claimer.service';
import { LaneRunnerService } from './lane-runner.service';

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Worker main loop (RUN_WORKER_LOOP=true only): one lane at a time per worker process.
 * - claim next pending lane
 * - execute it (provision, stages, logs, heartbeats), store the outcome
 * - sleep when the queue is empty
 */
@Injectable()
export class WorkerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(WorkerService.name);
  private abort = new AbortController();
  private loopPromise: Promise<void> | null = null;
  readonly workerId: string;

  constructor(
    private readonly claimer: LaneClaimerService,
    private readonly runner: LaneRunnerService,
    private readonly laneQueue: LaneQueueService,
    @Inject(orchestratorConfig.KEY)
    private readonly settings: ConfigType<typeof orchestratorConfig>,
  ) {
    this.workerId =
      settings.workerId || process.env.HOSTNAME || `worker-${randomUUID().slice(0, 8)}`;
  }

  onModuleInit(): void {
    if (!this.settings.runWorkerLoop) return;
    this.logger.log(`Worker ${this.workerId} started`);
    this.loopPromise = this.runLoop();
  }

  async onModuleDestroy(): Promise<void> {
    this.abort.abort();
    if (this.loopPromise) {
      await Promise.race([this.loopPromise, sleep(2000)]);
    }
  }

  /**
   * Claim and run a single lane. Returns false when nothing was pending.
   */
  async processNext(): Promise<boolean> {
    const claimed = await this.claimer.claimNext(this.workerId);
    if (!claimed) return false;

    let result: LaneResult;
    try {
      result = await this.runner.execute(claimed, this.workerId);
    } catch (err) {
      this.logger.error(
        `Lane ${claimed.lane.id} crashed: ${err instanceof Error ? err.message : String(err)}`,
        err instanceof Error ? err.stack : undefined,
      );
      result = {
        laneId: claimed.lane.id,
        status: 'failed',
        failureKind: 'infrastructure',
        stages: [],
        durationMs: 0,
      };
    }

    const disposition = await this.laneQueue.finishLane(claimed.record.id, result);
    this.logger.log(
      `Lane ${claimed.lane.id}: ${result.status}${result.failureKind ? ` (${result.failureKind})` : ''}` +
        (disposition === 'retrying' ? ', requeued for retry' : ''),
    );
    return true;
  }

  private async runLoop(): Promise<void> {
    while (!this.abort.signal.aborted) {
      try {
        const didWork = await this.processNext();
        if (!didWork) await sleep(this.settings.workerPollMs);
      } catch (err) {
        if (this.abort.signal.aborted) return;
        this.logger.error(`Worker loop error: ${err instanceof Error ? err.message : String(err)}`);
        await sleep(this.settings.workerPollMs);
      }
    }
  }
}
