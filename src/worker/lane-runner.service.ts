import { Inject, Injectable, Logger } from '@nestjs/common';
import { type ConfigType } from '@nestjs/config';
import { resolve } from 'path';
import { orchestratorConfig } from '../config/orchestrator.config';
import type { LaneOutputEvent, LaneResult } from '../executor/executor.types';
import { RunExecutorService } from '../executor/run-executor.service';
import { LaneQueueService } from '../queue/lane-queue.service';
import { LogStreamService } from '../streaming/log-stream.service';
import { HeartbeatService } from './heartbeat.service';
import type { ClaimedLane } from './lane-claimer.service';

export class LaneCancelRequestedError extends Error {
  constructor(laneId: string) {
    super(`Lane ${laneId} was cancelled`);
    this.name = 'LaneCancelRequestedError';
  }
}

/**
 * Runs one claimed lane on this worker: provisions, executes the stages, streams logs,
 * stores each stage result as it lands, heartbeats, and stops when cancellation is requested.
 */
@Injectable()
export class LaneRunnerService {
  private readonly logger = new Logger(LaneRunnerService.name);

  constructor(
    private readonly executor: RunExecutorService,
    private readonly heartbeat: HeartbeatService,
    private readonly laneQueue: LaneQueueService,
    private readonly logStream: LogStreamService,
    @Inject(orchestratorConfig.KEY)
    private readonly settings: ConfigType<typeof orchestratorConfig>,
  ) {}

  /**
   * Lane timeout: config.timeouts.laneSeconds, cut short by what is left of the run's budget.
   */
  static effectiveTimeoutMs(claimed: ClaimedLane, now = Date.now()): number | undefined {
    const { laneSeconds, runSeconds } = claimed.config.timeouts;
    const candidates: number[] = [];
    if (laneSeconds !== undefined) candidates.push(laneSeconds * 1000);
    if (runSeconds !== undefined) {
      candidates.push(Math.max(0, claimed.runCreatedAt.getTime() + runSeconds * 1000 - now));
    }
    return candidates.length ? Math.min(...candidates) : undefined;
  }

  async execute(claimed: ClaimedLane, workerId: string): Promise<LaneResult> {
    const laneRowId = claimed.record.id;
    const controller = new AbortController();

    // Log inserts are chained so lines land in the order they were produced.
    let logChain: Promise<void> = Promise.resolve();
    const appendLog = (step: string, line: string, level: string) => {
      logChain = logChain
        .then(() => this.logStream.appendLog(laneRowId, step, line, level))
        .catch((err) => {
          this.logger.warn(`Lane ${claimed.lane.id}: could not store log line: ${String(err)}`);
        });
    };

    const heartbeatTimer = setInterval(() => {
      this.heartbeat
        .tick(laneRowId)
        .then(({ cancelRequested }) => {
          if (cancelRequested && !controller.signal.aborted) {
            this.logger.log(`Lane ${claimed.lane.id}: cancellation requested`);
            controller.abort(new LaneCancelRequestedError(claimed.lane.id));
          }
        })
        .catch((err) => {
          this.logger.warn(`Lane ${claimed.lane.id}: heartbeat failed: ${String(err)}`);
        });
    }, this.settings.heartbeatIntervalMs);

    appendLog(
      'worker',
      `worker=${workerId} lane=${claimed.lane.id} image=${claimed.lane.image} attempt=${claimed.attempt}`,
      'info',
    );

    try {
      const result = await this.executor.executeLane(claimed.lane, claimed.config, {
        cwd: resolve(this.settings.workspaceDir),
        signal: controller.signal,
        timeoutMs: LaneRunnerService.effectiveTimeoutMs(claimed),
        onOutput: (event: LaneOutputEvent) => appendLog(event.step, event.line, event.level),
        onStageFinished: (stage) =>
          this.laneQueue.recordStageResult(laneRowId, claimed.attempt, stage),
      });

      appendLog(
        'worker',
        `lane ${result.status}${result.failureKind ? ` (${result.failureKind})` : ''}`,
        result.status === 'success' ? 'info' : 'error',
      );
      return result;
    } finally {
      clearInterval(heartbeatTimer);
      await logChain;
    }
  }
}
