import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { type ConfigType } from '@nestjs/config';
import { orchestratorConfig } from '../config/orchestrator.config';
import { LaneQueueService } from '../queue/lane-queue.service';

/**
 * Heartbeat: workers call tick(laneId) while running a lane; the reclaim loop fails or requeues
 * lanes whose worker went quiet.
 */
@Injectable()
export class HeartbeatService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(HeartbeatService.name);
  private reclaimTimer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly laneQueue: LaneQueueService,
    @Inject(orchestratorConfig.KEY)
    private readonly settings: ConfigType<typeof orchestratorConfig>,
  ) {}

  onModuleInit(): void {
    this.startReclaimLoop(this.settings.reclaimIntervalMs, this.settings.heartbeatTimeoutSeconds);
  }

  onModuleDestroy(): void {
    this.stopReclaimLoop();
  }

  /**
   * Keeps heartbeat_at fresh so the lane is not reclaimed; reports a pending cancellation request.
   */
  async tick(laneId: string): Promise<{ cancelRequested: boolean }> {
    return this.laneQueue.heartbeat(laneId);
  }

  async runReclaimOnce(timeoutSeconds = this.settings.heartbeatTimeoutSeconds): Promise<void> {
    const { requeued, failed } = await this.laneQueue.reclaimStuckLanes(timeoutSeconds);
    if (requeued > 0 || failed > 0) {
      this.logger.warn(`Reclaimed lanes from dead workers: ${requeued} requeued, ${failed} failed`);
    }
  }

  startReclaimLoop(intervalMs: number, timeoutSeconds: number): void {
    this.stopReclaimLoop();
    this.reclaimTimer = setInterval(() => {
      this.runReclaimOnce(timeoutSeconds).catch((err) => {
        // next interval retries
        this.logger.warn(`Reclaim pass failed: ${err instanceof Error ? err.message : String(err)}`);
      });
    }, intervalMs);
  }

  stopReclaimLoop(): void {
    if (this.reclaimTimer) {
      clearInterval(this.reclaimTimer);
      this.reclaimTimer = null;
    }
  }
}
