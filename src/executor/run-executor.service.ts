import { Inject, Injectable, Logger } from '@nestjs/common';
import { expandMatrix } from '../matrix/expand-matrix';
import { PipelineConfigError } from '../matrix/matrix.errors';
import type { Lane } from '../matrix/matrix.types';
import type { PipelineConfig } from '../queue/dto/pipeline.dto';
import {
  summarizeRun,
  type LaneOutputListener,
  type LaneResult,
  type RunResult,
  type StageResult,
} from './executor.types';
import { StageExecutorService } from './stage-executor.service';
import { TOOLCHAIN_PROVISIONER, type ToolchainProvisioner } from './toolchain-provisioner';

export class ExecutionTimeoutError extends Error {
  constructor(
    readonly scope: 'lane' | 'run',
    readonly subject: string,
    readonly timeoutMs: number,
  ) {
    super(`${scope} '${subject}' timed out after ${timeoutMs}ms`);
    this.name = 'ExecutionTimeoutError';
  }
}

export class UnknownLaneError extends PipelineConfigError {
  constructor(laneIds: string[], available: string[]) {
    super(`Unknown lane(s): ${laneIds.join(', ')}. Available: ${available.join(', ')}`);
  }
}

export interface ExecuteLaneOptions {
  cwd?: string;
  signal?: AbortSignal;
  /** Overrides config.timeouts.laneSeconds */
  timeoutMs?: number;
  onOutput?: LaneOutputListener;
  onStageFinished?: (result: StageResult) => void | Promise<void>;
}

export interface ExecuteRunOptions {
  cwd?: string;
  signal?: AbortSignal;
  /** Run only these lane ids (declaration order is kept) */
  lanes?: readonly string[];
  /** Overrides config.maxParallelLanes; default is every lane at once */
  maxParallelLanes?: number;
  onOutput?: LaneOutputListener;
  onLaneStarted?: (lane: Lane) => void;
  onLaneFinished?: (result: LaneResult) => void | Promise<void>;
}

/** Longest delay setTimeout honours; larger values fire after 1ms */
const MAX_TIMER_MS = 2_147_483_647;

interface LinkedAbort {
  signal: AbortSignal;
  dispose(): void;
}

/**
 * Child controller that aborts with the parent, and on its own after timeoutMs.
 */
function linkAbort(
  parent: AbortSignal | undefined,
  timeout?: { ms: number; error: () => Error },
): LinkedAbort {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent?.reason);

  if (parent?.aborted) controller.abort(parent.reason);
  else parent?.addEventListener('abort', onParentAbort, { once: true });

  const timer = timeout
    ? setTimeout(() => controller.abort(timeout.error()), Math.min(timeout.ms, MAX_TIMER_MS))
    : undefined;

  return {
    signal: controller.signal,
    dispose() {
      if (timer) clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

function secondsToMs(seconds: number | undefined): number | undefined {
  return seconds === undefined ? undefined : seconds * 1000;
}

/**
 * Provision + stages for a lane, and in-process fan-out of a whole run.
 * Lanes share nothing: each gets its own abort scope and its own result.
 */
@Injectable()
export class RunExecutorService {
  private readonly logger = new Logger(RunExecutorService.name);

  constructor(
    private readonly stageExecutor: StageExecutorService,
    @Inject(TOOLCHAIN_PROVISIONER) private readonly provisioner: ToolchainProvisioner,
  ) {}

  /**
   * Expand the matrix (config errors surface here, before any lane starts)
   * and optionally narrow it to the requested lane ids.
   */
  planLanes(config: PipelineConfig, only?: readonly string[]): Lane[] {
    const lanes = expandMatrix(config.matrix, { imageTemplate: config.pool?.image });
    if (!only || only.length === 0) return lanes;

    const known = new Set(lanes.map((lane) => lane.id));
    const unknown = only.filter((id) => !known.has(id));
    if (unknown.length > 0) throw new UnknownLaneError(unknown, [...known]);

    const wanted = new Set(only);
    return lanes.filter((lane) => wanted.has(lane.id));
  }

  async executeLane(
    lane: Lane,
    config: PipelineConfig,
    options: ExecuteLaneOptions = {},
  ): Promise<LaneResult> {
    const startedAt = Date.now();
    const timeoutMs = options.timeoutMs ?? secondsToMs(config.timeouts.laneSeconds);
    const abort = linkAbort(
      options.signal,
      timeoutMs === undefined
        ? undefined
        : { ms: timeoutMs, error: () => new ExecutionTimeoutError('lane', lane.id, timeoutMs) },
    );

    try {
      const env = StageExecutorService.laneEnv(lane, config.env);
      const provisioned = await this.provisioner.provision(lane, config.provision, {
        env,
        cwd: options.cwd,
        signal: abort.signal,
        onOutput: options.onOutput,
      });

      if (provisioned.status === 'failed') {
        this.logger.warn(`Lane ${lane.id}: toolchain provisioning failed (${provisioned.kind})`);
        return {
          laneId: lane.id,
          status: 'failed',
          failureKind: provisioned.kind,
          stages: [],
          durationMs: Date.now() - startedAt,
        };
      }

      // A cancelled provision leaves the signal aborted, so every stage is reported skipped.
      const result = await this.stageExecutor.runLane(lane, config.stages, {
        env: config.env,
        cwd: options.cwd,
        signal: abort.signal,
        onOutput: options.onOutput,
        onStageFinished: options.onStageFinished,
      });

      const durationMs = Date.now() - startedAt;
      const reason: unknown = abort.signal.reason;
      if (result.status === 'cancelled' && reason instanceof ExecutionTimeoutError) {
        this.logger.warn(`Lane ${lane.id}: ${reason.message}`);
        return { ...result, status: 'failed', failureKind: 'infrastructure', durationMs };
      }
      return { ...result, durationMs };
    } finally {
      abort.dispose();
    }
  }

  async executeRun(config: PipelineConfig, options: ExecuteRunOptions = {}): Promise<RunResult> {
    const lanes = this.planLanes(config, options.lanes);
    const runTimeoutMs = secondsToMs(config.timeouts.runSeconds);
    const abort = linkAbort(
      options.signal,
      runTimeoutMs === undefined
        ? undefined
        : { ms: runTimeoutMs, error: () => new ExecutionTimeoutError('run', 'run', runTimeoutMs) },
    );

    const results: LaneResult[] = new Array<LaneResult>(lanes.length);
    const parallel = Math.max(
      1,
      Math.min(options.maxParallelLanes ?? config.maxParallelLanes ?? lanes.length, lanes.length),
    );
    let next = 0;

    const drain = async (): Promise<void> => {
      while (next < lanes.length) {
        const index = next++;
        const lane = lanes[index];
        options.onLaneStarted?.(lane);
        results[index] = await this.executeLaneIsolated(lane, config, {
          cwd: options.cwd,
          signal: abort.signal,
          onOutput: options.onOutput,
        });
        await options.onLaneFinished?.(results[index]);
      }
    };

    try {
      await Promise.all(Array.from({ length: parallel }, () => drain()));
    } finally {
      abort.dispose();
    }

    return { status: summarizeRun(results), lanes: results };
  }

  /** An unexpected error in one lane becomes that lane's infrastructure failure. */
  private async executeLaneIsolated(
    lane: Lane,
    config: PipelineConfig,
    options: ExecuteLaneOptions,
  ): Promise<LaneResult> {
    try {
      return await this.executeLane(lane, config, options);
    } catch (err) {
      this.logger.error(
        `Lane ${lane.id} crashed: ${err instanceof Error ? err.message : String(err)}`,
        err instanceof Error ? err.stack : undefined,
      );
      return { laneId: lane.id, status: 'failed', failureKind: 'infrastructure', stages: [], durationMs: 0 };
    }
  }
}
