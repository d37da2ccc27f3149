import { Inject, Injectable } from '@nestjs/common';
import { interpolate, variablesToEnv } from '../matrix/interpolate';
import type { Lane } from '../matrix/matrix.types';
import type { StageDefinition } from '../queue/dto/pipeline.dto';
import { COMMAND_RUNNER, type CommandRunner } from './command-runner';
import type {
  FailureKind,
  LaneOutputListener,
  LaneResult,
  StageResult,
} from './executor.types';
import { nextPhase, PENDING, type LanePhase } from './lane-state';

export interface RunLaneOptions {
  /** Pipeline-wide environment, below lane variables and stage env */
  env?: Record<string, string>;
  cwd?: string;
  /** Aborting stops the current stage and skips the rest */
  signal?: AbortSignal;
  onOutput?: LaneOutputListener;
  /** Called once per stage result, in order, skipped stages included */
  onStageFinished?: (result: StageResult) => void | Promise<void>;
}

/**
 * Runs the fixed stage sequence for one lane, fail-fast.
 * Assumes the lane's toolchain is already provisioned.
 */
@Injectable()
export class StageExecutorService {
  constructor(@Inject(COMMAND_RUNNER) private readonly runner: CommandRunner) {}

  /**
   * Environment a lane's commands see (before stage-level env), on top of
   * `inherited`, the worker's own environment.
   */
  static laneEnv(
    lane: Lane,
    base: Record<string, string> = {},
    inherited: NodeJS.ProcessEnv = process.env,
  ): Record<string, string> {
    return {
      ...base,
      ...variablesToEnv(lane.variables, { ...inherited, ...base }),
      LANE_ID: lane.id,
      LANE_IMAGE: lane.image,
    };
  }

  async runLane(
    lane: Lane,
    stages: readonly StageDefinition[],
    options: RunLaneOptions = {},
  ): Promise<LaneResult> {
    const startedAt = Date.now();
    const results: StageResult[] = [];
    const laneEnv = StageExecutorService.laneEnv(lane, options.env);
    let failureKind: FailureKind | undefined;

    const record = async (result: StageResult) => {
      results.push(result);
      await options.onStageFinished?.(result);
    };

    let phase: LanePhase = nextPhase(
      PENDING,
      options.signal?.aborted ? { type: 'cancel' } : { type: 'start' },
      stages.length,
    );

    while (phase.state === 'running') {
      if (options.signal?.aborted) {
        phase = nextPhase(phase, { type: 'cancel' }, stages.length);
        break;
      }

      const stage = stages[phase.stageIndex];
      const result = await this.runStage(lane, stage, phase.stageIndex, laneEnv, options);
      await record(result);

      if (result.status === 'success') {
        phase = nextPhase(phase, { type: 'stage-passed' }, stages.length);
      } else if (result.status === 'cancelled') {
        phase = nextPhase(phase, { type: 'cancel' }, stages.length);
      } else {
        failureKind ??= result.failureKind;
        phase = nextPhase(
          phase,
          {
            type: 'stage-failed',
            // Infrastructure trouble ends the lane even for tolerant stages.
            continueLane: stage.continueOnFailure && result.failureKind === 'stage',
          },
          stages.length,
        );
      }
    }

    if (phase.state === 'cancelled') {
      for (let index = results.length; index < stages.length; index++) {
        await record(skippedStage(stages[index], index));
      }
    }

    return {
      laneId: lane.id,
      status:
        phase.state === 'succeeded' ? 'success' : phase.state === 'cancelled' ? 'cancelled' : 'failed',
      failureKind: phase.state === 'failed' ? (failureKind ?? 'stage') : undefined,
      stages: results,
      durationMs: Date.now() - startedAt,
    };
  }

  /**
   * Run every command of a stage in order; the first non-zero exit fails the stage.
   */
  private async runStage(
    lane: Lane,
    stage: StageDefinition,
    stageIndex: number,
    laneEnv: Record<string, string>,
    options: RunLaneOptions,
  ): Promise<StageResult> {
    const startedAt = new Date();
    const env = { ...laneEnv };
    for (const [name, value] of Object.entries(stage.env)) {
      env[name] = interpolate(value, lane.variables);
    }

    const emit = (line: string, level: 'info' | 'error') =>
      options.onOutput?.({ laneId: lane.id, step: stage.name, line, level });

    const finish = (
      fields: Pick<StageResult, 'status' | 'exitCode' | 'failureKind'>,
      output: string,
    ): StageResult => {
      const completedAt = new Date();
      return {
        stageIndex,
        name: stage.name,
        ...fields,
        output,
        durationMs: completedAt.getTime() - startedAt.getTime(),
        startedAt,
        completedAt,
      };
    };

    let output = '';
    let exitCode = 0;

    for (const template of stage.commands) {
      const command = interpolate(template, lane.variables);
      emit(`$ ${command}`, 'info');

      const outcome = await this.runner.run({
        command,
        env,
        cwd: options.cwd,
        signal: options.signal,
        onLine: (line, stream) => emit(line, stream === 'stderr' ? 'error' : 'info'),
      });
      output += outcome.output;

      if (outcome.kind === 'aborted') {
        emit('Stage cancelled', 'error');
        return finish({ status: 'cancelled', exitCode: null }, output);
      }
      if (outcome.kind === 'spawn-error') {
        emit(`Could not start command: ${outcome.error.message}`, 'error');
        return finish({ status: 'failed', exitCode: null, failureKind: 'infrastructure' }, output);
      }

      exitCode = outcome.exitCode;
      if (exitCode !== 0) {
        emit(`Command exited with code ${exitCode}`, 'error');
        return finish({ status: 'failed', exitCode, failureKind: 'stage' }, output);
      }
    }

    return finish({ status: 'success', exitCode }, output);
  }
}

function skippedStage(stage: StageDefinition, stageIndex: number): StageResult {
  return {
    stageIndex,
    name: stage.name,
    status: 'skipped',
    exitCode: null,
    output: '',
    durationMs: 0,
    startedAt: null,
    completedAt: null,
  };
}
