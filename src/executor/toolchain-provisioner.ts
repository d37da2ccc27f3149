import { Inject, Injectable } from '@nestjs/common';
import { interpolate } from '../matrix/interpolate';
import type { Lane } from '../matrix/matrix.types';
import type { ProvisionDefinition } from '../queue/dto/pipeline.dto';
import { COMMAND_RUNNER, type CommandRunner } from './command-runner';
import type { LaneOutputListener } from './executor.types';

export const TOOLCHAIN_PROVISIONER = Symbol('TOOLCHAIN_PROVISIONER');

export interface ProvisionOptions {
  /** Full lane environment (see StageExecutorService.laneEnv) */
  env: Record<string, string>;
  cwd?: string;
  signal?: AbortSignal;
  onOutput?: LaneOutputListener;
}

export type ProvisionOutcome =
  | { status: 'ready' }
  | { status: 'failed'; kind: 'provisioning' | 'infrastructure'; exitCode: number | null; output: string }
  | { status: 'cancelled'; output: string };

/**
 * Binds the lane's toolchain channel into the worker before any stage runs.
 */
export interface ToolchainProvisioner {
  provision(
    lane: Lane,
    definition: ProvisionDefinition | undefined,
    options: ProvisionOptions,
  ): Promise<ProvisionOutcome>;
}

/**
 * Provisions by running the pipeline's install commands (e.g. rustup) in the lane environment.
 * No provision block means the image already carries the toolchain.
 */
@Injectable()
export class CommandToolchainProvisioner implements ToolchainProvisioner {
  constructor(@Inject(COMMAND_RUNNER) private readonly runner: CommandRunner) {}

  async provision(
    lane: Lane,
    definition: ProvisionDefinition | undefined,
    options: ProvisionOptions,
  ): Promise<ProvisionOutcome> {
    if (!definition) return { status: 'ready' };

    const emit = (line: string, level: 'info' | 'error') =>
      options.onOutput?.({ laneId: lane.id, step: definition.name, line, level });

    let output = '';
    for (const template of definition.commands) {
      const command = interpolate(template, lane.variables);
      emit(`$ ${command}`, 'info');

      const outcome = await this.runner.run({
        command,
        env: options.env,
        cwd: options.cwd,
        signal: options.signal,
        onLine: (line, stream) => emit(line, stream === 'stderr' ? 'error' : 'info'),
      });
      output += outcome.output;

      if (outcome.kind === 'aborted') return { status: 'cancelled', output };
      if (outcome.kind === 'spawn-error') {
        emit(`Could not start command: ${outcome.error.message}`, 'error');
        return { status: 'failed', kind: 'infrastructure', exitCode: null, output };
      }
      if (outcome.exitCode !== 0) {
        emit(`Toolchain provisioning failed with code ${outcome.exitCode}`, 'error');
        return { status: 'failed', kind: 'provisioning', exitCode: outcome.exitCode, output };
      }
    }

    return { status: 'ready' };
  }
}
