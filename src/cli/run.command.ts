/**
 * run command - execute a pipeline definition in-process, no database
 */

import { Logger, type LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { Command, InvalidArgumentError } from 'commander';
import { resolve } from 'path';
import { loadPipelineDefinition, type PipelineDefinition } from '../database/seed/pipeline-definitions';
import { ExecutorModule } from '../executor/executor.module';
import { RunExecutorService } from '../executor/run-executor.service';
import { PipelineConfigError } from '../matrix/matrix.errors';
import type { Lane } from '../matrix/matrix.types';
import { formatLaneList, formatRunSummary } from './summary';

interface RunCommandOptions {
  lane: string[];
  maxParallel?: number;
  cwd: string;
  list?: boolean;
  quiet?: boolean;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('expected a positive integer');
  }
  return parsed;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

const QUIET_LOG_LEVELS: LogLevel[] = ['error'];
const DEFAULT_LOG_LEVELS: LogLevel[] = ['log', 'warn', 'error'];

export const runCommand = new Command('run')
  .description('Run every lane of a pipeline definition on this machine')
  .argument('<file>', 'Pipeline definition (YAML)')
  .option('-l, --lane <id>', 'Run only this lane (repeatable)', collect, [])
  .option('-p, --max-parallel <n>', 'Lanes running at once (default: all)', parsePositiveInt)
  .option('-C, --cwd <dir>', 'Directory lane commands run in', '.')
  .option('--list', 'Print the expanded lanes and exit')
  .option('-q, --quiet', 'Only print the summary')
  .action(async (file: string, options: RunCommandOptions) => {
    const logger = new Logger('lanes-ci');

    let definition: PipelineDefinition;
    try {
      definition = loadPipelineDefinition(resolve(file));
    } catch (err) {
      if (!(err instanceof PipelineConfigError)) throw err;
      console.error(`Error: ${err.message}`);
      process.exitCode = 2;
      return;
    }

    const app = await NestFactory.createApplicationContext(ExecutorModule, {
      logger: options.quiet ? QUIET_LOG_LEVELS : DEFAULT_LOG_LEVELS,
    });
    const abort = new AbortController();
    const onSignal = () => {
      logger.warn('Cancelling run...');
      abort.abort();
    };
    process.once('SIGINT', onSignal);

    try {
      const executor = app.get(RunExecutorService);
      let lanes: Lane[];
      try {
        lanes = executor.planLanes(definition.config, options.lane);
      } catch (err) {
        if (!(err instanceof PipelineConfigError)) throw err;
        console.error(`Error: ${err.message}`);
        process.exitCode = 2;
        return;
      }

      if (options.list) {
        for (const line of formatLaneList(lanes)) console.log(line);
        return;
      }

      logger.log(`${definition.name}: ${lanes.length} lane(s)`);
      const result = await executor.executeRun(definition.config, {
        cwd: resolve(options.cwd),
        signal: abort.signal,
        lanes: options.lane,
        maxParallelLanes: options.maxParallel,
        onOutput: options.quiet
          ? undefined
          : (event) => {
              const line = `[${event.laneId}] ${event.line}`;
              if (event.level === 'error') console.error(line);
              else console.log(line);
            },
      });

      console.log('');
      for (const line of formatRunSummary(result)) console.log(line);
      process.exitCode = result.status === 'success' ? 0 : 1;
    } finally {
      process.removeListener('SIGINT', onSignal);
      await app.close();
    }
  });
