import { Test } from '@nestjs/testing';
import { orchestratorConfig, type OrchestratorSettings } from '../config/orchestrator.config';
import { LaneRecord } from '../database/entities/lane.entity';
import type { LaneResult } from '../executor/executor.types';
import { parsePipelineConfig } from '../queue/dto/pipeline.dto';
import { LaneQueueService, type LaneDisposition } from '../queue/lane-queue.service';
import { LaneClaimerService, type ClaimedLane } from './lane-claimer.service';
import { LaneRunnerService } from './lane-runner.service';
import { WorkerService } from './worker.service';

const settings: OrchestratorSettings = {
  runWorkerLoop: false,
  workerId: 'worker-test',
  workerPollMs: 1000,
  heartbeatIntervalMs: 10_000,
  heartbeatTimeoutSeconds: 30,
  reclaimIntervalMs: 15_000,
  laneMaxRetries: 1,
  workspaceDir: '.',
  pipelineDefinitionsDir: 'pipelines',
};

function claimed(): ClaimedLane {
  const record = new LaneRecord();
  record.id = 'lane-row-1';
  return {
    record,
    lane: { id: 'mac-beta', labels: {}, variables: {}, image: 'macos-latest' },
    config: parsePipelineConfig({ matrix: [], stages: [{ name: 'build', commands: ['cargo build'] }] }),
    attempt: 0,
    runCreatedAt: new Date(),
  };
}

describe('WorkerService.processNext', () => {
  let next: ClaimedLane | null;
  let execute: () => Promise<LaneResult>;
  let finished: [string, LaneResult][];
  let disposition: LaneDisposition;
  let worker: WorkerService;

  beforeEach(async () => {
    next = claimed();
    finished = [];
    disposition = 'finished';
    execute = async () => ({ laneId: 'mac-beta', status: 'success', stages: [], durationMs: 5 });

    const moduleRef = await Test.createTestingModule({
      providers: [
        WorkerService,
        { provide: LaneClaimerService, useValue: { claimNext: async () => next } },
        { provide: LaneRunnerService, useValue: { execute: () => execute() } },
        {
          provide: LaneQueueService,
          useValue: {
            finishLane: async (laneId: string, result: LaneResult) => {
              finished.push([laneId, result]);
              return disposition;
            },
          },
        },
        { provide: orchestratorConfig.KEY, useValue: settings },
      ],
    }).compile();

    worker = moduleRef.get(WorkerService);
  });

  it('uses the configured worker id', () => {
    expect(worker.workerId).toBe('worker-test');
  });

  it('reports an empty queue', async () => {
    next = null;
    await expect(worker.processNext()).resolves.toBe(false);
    expect(finished).toEqual([]);
  });

  it('stores the outcome of the lane it ran', async () => {
    await expect(worker.processNext()).resolves.toBe(true);
    expect(finished).toEqual([
      ['lane-row-1', { laneId: 'mac-beta', status: 'success', stages: [], durationMs: 5 }],
    ]);
  });

  it('records a crash while running as an infrastructure failure', async () => {
    execute = async () => {
      throw new Error('worker out of memory');
    };
    disposition = 'retrying';

    await expect(worker.processNext()).resolves.toBe(true);
    expect(finished).toEqual([
      ['lane-row-1', { laneId: 'mac-beta', status: 'failed', failureKind: 'infrastructure', stages: [], durationMs: 0 }],
    ]);
  });
});
