import { registerAs } from '@nestjs/config';
import { z } from 'zod';

const blankToUndefined = (value: unknown) => (value === '' ? undefined : value);

const flag = (fallback: 'true' | 'false') =>
  z.preprocess(blankToUndefined, z.enum(['true', 'false']).default(fallback)).transform((v) => v === 'true');

const int = (fallback: number, min: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).default(fallback));

const OrchestratorEnvSchema = z.object({
  RUN_WORKER_LOOP: flag('false'),
  WORKER_ID: z.preprocess(blankToUndefined, z.string().optional()),
  WORKER_POLL_MS: int(1000, 10),
  HEARTBEAT_INTERVAL_MS: int(10_000, 100),
  HEARTBEAT_TIMEOUT_SECONDS: int(30, 1),
  RECLAIM_INTERVAL_MS: int(15_000, 100),
  LANE_MAX_RETRIES: int(0, 0),
  WORKSPACE_DIR: z.preprocess(blankToUndefined, z.string().default('.')),
  PIPELINE_DEFINITIONS_DIR: z.preprocess(blankToUndefined, z.string().default('pipelines')),
});

export interface OrchestratorSettings {
  runWorkerLoop: boolean;
  /** Falls back to HOSTNAME, then a random id (see WorkerService) */
  workerId?: string;
  workerPollMs: number;
  heartbeatIntervalMs: number;
  heartbeatTimeoutSeconds: number;
  reclaimIntervalMs: number;
  /** Retries for infrastructure failures only; 0 disables */
  laneMaxRetries: number;
  /** Directory lane commands run in */
  workspaceDir: string;
  pipelineDefinitionsDir: string;
}

/**
 * @throws Error naming every invalid variable
 */
export function readOrchestratorSettings(env: NodeJS.ProcessEnv = process.env): OrchestratorSettings {
  const parsed = OrchestratorEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid orchestrator environment: ${issues.join('; ')}`);
  }

  const vars = parsed.data;
  return {
    runWorkerLoop: vars.RUN_WORKER_LOOP,
    workerId: vars.WORKER_ID,
    workerPollMs: vars.WORKER_POLL_MS,
    heartbeatIntervalMs: vars.HEARTBEAT_INTERVAL_MS,
    heartbeatTimeoutSeconds: vars.HEARTBEAT_TIMEOUT_SECONDS,
    reclaimIntervalMs: vars.RECLAIM_INTERVAL_MS,
    laneMaxRetries: vars.LANE_MAX_RETRIES,
    workspaceDir: vars.WORKSPACE_DIR,
    pipelineDefinitionsDir: vars.PIPELINE_DEFINITIONS_DIR,
  };
}

export const orchestratorConfig = registerAs('orchestrator', () => readOrchestratorSettings());
