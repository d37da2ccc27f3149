import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService, type ConfigType } from '@nestjs/config';
import { resolve } from 'path';
import { DataSource } from 'typeorm';
import { orchestratorConfig } from '../config/orchestrator.config';
import { runLockedDdl } from './ddl';
import { Pipeline } from './entities/pipeline.entity';
import { loadPipelineDefinitions } from './seed/pipeline-definitions';

// Sync pipeline_runs.status/started_at/completed_at from lanes (DB is source of truth).
// Lane statuses: pending, running, success, failed, cancelled. Run statuses: same.
const SYNC_PIPELINE_RUN_STATUS_TRIGGER_SQL = `
CREATE OR REPLACE FUNCTION sync_pipeline_run_status_from_lanes()
RETURNS TRIGGER AS $$
DECLARE
  run_id uuid := COALESCE(NEW.pipeline_run_id, OLD.pipeline_run_id);
  has_running boolean;
  all_terminal boolean;
  has_failed boolean;
  has_cancelled boolean;
BEGIN
  -- Any lane running → run is running, set started_at if null
  SELECT EXISTS (
    SELECT 1 FROM lanes WHERE pipeline_run_id = run_id AND status = 'running'
  ) INTO has_running;

  IF has_running THEN
    UPDATE pipeline_runs
    SET status = 'running',
        started_at = COALESCE(started_at, NOW())
    WHERE id = run_id AND (status IS DISTINCT FROM 'running' OR started_at IS NULL);
    RETURN COALESCE(NEW, OLD);
  END IF;

  -- All lanes terminal → failed if any lane failed, cancelled if any was cancelled, else success
  SELECT
    NOT EXISTS (SELECT 1 FROM lanes WHERE pipeline_run_id = run_id AND status NOT IN ('success', 'failed', 'cancelled')),
    EXISTS (SELECT 1 FROM lanes WHERE pipeline_run_id = run_id AND status = 'failed'),
    EXISTS (SELECT 1 FROM lanes WHERE pipeline_run_id = run_id AND status = 'cancelled')
  INTO all_terminal, has_failed, has_cancelled;

  IF all_terminal THEN
    UPDATE pipeline_runs
    SET status = CASE
          WHEN has_failed THEN 'failed'
          WHEN has_cancelled THEN 'cancelled'
          ELSE 'success'
        END,
        completed_at = COALESCE(completed_at, NOW())
    WHERE id = run_id;
  END IF;

  RETURN COALESCE(NEW, OLD);
END;
$$ LANGUAGE plpgsql;

DROP TRIGGER IF EXISTS lanes_sync_pipeline_run_status ON lanes;
CREATE TRIGGER lanes_sync_pipeline_run_status
  AFTER INSERT OR UPDATE OF status
  ON lanes
  FOR EACH ROW
  EXECUTE PROCEDURE sync_pipeline_run_status_from_lanes();
`;

/**
 * On startup: seed pipelines from the definitions directory when the table is empty,
 * and install the run-status trigger.
 */
@Injectable()
export class DatabaseSeedService implements OnModuleInit {
  private readonly logger = new Logger(DatabaseSeedService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly configService: ConfigService,
    @Inject(orchestratorConfig.KEY)
    private readonly settings: ConfigType<typeof orchestratorConfig>,
  ) {}

  async onModuleInit(): Promise<void> {
    await this.seedPipelinesIfEmpty();
    await this.ensureSyncPipelineRunStatusTrigger();
  }

  private async seedPipelinesIfEmpty(): Promise<void> {
    const repo = this.dataSource.getRepository(Pipeline);
    const count = await repo.count();
    if (count > 0) return;

    const dir = resolve(this.settings.pipelineDefinitionsDir);
    const definitions = loadPipelineDefinitions(dir);
    for (const definition of definitions) {
      await repo.save(
        repo.create({
          name: definition.name,
          repository: definition.repository,
          config: definition.config,
        }),
      );
      this.logger.log(`Seeded pipeline '${definition.name}' from ${definition.source}`);
    }
  }

  /**
   * Trigger on lanes: when any lane becomes running → run = running + started_at;
   * when all lanes terminal → run = failed|cancelled|success + completed_at.
   * Only run this in the API process (SYNC_DATABASE=true) to avoid multi-process DDL races.
   */
  private async ensureSyncPipelineRunStatusTrigger(): Promise<void> {
    if (this.configService.get('SYNC_DATABASE') !== 'true') return;
    await runLockedDdl(this.dataSource, SYNC_PIPELINE_RUN_STATUS_TRIGGER_SQL);
  }
}
