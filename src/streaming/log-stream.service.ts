import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService, type ConfigType } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { Pool, PoolClient } from 'pg';
import { Observable, Subject } from 'rxjs';
import { filter } from 'rxjs/operators';
import { z } from 'zod';
import { orchestratorConfig } from '../config/orchestrator.config';
import { runLockedDdl } from '../database/ddl';

const LOG_CHANNEL = 'lane_logs';

const LANE_LOGS_NOTIFY_TRIGGER_SQL = `
CREATE OR REPLACE FUNCTION notify_lane_log_insert()
RETURNS TRIGGER AS $$
DECLARE
  payload text;
  line_trunc text;
BEGIN
  line_trunc := left(NEW.log_line, 7000);
  IF length(NEW.log_line) > 7000 THEN
    line_trunc := line_trunc || '…';
  END IF;
  payload := json_build_object(
    'lane_id', NEW.lane_id,
    'step', NEW.step,
    'log_line', line_trunc,
    'log_level', coalesce(NEW.log_level, 'info'),
    'timestamp', NEW.timestamp,
    'id', NEW.id
  )::text;
  PERFORM pg_notify('lane_logs', payload);
  RETURN NEW;
END;
$$ LANGUAGE plpgsql;

DROP TRIGGER IF EXISTS lane_logs_notify ON lane_logs;
CREATE TRIGGER lane_logs_notify
  AFTER INSERT ON lane_logs
  FOR EACH ROW
  EXECUTE FUNCTION notify_lane_log_insert();
`;

const LogStreamEventSchema = z.object({
  lane_id: z.string(),
  step: z.string(),
  log_line: z.string(),
  log_level: z.string(),
  timestamp: z.string(),
  id: z.coerce.string().optional(),
});

export type LogStreamEvent = z.infer<typeof LogStreamEventSchema>;

/**
 * Real-time lane logs: DB is source of truth + event emitter.
 * - Postgres trigger on lane_logs NOTIFYs on INSERT; this service only LISTENs and forwards.
 * - appendLog() only INSERTs; the trigger does NOTIFY.
 * Worker processes write logs but do not listen.
 */
@Injectable()
export class LogStreamService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(LogStreamService.name);
  private pool: Pool | null = null;
  private listenClient: PoolClient | null = null;
  private stopped = false;
  private readonly logSubject = new Subject<LogStreamEvent>();

  constructor(
    private readonly configService: ConfigService,
    private readonly dataSource: DataSource,
    @Inject(orchestratorConfig.KEY)
    private readonly settings: ConfigType<typeof orchestratorConfig>,
  ) {}

  private getPool(): Pool {
    if (!this.pool) {
      this.pool = new Pool({
        connectionString: this.configService.getOrThrow<string>('DATABASE_URL'),
      });
    }
    return this.pool;
  }

  async onModuleInit(): Promise<void> {
    await this.ensureNotifyTrigger();
    if (!this.settings.runWorkerLoop) await this.startListening();
  }

  async onModuleDestroy(): Promise<void> {
    this.stopped = true;
    if (this.listenClient) {
      this.listenClient.release();
      this.listenClient = null;
    }
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
    this.logSubject.complete();
  }

  /**
   * Ensure Postgres trigger exists: NOTIFY on INSERT into lane_logs.
   * Only run in one process (SYNC_DATABASE=true) to avoid concurrent DDL errors in workers.
   */
  private async ensureNotifyTrigger(): Promise<void> {
    if (this.configService.get('SYNC_DATABASE') !== 'true') return;
    await runLockedDdl(this.dataSource, LANE_LOGS_NOTIFY_TRIGGER_SQL);
  }

  /**
   * Dedicated connection that LISTENs to lane_logs; Postgres sends NOTIFY from trigger.
   */
  private async startListening(): Promise<void> {
    const pool = this.getPool();
    const client = await pool.connect();
    this.listenClient = client;

    client.on('notification', (msg) => {
      if (msg.channel !== LOG_CHANNEL || !msg.payload) return;
      try {
        this.logSubject.next(LogStreamEventSchema.parse(JSON.parse(msg.payload)));
      } catch (err) {
        this.logger.warn(`Dropping malformed log notification: ${String(err)}`);
      }
    });

    let restarting = false;
    const restart = (reason: unknown) => {
      if (restarting || this.stopped) return;
      restarting = true;
      this.logger.warn(`LISTEN connection lost (${String(reason)}); reconnecting`);
      client.release(true);
      if (this.listenClient === client) this.listenClient = null;
      this.scheduleReconnect();
    };

    client.on('error', restart);
    client.on('end', () => restart('connection ended'));

    await client.query(`LISTEN "${LOG_CHANNEL}"`);
  }

  private scheduleReconnect(): void {
    setTimeout(() => {
      if (this.stopped) return;
      this.startListening().catch((err) => {
        this.logger.warn(`LISTEN reconnect failed (${String(err)}); retrying`);
        this.scheduleReconnect();
      });
    }, 1000);
  }

  getLogStream(): Observable<LogStreamEvent> {
    return this.logSubject.asObservable();
  }

  getLogStreamForLane(laneId: string): Observable<LogStreamEvent> {
    return this.logSubject.pipe(filter((ev) => ev.lane_id === laneId));
  }

  /**
   * Persist a log line only. Postgres trigger NOTIFYs; we do not publish from the app.
   */
  async appendLog(
    laneId: string,
    step: string,
    logLine: string,
    logLevel = 'info',
  ): Promise<void> {
    await this.dataSource.query(
      `INSERT INTO lane_logs (lane_id, step, log_line, log_level) VALUES ($1, $2, $3, $4)`,
      [laneId, step, logLine, logLevel],
    );
  }
}
