import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  OneToMany,
  Index,
} from 'typeorm';
import { Pipeline } from './pipeline.entity';
import { LaneRecord } from './lane.entity';
import type { PipelineConfig } from '../../queue/dto/pipeline.dto';

/**
 * One execution of a pipeline (triggered by git push or manually).
 * config_snapshot freezes the pipeline config at trigger time; every lane runs that copy
 * even if the pipeline is edited mid-run.
 * Status is derived from the lanes by a Postgres trigger (see DatabaseSeedService).
 */
@Entity('pipeline_runs')
@Index(['pipeline_id', 'created_at'])
export class PipelineRun {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  pipeline_id!: string;

  @ManyToOne(() => Pipeline, (p) => p.runs, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'pipeline_id' })
  pipeline!: Pipeline;

  @Column({ length: 50 })
  trigger_type!: string;

  @Column('jsonb', { nullable: true })
  trigger_metadata!: Record<string, unknown> | null;

  @Column('jsonb')
  config_snapshot!: PipelineConfig;

  /** pending | running | success | failed | cancelled */
  @Column({ length: 50, default: 'pending' })
  status!: string;

  @Column({ type: 'timestamptz', nullable: true })
  started_at!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  completed_at!: Date | null;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @OneToMany(() => LaneRecord, (lane) => lane.pipeline_run)
  lanes!: LaneRecord[];
}
