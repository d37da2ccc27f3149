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
import { PipelineRun } from './pipeline-run.entity';
import { LaneLog } from './lane-log.entity';
import { StageResultRecord } from './stage-result.entity';

/**
 * Lane queue: one expanded matrix combination per row.
 * Workers claim via FOR UPDATE SKIP LOCKED; claimed_by/heartbeat_at support dead-worker reclaim.
 * Lanes of a run are independent, so there is no ordering gate between them.
 */
@Entity('lanes')
@Index(['status', 'created_at', 'lane_order'])
@Index(['pipeline_run_id', 'lane_key'], { unique: true })
@Index(['heartbeat_at'])
export class LaneRecord {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  pipeline_run_id!: string;

  @ManyToOne(() => PipelineRun, (run) => run.lanes, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'pipeline_run_id' })
  pipeline_run!: PipelineRun;

  /** Lane id from matrix expansion, e.g. linux-stable */
  @Column({ length: 255 })
  lane_key!: string;

  /** Declaration order, for stable listings only */
  @Column({ type: 'int', default: 0 })
  lane_order!: number;

  @Column('jsonb')
  labels!: Record<string, string>;

  @Column('jsonb')
  variables!: Record<string, string>;

  @Column({ length: 255 })
  image!: string;

  /** pending | running | success | failed | cancelled */
  @Column({ length: 50, default: 'pending' })
  status!: string;

  /** stage | provisioning | infrastructure */
  @Column({ type: 'varchar', length: 50, nullable: true })
  failure_kind!: string | null;

  @Column({ default: false })
  cancel_requested!: boolean;

  @Column({ type: 'varchar', length: 100, nullable: true })
  claimed_by!: string | null;

  @Column({ type: 'timestamptz', nullable: true })
  claimed_at!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  heartbeat_at!: Date | null;

  /** Infrastructure retries used so far */
  @Column({ default: 0 })
  retry_count!: number;

  @Column({ default: 0 })
  max_retries!: number;

  @Column({ type: 'timestamptz', nullable: true })
  started_at!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  completed_at!: Date | null;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @OneToMany(() => StageResultRecord, (stage) => stage.lane)
  stage_results!: StageResultRecord[];

  @OneToMany(() => LaneLog, (log) => log.lane)
  logs!: LaneLog[];
}
