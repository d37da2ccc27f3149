import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { LaneRecord } from './lane.entity';

/**
 * Outcome of one stage in one lane attempt. A retried lane gets a fresh set of rows
 * under the next attempt number.
 */
@Entity('stage_results')
@Index(['lane_id', 'attempt', 'stage_index'], { unique: true })
export class StageResultRecord {
  @PrimaryGeneratedColumn({ type: 'bigint' })
  id!: string;

  @Column({ type: 'uuid' })
  lane_id!: string;

  @ManyToOne(() => LaneRecord, (lane) => lane.stage_results, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'lane_id' })
  lane!: LaneRecord;

  @Column({ type: 'int', default: 0 })
  attempt!: number;

  @Column({ type: 'int' })
  stage_index!: number;

  @Column({ length: 255 })
  stage_name!: string;

  /** success | failed | cancelled | skipped */
  @Column({ length: 50 })
  status!: string;

  @Column({ type: 'int', nullable: true })
  exit_code!: number | null;

  @Column({ type: 'varchar', length: 50, nullable: true })
  failure_kind!: string | null;

  @Column('text', { default: '' })
  output!: string;

  @Column({ type: 'int', default: 0 })
  duration_ms!: number;

  @Column({ type: 'timestamptz', nullable: true })
  started_at!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  completed_at!: Date | null;
}
