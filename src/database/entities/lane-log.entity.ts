import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { LaneRecord } from './lane.entity';

@Entity('lane_logs')
@Index(['lane_id', 'timestamp'])
export class LaneLog {
  @PrimaryGeneratedColumn({ type: 'bigint' })
  id!: string;

  @Column({ type: 'uuid' })
  lane_id!: string;

  @ManyToOne(() => LaneRecord, (lane) => lane.logs, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'lane_id' })
  lane!: LaneRecord;

  /** Stage name or provisioning step */
  @Column({ length: 255, default: '' })
  step!: string;

  @Column('text')
  log_line!: string;

  @Column({ length: 20, default: 'info' })
  log_level!: string;

  @Column({ type: 'timestamptz', default: () => 'CURRENT_TIMESTAMP' })
  timestamp!: Date;
}
