import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  OneToMany,
} from 'typeorm';
import { PipelineRun } from './pipeline-run.entity';
import type { PipelineConfig } from '../../queue/dto/pipeline.dto';

/**
 * Pipeline definition: one build-verification pipeline per repo.
 * Stores name, repository (for webhook matching), and the validated config
 * (matrix axes, provisioning, stages) as json.
 */
@Entity('pipelines')
export class Pipeline {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 255, unique: true })
  name!: string;

  @Column({ length: 500 })
  repository!: string;

  @Column('jsonb')
  config!: PipelineConfig;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updated_at!: Date;

  @OneToMany(() => PipelineRun, (run) => run.pipeline)
  runs!: PipelineRun[];
}
