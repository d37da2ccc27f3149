import { Injectable, NotFoundException } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { Pipeline } from '../../database/entities/pipeline.entity';
import { expandMatrix } from '../../matrix/expand-matrix';
import type { Lane } from '../../matrix/matrix.types';
import { parsePipelineConfig, type PipelineConfig } from '../../queue/dto/pipeline.dto';

export interface PipelineInput {
  name: string;
  repository: string;
  config: unknown;
}

/**
 * Validate a config and make sure its matrix expands; returns the normalized config.
 * @throws PipelineConfigError
 */
export function validatePipelineConfig(raw: unknown): PipelineConfig {
  const config = parsePipelineConfig(raw);
  expandMatrix(config.matrix, { imageTemplate: config.pool?.image });
  return config;
}

@Injectable()
export class PipelinesService {
  constructor(private readonly dataSource: DataSource) {}

  private get repo() {
    return this.dataSource.getRepository(Pipeline);
  }

  async findAll(): Promise<Pipeline[]> {
    return this.repo.find({ order: { created_at: 'DESC' } });
  }

  async findOne(id: string): Promise<Pipeline | null> {
    return this.repo.findOne({ where: { id } });
  }

  async findByRepository(repo: string): Promise<Pipeline | null> {
    return this.repo.findOne({ where: { repository: repo } });
  }

  async create(input: PipelineInput): Promise<Pipeline> {
    const pipeline = this.repo.create({
      name: input.name,
      repository: input.repository,
      config: validatePipelineConfig(input.config),
    });
    return this.repo.save(pipeline);
  }

  async update(id: string, input: Partial<PipelineInput>): Promise<Pipeline> {
    const pipeline = await this.repo.findOne({ where: { id } });
    if (!pipeline) throw new NotFoundException('Pipeline not found');

    if (input.name !== undefined) pipeline.name = input.name;
    if (input.repository !== undefined) pipeline.repository = input.repository;
    if (input.config !== undefined) pipeline.config = validatePipelineConfig(input.config);
    return this.repo.save(pipeline);
  }

  async remove(id: string): Promise<void> {
    const result = await this.repo.delete(id);
    if (result.affected === 0) throw new NotFoundException('Pipeline not found');
  }

  /** Dry run of matrix expansion for a stored pipeline. */
  async previewLanes(id: string): Promise<Lane[]> {
    const pipeline = await this.findOne(id);
    if (!pipeline) throw new NotFoundException('Pipeline not found');
    const config = parsePipelineConfig(pipeline.config);
    return expandMatrix(config.matrix, { imageTemplate: config.pool?.image });
  }
}
