import { ApiPropertyOptional } from '@nestjs/swagger';

export class UpdatePipelineDto {
  @ApiPropertyOptional({ example: 'build-verification' })
  name?: string;

  @ApiPropertyOptional({ example: 'example/sprite-renderer' })
  repository?: string;

  @ApiPropertyOptional({
    description: 'Replaces the whole pipeline config. Runs already triggered keep their snapshot.',
  })
  config?: Record<string, unknown>;
}
