import { ApiProperty } from '@nestjs/swagger';

export class CreatePipelineDto {
  @ApiProperty({ example: 'build-verification' })
  name!: string;

  @ApiProperty({
    example: 'example/sprite-renderer',
    description: 'Must match what your git webhook sends',
  })
  repository!: string;

  @ApiProperty({
    description:
      'Pipeline config JSON (matrix axes, pool image, provisioning, stages). Validated, then stored in pipelines.config (jsonb).',
    example: {
      matrix: [
        {
          name: 'platform-toolchain',
          entries: [
            { label: 'linux-stable', variables: { imageName: 'ubuntu-latest', toolchainChannel: 'stable' } },
            { label: 'linux-nightly', variables: { imageName: 'ubuntu-latest', toolchainChannel: 'nightly' } },
          ],
        },
      ],
      pool: { image: '$(imageName)' },
      provision: { commands: ['rustup default $(toolchainChannel)'] },
      stages: [
        { name: 'build', commands: ['cargo build --verbose --all'] },
        { name: 'test', commands: ['cargo test --verbose --all'] },
      ],
    },
  })
  config!: Record<string, unknown>;
}
