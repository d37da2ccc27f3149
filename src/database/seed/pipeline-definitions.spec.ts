import { join } from 'path';
import { InvalidPipelineConfigError } from '../../matrix/matrix.errors';
import { expandMatrix } from '../../matrix/expand-matrix';
import { loadPipelineDefinition, loadPipelineDefinitions, parsePipelineDefinition } from './pipeline-definitions';

const PIPELINES_DIR = join(__dirname, '..', '..', '..', 'pipelines');

describe('pipeline definitions', () => {
  it('loads the shipped build-verification pipeline', () => {
    const definition = loadPipelineDefinition(join(PIPELINES_DIR, 'build-verification.yml'));

    expect(definition.name).toBe('build-verification');
    expect(definition.repository).toBe('example/sprite-renderer');
    expect(definition.config.stages.map((stage) => stage.name)).toEqual(['build', 'lint', 'test', 'docs']);
    expect(definition.config.stages[0].commands).toEqual([
      'rustc --version --verbose',
      'cargo build --verbose --all',
      'cargo test --verbose --all --no-run',
    ]);
    expect(definition.config.timeouts).toEqual({ laneSeconds: 3600 });
  });

  it('expands the shipped pipeline into 3 platforms x 3 channels', () => {
    const { config } = loadPipelineDefinition(join(PIPELINES_DIR, 'build-verification.yml'));
    const lanes = expandMatrix(config.matrix, { imageTemplate: config.pool?.image });

    expect(lanes).toHaveLength(9);
    expect(lanes.map((lane) => lane.id)).toEqual([
      'windows-stable',
      'windows-beta',
      'windows-nightly',
      'mac-stable',
      'mac-beta',
      'mac-nightly',
      'linux-stable',
      'linux-beta',
      'linux-nightly',
    ]);
    expect(lanes[4]).toMatchObject({ image: 'macos-latest', variables: { toolchainChannel: 'beta' } });
  });

  it('finds every definition in a directory', () => {
    expect(loadPipelineDefinitions(PIPELINES_DIR).map((d) => d.name)).toEqual(['build-verification']);
  });

  it('returns nothing for a missing directory', () => {
    expect(loadPipelineDefinitions(join(PIPELINES_DIR, 'does-not-exist'))).toEqual([]);
  });

  it('names a definition after its file when it has no name', () => {
    const definition = parsePipelineDefinition(
      [
        'repository: example/tiny',
        'pipeline:',
        '  matrix:',
        '    - name: channel',
        '      entries:',
        '        - { label: stable, variables: { toolchainChannel: stable } }',
        '  stages:',
        '    - { name: build, commands: [cargo build] }',
      ].join('\n'),
      '/defs/tiny.yaml',
    );

    expect(definition.name).toBe('tiny');
    expect(definition.config.stages[0].commands).toEqual(['cargo build']);
  });

  it('rejects a file without a repository', () => {
    expect(() => parsePipelineDefinition('pipeline: {}\n', 'broken.yml')).toThrow(InvalidPipelineConfigError);
    expect(() => parsePipelineDefinition('pipeline: {}\n', 'broken.yml')).toThrow(
      'Invalid pipeline config: broken.yml: repository: Required',
    );
  });
});
