import { expandMatrix } from './expand-matrix';
import { DuplicateLaneError, DuplicateVariableError, EmptyMatrixError, PipelineConfigError } from './matrix.errors';
import type { AxisDefinition } from './matrix.types';

const platform: AxisDefinition = {
  name: 'platform',
  entries: [
    { label: 'A', variables: { imageName: 'X', channel: 'stable' } },
    { label: 'B', variables: { imageName: 'X', channel: 'nightly' } },
    { label: 'C', variables: { imageName: 'Y', channel: 'stable' } },
  ],
};

describe('expandMatrix', () => {
  it('yields one lane per entry of a single axis, in declaration order', () => {
    const lanes = expandMatrix([platform]);

    expect(lanes.map((lane) => lane.id)).toEqual(['A', 'B', 'C']);
    expect(lanes[0]).toEqual({
      id: 'A',
      labels: { platform: 'A' },
      variables: { imageName: 'X', channel: 'stable' },
      image: 'X',
    });
    expect(lanes[1].variables).toEqual({ imageName: 'X', channel: 'nightly' });
    expect(lanes[2].variables).toEqual({ imageName: 'Y', channel: 'stable' });
    expect(lanes[2].image).toBe('Y');
  });

  it('takes the Cartesian product of several axes, first axis outermost', () => {
    const lanes = expandMatrix([
      {
        name: 'os',
        entries: [
          { label: 'linux', variables: { imageName: 'ubuntu-latest' } },
          { label: 'mac', variables: { imageName: 'macos-latest' } },
        ],
      },
      {
        name: 'channel',
        entries: [
          { label: 'stable', variables: { toolchainChannel: 'stable' } },
          { label: 'beta', variables: { toolchainChannel: 'beta' } },
          { label: 'nightly', variables: { toolchainChannel: 'nightly' } },
        ],
      },
    ]);

    expect(lanes.map((lane) => lane.id)).toEqual([
      'linux/stable',
      'linux/beta',
      'linux/nightly',
      'mac/stable',
      'mac/beta',
      'mac/nightly',
    ]);
    expect(lanes[4]).toEqual({
      id: 'mac/beta',
      labels: { os: 'mac', channel: 'beta' },
      variables: { imageName: 'macos-latest', toolchainChannel: 'beta' },
      image: 'macos-latest',
    });
    expect(new Set(lanes.map((lane) => lane.id)).size).toBe(lanes.length);
  });

  it('resolves the image template from lane variables', () => {
    const [lane] = expandMatrix([platform], { imageTemplate: 'registry.local/$(imageName):$(channel)' });
    expect(lane.image).toBe('registry.local/X:stable');
  });

  it('keeps unknown macros in the image template as written', () => {
    const [lane] = expandMatrix([platform], { imageTemplate: '$(pool)-$(imageName)' });
    expect(lane.image).toBe('$(pool)-X');
  });

  it('returns frozen lanes', () => {
    const [lane] = expandMatrix([platform]);
    expect(Object.isFrozen(lane)).toBe(true);
    expect(Object.isFrozen(lane.variables)).toBe(true);
    expect(Object.isFrozen(lane.labels)).toBe(true);
  });

  it('does not modify its input', () => {
    const axes = [structuredClone(platform)];
    expandMatrix(axes);
    expect(axes).toEqual([platform]);
  });

  it('rejects an empty axis set', () => {
    expect(() => expandMatrix([])).toThrow(EmptyMatrixError);
    expect(() => expandMatrix([])).toThrow('Nothing to run: matrix declares no axes');
  });

  it('rejects an axis with no entries', () => {
    expect(() => expandMatrix([platform, { name: 'channel', entries: [] }])).toThrow(
      "Nothing to run: axis 'channel' has no entries",
    );
  });

  it('rejects two entries of one axis sharing a label', () => {
    const axis: AxisDefinition = {
      name: 'platform',
      entries: [
        { label: 'A', variables: { imageName: 'X' } },
        { label: 'A', variables: { imageName: 'Y' } },
      ],
    };

    expect(() => expandMatrix([axis])).toThrow(DuplicateLaneError);
    expect(() => expandMatrix([axis])).toThrow("Axis 'platform' declares entry 'A' more than once");
  });

  it('rejects two axes binding the same variable', () => {
    const other: AxisDefinition = {
      name: 'toolchain',
      entries: [{ label: 'stable', variables: { channel: 'stable' } }],
    };

    let caught: unknown;
    try {
      expandMatrix([platform, other]);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(DuplicateVariableError);
    expect(caught).toBeInstanceOf(PipelineConfigError);
    expect(caught).toMatchObject({
      name: 'DuplicateVariableError',
      variable: 'channel',
      axes: ['platform', 'toolchain'],
    });
  });
});
