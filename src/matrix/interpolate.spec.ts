import { interpolate, toEnvName, variablesToEnv } from './interpolate';

describe('interpolate', () => {
  it('replaces every known macro', () => {
    expect(
      interpolate('rustup toolchain install $(toolchainChannel) && rustup default $(toolchainChannel)', {
        toolchainChannel: 'beta',
      }),
    ).toBe('rustup toolchain install beta && rustup default beta');
  });

  it('leaves unknown macros and shell substitutions alone', () => {
    expect(interpolate('echo $(missing) $HOME ${PATH}', {})).toBe('echo $(missing) $HOME ${PATH}');
  });

  it('does not treat inherited object keys as variables', () => {
    expect(interpolate('$(constructor)', {})).toBe('$(constructor)');
  });
});

describe('variablesToEnv', () => {
  it('exposes each variable under its own name and its upper-snake alias', () => {
    expect(variablesToEnv({ imageName: 'ubuntu-latest', 'rustup.channel': 'nightly' })).toEqual({
      imageName: 'ubuntu-latest',
      IMAGENAME: 'ubuntu-latest',
      'rustup.channel': 'nightly',
      RUSTUP_CHANNEL: 'nightly',
    });
  });

  it('does not let an alias replace inherited variables', () => {
    expect(variablesToEnv({ path: 'src/lib', home: '/opt/lanes' }, { PATH: '/usr/bin', HOME: '/root' })).toEqual({
      path: 'src/lib',
      home: '/opt/lanes',
    });
  });

  it('does not let an alias replace a variable of the same name', () => {
    expect(variablesToEnv({ 'cargo.home': 'a', CARGO_HOME: 'b' })).toEqual({ 'cargo.home': 'a', CARGO_HOME: 'b' });
  });

  it('maps names to env-safe upper case', () => {
    expect(toEnvName('toolchain-channel')).toBe('TOOLCHAIN_CHANNEL');
  });
});
