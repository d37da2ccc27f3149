import type { Variables } from './matrix.types';

const MACRO_PATTERN = /\$\(([A-Za-z_][A-Za-z0-9_.]*)\)/g;

/**
 * Resolve `$(name)` macros against lane variables.
 * Unknown macros are left as written so the shell sees them unchanged.
 */
export function interpolate(template: string, variables: Variables): string {
  return template.replace(MACRO_PATTERN, (macro, name: string) =>
    Object.prototype.hasOwnProperty.call(variables, name) ? variables[name] : macro,
  );
}

/** imageName -> IMAGENAME, rustup.toolchain -> RUSTUP_TOOLCHAIN */
export function toEnvName(name: string): string {
  return name.replace(/[^A-Za-z0-9_]/g, '_').toUpperCase();
}

/**
 * Lane variables as process environment: each variable under its own name
 * and under its upper-snake alias. An alias never replaces a variable of that
 * exact name, nor anything already set in `inherited` (PATH, HOME, ...).
 */
export function variablesToEnv(
  variables: Variables,
  inherited: Readonly<Record<string, string | undefined>> = {},
): Record<string, string> {
  const env: Record<string, string> = { ...variables };
  for (const [name, value] of Object.entries(variables)) {
    const alias = toEnvName(name);
    if (Object.prototype.hasOwnProperty.call(env, alias) || inherited[alias] !== undefined) continue;
    env[alias] = value;
  }
  return env;
}
