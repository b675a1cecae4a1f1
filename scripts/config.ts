import { Data, Effect } from 'effect';
import type { Flavor } from './path.ts';

export type Env = Readonly<Record<string, string | undefined>>;

export interface SanitizeConfig {
  readonly fat: boolean;
  readonly trim: boolean;
  readonly warn: boolean;
  readonly flavor: Flavor;
}

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);
const FALSY = new Set(['0', 'false', 'no', 'off']);

export class ConfigError extends Data.TaggedError('ConfigError')<{
  readonly message: string;
  readonly variable: string;
  readonly value: string;
}> {}

const invalid = (variable: string, value: string): ConfigError =>
  new ConfigError({ message: `Invalid value for ${variable}: '${value}'`, variable, value });

function readFlag(env: Env, name: string, fallback: boolean): boolean {
  const raw = (env[name] || '').trim().toLowerCase();
  if (!raw) return fallback;
  if (TRUTHY.has(raw)) return true;
  if (FALSY.has(raw)) return false;
  throw invalid(name, raw);
}

function readFlavor(env: Env): Flavor {
  const raw = (env.PATH_SANITIZE_FLAVOR || 'posix').trim().toLowerCase();
  if (raw === 'posix' || raw === 'windows') return raw;
  throw invalid('PATH_SANITIZE_FLAVOR', raw);
}

/**
 * Reads the sanitizer policy from the environment:
 * PATH_SANITIZE_FAT, PATH_SANITIZE_TRIM, PATH_SANITIZE_WARN (on by default)
 * and PATH_SANITIZE_FLAVOR (`posix` or `windows`).
 */
export function loadConfig(env: Env = process.env): SanitizeConfig {
  return {
    fat: readFlag(env, 'PATH_SANITIZE_FAT', false),
    trim: readFlag(env, 'PATH_SANITIZE_TRIM', false),
    warn: readFlag(env, 'PATH_SANITIZE_WARN', true),
    flavor: readFlavor(env),
  };
}

export const loadConfigEffect = (env: Env = process.env): Effect.Effect<SanitizeConfig, ConfigError> =>
  Effect.suspend((): Effect.Effect<SanitizeConfig, ConfigError> => {
    try {
      return Effect.succeed(loadConfig(env));
    } catch (e) {
      return e instanceof ConfigError ? Effect.fail(e) : Effect.die(e);
    }
  });
