import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Effect } from 'effect';
import { ConfigError, loadConfig, loadConfigEffect } from '../scripts/config.ts';

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    assert.deepEqual(loadConfig({}), { fat: false, trim: false, warn: true, flavor: 'posix' });
  });

  it('parses flags and flavor case-insensitively', () => {
    const env = {
      PATH_SANITIZE_FAT: 'yes',
      PATH_SANITIZE_TRIM: '1',
      PATH_SANITIZE_WARN: 'OFF',
      PATH_SANITIZE_FLAVOR: 'Windows',
    };
    assert.deepEqual(loadConfig(env), { fat: true, trim: true, warn: false, flavor: 'windows' });
  });

  it('rejects values it does not understand', () => {
    assert.throws(
      () => loadConfig({ PATH_SANITIZE_FAT: 'maybe' }),
      (err: unknown) => err instanceof ConfigError && err.message === "Invalid value for PATH_SANITIZE_FAT: 'maybe'",
    );
    assert.throws(() => loadConfig({ PATH_SANITIZE_FLAVOR: 'dos' }), ConfigError);
  });

  it('fails the Effect variant with the tagged error', async () => {
    const err = await Effect.runPromise(Effect.flip(loadConfigEffect({ PATH_SANITIZE_TRIM: 'sometimes' })));
    assert.equal(err._tag, 'ConfigError');
    assert.equal(err.variable, 'PATH_SANITIZE_TRIM');
    assert.equal(err.value, 'sometimes');
  });
});
