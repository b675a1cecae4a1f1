import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Effect } from 'effect';
import { runCli } from '../scripts/cli.ts';

const quiet = { PATH_SANITIZE_WARN: 'off' };

describe('runCli', () => {
  it('prints one sanitized path per argument', async () => {
    const lines = await Effect.runPromise(runCli(['abc|def', 'C:\\x', 'ok/path'], quiet));
    assert.deepEqual(lines, ['abc_def', '/C:/x', 'ok/path']);
  });

  it('honours the environment policy', async () => {
    const env = { ...quiet, PATH_SANITIZE_FLAVOR: 'windows', PATH_SANITIZE_FAT: 'true' };
    const lines = await Effect.runPromise(runCli(['C:/clock$.txt'], env));
    assert.deepEqual(lines, ['C:\\_clock$_.txt']);
  });

  it('fails without arguments', async () => {
    const err = await Effect.runPromise(Effect.flip(runCli([], quiet)));
    assert.equal(err._tag, 'UsageError');
    assert.equal(err.message, 'Usage: sanitize-path <path>...');
  });

  it('fails on a bad configuration with a tagged error', async () => {
    const recovered = await Effect.runPromise(
      runCli(['x'], { PATH_SANITIZE_FLAVOR: 'dos' }).pipe(
        Effect.catchTag('ConfigError', (e) => Effect.succeed([`${e.variable}=${e.value}`])),
      ),
    );
    assert.deepEqual(recovered, ['PATH_SANITIZE_FLAVOR=dos']);
  });
});
