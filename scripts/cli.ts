import { Data, Effect } from 'effect';
import { pathToFileURL } from 'node:url';
import { loadConfigEffect, type Env } from './config.ts';
import { sanitizePathEffect } from './path.ts';

const USAGE = 'Usage: sanitize-path <path>...';

export class UsageError extends Data.TaggedError('UsageError')<{ readonly message: string }> {}

/** Sanitizes every argument with the environment's policy; one output line per path. */
export const runCli = (args: readonly string[], env: Env = process.env) =>
  Effect.gen(function* (_) {
    if (args.length === 0) return yield* _(Effect.fail(new UsageError({ message: USAGE })));
    const config = yield* _(loadConfigEffect(env));
    return yield* _(Effect.forEach(args, (arg) => sanitizePathEffect(arg, config)));
  });

// Only run when executed directly
const isDirect = import.meta.url === pathToFileURL(process.argv[1] || '').href;
if (isDirect) {
  Effect.runPromise(runCli(process.argv.slice(2)))
    .then((lines) => {
      for (const line of lines) console.log(line);
    })
    .catch((err) => {
      console.error(err);
      process.exit(1);
    });
}
