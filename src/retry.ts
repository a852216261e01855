import { parseArgs } from 'node:util';
import pino from 'pino';
import { redeliver, resend, retryFilterSchema } from './application/index.js';
import { createOutboxRuntime, loadConfig } from './infrastructure/index.js';

/**
 * Runs one resend or redeliver batch and prints the counts, so a cron job
 * or any other scheduler can drive the retry coordinator.
 *
 *   retry resend|redeliver [--days N] [--max-try-count N]
 *                          [--event-type T]... [--tenant ID] [--limit N]
 */
const USAGE = 'Usage: retry <resend|redeliver> [--days N] [--max-try-count N] '
  + '[--event-type T]... [--tenant ID] [--limit N]';

function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

async function main(argv: string[]): Promise<number> {
  const { positionals, values } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      'days': { type: 'string' },
      'max-try-count': { type: 'string' },
      'event-type': { type: 'string', multiple: true },
      'tenant': { type: 'string' },
      'limit': { type: 'string' },
    },
  });

  const mode = positionals[0];
  if (mode !== 'resend' && mode !== 'redeliver') {
    process.stderr.write(`${USAGE}\n`);
    return 2;
  }

  const config = loadConfig();
  const log = pino({ level: config.logLevel });

  const parsed = retryFilterSchema({
    days: config.outbox.defaultLookbackDays,
    max_try_count: config.outbox.defaultMaxTryCount,
    max_limit: config.outbox.retryBatchLimit,
  }).safeParse({
    days: toNumber(values['days']),
    max_try_count: toNumber(values['max-try-count']),
    event_types: values['event-type'],
    tenant_id: values['tenant'],
    limit: toNumber(values['limit']),
  });

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    process.stderr.write(`Invalid arguments: ${problems}\n${USAGE}\n`);
    return 2;
  }

  const runtime = await createOutboxRuntime(config, log);
  try {
    const result = mode === 'resend'
      ? await resend(runtime.deps, parsed.data)
      : await redeliver(runtime.deps, parsed.data);
    process.stdout.write(`${JSON.stringify({ mode, ...result })}\n`);
    return 0;
  } finally {
    await runtime.shutdown();
  }
}

main(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    process.stderr.write(`retry failed: ${message}\n`);
    process.exit(1);
  });
