import pino from 'pino';
import {
  changeTenantStatus,
  issueCredential,
  registerTenant,
} from './application/index.js';
import { describeTenantTopology, isTenantStatus, TENANT_STATUSES } from './domain/index.js';
import { createOutboxRuntime, loadConfig } from './infrastructure/index.js';

/**
 * Tenant provisioning CLI.
 *
 *   provision create <routing_name> [description]
 *   provision rotate-key <tenant_id>
 *   provision set-status <tenant_id> <active|suspended|deactivated>
 *
 * Results go to stdout as JSON; the API key is printed once and never logged.
 */
const USAGE = [
  'Usage:',
  '  provision create <routing_name> [description]',
  '  provision rotate-key <tenant_id>',
  `  provision set-status <tenant_id> <${TENANT_STATUSES.join('|')}>`,
].join('\n');

function print(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

async function main(argv: string[]): Promise<number> {
  const [command, first, second] = argv;
  if (command === undefined || first === undefined) {
    process.stderr.write(`${USAGE}\n`);
    return 2;
  }

  const config = loadConfig();
  const log = pino({ level: config.logLevel });
  const runtime = await createOutboxRuntime(config, log);
  const { deps } = runtime;

  try {
    switch (command) {
      case 'create': {
        const registered = await registerTenant(deps, { routing_name: first, description: second ?? null });
        print({
          tenant: registered.tenant,
          api_key: registered.api_key,
          key_id: registered.credential.key_id,
          topology: describeTenantTopology(deps.settings.topology, registered.tenant.routing_name),
        });
        return 0;
      }
      case 'rotate-key': {
        const issued = await issueCredential(deps, first);
        print({ tenant_id: first, api_key: issued.api_key, key_id: issued.credential.key_id });
        return 0;
      }
      case 'set-status': {
        if (second === undefined || !isTenantStatus(second)) {
          process.stderr.write(`${USAGE}\n`);
          return 2;
        }
        const tenant = await changeTenantStatus(deps, first, second);
        print({ tenant });
        return 0;
      }
      default:
        process.stderr.write(`Unknown command: ${command}\n${USAGE}\n`);
        return 2;
    }
  } finally {
    await runtime.shutdown();
  }
}

main(process.argv.slice(2))
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    process.stderr.write(`provision failed: ${message}\n`);
    process.exit(1);
  });
