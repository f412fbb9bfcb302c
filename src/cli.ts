#!/usr/bin/env node
import { parseArgs } from 'node:util';
import { ConfigurationError, getConfig } from './config/index.js';
import { HomgarClient } from './clients/homgar.client.js';
import { FileSessionStore, MemorySessionStore } from './clients/session.store.js';
import { AppError } from './utils/errors.js';
import { createStderrLogger, fromPino } from './utils/logger.js';

const USAGE = `Usage: homgar-bridge [--verbose] [--session <file>]

Logs in with HOMGAR_EMAIL and HOMGAR_PASSWORD and prints every home, hub and
subdevice with its current status.`;

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      verbose: { type: 'boolean', short: 'v', default: false },
      session: { type: 'string', short: 's' },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  if (values.help === true) {
    process.stdout.write(`${USAGE}\n`);
    return;
  }

  const config = getConfig();
  const logger = fromPino(createStderrLogger('homgar-bridge', values.verbose === true ? 'debug' : config.logLevel));
  const sessionFile = values.session ?? config.sessionFile;
  const sessionStore =
    sessionFile !== undefined ? new FileSessionStore(sessionFile, logger) : new MemorySessionStore();

  const client = HomgarClient.fromConfig(config, sessionStore, logger);
  await client.ensureLoggedIn(config.homgarEmail, config.homgarPassword);

  const out: string[] = [];
  for (const home of await client.getHomes()) {
    out.push(`(${home.hid}) ${home.name}:`);
    for (const hub of await client.getDevicesForHome(home.hid)) {
      const result = await client.getDeviceStatus(hub);
      out.push(`  - ${hub.toString()}`);
      for (const subdevice of hub.subdevices) {
        out.push(`    + ${subdevice.toString()}`);
      }
      for (const failure of result.failures) {
        out.push(`    ! ${failure.statusId}: ${failure.message}`);
      }
    }
  }
  process.stdout.write(`${out.join('\n')}\n`);
}

main().catch((err: unknown) => {
  if (err instanceof ConfigurationError || err instanceof AppError) {
    process.stderr.write(`${err.message}\n`);
  } else {
    process.stderr.write(`Fatal error: ${String(err)}\n`);
  }
  process.exit(1);
});
